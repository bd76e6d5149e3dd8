/**
 * Actionable Step Processor
 *
 * Turns a note's extracted checklist/plan payload into persisted steps. Each run
 * fully replaces the note's previous steps and schedules; plan steps are handed
 * to the schedule state service for recurrence tracking.
 */

import * as functions from 'firebase-functions';
import type {
  ActionableStepRecord,
  ActionableStepRepository,
  ChecklistStepRecord,
  PlanStepRecord,
} from './repositories/actionableSteps/ActionableStepRepository';
import { timestampFromDate } from './repositories/common/timestamps';
import { validateScheduleDefinition } from './scheduleDefinition';
import { runStoreOperation, ScheduleNotFoundError } from './scheduleErrors';
import type { CompletionResult, ScheduleStateService } from './scheduleStateService';
import type {
  ActionableStepsInput,
  ChecklistItem,
  DueNotification,
  PlanItem,
  ScheduleDefinition,
} from '../types/schedule';

const TAG = 'ActionableSteps';
const DAY_MS = 24 * 60 * 60 * 1000;
const CHECKLIST_DUE_WINDOW_MS = DAY_MS;

export type CheckInResult =
  | { stepId: string; type: 'Checklist'; status: 'completed' }
  | ({ stepId: string; type: 'Plan' } & CompletionResult);

export type ActionableStepProcessorDependencies = {
  actionableStepRepository: ActionableStepRepository;
  scheduleStateService: ScheduleStateService;
  clock?: () => Date;
};

type ValidatedPlanItem = {
  item: PlanItem;
  schedule: ScheduleDefinition;
};

export class ActionableStepProcessor {
  private readonly actionableStepRepository: ActionableStepRepository;
  private readonly scheduleStateService: ScheduleStateService;
  private readonly clock: () => Date;

  constructor(dependencies: ActionableStepProcessorDependencies) {
    this.actionableStepRepository = dependencies.actionableStepRepository;
    this.scheduleStateService = dependencies.scheduleStateService;
    this.clock = dependencies.clock ?? (() => new Date());
  }

  private buildChecklistStep(
    noteId: string,
    item: ChecklistItem,
    position: number,
    now: Date,
  ): ChecklistStepRecord {
    return {
      id: this.actionableStepRepository.allocateId(),
      noteId,
      patientId: null,
      type: 'Checklist',
      description: item.description,
      priority: item.priority ?? 'Medium',
      status: 'pending',
      isCompleted: false,
      position,
      dueDate: timestampFromDate(new Date(now.getTime() + CHECKLIST_DUE_WINDOW_MS)),
      createdAt: timestampFromDate(now),
      completedAt: null,
    };
  }

  private buildPlanStep(
    noteId: string,
    { item, schedule }: ValidatedPlanItem,
    position: number,
    now: Date,
  ): PlanStepRecord {
    const startDate = item.startDate ?? now;
    return {
      id: this.actionableStepRepository.allocateId(),
      noteId,
      patientId: item.patientId,
      type: 'Plan',
      description: item.description,
      schedule,
      duration: schedule.duration,
      startDate: timestampFromDate(startDate),
      status: 'scheduled',
      isCompleted: false,
      position,
      dueDate: timestampFromDate(new Date(startDate.getTime() + schedule.duration * DAY_MS)),
      createdAt: timestampFromDate(now),
      completedAt: null,
    };
  }

  async createActionableSteps(input: ActionableStepsInput): Promise<string[]> {
    const { noteId } = input;
    const now = this.clock();

    const validatedPlan: ValidatedPlanItem[] = input.plan.map((item, index) => ({
      item,
      schedule: validateScheduleDefinition(item.schedule, `plan[${index}].schedule`),
    }));

    await this.scheduleStateService.cancelNoteSchedules(noteId);
    await runStoreOperation(TAG, 'deleteByNote', () => this.actionableStepRepository.deleteByNote(noteId));

    const steps: ActionableStepRecord[] = input.checklist.map((item, index) =>
      this.buildChecklistStep(noteId, item, index, now),
    );

    for (const planItem of validatedPlan) {
      const step = this.buildPlanStep(noteId, planItem, steps.length, now);
      await this.scheduleStateService.storeScheduleState({
        noteId,
        patientId: planItem.item.patientId,
        description: planItem.item.description,
        schedule: planItem.schedule,
        stepId: step.id,
      });
      steps.push(step);
    }

    if (steps.length === 0) {
      functions.logger.info(`[ActionableSteps] Note ${noteId} produced no actionable steps`);
      return [];
    }

    const ids = await runStoreOperation(TAG, 'createMany', () => this.actionableStepRepository.createMany(steps));
    functions.logger.info(`[ActionableSteps] Created ${ids.length} step(s) for note ${noteId}`, {
      checklist: input.checklist.length,
      plan: validatedPlan.length,
    });
    return ids;
  }

  async getActionableSteps(noteId: string): Promise<ActionableStepRecord[]> {
    return runStoreOperation(TAG, 'listByNote', () => this.actionableStepRepository.listByNote(noteId));
  }

  async getDueNotifications(noteId: string, patientId: string): Promise<DueNotification[]> {
    return this.scheduleStateService.getDueNotifications(noteId, patientId);
  }

  async cancelNoteSchedules(noteId: string): Promise<number> {
    return this.scheduleStateService.cancelNoteSchedules(noteId);
  }

  /**
   * Records a patient/caregiver check-in. Checklist steps complete immediately;
   * plan steps advance their schedule and complete once it is exhausted.
   */
  async checkIn(noteId: string, patientId: string, stepId: string): Promise<CheckInResult> {
    const step = await runStoreOperation(TAG, 'getById', () => this.actionableStepRepository.getById(stepId));
    if (!step || step.noteId !== noteId) {
      throw new ScheduleNotFoundError(`No actionable step ${stepId} found for note ${noteId}`);
    }

    if (step.type === 'Checklist') {
      if (!step.isCompleted) {
        await runStoreOperation(TAG, 'markCompleted', () =>
          this.actionableStepRepository.markCompleted(stepId, this.clock()),
        );
      }
      return { stepId, type: 'Checklist', status: 'completed' };
    }

    const result = await this.scheduleStateService.markCompleted(noteId, patientId, stepId);
    if (result.status === 'exhausted') {
      await runStoreOperation(TAG, 'markCompleted', () =>
        this.actionableStepRepository.markCompleted(stepId, this.clock()),
      );
    }

    return { stepId, type: 'Plan', ...result };
  }
}
