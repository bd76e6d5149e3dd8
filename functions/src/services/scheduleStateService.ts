/**
 * Schedule State Service
 *
 * Owns the lifecycle of a plan item's recurrence: seeds schedule state and the
 * due cache, advances state on check-in, answers due polls from the cache and
 * cancels a note's schedules. The store is the source of truth; the due cache
 * is a disposable projection that expires after a day.
 */

import * as functions from 'firebase-functions';
import { schedulingConfig } from '../config';
import type { DueCacheRepository } from './repositories/dueCache/DueCacheRepository';
import type {
  ScheduleStateRecord,
  ScheduleStateRepository,
} from './repositories/scheduleStates/ScheduleStateRepository';
import { toDate } from './repositories/common/timestamps';
import { runCacheOperation, runStoreOperation, ScheduleNotFoundError } from './scheduleErrors';
import { calculateNextOccurrence, startOfNextDay } from '../utils/scheduleRecurrence';
import type { DueNotification, ScheduleDefinition } from '../types/schedule';

export type StoreScheduleStateInput = {
  noteId: string;
  patientId: string;
  description: string;
  schedule: ScheduleDefinition;
  stepId?: string | null;
};

export type CompletionResult =
  | { status: 'exhausted'; completedOccurrences: number; totalOccurrences: number }
  | {
      status: 'scheduled';
      completedOccurrences: number;
      totalOccurrences: number;
      nextOccurrence: string | null;
    };

export type ScheduleStateServiceDependencies = {
  scheduleStateRepository: ScheduleStateRepository;
  dueCacheRepository: DueCacheRepository;
  clock?: () => Date;
  dueCacheTtlSeconds?: number;
};

const TAG = 'ScheduleState';

export function buildDueCacheKey(noteId: string, patientId: string): string {
  return `schedule:${noteId}:${patientId}`;
}

export function buildTrackedKeysKey(noteId: string): string {
  return `schedule:${noteId}:keys`;
}

export class ScheduleStateService {
  private readonly scheduleStateRepository: ScheduleStateRepository;
  private readonly dueCacheRepository: DueCacheRepository;
  private readonly clock: () => Date;
  private readonly ttlSeconds: number;

  constructor(dependencies: ScheduleStateServiceDependencies) {
    this.scheduleStateRepository = dependencies.scheduleStateRepository;
    this.dueCacheRepository = dependencies.dueCacheRepository;
    this.clock = dependencies.clock ?? (() => new Date());
    this.ttlSeconds = dependencies.dueCacheTtlSeconds ?? schedulingConfig.dueCacheTtlSeconds;
  }

  private async writeDueEntry(
    noteId: string,
    patientId: string,
    nextOccurrence: Date,
    description: string,
    stepId: string | null,
  ): Promise<void> {
    await this.dueCacheRepository.setTracked(
      buildDueCacheKey(noteId, patientId),
      { nextOccurrence: nextOccurrence.toISOString(), description, stepId },
      buildTrackedKeysKey(noteId),
      this.ttlSeconds,
    );
  }

  /**
   * Next owed occurrence after a completion. When today's run is already
   * satisfied the first occurrence of the following day is used instead.
   */
  private nextOccurrenceAfterCompletion(state: ScheduleStateRecord, now: Date): Date | null {
    const lastCompletion = toDate(state.lastCompletion);
    return (
      calculateNextOccurrence(state.schedule, lastCompletion, now) ??
      calculateNextOccurrence(state.schedule, lastCompletion, startOfNextDay(now))
    );
  }

  async storeScheduleState(input: StoreScheduleStateInput): Promise<ScheduleStateRecord> {
    const now = this.clock();
    const stepId = input.stepId ?? null;

    // Validates fixed times before anything is written
    const nextOccurrence = calculateNextOccurrence(input.schedule, null, now);

    const state = await runStoreOperation(TAG, 'storeScheduleState', () =>
      this.scheduleStateRepository.replaceForNote({
        noteId: input.noteId,
        stepId,
        patientId: input.patientId,
        description: input.description,
        schedule: input.schedule,
        createdAt: now,
      }),
    );

    if (nextOccurrence) {
      try {
        await this.writeDueEntry(input.noteId, input.patientId, nextOccurrence, input.description, stepId);
      } catch (error) {
        functions.logger.warn(
          `[ScheduleState] Stored schedule for note ${input.noteId} but could not seed the due cache:`,
          error,
        );
      }
    }

    functions.logger.info(`[ScheduleState] Stored schedule state for note ${input.noteId}`, {
      stepId,
      type: input.schedule.type,
      nextOccurrence: nextOccurrence?.toISOString() ?? null,
    });

    return state;
  }

  async markCompleted(noteId: string, patientId: string, stepId: string): Promise<CompletionResult> {
    const now = this.clock();
    const state = await runStoreOperation(TAG, 'markCompleted', () =>
      this.scheduleStateRepository.recordCompletion(noteId, stepId, patientId, now),
    );

    if (!state) {
      throw new ScheduleNotFoundError(
        `No active schedule found for note ${noteId}, step ${stepId}, patient ${patientId}`,
      );
    }

    const key = buildDueCacheKey(noteId, state.patientId);

    if (!state.isActive) {
      // The step is done either way; a stale entry expires with its TTL
      try {
        await this.dueCacheRepository.delete(key);
      } catch (error) {
        functions.logger.warn(
          `[ScheduleState] Schedule for note ${noteId} exhausted but could not clear the due cache:`,
          error,
        );
      }
      functions.logger.info(
        `[ScheduleState] Schedule for note ${noteId} exhausted after ${state.completedOccurrences} completions`,
      );
      return {
        status: 'exhausted',
        completedOccurrences: state.completedOccurrences,
        totalOccurrences: state.totalOccurrences,
      };
    }

    const nextOccurrence = this.nextOccurrenceAfterCompletion(state, now);
    await runCacheOperation(TAG, 'markCompleted', async () => {
      if (nextOccurrence) {
        await this.writeDueEntry(noteId, state.patientId, nextOccurrence, state.description, state.stepId);
      } else {
        await this.dueCacheRepository.delete(key);
      }
    });

    functions.logger.info(`[ScheduleState] Marked completion for note ${noteId}, step ${stepId}`, {
      completedOccurrences: state.completedOccurrences,
      totalOccurrences: state.totalOccurrences,
    });

    return {
      status: 'scheduled',
      completedOccurrences: state.completedOccurrences,
      totalOccurrences: state.totalOccurrences,
      nextOccurrence: nextOccurrence?.toISOString() ?? null,
    };
  }

  async getDueNotifications(noteId: string, patientId: string): Promise<DueNotification[]> {
    const now = this.clock();
    const key = buildDueCacheKey(noteId, patientId);
    const entry = await runCacheOperation(TAG, 'getDueNotifications', () => this.dueCacheRepository.get(key));

    if (!entry) {
      functions.logger.debug(`[ScheduleState] No due entry cached for ${key}`);
      return [];
    }

    if (Date.parse(entry.nextOccurrence) > now.getTime()) {
      return [];
    }

    return [
      {
        noteId,
        patientId,
        stepId: entry.stepId,
        description: entry.description,
        nextOccurrence: entry.nextOccurrence,
      },
    ];
  }

  async cancelNoteSchedules(noteId: string): Promise<number> {
    const now = this.clock();
    const cancelled = await runStoreOperation(TAG, 'cancelNoteSchedules', () =>
      this.scheduleStateRepository.deactivateActiveByNote(noteId, 'cancelled', now),
    );

    const trackedKeysKey = buildTrackedKeysKey(noteId);
    try {
      const keys = await this.dueCacheRepository.listTrackedKeys(trackedKeysKey);
      if (keys.length > 0) {
        await this.dueCacheRepository.deleteMany([...keys, trackedKeysKey]);
      }
    } catch (error) {
      functions.logger.warn(`[ScheduleState] Could not clear due cache for note ${noteId}:`, error);
    }

    if (cancelled > 0) {
      functions.logger.info(`[ScheduleState] Cancelled ${cancelled} schedule(s) for note ${noteId}`);
    }

    return cancelled;
  }
}
