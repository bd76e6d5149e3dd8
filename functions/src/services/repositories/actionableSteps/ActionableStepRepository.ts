import type { firestore } from 'firebase-admin';
import type { ChecklistPriority, ScheduleDefinition } from '../../../types/schedule';

export type ActionableStepType = 'Checklist' | 'Plan';
export type ActionableStepStatus = 'pending' | 'scheduled' | 'completed';

type ActionableStepBase = {
  id: string;
  noteId: string;
  patientId: string | null;
  description: string;
  status: ActionableStepStatus;
  isCompleted: boolean;
  position: number;
  dueDate: firestore.Timestamp;
  createdAt: firestore.Timestamp;
  completedAt: firestore.Timestamp | null;
};

export type ChecklistStepRecord = ActionableStepBase & {
  type: 'Checklist';
  priority: ChecklistPriority;
};

export type PlanStepRecord = ActionableStepBase & {
  type: 'Plan';
  schedule: ScheduleDefinition;
  duration: number;
  startDate: firestore.Timestamp;
};

export type ActionableStepRecord = ChecklistStepRecord | PlanStepRecord;

export interface ActionableStepRepository {
  /** Reserves a document id so schedule state can reference a step before it is written. */
  allocateId(): string;
  listByNote(noteId: string): Promise<ActionableStepRecord[]>;
  getById(stepId: string): Promise<ActionableStepRecord | null>;
  createMany(steps: ActionableStepRecord[]): Promise<string[]>;
  deleteByNote(noteId: string): Promise<number>;
  markCompleted(stepId: string, completedAt: Date): Promise<ActionableStepRecord | null>;
}
