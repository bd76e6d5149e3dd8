import type { firestore } from 'firebase-admin';
import type { ScheduleDefinition, StoredScheduleDefinition } from '../../../types/schedule';

export type ScheduleDeactivationReason = 'exhausted' | 'cancelled';

export type ScheduleStateRecord = {
  id: string;
  noteId: string;
  stepId: string | null;
  patientId: string;
  description: string;
  schedule: StoredScheduleDefinition;
  totalOccurrences: number;
  completedOccurrences: number;
  lastCompletion: firestore.Timestamp | null;
  isActive: boolean;
  createdAt: firestore.Timestamp;
  updatedAt?: firestore.Timestamp;
  deactivatedAt?: firestore.Timestamp | null;
  deactivationReason?: ScheduleDeactivationReason | null;
};

export type ScheduleStateWrite = {
  noteId: string;
  stepId: string | null;
  patientId: string;
  description: string;
  schedule: ScheduleDefinition;
  createdAt: Date;
};

export interface ScheduleStateRepository {
  /** Replaces whatever state the note had with a fresh, active one. */
  replaceForNote(state: ScheduleStateWrite): Promise<ScheduleStateRecord>;
  getByNoteId(noteId: string): Promise<ScheduleStateRecord | null>;
  /**
   * Atomically records one completion on the active state matching (noteId, stepId, patientId),
   * deactivating it when the run is exhausted. Null when no active state matches.
   */
  recordCompletion(
    noteId: string,
    stepId: string,
    patientId: string,
    completedAt: Date,
  ): Promise<ScheduleStateRecord | null>;
  deactivateActiveByNote(noteId: string, reason: ScheduleDeactivationReason, at: Date): Promise<number>;
}
