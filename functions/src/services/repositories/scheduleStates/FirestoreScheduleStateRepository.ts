import type { firestore } from 'firebase-admin';
import { requireCollectionName } from '../common/errors';
import { timestampFromDate } from '../common/timestamps';
import type {
  ScheduleDeactivationReason,
  ScheduleStateRecord,
  ScheduleStateRepository,
  ScheduleStateWrite,
} from './ScheduleStateRepository';

export const SCHEDULE_STATES_COLLECTION = 'scheduleStates';
const MAX_BATCH_SIZE = 500;

function toCount(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? Math.max(0, Math.floor(value)) : 0;
}

function mapScheduleStateDoc(
  doc: firestore.DocumentSnapshot<firestore.DocumentData>,
): ScheduleStateRecord | null {
  const data = doc.data();
  if (!doc.exists || !data) {
    return null;
  }

  return {
    id: doc.id,
    noteId: typeof data.noteId === 'string' ? data.noteId : doc.id,
    stepId: typeof data.stepId === 'string' ? data.stepId : null,
    patientId: typeof data.patientId === 'string' ? data.patientId : '',
    description: typeof data.description === 'string' ? data.description : '',
    schedule: data.schedule ?? { type: 'unknown' },
    totalOccurrences: toCount(data.totalOccurrences),
    completedOccurrences: toCount(data.completedOccurrences),
    lastCompletion: data.lastCompletion ?? null,
    isActive: data.isActive === true,
    createdAt: data.createdAt,
    updatedAt: data.updatedAt,
    deactivatedAt: data.deactivatedAt ?? null,
    deactivationReason: data.deactivationReason ?? null,
  };
}

export class FirestoreScheduleStateRepository implements ScheduleStateRepository {
  private readonly collectionName: string;

  constructor(
    private readonly db: firestore.Firestore,
    collectionName: string = SCHEDULE_STATES_COLLECTION,
  ) {
    this.collectionName = requireCollectionName(collectionName);
  }

  private collection() {
    return this.db.collection(this.collectionName);
  }

  async replaceForNote(state: ScheduleStateWrite): Promise<ScheduleStateRecord> {
    const createdAt = timestampFromDate(state.createdAt);
    const payload: Omit<ScheduleStateRecord, 'id'> = {
      noteId: state.noteId,
      stepId: state.stepId,
      patientId: state.patientId,
      description: state.description,
      schedule: state.schedule,
      totalOccurrences: state.schedule.duration,
      completedOccurrences: 0,
      lastCompletion: null,
      isActive: true,
      createdAt,
      updatedAt: createdAt,
      deactivatedAt: null,
      deactivationReason: null,
    };

    await this.collection().doc(state.noteId).set(payload);
    return { id: state.noteId, ...payload };
  }

  async getByNoteId(noteId: string): Promise<ScheduleStateRecord | null> {
    const doc = await this.collection().doc(noteId).get();
    return mapScheduleStateDoc(doc);
  }

  async recordCompletion(
    noteId: string,
    stepId: string,
    patientId: string,
    completedAt: Date,
  ): Promise<ScheduleStateRecord | null> {
    const ref = this.collection().doc(noteId);

    return this.db.runTransaction(async (tx) => {
      const current = mapScheduleStateDoc(await tx.get(ref));
      if (
        !current ||
        !current.isActive ||
        current.stepId !== stepId ||
        current.patientId !== patientId
      ) {
        return null;
      }

      const completedAtTs = timestampFromDate(completedAt);
      const completedOccurrences = current.completedOccurrences + 1;
      const exhausted = completedOccurrences >= current.totalOccurrences;
      const updates = {
        completedOccurrences,
        lastCompletion: completedAtTs,
        updatedAt: completedAtTs,
        ...(exhausted
          ? {
              isActive: false,
              deactivatedAt: completedAtTs,
              deactivationReason: 'exhausted' as const,
            }
          : {}),
      };

      tx.update(ref, updates);
      return { ...current, ...updates };
    });
  }

  async deactivateActiveByNote(
    noteId: string,
    reason: ScheduleDeactivationReason,
    at: Date,
  ): Promise<number> {
    const snapshot = await this.collection()
      .where('noteId', '==', noteId)
      .where('isActive', '==', true)
      .get();

    if (snapshot.empty) {
      return 0;
    }

    const deactivatedAt = timestampFromDate(at);
    let updated = 0;
    for (let index = 0; index < snapshot.docs.length; index += MAX_BATCH_SIZE) {
      const chunk = snapshot.docs.slice(index, index + MAX_BATCH_SIZE);
      const batch = this.db.batch();
      chunk.forEach((doc) => {
        batch.update(doc.ref, {
          isActive: false,
          deactivatedAt,
          deactivationReason: reason,
          updatedAt: deactivatedAt,
        });
      });
      await batch.commit();
      updated += chunk.length;
    }

    return updated;
  }
}
