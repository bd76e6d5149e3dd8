import type { firestore } from 'firebase-admin';
import { requireCollectionName } from '../common/errors';
import { timestampFromDate } from '../common/timestamps';
import type {
  ActionableStepRecord,
  ActionableStepRepository,
} from './ActionableStepRepository';

export const ACTIONABLE_STEPS_COLLECTION = 'actionableSteps';
const MAX_BATCH_SIZE = 500;

function mapStepDoc(
  doc: firestore.DocumentSnapshot<firestore.DocumentData>,
): ActionableStepRecord | null {
  const data = doc.data();
  if (!doc.exists || !data) {
    return null;
  }

  const base = {
    id: doc.id,
    noteId: typeof data.noteId === 'string' ? data.noteId : '',
    patientId: typeof data.patientId === 'string' ? data.patientId : null,
    description: typeof data.description === 'string' ? data.description : '',
    status: data.status ?? 'pending',
    isCompleted: data.isCompleted === true,
    position: typeof data.position === 'number' ? data.position : 0,
    dueDate: data.dueDate,
    createdAt: data.createdAt,
    completedAt: data.completedAt ?? null,
  };

  if (data.type === 'Plan') {
    return {
      ...base,
      type: 'Plan',
      schedule: data.schedule,
      duration: typeof data.duration === 'number' ? data.duration : 0,
      startDate: data.startDate,
    };
  }

  return {
    ...base,
    type: 'Checklist',
    priority: data.priority ?? 'Medium',
  };
}

export class FirestoreActionableStepRepository implements ActionableStepRepository {
  private readonly collectionName: string;

  constructor(
    private readonly db: firestore.Firestore,
    collectionName: string = ACTIONABLE_STEPS_COLLECTION,
  ) {
    this.collectionName = requireCollectionName(collectionName);
  }

  private collection() {
    return this.db.collection(this.collectionName);
  }

  allocateId(): string {
    return this.collection().doc().id;
  }

  async listByNote(noteId: string): Promise<ActionableStepRecord[]> {
    const snapshot = await this.collection()
      .where('noteId', '==', noteId)
      .orderBy('position', 'asc')
      .get();

    return snapshot.docs.flatMap((doc) => {
      const step = mapStepDoc(doc);
      return step ? [step] : [];
    });
  }

  async getById(stepId: string): Promise<ActionableStepRecord | null> {
    const doc = await this.collection().doc(stepId).get();
    return mapStepDoc(doc);
  }

  async createMany(steps: ActionableStepRecord[]): Promise<string[]> {
    const ids: string[] = [];

    for (let index = 0; index < steps.length; index += MAX_BATCH_SIZE) {
      const chunk = steps.slice(index, index + MAX_BATCH_SIZE);
      const batch = this.db.batch();
      chunk.forEach(({ id, ...payload }) => {
        batch.set(this.collection().doc(id), payload);
        ids.push(id);
      });
      await batch.commit();
    }

    return ids;
  }

  async deleteByNote(noteId: string): Promise<number> {
    const snapshot = await this.collection().where('noteId', '==', noteId).get();
    if (snapshot.empty) {
      return 0;
    }

    let deleted = 0;
    for (let index = 0; index < snapshot.docs.length; index += MAX_BATCH_SIZE) {
      const chunk = snapshot.docs.slice(index, index + MAX_BATCH_SIZE);
      const batch = this.db.batch();
      chunk.forEach((doc) => {
        batch.delete(doc.ref);
      });
      await batch.commit();
      deleted += chunk.length;
    }

    return deleted;
  }

  async markCompleted(stepId: string, completedAt: Date): Promise<ActionableStepRecord | null> {
    const ref = this.collection().doc(stepId);
    const existing = await ref.get();
    if (!existing.exists) {
      return null;
    }

    await ref.update({
      status: 'completed',
      isCompleted: true,
      completedAt: timestampFromDate(completedAt),
    });

    return mapStepDoc(await ref.get());
  }
}
