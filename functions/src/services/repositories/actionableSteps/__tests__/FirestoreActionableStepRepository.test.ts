import * as admin from 'firebase-admin';
import { buildFirestoreHarness, makeTimestamp } from '../../__tests__/helpers/buildFirestoreHarness';
import type { ChecklistStepRecord, PlanStepRecord } from '../ActionableStepRepository';
import { FirestoreActionableStepRepository } from '../FirestoreActionableStepRepository';

function checklistStep(id: string, position: number, noteId = 'note-1'): ChecklistStepRecord {
  return {
    id,
    noteId,
    patientId: null,
    type: 'Checklist',
    description: `Checklist ${id}`,
    priority: 'Low',
    status: 'pending',
    isCompleted: false,
    position,
    dueDate: makeTimestamp('2025-03-11T10:00:00.000Z'),
    createdAt: makeTimestamp('2025-03-10T10:00:00.000Z'),
    completedAt: null,
  };
}

function planStep(id: string, position: number): PlanStepRecord {
  return {
    id,
    noteId: 'note-1',
    patientId: 'patient-1',
    type: 'Plan',
    description: 'Take 500mg of Paracetamol',
    schedule: { type: 'interval_based', duration: 3, intervalHours: 6 },
    duration: 3,
    startDate: makeTimestamp('2025-03-10T10:00:00.000Z'),
    status: 'scheduled',
    isCompleted: false,
    position,
    dueDate: makeTimestamp('2025-03-13T10:00:00.000Z'),
    createdAt: makeTimestamp('2025-03-10T10:00:00.000Z'),
    completedAt: null,
  };
}

describe('FirestoreActionableStepRepository', () => {
  beforeEach(() => {
    Object.assign(admin.firestore, {
      Timestamp: { fromDate: (date: Date) => makeTimestamp(date) },
    });
  });

  it('allocates ids from the collection', () => {
    const harness = buildFirestoreHarness();
    const repository = new FirestoreActionableStepRepository(harness.db);

    expect(repository.allocateId()).toBe('auto-1');
    expect(repository.allocateId()).toBe('auto-2');
  });

  it('creates steps under their allocated ids and lists them by position', async () => {
    const harness = buildFirestoreHarness();
    const repository = new FirestoreActionableStepRepository(harness.db);

    const ids = await repository.createMany([planStep('step-b', 1), checklistStep('step-a', 0)]);

    expect(ids).toEqual(['step-b', 'step-a']);
    expect(harness.state.actionableSteps['step-a']).not.toHaveProperty('id');
    expect(harness.batches).toEqual([{ commits: 1 }]);

    const steps = await repository.listByNote('note-1');
    expect(steps.map((step) => step.id)).toEqual(['step-a', 'step-b']);
    expect(steps[0]).toMatchObject({ type: 'Checklist', priority: 'Low', status: 'pending' });
    expect(steps[1]).toMatchObject({
      type: 'Plan',
      patientId: 'patient-1',
      duration: 3,
      schedule: { type: 'interval_based', duration: 3, intervalHours: 6 },
    });
    expect(steps[1].type === 'Plan' && steps[1].schedule).toEqual({
      type: 'interval_based',
      duration: 3,
      intervalHours: 6,
    });
  });

  it('deletes only the steps of the given note', async () => {
    const harness = buildFirestoreHarness();
    const repository = new FirestoreActionableStepRepository(harness.db);
    await repository.createMany([checklistStep('step-a', 0), planStep('step-b', 1), checklistStep('step-c', 0, 'note-2')]);

    await expect(repository.deleteByNote('note-1')).resolves.toBe(2);
    expect(Object.keys(harness.state.actionableSteps)).toEqual(['step-c']);
    await expect(repository.deleteByNote('note-1')).resolves.toBe(0);
  });

  it('marks a step completed and returns the updated record', async () => {
    const harness = buildFirestoreHarness();
    const repository = new FirestoreActionableStepRepository(harness.db);
    await repository.createMany([checklistStep('step-a', 0)]);

    const updated = await repository.markCompleted('step-a', new Date('2025-03-10T12:00:00.000Z'));

    expect(updated).toMatchObject({ id: 'step-a', status: 'completed', isCompleted: true });
    expect(updated?.completedAt?.toDate().toISOString()).toBe('2025-03-10T12:00:00.000Z');
    await expect(repository.markCompleted('step-404', new Date())).resolves.toBeNull();
  });

  it('reads a single step by id', async () => {
    const harness = buildFirestoreHarness({
      actionableSteps: {
        'step-x': { noteId: 'note-1', type: 'Checklist', description: 'Call pharmacy', position: 0 },
      },
    });
    const repository = new FirestoreActionableStepRepository(harness.db);

    await expect(repository.getById('step-x')).resolves.toMatchObject({
      id: 'step-x',
      type: 'Checklist',
      priority: 'Medium',
      status: 'pending',
      isCompleted: false,
      completedAt: null,
    });
    await expect(repository.getById('step-404')).resolves.toBeNull();
  });
});
