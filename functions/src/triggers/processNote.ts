import { onDocumentCreated } from 'firebase-functions/v2/firestore';
import { logger } from 'firebase-functions/v2';
import * as admin from 'firebase-admin';
import type { firestore } from 'firebase-admin';
import { getSchedulingServices } from '../services/domain/serviceContainer';
import { getNoteExtractionService } from '../services/noteExtraction';
import {
  processNote,
  type NoteProcessingDependencies,
} from '../services/noteProcessingService';
import { describeError } from '../services/scheduleErrors';
import { captureException, flushSentry } from '../utils/sentry';

type NoteDocumentRef = Pick<firestore.DocumentReference, 'update'>;

const readString = (data: firestore.DocumentData, field: string): string => {
  const value = data[field];
  return typeof value === 'string' ? value.trim() : '';
};

/**
 * Runs extraction + step creation for a freshly created note and records the
 * outcome on the note document. Returns false when the note was skipped.
 */
export async function handleCreatedNote(
  noteId: string,
  data: firestore.DocumentData,
  ref: NoteDocumentRef,
  dependencies: NoteProcessingDependencies,
): Promise<boolean> {
  const content = readString(data, 'content');
  const patientId = readString(data, 'patientId');

  if (!content || !patientId) {
    logger.warn(`[processNoteTrigger] Note ${noteId} is missing content or patientId, skipping`);
    return false;
  }

  try {
    const result = await processNote({ noteId, patientId, content }, dependencies);
    await ref.update({
      processingStatus: 'completed',
      stepIds: result.stepIds,
      processingError: null,
      processedAt: admin.firestore.Timestamp.now(),
    });
  } catch (error) {
    logger.error(`[processNoteTrigger] Failed to process note ${noteId}:`, error);
    captureException(error, { noteId, trigger: 'processNoteTrigger' });
    await ref.update({
      processingStatus: 'failed',
      processingError: describeError(error),
      processedAt: admin.firestore.Timestamp.now(),
    });
    await flushSentry();
  }

  return true;
}

export const processNoteTrigger = onDocumentCreated(
  {
    document: 'notes/{noteId}',
    timeoutSeconds: 120,
    memory: '512MiB',
  },
  async (event) => {
    const snapshot = event.data;
    if (!snapshot) {
      logger.warn('[processNoteTrigger] No data in event');
      return;
    }

    const data = snapshot.data();
    if (!data) {
      return;
    }

    await handleCreatedNote(snapshot.id, data, snapshot.ref, {
      extractor: getNoteExtractionService(),
      processor: getSchedulingServices().actionableStepProcessor,
    });
  },
);
