import * as functions from 'firebase-functions';
import type { ActionableStepProcessor } from './actionableStepProcessor';
import type { NoteInput } from './noteExtraction';
import type { ActionableStepsInput } from '../types/schedule';

export type NoteExtractor = {
  extract(note: NoteInput): Promise<ActionableStepsInput>;
};

export type NoteProcessingDependencies = {
  extractor: NoteExtractor;
  processor: Pick<ActionableStepProcessor, 'createActionableSteps'>;
};

export type NoteProcessingResult = {
  noteId: string;
  stepIds: string[];
  checklistCount: number;
  planCount: number;
};

/**
 * Extracts checklist/plan items from a note and replaces the note's steps with them.
 */
export async function processNote(
  note: NoteInput,
  dependencies: NoteProcessingDependencies,
): Promise<NoteProcessingResult> {
  const extracted = await dependencies.extractor.extract(note);
  const stepIds = await dependencies.processor.createActionableSteps({
    ...extracted,
    noteId: note.noteId,
  });

  functions.logger.info(`[NoteProcessing] Saved ${stepIds.length} actionable step(s) for note ${note.noteId}`);

  return {
    noteId: note.noteId,
    stepIds,
    checklistCount: extracted.checklist.length,
    planCount: extracted.plan.length,
  };
}
