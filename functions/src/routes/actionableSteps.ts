/**
 * Actionable Steps API Routes
 *
 * Note-scoped steps, due polling, check-ins and schedule cancellation.
 * Mounted at /v1/notes.
 */

import { Router, type NextFunction, type Response } from 'express';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import type { ActionableStepProcessor } from '../services/actionableStepProcessor';
import type { ActionableStepRecord } from '../services/repositories/actionableSteps/ActionableStepRepository';
import { toDate } from '../services/repositories/common/timestamps';
import { scheduleDefinitionSchema } from '../services/scheduleDefinition';
import { isSchedulingError } from '../services/scheduleErrors';
import { getSchedulingServices } from '../services/domain/serviceContainer';
import { writeLimiter } from '../middlewares/rateLimit';

export type ActionableStepsRouteProcessor = Pick<
  ActionableStepProcessor,
  | 'createActionableSteps'
  | 'getActionableSteps'
  | 'getDueNotifications'
  | 'cancelNoteSchedules'
  | 'checkIn'
>;

// =============================================================================
// Validation Schemas
// =============================================================================

const createStepsSchema = z.object({
  checklist: z
    .array(
      z.object({
        description: z.string().trim().min(1),
        priority: z.enum(['High', 'Medium', 'Low']).optional(),
      }),
    )
    .default([]),
  plan: z
    .array(
      z.object({
        description: z.string().trim().min(1),
        patientId: z.string().trim().min(1),
        schedule: scheduleDefinitionSchema,
        startDate: z.string().datetime({ offset: true }).nullish(),
      }),
    )
    .default([]),
});

const patientQuerySchema = z.object({
  patientId: z.string().trim().min(1),
});

const STATUS_BY_CODE = {
  validation_failed: 400,
  not_found: 404,
  store_unavailable: 503,
  cache_unavailable: 503,
} as const;

function handleRouteError(operation: string, error: unknown, res: Response, next: NextFunction) {
  if (error instanceof z.ZodError) {
    res.status(400).json({
      code: 'validation_failed',
      message: 'Invalid request',
      details: error.errors,
    });
    return;
  }

  if (isSchedulingError(error)) {
    const status = STATUS_BY_CODE[error.code];
    if (status >= 500) {
      functions.logger.error(`[actionableSteps] ${operation} failed:`, error);
    }
    res.status(status).json({
      code: error.code,
      message: error.message,
    });
    return;
  }

  next(error);
}

const serializeTimestamp = (value: unknown): string | null => toDate(value)?.toISOString() ?? null;

function serializeStep(step: ActionableStepRecord) {
  const common = {
    id: step.id,
    noteId: step.noteId,
    patientId: step.patientId,
    description: step.description,
    status: step.status,
    isCompleted: step.isCompleted,
    position: step.position,
    dueDate: serializeTimestamp(step.dueDate),
    createdAt: serializeTimestamp(step.createdAt),
    completedAt: serializeTimestamp(step.completedAt),
  };

  if (step.type === 'Checklist') {
    return { ...common, type: step.type, priority: step.priority };
  }

  return {
    ...common,
    type: step.type,
    schedule: step.schedule,
    duration: step.duration,
    startDate: serializeTimestamp(step.startDate),
  };
}

export function createActionableStepsRouter(
  getProcessor: () => ActionableStepsRouteProcessor = () => getSchedulingServices().actionableStepProcessor,
): Router {
  const router = Router();

  // ===========================================================================
  // GET /v1/notes/:noteId/steps - List the note's steps in insertion order
  // ===========================================================================

  router.get('/:noteId/steps', async (req, res, next) => {
    try {
      const steps = await getProcessor().getActionableSteps(req.params.noteId);
      res.json({ steps: steps.map(serializeStep) });
    } catch (error) {
      handleRouteError('List steps', error, res, next);
    }
  });

  // ===========================================================================
  // POST /v1/notes/:noteId/steps - Replace the note's steps and schedules
  // ===========================================================================

  router.post('/:noteId/steps', writeLimiter, async (req, res, next) => {
    try {
      const body = createStepsSchema.parse(req.body ?? {});
      const stepIds = await getProcessor().createActionableSteps({
        noteId: req.params.noteId,
        checklist: body.checklist,
        plan: body.plan.map((item) => ({
          description: item.description,
          patientId: item.patientId,
          schedule: item.schedule,
          startDate: item.startDate ? new Date(item.startDate) : null,
        })),
      });
      res.status(201).json({ stepIds });
    } catch (error) {
      handleRouteError('Create steps', error, res, next);
    }
  });

  // ===========================================================================
  // GET /v1/notes/:noteId/due?patientId= - Poll for due reminders
  // ===========================================================================

  router.get('/:noteId/due', async (req, res, next) => {
    try {
      const { patientId } = patientQuerySchema.parse(req.query);
      const notifications = await getProcessor().getDueNotifications(req.params.noteId, patientId);
      res.json({ notifications });
    } catch (error) {
      handleRouteError('Due poll', error, res, next);
    }
  });

  // ===========================================================================
  // POST /v1/notes/:noteId/steps/:stepId/check-in - Record a completion
  // ===========================================================================

  router.post('/:noteId/steps/:stepId/check-in', writeLimiter, async (req, res, next) => {
    try {
      const { patientId } = patientQuerySchema.parse(req.body ?? {});
      const result = await getProcessor().checkIn(req.params.noteId, patientId, req.params.stepId);
      res.json({ result });
    } catch (error) {
      handleRouteError('Check-in', error, res, next);
    }
  });

  // ===========================================================================
  // DELETE /v1/notes/:noteId/schedules - Cancel all active schedules
  // ===========================================================================

  router.delete('/:noteId/schedules', writeLimiter, async (req, res, next) => {
    try {
      const cancelled = await getProcessor().cancelNoteSchedules(req.params.noteId);
      res.json({ cancelled });
    } catch (error) {
      handleRouteError('Cancel schedules', error, res, next);
    }
  });

  return router;
}

export const actionableStepsRouter = createActionableStepsRouter();
