import * as functions from 'firebase-functions';

export class ScheduleValidationError extends Error {
  readonly code = 'validation_failed' as const;

  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = 'ScheduleValidationError';
  }
}

export class ScheduleNotFoundError extends Error {
  readonly code = 'not_found' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ScheduleNotFoundError';
  }
}

/** The durable schedule/step store failed or was unreachable. */
export class ScheduleStoreError extends Error {
  readonly code = 'store_unavailable' as const;

  constructor(message: string, options: ErrorOptions = {}) {
    super(message, options);
    this.name = 'ScheduleStoreError';
  }
}

/** The due cache failed or was unreachable. */
export class DueCacheError extends Error {
  readonly code = 'cache_unavailable' as const;

  constructor(message: string, options: ErrorOptions = {}) {
    super(message, options);
    this.name = 'DueCacheError';
  }
}

export type SchedulingError =
  | ScheduleValidationError
  | ScheduleNotFoundError
  | ScheduleStoreError
  | DueCacheError;

export function isSchedulingError(error: unknown): error is SchedulingError {
  return (
    error instanceof ScheduleValidationError ||
    error instanceof ScheduleNotFoundError ||
    error instanceof ScheduleStoreError ||
    error instanceof DueCacheError
  );
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs a durable-store call, logging and re-signaling collaborator failures as
 * `ScheduleStoreError`. Domain errors pass through untouched.
 */
export async function runStoreOperation<T>(
  tag: string,
  operation: string,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (isSchedulingError(error)) throw error;
    functions.logger.error(`[${tag}] Store failure during ${operation}:`, error);
    throw new ScheduleStoreError(`Store failed during ${operation}: ${describeError(error)}`, {
      cause: error,
    });
  }
}

export async function runCacheOperation<T>(
  tag: string,
  operation: string,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (isSchedulingError(error)) throw error;
    functions.logger.error(`[${tag}] Due cache failure during ${operation}:`, error);
    throw new DueCacheError(`Due cache failed during ${operation}: ${describeError(error)}`, {
      cause: error,
    });
  }
}
