/**
 * Sentry Error Tracking
 *
 * Set the SENTRY_DSN environment variable to enable reporting. Without a DSN,
 * errors are only logged. Request bodies and query strings never leave the
 * process: notes, plans and check-ins carry patient data.
 */

import * as Sentry from '@sentry/node';
import type { ErrorEvent } from '@sentry/node';
import type { Application } from 'express';
import * as functions from 'firebase-functions';
import { sentryConfig } from '../config';

const REDACTED = '[REDACTED]';

let activeDsn: string | null = null;

export function scrubSentryEvent(event: ErrorEvent): ErrorEvent {
  const request = event.request;
  if (!request) {
    return event;
  }

  if (request.data !== undefined) {
    request.data = REDACTED;
  }

  // Due polls carry the patient id in the query
  if (request.query_string !== undefined) {
    request.query_string = REDACTED;
  }

  if (request.headers?.authorization) {
    request.headers = { ...request.headers, authorization: REDACTED };
  }

  return event;
}

/**
 * Initializes Sentry once per instance. Call before the express app is built.
 */
export function initSentry(dsn: string = sentryConfig.dsn): void {
  if (activeDsn !== null) {
    return;
  }
  activeDsn = dsn;

  if (!dsn) {
    functions.logger.info('[sentry] SENTRY_DSN not configured. Error tracking disabled.');
    return;
  }

  Sentry.init({
    dsn,
    environment: sentryConfig.environment,
    release: sentryConfig.release,
    tracesSampleRate: sentryConfig.environment === 'production' ? 0.1 : 1.0,
    enabled: sentryConfig.environment !== 'test',
    beforeSend: scrubSentryEvent,
    ignoreErrors: ['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED'],
  });

  functions.logger.info('[sentry] Sentry initialized');
}

function isEnabled(): boolean {
  return Boolean(activeDsn);
}

export function captureException(error: unknown, context?: Record<string, unknown>): void {
  if (!isEnabled()) {
    return;
  }

  Sentry.withScope((scope) => {
    if (context) {
      scope.setExtras(context);
    }
    Sentry.captureException(error);
  });
}

/**
 * Registers Sentry's express error handler.
 * Call after all routes but before the custom error handler.
 */
export function setupSentryErrorHandler(app: Application): void {
  if (!isEnabled()) {
    return;
  }
  Sentry.setupExpressErrorHandler(app);
}

/** Sends pending events before a background function returns. */
export async function flushSentry(timeout = 2000): Promise<void> {
  if (!isEnabled()) {
    return;
  }
  await Sentry.flush(timeout);
}
