import type { ErrorEvent } from '@sentry/node';
import type { Application } from 'express';

type SentryUtils = typeof import('../sentry');
type SentryMock = {
  init: jest.Mock;
  withScope: jest.Mock;
  captureException: jest.Mock;
  setupExpressErrorHandler: jest.Mock;
  flush: jest.Mock;
};
type LoggerMock = { logger: { info: jest.Mock } };

const TEST_DSN = 'https://public@example.ingest.sentry.io/1';

function loadSentryUtils() {
  let loaded: { utils: SentryUtils; sentry: SentryMock; functions: LoggerMock } | undefined;
  jest.isolateModules(() => {
    loaded = {
      utils: require('../sentry'),
      sentry: require('@sentry/node'),
      functions: require('firebase-functions'),
    };
  });
  if (!loaded) {
    throw new Error('Could not load sentry utils');
  }
  return loaded;
}

describe('sentry utils', () => {
  const app = { use: jest.fn() } as unknown as Application;

  it('stays disabled without a DSN', async () => {
    const { utils, sentry, functions } = loadSentryUtils();

    utils.initSentry('');
    utils.captureException(new Error('boom'), { noteId: 'note-1' });
    utils.setupSentryErrorHandler(app);
    await utils.flushSentry();

    expect(sentry.init).not.toHaveBeenCalled();
    expect(sentry.captureException).not.toHaveBeenCalled();
    expect(sentry.setupExpressErrorHandler).not.toHaveBeenCalled();
    expect(sentry.flush).not.toHaveBeenCalled();
    expect(functions.logger.info).toHaveBeenCalledWith('[sentry] SENTRY_DSN not configured. Error tracking disabled.');
  });

  it('initializes once with a DSN and reports through it', async () => {
    const { utils, sentry } = loadSentryUtils();

    utils.initSentry(TEST_DSN);
    utils.initSentry(TEST_DSN);

    expect(sentry.init).toHaveBeenCalledTimes(1);
    expect(sentry.init).toHaveBeenCalledWith(
      expect.objectContaining({
        dsn: TEST_DSN,
        environment: 'test',
        enabled: false,
        beforeSend: utils.scrubSentryEvent,
      }),
    );

    const error = new Error('boom');
    utils.captureException(error, { noteId: 'note-1' });
    expect(sentry.withScope).toHaveBeenCalledTimes(1);
    expect(sentry.captureException).toHaveBeenCalledWith(error);

    utils.setupSentryErrorHandler(app);
    expect(sentry.setupExpressErrorHandler).toHaveBeenCalledWith(app);

    await utils.flushSentry(500);
    expect(sentry.flush).toHaveBeenCalledWith(500);
  });

  it('redacts request bodies, query strings and authorization headers', () => {
    const { utils } = loadSentryUtils();
    const event: ErrorEvent = {
      type: undefined,
      request: {
        url: 'https://example.test/v1/notes/note-1/due',
        data: '{"patientId":"patient-1"}',
        query_string: 'patientId=patient-1',
        headers: { authorization: 'Bearer test-token', 'content-type': 'application/json' },
      },
    };

    expect(utils.scrubSentryEvent(event).request).toEqual({
      url: 'https://example.test/v1/notes/note-1/due',
      data: '[REDACTED]',
      query_string: '[REDACTED]',
      headers: { authorization: '[REDACTED]', 'content-type': 'application/json' },
    });
  });

  it('leaves events without a request untouched', () => {
    const { utils } = loadSentryUtils();
    const event: ErrorEvent = { type: undefined, message: 'boom' };

    expect(utils.scrubSentryEvent(event)).toEqual({ type: undefined, message: 'boom' });
  });
});
