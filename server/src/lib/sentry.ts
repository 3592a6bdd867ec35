import * as Sentry from '@sentry/node';
import logger from './logger.js';

const SENSITIVE_KEY_PATTERN = /key|token|secret|password|authorization/i;

let enabled = false;

function scrub(record: Record<string, unknown> | undefined): void {
  if (!record) return;
  for (const key of Object.keys(record)) {
    if (SENSITIVE_KEY_PATTERN.test(key)) {
      record[key] = '[REDACTED]';
    }
  }
}

/** No-op when no DSN is configured. */
export function initSentry(dsn: string | undefined, environment: string): void {
  if (!dsn) {
    logger.info('SENTRY_DSN not set — Sentry disabled');
    return;
  }

  Sentry.init({
    dsn,
    environment,
    tracesSampleRate: 0.1,
    beforeSend(event) {
      scrub(event.extra);
      for (const crumb of event.breadcrumbs ?? []) {
        scrub(crumb.data);
      }
      return event;
    },
  });
  enabled = true;
  logger.info('Sentry initialized');
}

export function captureError(err: unknown, context?: Record<string, unknown>): void {
  if (!enabled) return;
  Sentry.withScope((scope) => {
    if (context) {
      scope.setExtras(context);
    }
    Sentry.captureException(err);
  });
}

export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!enabled) return;
  try {
    await Sentry.flush(timeoutMs);
  } catch (err) {
    logger.warn({ err }, 'Sentry flush failed during shutdown');
  }
}
