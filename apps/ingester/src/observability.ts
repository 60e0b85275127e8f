/**
 * FILE PURPOSE: Sentry error reporting for the worker and the one-shot script
 * HOW: No-op when SENTRY_DSN is not set; captureException before init does nothing.
 */

import * as Sentry from '@sentry/node';

export function initSentry(dsn: string | undefined = process.env.SENTRY_DSN): boolean {
  if (!dsn) return false;
  Sentry.init({
    dsn,
    environment: process.env.NODE_ENV ?? 'production',
    tracesSampleRate: 0,
    sendDefaultPii: false,
  });
  return true;
}

/** Capture a fatal error and wait for it to be sent before the process exits. */
export async function reportFatal(err: unknown): Promise<void> {
  Sentry.captureException(err);
  await Sentry.flush(2000);
}

export function reportError(err: unknown): void {
  Sentry.captureException(err);
}
