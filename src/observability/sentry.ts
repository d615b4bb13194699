import * as Sentry from '@sentry/node';
import type { Application } from 'express';

let enabled = false;

export function initSentry(dsn: string | undefined) {
  if (!dsn) return;
  Sentry.init({ dsn, tracesSampleRate: 0.1 });
  enabled = true;
}

/** Reports to Sentry when it was initialised; no-op otherwise. */
export function reportError(err: unknown, context: Record<string, string> = {}) {
  if (!enabled) return;
  Sentry.captureException(err, { tags: context });
}

// must be registered after all routes
export function sentryErrorHandler(app: Application) {
  if (enabled) Sentry.setupExpressErrorHandler(app);
}
