import * as Sentry from "@sentry/node";

import { errorMessage } from "@guidedeck/shared";

export type ErrorContext = {
  slideNumber?: number;
  kind?: string;
  input?: string;
  [key: string]: unknown;
};

let sentryInitialized = false;

export function initSentry(): boolean {
  if (sentryInitialized) return true;
  const dsn = process.env.SENTRY_DSN;
  if (!dsn) return false;

  Sentry.init({
    dsn,
    environment: process.env.NODE_ENV ?? "development",
    release: process.env.GIT_COMMIT_SHA,
    tracesSampleRate: 0,
  });
  sentryInitialized = true;
  return true;
}

/**
 * Report a failure to Sentry under the given scope tag. Without SENTRY_DSN
 * this does nothing.
 */
export function captureError(scopeName: string, error: unknown, context: ErrorContext = {}): void {
  if (!initSentry()) return;
  const safeError = error instanceof Error ? error : new Error(errorMessage(error));
  Sentry.withScope((scope) => {
    scope.setTag("component", scopeName);
    if (context.kind) scope.setTag("diagram_kind", context.kind);
    if (context.input) scope.setTag("input", context.input);
    scope.setContext("pipeline_context", context);
    Sentry.captureException(safeError);
  });
}

/** Wait for queued events before the process exits. */
export async function flushSentry(timeoutMs = 2_000): Promise<void> {
  if (!sentryInitialized) return;
  await Sentry.flush(timeoutMs);
}
