import * as Sentry from "@sentry/node";

import { serverEnv } from "@/lib/env/server";

let initialized = false;

export function initErrorReporting(): void {
  if (initialized) return;
  initialized = true;
  const dsn = serverEnv.SENTRY_DSN ?? undefined;
  Sentry.init({
    dsn: dsn ?? "",
    enabled: Boolean(dsn),
    environment: serverEnv.SENTRY_ENVIRONMENT ?? serverEnv.NODE_ENV,
    tracesSampleRate: serverEnv.SENTRY_TRACES_SAMPLE_RATE,
  });
}

/** Logs an unexpected error and forwards it to Sentry when reporting is enabled. */
export function reportUnexpectedError(
  scope: string,
  error: unknown,
  context: Record<string, unknown> = {},
): void {
  console.error(scope, {
    ...context,
    error: error instanceof Error ? error.message : String(error),
  });
  Sentry.captureException(error, { tags: { scope }, extra: context });
}

export async function flushErrorReporting(timeoutMs = 2000): Promise<void> {
  if (!initialized) return;
  await Sentry.flush(timeoutMs);
}
