import * as Sentry from "@sentry/node";

/**
 * Initialise Sentry when a DSN is configured. Without one every
 * Sentry call in the app is a no-op.
 */
export function initSentry(): boolean {
  const dsn = process.env.SENTRY_DSN;
  if (!dsn) {
    console.warn("SENTRY_DSN not set - error reporting disabled");
    return false;
  }

  Sentry.init({
    dsn,
    environment: process.env.NODE_ENV ?? "development",
    tracesSampleRate: 0,
  });
  return true;
}

/**
 * Add a breadcrumb for tracking user flow through the app.
 * Useful for debugging what led up to an error.
 */
export function addBreadcrumb(
  category: string,
  message: string,
  data?: Record<string, unknown>
) {
  Sentry.addBreadcrumb({
    category,
    message,
    data,
    level: "info",
  });
}

/**
 * Record a failure that was recovered from and never shown to the user
 */
export function captureRecoveredFailure(
  message: string,
  tags: Record<string, string>,
  extra?: Record<string, unknown>
) {
  Sentry.captureMessage(message, {
    level: "warning",
    tags,
    extra,
  });
}
