import * as Sentry from '@sentry/node';
import { config } from './config.js';

// Error reporting is only enabled when a DSN is configured
const sentryEnabled = !!config.sentry.dsn;

if (sentryEnabled) {
  Sentry.init({
    dsn: config.sentry.dsn,
    environment: process.env.SENTRY_ENVIRONMENT || 'development',
    sampleRate: 1.0,
    tracesSampleRate: 0,
    serverName: process.env.SENTRY_SERVER_NAME || 'catalog-crawler-local',
  });
}

// Manual error capture helper
export function captureError(error: Error, context?: Record<string, unknown>): void {
  if (!sentryEnabled) return;

  Sentry.withScope((scope) => {
    if (context) {
      scope.setExtras(context);
    }
    Sentry.captureException(error);
  });
}

// Add breadcrumb for debugging
export function addBreadcrumb(breadcrumb: {
  category?: string;
  message: string;
  level?: 'debug' | 'info' | 'warning' | 'error';
  data?: Record<string, unknown>;
}): void {
  if (!sentryEnabled) return;
  Sentry.addBreadcrumb(breadcrumb);
}

/**
 * Wait for queued events to be delivered before the process exits
 */
export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!sentryEnabled) return;
  await Sentry.flush(timeoutMs);
}
