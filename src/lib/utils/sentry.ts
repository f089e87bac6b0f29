/**
 * Sentry error tracking
 *
 * Captures failed post builds and warnings with breadcrumbs leading up to them.
 * Nothing is sent unless SENTRY_DSN is set.
 */

import * as Sentry from '@sentry/node';
import { getConfig } from '../../types/config';

let isInitialized = false;
let isEnabled = false;

/**
 * Initialize Sentry
 *
 * This should be called once at application startup.
 */
export function initializeSentry(): void {
  if (isInitialized) {
    return;
  }

  const dsn = getConfig('SENTRY_DSN', '');
  const environment = getConfig('SENTRY_ENVIRONMENT', 'development');
  const release = getConfig('SENTRY_RELEASE', '') || undefined;

  if (!dsn) {
    isInitialized = true;
    return;
  }

  try {
    Sentry.init({
      dsn,
      environment,
      release,
      tracesSampleRate: environment === 'production' ? 0.1 : 1.0,
      maxBreadcrumbs: 50,
      attachStacktrace: true,
      initialScope: {
        tags: {
          runtime: 'node',
          'node.version': process.version,
        },
      },
    });

    console.info('[Sentry] Error tracking initialized successfully');
    isInitialized = true;
    isEnabled = true;
  } catch (error) {
    console.error('[Sentry] Failed to initialize:', error);
    isInitialized = true;
  }
}

/**
 * Whether Sentry was initialized with a DSN
 */
export function isSentryEnabled(): boolean {
  return isEnabled;
}

/**
 * Capture an exception and send to Sentry
 *
 * @returns Event ID from Sentry
 */
export function captureException(
  error: Error,
  context?: Record<string, unknown>
): string | undefined {
  if (!isSentryEnabled()) {
    return undefined;
  }

  return Sentry.captureException(error, {
    extra: context,
  });
}

/**
 * Capture a message and send to Sentry
 *
 * @returns Event ID from Sentry
 */
export function captureMessage(
  message: string,
  level: Sentry.SeverityLevel = 'info',
  context?: Record<string, unknown>
): string | undefined {
  if (!isSentryEnabled()) {
    return undefined;
  }

  return Sentry.captureMessage(message, {
    level,
    extra: context,
  });
}

/**
 * Add breadcrumb for the events leading up to an error
 */
export function addBreadcrumb(
  message: string,
  category: string,
  level: Sentry.SeverityLevel = 'info',
  data?: Record<string, unknown>
): void {
  if (!isSentryEnabled()) {
    return;
  }

  Sentry.addBreadcrumb({
    message,
    category,
    level,
    data,
    timestamp: Date.now() / 1000,
  });
}

/**
 * Set custom tag for filtering and grouping errors
 */
export function setTag(key: string, value: string): void {
  if (!isSentryEnabled()) {
    return;
  }

  Sentry.setTag(key, value);
}

/**
 * Runs an async operation inside a Sentry span
 *
 * @param name - Span name
 * @param op - Operation type
 */
export async function withSpan<T>(name: string, op: string, operation: () => Promise<T>): Promise<T> {
  if (!isSentryEnabled()) {
    return operation();
  }

  return Sentry.startSpan({ name, op }, () => operation());
}

/**
 * Flush all pending events to Sentry
 *
 * Should be called before the process exits.
 *
 * @param timeout - Timeout in milliseconds (default: 2000)
 */
export async function flushSentry(timeout: number = 2000): Promise<boolean> {
  if (!isSentryEnabled()) {
    return true;
  }

  return Sentry.flush(timeout);
}

export type { SeverityLevel } from '@sentry/node';
