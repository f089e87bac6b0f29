/**
 * Structured logging for site builds
 *
 * Every line goes to the console and is mirrored to Application Insights and
 * Sentry when those are configured. LOG_LEVEL (debug, info, warn, error)
 * sets the lowest level written; the default is info.
 */

import { getConfig } from '../../types/config';
import { trackTrace, trackException, SeverityLevel } from './telemetry';
import { captureException, captureMessage, addBreadcrumb } from './sentry';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

interface LogContext {
  [key: string]: unknown;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Whether messages of `level` pass the configured threshold
 */
export function isLevelEnabled(level: LogLevel): boolean {
  const configured = getConfig('LOG_LEVEL', LogLevel.INFO).trim().toUpperCase();
  const threshold = isLogLevel(configured) ? configured : LogLevel.INFO;
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

/**
 * Formats a log message with timestamp and context
 */
function formatLogMessage(
  level: LogLevel,
  message: string,
  context?: LogContext
): string {
  const timestamp = new Date().toISOString();
  const contextStr = context ? ` | ${JSON.stringify(context)}` : '';
  return `[${timestamp}] [${level}] ${message}${contextStr}`;
}

/**
 * Convert LogContext to string properties for Application Insights
 */
function contextToProperties(context?: LogContext): Record<string, string> | undefined {
  if (!context) return undefined;

  const properties: Record<string, string> = {};
  for (const [key, value] of Object.entries(context)) {
    properties[key] = typeof value === 'object' ? JSON.stringify(value) : String(value);
  }
  return properties;
}

/**
 * Log debug message
 */
export function debug(message: string, context?: LogContext): void {
  if (!isLevelEnabled(LogLevel.DEBUG)) return;

  console.debug(formatLogMessage(LogLevel.DEBUG, message, context));
  trackTrace(message, SeverityLevel.Verbose, contextToProperties(context));
  addBreadcrumb(message, 'build', 'debug', context);
}

/**
 * Log informational message
 */
export function info(message: string, context?: LogContext): void {
  if (!isLevelEnabled(LogLevel.INFO)) return;

  console.info(formatLogMessage(LogLevel.INFO, message, context));
  trackTrace(message, SeverityLevel.Information, contextToProperties(context));
  addBreadcrumb(message, 'build', 'info', context);
}

/**
 * Log warning message
 */
export function warn(message: string, context?: LogContext): void {
  if (!isLevelEnabled(LogLevel.WARN)) return;

  console.warn(formatLogMessage(LogLevel.WARN, message, context));
  trackTrace(message, SeverityLevel.Warning, contextToProperties(context));
  captureMessage(message, 'warning', context);
}

/**
 * Log error message; errors are never filtered
 */
export function error(message: string, context?: LogContext): void {
  console.error(formatLogMessage(LogLevel.ERROR, message, context));
  trackTrace(message, SeverityLevel.Error, contextToProperties(context));
  captureMessage(message, 'error', context);
}

/**
 * Log error with full error object details
 */
export function logError(message: string, err: Error, context?: LogContext): void {
  // Wrapping errors in ./errors carry the failure they wrap
  const cause = 'originalError' in err && err.originalError instanceof Error ? err.originalError : undefined;
  error(message, {
    ...context,
    errorName: err.name,
    errorMessage: err.message,
    errorStack: err.stack,
    ...(cause && { causeMessage: cause.message }),
  });

  trackException(err, contextToProperties(context));
  captureException(err, context);
}
