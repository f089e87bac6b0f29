/**
 * Application Insights telemetry utilities
 *
 * Custom events, metrics and dependencies for site builds. Telemetry is only
 * sent when APPLICATIONINSIGHTS_CONNECTION_STRING is set.
 */

import * as appInsights from 'applicationinsights';
import { getConfig } from '../../types/config';
import { toError } from './errors';

/**
 * Telemetry client instance
 */
let telemetryClient: appInsights.TelemetryClient | null = null;
let isInitialized = false;

/**
 * Severity levels for telemetry traces
 */
export const SeverityLevel = appInsights.Contracts.SeverityLevel;
export type SeverityLevel = appInsights.Contracts.SeverityLevel;

/**
 * Initialize Application Insights
 *
 * This should be called once at application startup.
 */
export function initializeTelemetry(): void {
  if (isInitialized) {
    return;
  }

  const connectionString = getConfig('APPLICATIONINSIGHTS_CONNECTION_STRING', '');

  if (!connectionString) {
    isInitialized = true;
    return;
  }

  try {
    // A build is a short-lived batch process: no request or live metrics collection
    appInsights
      .setup(connectionString)
      .setAutoCollectRequests(false)
      .setAutoCollectPerformance(false, false)
      .setAutoCollectExceptions(true)
      .setAutoCollectDependencies(true)
      .setAutoCollectConsole(false)
      .setUseDiskRetryCaching(false)
      .setSendLiveMetrics(false);

    appInsights.start();

    telemetryClient = appInsights.defaultClient;
    telemetryClient.context.tags[telemetryClient.context.keys.cloudRole] = 'post-engine';

    console.info('[Telemetry] Application Insights initialized successfully');
    isInitialized = true;
  } catch (error) {
    console.error('[Telemetry] Failed to initialize Application Insights:', error);
    isInitialized = true;
  }
}

/**
 * Get the telemetry client instance
 */
export function getTelemetryClient(): appInsights.TelemetryClient | null {
  if (!isInitialized) {
    initializeTelemetry();
  }
  return telemetryClient;
}

/**
 * Track a custom event
 *
 * @param name - Event name
 * @param properties - Custom properties
 * @param measurements - Custom measurements (numeric values)
 */
export function trackEvent(
  name: string,
  properties?: Record<string, string>,
  measurements?: Record<string, number>
): void {
  const client = getTelemetryClient();
  if (client) {
    client.trackEvent({
      name,
      properties,
      measurements,
    });
  }
}

/**
 * Track a custom metric
 */
export function trackMetric(
  name: string,
  value: number,
  properties?: Record<string, string>
): void {
  const client = getTelemetryClient();
  if (client) {
    client.trackMetric({
      name,
      value,
      properties,
    });
  }
}

/**
 * Track a dependency (embedding API call, vector index query)
 *
 * @param name - Dependency name
 * @param dependencyTypeName - Dependency type (e.g. 'OpenAI API', 'Pinecone')
 * @param data - Command or request data
 * @param duration - Duration in milliseconds
 * @param success - Whether the dependency call succeeded
 */
export function trackDependency(
  name: string,
  dependencyTypeName: string,
  data: string,
  duration: number,
  success: boolean,
  properties?: Record<string, string>
): void {
  const client = getTelemetryClient();
  if (client) {
    client.trackDependency({
      name,
      dependencyTypeName,
      data,
      duration,
      success,
      resultCode: success ? 0 : 1,
      properties,
    });
  }
}

/**
 * Track an exception
 */
export function trackException(
  error: Error,
  properties?: Record<string, string>
): void {
  const client = getTelemetryClient();
  if (client) {
    client.trackException({
      exception: error,
      properties,
    });
  }
}

/**
 * Track a trace (custom log message)
 */
export function trackTrace(
  message: string,
  severity: SeverityLevel = SeverityLevel.Information,
  properties?: Record<string, string>
): void {
  const client = getTelemetryClient();
  if (client) {
    client.trackTrace({
      message,
      severity,
      properties,
    });
  }
}

/**
 * Flush all telemetry data
 *
 * Should be called before the process exits so buffered telemetry is sent.
 */
export function flushTelemetry(): Promise<void> {
  return new Promise((resolve) => {
    const client = getTelemetryClient();
    if (client) {
      client.flush({ callback: () => resolve() });
    } else {
      resolve();
    }
  });
}

/**
 * Measures an async operation and tracks its duration and outcome as an event
 *
 * @returns The result of the operation
 */
export async function trackOperation<T>(
  name: string,
  operation: () => Promise<T>,
  properties?: Record<string, string>
): Promise<T> {
  const startTime = Date.now();
  let success = true;
  let error: Error | undefined;

  try {
    return await operation();
  } catch (err) {
    success = false;
    error = toError(err);
    trackException(error, { ...properties, operation: name });
    throw err;
  } finally {
    const duration = Date.now() - startTime;
    trackEvent(
      name,
      {
        ...properties,
        success: success.toString(),
        ...(error && { errorMessage: error.message }),
      },
      { duration }
    );
  }
}
