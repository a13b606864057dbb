/**
 * @studycache/core - Runtime telemetry abstraction
 *
 * Lets the cache emit structured logs and counters without tying it to a
 * specific logging SDK. The host application swaps the backend with
 * `configureCacheTelemetry()`.
 */

export type CacheTelemetryLevel = 'debug' | 'info' | 'warn' | 'error';

export type CacheTelemetryAttributes = Record<string, string | number | boolean>;

/**
 * Structured cache log event.
 */
export interface CacheTelemetryEvent {
  event: string;
  level?: CacheTelemetryLevel;
  durationMs?: number;
  rowCount?: number;
  error?: string;
  [key: string]: unknown;
}

export interface CacheMetrics {
  count(
    name: string,
    value?: number,
    attributes?: CacheTelemetryAttributes
  ): void;
}

/**
 * Unified telemetry interface.
 */
export interface CacheTelemetry {
  log(event: CacheTelemetryEvent): void;
  metrics: CacheMetrics;
  captureException(error: unknown, context?: Record<string, unknown>): void;
}

const noopMetrics: CacheMetrics = {
  count() {},
};

function createConsoleLogger(): (event: CacheTelemetryEvent) => void {
  const defer = (fn: () => void) => globalThis.setImmediate(fn);

  return (event: CacheTelemetryEvent) => {
    defer(() => {
      const level = event.level ?? (event.error ? 'error' : 'info');
      const payload = {
        timestamp: new Date().toISOString(),
        level,
        ...event,
      };
      console.log(JSON.stringify(payload));
    });
  };
}

/**
 * Console-backed default telemetry (JSON lines; metrics are dropped).
 */
export function createDefaultCacheTelemetry(): CacheTelemetry {
  const logger = createConsoleLogger();
  return {
    log(event) {
      logger(event);
    },
    metrics: noopMetrics,
    captureException(error, context) {
      const message =
        error instanceof Error
          ? error.message
          : `Unknown error: ${String(error)}`;
      logger({
        event: 'cache.exception',
        level: 'error',
        error: message,
        ...(context ?? {}),
      });
    },
  };
}

/**
 * Telemetry that discards everything. Handy in tests.
 */
export function createSilentCacheTelemetry(): CacheTelemetry {
  return {
    log() {},
    metrics: noopMetrics,
    captureException() {},
  };
}

let activeCacheTelemetry: CacheTelemetry = createDefaultCacheTelemetry();

export function getCacheTelemetry(): CacheTelemetry {
  return activeCacheTelemetry;
}

/**
 * Replace active telemetry backend.
 */
export function configureCacheTelemetry(telemetry: CacheTelemetry): void {
  activeCacheTelemetry = telemetry;
}

/**
 * Reset telemetry backend to the default console implementation.
 */
export function resetCacheTelemetry(): void {
  activeCacheTelemetry = createDefaultCacheTelemetry();
}

export function captureCacheException(
  error: unknown,
  context?: Record<string, unknown>
): void {
  activeCacheTelemetry.captureException(error, context);
}

export function countCacheMetric(
  name: string,
  value?: number,
  attributes?: CacheTelemetryAttributes
): void {
  activeCacheTelemetry.metrics.count(name, value, attributes);
}
