/**
 * @studycache/core - Structured logging for cache operations
 *
 * Uses the active telemetry backend configured via `configureCacheTelemetry()`.
 */

import { type CacheTelemetryEvent, getCacheTelemetry } from './telemetry';

export type CacheLogEvent = CacheTelemetryEvent;

export type CacheLogger = (event: CacheLogEvent) => void;

export const logCacheEvent: CacheLogger = (event) => {
  getCacheTelemetry().log(event);
};

/**
 * Create a timer for measuring operation duration.
 * Returns the elapsed time in milliseconds when called.
 *
 * @example
 * const elapsed = createCacheTimer();
 * await fetchAssignments(db, gateway, progress);
 * logCacheEvent({ event: 'cache.fetch.assignments', durationMs: elapsed() });
 */
export function createCacheTimer(): () => number {
  const start = performance.now();
  return () => Math.round(performance.now() - start);
}
