/**
 * @buildmeta/core - Structured logging helpers
 *
 * Uses the backend configured via `configureTelemetry()`.
 */

import { getTelemetry, type MetadataTelemetryEvent } from './telemetry';

export type MetadataLogEvent = MetadataTelemetryEvent;

export type MetadataLogger = (event: MetadataLogEvent) => void;

export const logMetadataEvent: MetadataLogger = (event) => {
  getTelemetry().log(event);
};

/**
 * Create a timer for measuring operation duration.
 * Returns the elapsed time in milliseconds when called.
 *
 * @example
 * const elapsed = createTimer();
 * await submitBadge(input);
 * logMetadataEvent({ event: 'metadata.badge.submitted', durationMs: elapsed() });
 */
export function createTimer(): () => number {
  const start = performance.now();
  return () => Math.round(performance.now() - start);
}
