/**
 * @buildmeta/core - Runtime telemetry abstraction
 *
 * Vendor-neutral logging, tracing, and metrics interfaces. The engine and the
 * HTTP layer emit through the active backend; the default writes JSON lines
 * to stdout and drops spans and metrics.
 */

/**
 * Supported log levels, lowest first.
 */
export const METADATA_LOG_LEVELS = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
] as const;

export type MetadataLogLevel = (typeof METADATA_LOG_LEVELS)[number];

/**
 * Primitive attribute value used by traces and metrics.
 */
export type MetadataTelemetryAttributeValue = string | number | boolean;

export type MetadataTelemetryAttributes = Record<
  string,
  MetadataTelemetryAttributeValue
>;

/**
 * Structured log event.
 */
export interface MetadataTelemetryEvent {
  event: string;
  level?: MetadataLogLevel;
  durationMs?: number;
  rowCount?: number;
  error?: string;
  [key: string]: unknown;
}

export interface MetadataSpanOptions {
  name: string;
  op?: string;
  attributes?: MetadataTelemetryAttributes;
}

export interface MetadataSpan {
  setAttribute(name: string, value: MetadataTelemetryAttributeValue): void;
  setAttributes(attributes: MetadataTelemetryAttributes): void;
  setStatus(status: 'ok' | 'error'): void;
}

export interface MetadataTracer {
  startSpan<T>(
    options: MetadataSpanOptions,
    callback: (span: MetadataSpan) => T
  ): T;
}

export interface MetadataMetricOptions {
  attributes?: MetadataTelemetryAttributes;
  unit?: string;
}

export interface MetadataMetrics {
  count(name: string, value?: number, options?: MetadataMetricOptions): void;
  gauge(name: string, value: number, options?: MetadataMetricOptions): void;
  distribution(
    name: string,
    value: number,
    options?: MetadataMetricOptions
  ): void;
}

/**
 * Unified telemetry interface.
 */
export interface MetadataTelemetry {
  log(event: MetadataTelemetryEvent): void;
  tracer: MetadataTracer;
  metrics: MetadataMetrics;
  captureException(error: unknown, context?: Record<string, unknown>): void;
}

export interface DefaultTelemetryOptions {
  /** Events below this level are dropped. Defaults to `info`. */
  minLevel?: MetadataLogLevel;
  /** Line sink, `console.log` unless overridden. */
  write?: (line: string) => void;
}

const noopSpan: MetadataSpan = {
  setAttribute() {},
  setAttributes() {},
  setStatus() {},
};

const noopTracer: MetadataTracer = {
  startSpan(_options, callback) {
    return callback(noopSpan);
  },
};

const noopMetrics: MetadataMetrics = {
  count() {},
  gauge() {},
  distribution() {},
};

function levelRank(level: MetadataLogLevel): number {
  return METADATA_LOG_LEVELS.indexOf(level);
}

function createConsoleLogger(
  options: DefaultTelemetryOptions
): (event: MetadataTelemetryEvent) => void {
  const threshold = levelRank(options.minLevel ?? 'info');
  const write = options.write ?? ((line: string) => console.log(line));

  return (event: MetadataTelemetryEvent) => {
    const level = event.level ?? (event.error ? 'error' : 'info');
    if (levelRank(level) < threshold) return;
    const payload = {
      timestamp: new Date().toISOString(),
      ...event,
      level,
    };
    write(JSON.stringify(payload));
  };
}

/**
 * Create console-backed default telemetry (logs only; no-op tracing/metrics).
 */
export function createDefaultTelemetry(
  options: DefaultTelemetryOptions = {}
): MetadataTelemetry {
  const logger = createConsoleLogger(options);
  return {
    log(event) {
      logger(event);
    },
    tracer: noopTracer,
    metrics: noopMetrics,
    captureException(error, context) {
      const message =
        error instanceof Error
          ? error.message
          : `Unknown error: ${String(error)}`;
      logger({
        event: 'metadata.exception',
        level: 'error',
        error: message,
        ...(context ?? {}),
      });
    },
  };
}

let activeTelemetry: MetadataTelemetry = createDefaultTelemetry();

export function getTelemetry(): MetadataTelemetry {
  return activeTelemetry;
}

/**
 * Replace the active telemetry backend.
 */
export function configureTelemetry(telemetry: MetadataTelemetry): void {
  activeTelemetry = telemetry;
}

/**
 * Reset to the default console backend.
 */
export function resetTelemetry(): void {
  activeTelemetry = createDefaultTelemetry();
}

export function captureMetadataException(
  error: unknown,
  context?: Record<string, unknown>
): void {
  activeTelemetry.captureException(error, context);
}

export function startMetadataSpan<T>(
  options: MetadataSpanOptions,
  callback: (span: MetadataSpan) => T
): T {
  return activeTelemetry.tracer.startSpan(options, callback);
}

export function countMetadataMetric(
  name: string,
  value?: number,
  options?: MetadataMetricOptions
): void {
  activeTelemetry.metrics.count(name, value, options);
}

export function gaugeMetadataMetric(
  name: string,
  value: number,
  options?: MetadataMetricOptions
): void {
  activeTelemetry.metrics.gauge(name, value, options);
}

export function distributionMetadataMetric(
  name: string,
  value: number,
  options?: MetadataMetricOptions
): void {
  activeTelemetry.metrics.distribution(name, value, options);
}
