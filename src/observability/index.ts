/**
 * Logging, metrics and tracing hooks for pushdown scans.
 *
 * Every hook has a no-op form, used when nothing is configured, and an
 * in-memory form that tests read back. {@link ConsoleLogger} is the only
 * implementation that writes anywhere.
 *
 * @module observability
 */

// ============================================================================
// Logging
// ============================================================================

/**
 * Log levels, lowest first.
 */
export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
}

/**
 * Structured logger. `context` holds the fields logged with the message.
 */
export interface Logger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Parses a log level name, ignoring case and surrounding whitespace.
 *
 * @returns The level, or undefined for an unknown name
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  switch (name.trim().toUpperCase()) {
    case 'TRACE':
      return LogLevel.TRACE;
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return undefined;
  }
}

const SECRET_KEY = /password|secret|token/i;

/**
 * Options for {@link ConsoleLogger}.
 */
export interface ConsoleLoggerOptions {
  /** Messages below this level are dropped (default: INFO) */
  level?: LogLevel;
  /** Written as `component` on every line */
  component?: string;
}

/**
 * Writes one JSON object per message to the console.
 *
 * WARN and ERROR go to stderr, the rest to stdout. Fields whose name looks
 * like a credential are masked, and bigints are written as decimal text.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly component?: string;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.component = options.component;
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.TRACE, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.WARN, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.ERROR, message, context);
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (level < this.level) {
      return;
    }

    const line = JSON.stringify(
      {
        time: new Date().toISOString(),
        level: LogLevel[level].toLowerCase(),
        component: this.component,
        message,
        ...(context !== undefined ? { context: maskSecrets(context) } : {}),
      },
      (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value)
    );

    if (level >= LogLevel.WARN) {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

function maskSecrets(fields: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(fields).map(([key, value]) => [key, SECRET_KEY.test(key) ? '[REDACTED]' : value])
  );
}

/**
 * Logger that drops everything.
 */
export class NoopLogger implements Logger {
  trace(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

/**
 * A message captured by {@link InMemoryLogger}.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
}

/**
 * Logger that keeps every message, for tests.
 */
export class InMemoryLogger implements Logger {
  private readonly entries: LogEntry[] = [];

  trace(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: LogLevel.TRACE, message, context });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: LogLevel.DEBUG, message, context });
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: LogLevel.INFO, message, context });
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: LogLevel.WARN, message, context });
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: LogLevel.ERROR, message, context });
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesAtLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter(entry => entry.level === level);
  }
}

// ============================================================================
// Metrics
// ============================================================================

/**
 * Metric names for pushdown operations.
 */
export const PushdownMetricNames = {
  PREDICATES_COMPILED_TOTAL: 'pushdown_predicates_compiled_total',
  BIND_VALUES_TOTAL: 'pushdown_bind_values_total',
  STATEMENTS_CREATED_TOTAL: 'pushdown_statements_created_total',
  SCANS_STARTED_TOTAL: 'pushdown_scans_started_total',
  ROWS_STREAMED_TOTAL: 'pushdown_rows_streamed_total',
  SCAN_DURATION_MS: 'pushdown_scan_duration_ms',
  ERRORS_TOTAL: 'pushdown_errors_total',
} as const;

export type MetricTags = Record<string, string>;

/**
 * Counters and timings.
 */
export interface MetricsCollector {
  increment(name: string, value?: number, tags?: MetricTags): void;
  timing(name: string, durationMs: number, tags?: MetricTags): void;
}

export class NoopMetricsCollector implements MetricsCollector {
  increment(): void {}
  timing(): void {}
}

/**
 * Metrics collector that sums counters per tag set and keeps every timing.
 */
export class InMemoryMetricsCollector implements MetricsCollector {
  private readonly counters = new Map<string, number>();
  private readonly timings = new Map<string, number[]>();

  increment(name: string, value = 1, tags?: MetricTags): void {
    const key = seriesKey(name, tags);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  timing(name: string, durationMs: number, tags?: MetricTags): void {
    const key = seriesKey(name, tags);
    this.timings.set(key, [...(this.timings.get(key) ?? []), durationMs]);
  }

  getCounter(name: string, tags?: MetricTags): number {
    return this.counters.get(seriesKey(name, tags)) ?? 0;
  }

  getTimings(name: string, tags?: MetricTags): number[] {
    return [...(this.timings.get(seriesKey(name, tags)) ?? [])];
  }
}

// name{a=1,b=2}, tags sorted by key
function seriesKey(name: string, tags?: MetricTags): string {
  const pairs = Object.entries(tags ?? {})
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, value]) => `${key}=${value}`);
  return pairs.length === 0 ? name : `${name}{${pairs.join(',')}}`;
}

// ============================================================================
// Tracing
// ============================================================================

export type SpanAttributeValue = string | number | boolean;

/**
 * The span a traced function runs in.
 */
export interface Span {
  setAttribute(key: string, value: SpanAttributeValue): void;
}

/**
 * Runs functions inside named spans.
 */
export interface Tracer {
  withSpan<T>(name: string, fn: (span: Span) => Promise<T>): Promise<T>;
}

const NOOP_SPAN: Span = {
  setAttribute: () => {},
};

export class NoopTracer implements Tracer {
  withSpan<T>(_name: string, fn: (span: Span) => Promise<T>): Promise<T> {
    return fn(NOOP_SPAN);
  }
}

/**
 * A span recorded by {@link InMemoryTracer} once its function settled.
 */
export interface FinishedSpan {
  name: string;
  attributes: Record<string, SpanAttributeValue>;
  status: 'ok' | 'error';
  /** Message of the error the function threw */
  error?: string;
  durationMs: number;
}

/**
 * Tracer that records finished spans, for tests.
 */
export class InMemoryTracer implements Tracer {
  private readonly spans: FinishedSpan[] = [];

  async withSpan<T>(name: string, fn: (span: Span) => Promise<T>): Promise<T> {
    const attributes: Record<string, SpanAttributeValue> = {};
    const startedAt = Date.now();
    const finish = (status: FinishedSpan['status'], error?: string): void => {
      this.spans.push({ name, attributes, status, error, durationMs: Date.now() - startedAt });
    };

    try {
      const result = await fn({ setAttribute: (key, value) => { attributes[key] = value; } });
      finish('ok');
      return result;
    } catch (error) {
      finish('error', error instanceof Error ? error.message : String(error));
      throw error;
    }
  }

  /** Finished spans, oldest first, optionally only those named `name` */
  getSpans(name?: string): FinishedSpan[] {
    return this.spans.filter(span => name === undefined || span.name === name);
  }
}

// ============================================================================
// Container
// ============================================================================

export interface Observability {
  logger: Logger;
  metrics: MetricsCollector;
  tracer: Tracer;
}

export function createNoopObservability(): Observability {
  return {
    logger: new NoopLogger(),
    metrics: new NoopMetricsCollector(),
    tracer: new NoopTracer(),
  };
}

/**
 * Hooks that record everything, for tests.
 */
export function createInMemoryObservability(): {
  logger: InMemoryLogger;
  metrics: InMemoryMetricsCollector;
  tracer: InMemoryTracer;
} {
  return {
    logger: new InMemoryLogger(),
    metrics: new InMemoryMetricsCollector(),
    tracer: new InMemoryTracer(),
  };
}

/**
 * Console logging at `level`. Metrics and spans are dropped.
 */
export function createConsoleObservability(level: LogLevel = LogLevel.INFO): Observability {
  return {
    logger: new ConsoleLogger({ level, component: 'pushdown' }),
    metrics: new NoopMetricsCollector(),
    tracer: new NoopTracer(),
  };
}
