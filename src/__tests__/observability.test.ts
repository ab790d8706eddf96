/**
 * Tests for logging, metrics and tracing.
 */

import {
  ConsoleLogger,
  InMemoryLogger,
  InMemoryMetricsCollector,
  InMemoryTracer,
  LogLevel,
  NoopTracer,
  createConsoleObservability,
  parseLogLevel,
} from '../index.js';

describe('ConsoleLogger', () => {
  it('should write JSON lines at or above its level and mask secrets', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = new ConsoleLogger({ level: LogLevel.INFO, component: 'pushdown' });

    logger.debug('hidden');
    logger.info('Scan started', { password: 'test-secret', rows: 10n });

    expect(log).toHaveBeenCalledTimes(1);
    const line = JSON.parse(String(log.mock.calls[0][0]));
    expect(line).toMatchObject({
      level: 'info',
      component: 'pushdown',
      message: 'Scan started',
      context: { password: '[REDACTED]', rows: '10' },
    });
  });

  it('should send warnings and errors to stderr', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new ConsoleLogger();

    logger.warn('slow scan');
    logger.error('Scan failed');

    expect(error).toHaveBeenCalledTimes(2);
    expect(JSON.parse(String(error.mock.calls[1][0]))).not.toHaveProperty('component');
  });
});

describe('InMemoryLogger', () => {
  it('should keep entries by level', () => {
    const logger = new InMemoryLogger();
    logger.warn('slow scan', { scan: 7 });
    logger.info('done');

    expect(logger.getEntries()).toHaveLength(2);
    expect(logger.getEntriesAtLevel(LogLevel.WARN)).toEqual([
      { level: LogLevel.WARN, message: 'slow scan', context: { scan: 7 } },
    ]);
  });
});

describe('parseLogLevel', () => {
  it('should parse level names case-insensitively', () => {
    expect(parseLogLevel('trace')).toBe(LogLevel.TRACE);
    expect(parseLogLevel(' Warning ')).toBe(LogLevel.WARN);
    expect(parseLogLevel('verbose')).toBeUndefined();
  });
});

describe('InMemoryMetricsCollector', () => {
  it('should sum counters per tag set', () => {
    const metrics = new InMemoryMetricsCollector();
    metrics.increment('scans');
    metrics.increment('scans', 2);
    metrics.increment('errors', 1, { operation: 'stream', kind: 'driver' });

    expect(metrics.getCounter('scans')).toBe(3);
    expect(metrics.getCounter('errors', { kind: 'driver', operation: 'stream' })).toBe(1);
    expect(metrics.getCounter('errors')).toBe(0);
  });

  it('should keep every timing', () => {
    const metrics = new InMemoryMetricsCollector();
    metrics.timing('scan_ms', 12);
    metrics.timing('scan_ms', 3);

    expect(metrics.getTimings('scan_ms')).toEqual([12, 3]);
    expect(metrics.getTimings('other_ms')).toEqual([]);
  });
});

describe('InMemoryTracer', () => {
  it('should record attributes of successful spans', async () => {
    const tracer = new InMemoryTracer();

    const result = await tracer.withSpan('pushdown.scan', async (span) => {
      span.setAttribute('pushdown.columns', 2);
      return 'rows';
    });

    expect(result).toBe('rows');
    const [span] = tracer.getSpans('pushdown.scan');
    expect(span).toMatchObject({ status: 'ok', attributes: { 'pushdown.columns': 2 } });
    expect(span.error).toBeUndefined();
  });

  it('should record failed spans and rethrow', async () => {
    const tracer = new InMemoryTracer();

    await expect(tracer.withSpan('pushdown.scan', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(tracer.getSpans()).toMatchObject([{ name: 'pushdown.scan', status: 'error', error: 'boom' }]);
    expect(tracer.getSpans('other')).toEqual([]);
  });
});

describe('NoopTracer', () => {
  it('should run the function', async () => {
    expect(await new NoopTracer().withSpan('s', async () => 5)).toBe(5);
  });
});

describe('createConsoleObservability', () => {
  it('should log through a console logger at the given level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const { logger } = createConsoleObservability(LogLevel.WARN);

    logger.info('skipped');

    expect(logger).toBeInstanceOf(ConsoleLogger);
    expect(log).not.toHaveBeenCalled();
  });
});
