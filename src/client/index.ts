/**
 * Pushdown client.
 *
 * Leases a pooled connection, prepares a statement carrying the compiled
 * predicate and streams its rows. A scan read to its end, or failed by the
 * server, returns its connection to the pool. A scan closed before its end
 * destroys the connection, because the driver is still reading its result.
 *
 * @module client
 */

import mysql from 'mysql2/promise';
import type { Pool, PoolConnection } from 'mysql2/promise';
import type { PoolOptions } from 'mysql2';
import { ClientClosedError, fromDriverError } from '../errors/index.js';
import type { PushdownConfig } from '../config/index.js';
import { toPoolOptions } from '../config/index.js';
import type { Observability } from '../observability/index.js';
import { createConsoleObservability, createNoopObservability, PushdownMetricNames } from '../observability/index.js';
import { PredicateCompiler } from '../predicate/index.js';
import { StatementBuilder } from '../statement/index.js';
import type { Row, RowStream, StreamingConnection } from '../statement/index.js';
import type { ColumnType, CompiledPredicate, TupleDomain } from '../types/index.js';

// ============================================================================
// Connection Providers
// ============================================================================

/**
 * A connection leased from a provider. Settle it once, with `release` when its
 * last query was read to the end and with `destroy` otherwise.
 */
export interface LeasedConnection {
  connection: StreamingConnection;
  /** Returns the connection to the provider for reuse */
  release(): void;
  /** Closes the connection instead of reusing it */
  destroy(): void;
}

/**
 * Source of connections for scans.
 */
export interface ConnectionProvider {
  acquire(): Promise<LeasedConnection>;
  /** Closes every connection the provider holds */
  end(): Promise<void>;
}

/**
 * Connection provider backed by a mysql2 pool.
 */
export class MysqlPoolConnectionProvider implements ConnectionProvider {
  private readonly pool: Pool;
  private readonly acquireTimeoutMs: number;

  constructor(options: PoolOptions, acquireTimeoutMs: number) {
    this.pool = mysql.createPool(options);
    this.acquireTimeoutMs = acquireTimeoutMs;
  }

  async acquire(): Promise<LeasedConnection> {
    const poolConnection = await this.acquireWithTimeout();
    return {
      // the core connection exposes query().stream()
      connection: poolConnection.connection,
      release: () => poolConnection.release(),
      destroy: () => poolConnection.destroy(),
    };
  }

  async end(): Promise<void> {
    await this.pool.end();
  }

  private acquireWithTimeout(): Promise<PoolConnection> {
    return new Promise((resolve, reject) => {
      let timedOut = false;
      const timer = setTimeout(() => {
        timedOut = true;
        reject(new Error(`Timeout acquiring connection after ${this.acquireTimeoutMs}ms`));
      }, this.acquireTimeoutMs);

      this.pool
        .getConnection()
        .then((connection) => {
          clearTimeout(timer);
          if (timedOut) {
            // nobody is waiting for it any more
            connection.release();
            return;
          }
          resolve(connection);
        })
        .catch((err: unknown) => {
          clearTimeout(timer);
          reject(err);
        });
    });
  }
}

// ============================================================================
// Scan Request
// ============================================================================

/**
 * What to scan and which constraints to push down.
 */
export interface ScanRequest {
  /** Base statement without a WHERE clause */
  sql: string;
  /** Column names, indexed like the tuple domain */
  columnNames: readonly string[];
  /** Declared column types, indexed like the tuple domain */
  columnTypes: readonly ColumnType[];
  /** Columns holding UUIDs stored as 16 bytes */
  identifierColumnIndexes?: ReadonlySet<number>;
  /** Constraints to push down */
  tupleDomain: TupleDomain;
}

// ============================================================================
// Pushdown Client
// ============================================================================

/**
 * Options for the pushdown client.
 */
export interface PushdownClientOptions {
  observability?: Observability;
  /** Log each prepared statement at debug level */
  logStatements?: boolean;
  /** Rows buffered by each scan */
  streamHighWaterMark?: number;
}

/**
 * Runs scans with pushed-down predicates.
 *
 * @example
 * ```typescript
 * const client = createPushdownClient(configFromEnv());
 * const rows = await client.openScan({
 *   sql: 'SELECT shard_uuid, row_count FROM shards',
 *   columnNames: ['shard_uuid', 'row_count'],
 *   columnTypes: [VARBINARY, BIGINT],
 *   identifierColumnIndexes: new Set([0]),
 *   tupleDomain: TupleDomain.withColumnDomains([[1, Domain.create(BIGINT, ValueSet.ofRanges(Range.greaterThan(100)), false)]]),
 * });
 * for await (const row of rows) { ... }
 * await client.close();
 * ```
 */
export class PushdownClient {
  private readonly provider: ConnectionProvider;
  private readonly observability: Observability;
  private readonly compiler: PredicateCompiler;
  private readonly builder: StatementBuilder;
  private closed = false;

  constructor(provider: ConnectionProvider, options: PushdownClientOptions = {}) {
    this.provider = provider;
    this.observability = options.observability ?? createNoopObservability();
    this.compiler = new PredicateCompiler(this.observability.logger);
    this.builder = new StatementBuilder({
      logger: this.observability.logger,
      metrics: this.observability.metrics,
      logStatements: options.logStatements,
      highWaterMark: options.streamHighWaterMark,
    });
  }

  /**
   * Compiles a tuple domain without touching the database.
   *
   * @throws {ClientClosedError} If the client is closed
   */
  compile(
    tupleDomain: TupleDomain,
    columnNames: readonly string[],
    columnTypes: readonly ColumnType[],
    identifierColumnIndexes: ReadonlySet<number> = new Set()
  ): CompiledPredicate {
    this.ensureOpen();
    const compiled = this.compiler.compile(tupleDomain, columnNames, columnTypes, identifierColumnIndexes);
    this.observability.metrics.increment(PushdownMetricNames.PREDICATES_COMPILED_TOTAL);
    return compiled;
  }

  /**
   * Opens a streaming scan.
   *
   * A none tuple domain still runs the unfiltered statement; callers that
   * want no rows for it must check `tupleDomain.isNone()` first.
   *
   * @throws {ClientClosedError} If the client is closed
   * @throws {InvalidArgumentError} If the request is malformed
   * @throws {ExecutionError} If no connection can be acquired
   */
  async openScan(request: ScanRequest): Promise<RowStream> {
    this.ensureOpen();
    const { logger, metrics, tracer } = this.observability;

    return tracer.withSpan('pushdown.scan', async (span) => {
      const startTime = Date.now();
      span.setAttribute('pushdown.columns', request.columnNames.length);
      span.setAttribute('pushdown.tuple_domain_none', request.tupleDomain.isNone());

      let leased: LeasedConnection;
      try {
        leased = await this.provider.acquire();
      } catch (error) {
        const mapped = fromDriverError(error);
        metrics.increment(PushdownMetricNames.ERRORS_TOTAL, 1, { operation: 'acquire' });
        logger.error('Failed to acquire connection', { error: mapped.message });
        throw mapped;
      }

      let rows: RowStream;
      try {
        const statement = this.builder.create(
          leased.connection,
          request.sql,
          request.columnNames,
          request.columnTypes,
          request.identifierColumnIndexes ?? new Set(),
          request.tupleDomain
        );
        span.setAttribute('pushdown.bind_values', statement.parameterCount);
        metrics.increment(PushdownMetricNames.PREDICATES_COMPILED_TOTAL);
        rows = statement.stream();
      } catch (error) {
        leased.release();
        metrics.increment(PushdownMetricNames.ERRORS_TOTAL, 1, { operation: 'prepare' });
        throw error;
      }

      metrics.increment(PushdownMetricNames.SCANS_STARTED_TOTAL);
      logger.debug('Scan started', { sql: request.sql });

      return releasingStream(rows, {
        onRow: () => metrics.increment(PushdownMetricNames.ROWS_STREAMED_TOTAL),
        onDone: (outcome) => {
          if (outcome.kind === 'abandoned') {
            leased.destroy();
            logger.debug('Scan closed before its end, connection discarded', { sql: request.sql });
          } else {
            leased.release();
          }
          metrics.timing(PushdownMetricNames.SCAN_DURATION_MS, Date.now() - startTime);
          if (outcome.kind === 'failed') {
            metrics.increment(PushdownMetricNames.ERRORS_TOTAL, 1, { operation: 'stream' });
            logger.error('Scan failed', { error: outcome.error.message });
          }
        },
      });
    });
  }

  /**
   * Closes the client and its connection provider. Further calls throw.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.provider.end();
    this.observability.logger.info('Pushdown client closed');
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new ClientClosedError();
    }
  }
}

/**
 * How a scan's stream finished.
 */
type ScanOutcome =
  | { kind: 'completed' }
  | { kind: 'failed'; error: Error }
  | { kind: 'abandoned' };

/**
 * Wraps a row stream so `onDone` runs exactly once, when the stream ends,
 * fails or is closed.
 */
function releasingStream(
  rows: RowStream,
  hooks: { onRow(): void; onDone(outcome: ScanOutcome): void }
): RowStream {
  let done = false;
  const finish = (outcome: ScanOutcome): void => {
    if (!done) {
      done = true;
      hooks.onDone(outcome);
    }
  };

  return {
    [Symbol.asyncIterator](): AsyncIterator<Row> {
      const iterator = rows[Symbol.asyncIterator]();
      return {
        async next(): Promise<IteratorResult<Row>> {
          let result: IteratorResult<Row>;
          try {
            result = await iterator.next();
          } catch (error) {
            finish({ kind: 'failed', error: error instanceof Error ? error : new Error(String(error)) });
            throw error;
          }
          if (result.done) {
            finish({ kind: 'completed' });
          } else {
            hooks.onRow();
          }
          return result;
        },
        async return(): Promise<IteratorResult<Row>> {
          await rows.close();
          finish({ kind: 'abandoned' });
          return { done: true, value: undefined };
        },
      };
    },
    async close(): Promise<void> {
      await rows.close();
      finish({ kind: 'abandoned' });
    },
    get closed(): boolean {
      return rows.closed;
    },
  };
}

/**
 * Creates a pushdown client over a mysql2 pool.
 *
 * Without `observability`, the client logs to the console at `config.logLevel`.
 */
export function createPushdownClient(
  config: PushdownConfig,
  observability?: Observability
): PushdownClient {
  const provider = new MysqlPoolConnectionProvider(toPoolOptions(config), config.connection.connectTimeout);
  return new PushdownClient(provider, {
    observability: observability ?? createConsoleObservability(config.logLevel),
    logStatements: config.logStatements,
    streamHighWaterMark: config.streamHighWaterMark,
  });
}
