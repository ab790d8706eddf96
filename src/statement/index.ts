/**
 * Prepared statements over mysql2.
 *
 * A {@link MysqlPreparedStatement} collects positional parameters and runs as a
 * forward-only, read-only streaming query. {@link StatementBuilder} ties the
 * predicate compiler and the binder to it.
 *
 * @module statement
 */

import type { Readable } from 'node:stream';
import mysql from 'mysql2';
import { bindParameters } from '../binding/index.js';
import type { SqlNullType, StatementParameters } from '../binding/index.js';
import {
  InvalidArgumentError,
  ParameterIndexOutOfRangeError,
  UnboundParameterError,
  fromDriverError,
} from '../errors/index.js';
import type { Logger, MetricsCollector } from '../observability/index.js';
import { NoopLogger, NoopMetricsCollector, PushdownMetricNames } from '../observability/index.js';
import { compilePredicate, countPlaceholders } from '../predicate/index.js';
import type { ColumnType, PendingBindValue, TupleDomain } from '../types/index.js';

// ============================================================================
// Connection Contract
// ============================================================================

/**
 * Query options passed to the driver.
 */
export interface StreamingQueryOptions {
  sql: string;
  values: unknown[];
}

/**
 * The part of a mysql2 connection a streaming statement needs.
 *
 * mysql2's core `Connection` (or `PoolConnection.connection` from
 * mysql2/promise) satisfies it.
 */
export interface StreamingConnection {
  query(options: StreamingQueryOptions): {
    stream(options?: { highWaterMark?: number }): Readable;
  };
}

/**
 * Row as delivered by the driver, keyed by column label.
 */
export type Row = Record<string, unknown>;

/**
 * Forward-only stream of rows.
 */
export interface RowStream extends AsyncIterable<Row> {
  /** Stops the stream and releases its resources */
  close(): Promise<void>;
  /** Whether the stream has been closed or exhausted */
  readonly closed: boolean;
}

// ============================================================================
// Parameter Values
// ============================================================================

/**
 * Typed parameter value held by a statement slot.
 */
export type Value =
  | { type: 'Null'; sqlType: SqlNullType }
  | { type: 'Int'; value: bigint }
  | { type: 'Double'; value: number }
  | { type: 'Bool'; value: boolean }
  | { type: 'Bytes'; value: Uint8Array }
  | { type: 'String'; value: string };

/**
 * Converts a typed value to what mysql2 expects as a parameter.
 *
 * Integers outside the safe range become unquoted decimal literals, so the
 * server compares them as integers and not as text.
 */
export function toDriverParam(value: Value): unknown {
  switch (value.type) {
    case 'Null':
      return null;
    case 'Int':
      return value.value >= BigInt(Number.MIN_SAFE_INTEGER) && value.value <= BigInt(Number.MAX_SAFE_INTEGER)
        ? Number(value.value)
        : mysql.raw(value.value.toString());
    case 'Double':
      return value.value;
    case 'Bool':
      return value.value;
    case 'Bytes':
      return Buffer.from(value.value);
    case 'String':
      return value.value;
  }
}

// ============================================================================
// Prepared Statement
// ============================================================================

/**
 * Options for a streaming statement.
 */
export interface StatementOptions {
  /** Rows buffered before back-pressure applies */
  highWaterMark?: number;
}

/**
 * Prepared statement with positional parameters, executed as a streaming query.
 *
 * Every `?` in `sql` is a placeholder, including one inside a string literal
 * or a comment, since mysql2 substitutes them all.
 *
 * Exclusively owned by one caller from binding until the stream is closed.
 */
export class MysqlPreparedStatement implements StatementParameters {
  readonly sql: string;
  readonly parameterCount: number;
  private readonly connection: StreamingConnection;
  private readonly highWaterMark?: number;
  private readonly slots: Array<Value | undefined>;

  constructor(connection: StreamingConnection, sql: string, options: StatementOptions = {}) {
    this.connection = connection;
    this.sql = sql;
    this.parameterCount = countPlaceholders(sql);
    this.highWaterMark = options.highWaterMark;
    this.slots = new Array<Value | undefined>(this.parameterCount).fill(undefined);
  }

  setNull(position: number, sqlType: SqlNullType): void {
    this.set(position, { type: 'Null', sqlType });
  }

  setLong(position: number, value: bigint): void {
    this.set(position, { type: 'Int', value });
  }

  setDouble(position: number, value: number): void {
    this.set(position, { type: 'Double', value });
  }

  setBoolean(position: number, value: boolean): void {
    this.set(position, { type: 'Bool', value });
  }

  setBytes(position: number, value: Uint8Array): void {
    this.set(position, { type: 'Bytes', value });
  }

  setString(position: number, value: string): void {
    this.set(position, { type: 'String', value });
  }

  /** Clears every bound parameter */
  clearParameters(): void {
    this.slots.fill(undefined);
  }

  /**
   * Bound parameters in position order.
   *
   * @throws {UnboundParameterError} If any placeholder has no value
   */
  getParameters(): Value[] {
    const values: Value[] = [];
    const missing: number[] = [];
    this.slots.forEach((slot, i) => {
      if (slot === undefined) {
        missing.push(i + 1);
      } else {
        values.push(slot);
      }
    });
    if (missing.length > 0) {
      throw new UnboundParameterError(missing);
    }
    return values;
  }

  /**
   * Parameters in the form mysql2 takes.
   *
   * @throws {UnboundParameterError} If any placeholder has no value
   */
  toDriverParams(): unknown[] {
    return this.getParameters().map(toDriverParam);
  }

  /**
   * Runs the statement and streams its rows.
   *
   * @throws {UnboundParameterError} If any placeholder has no value
   */
  stream(): RowStream {
    const values = this.toDriverParams();
    const source = this.connection
      .query({ sql: this.sql, values })
      .stream(this.highWaterMark !== undefined ? { highWaterMark: this.highWaterMark } : undefined);
    return createRowStream(source);
  }

  private set(position: number, value: Value): void {
    if (!Number.isInteger(position) || position < 1 || position > this.parameterCount) {
      throw new ParameterIndexOutOfRangeError(position, this.parameterCount);
    }
    this.slots[position - 1] = value;
  }
}

/**
 * Wraps a driver row stream. Driver errors surface as pushdown errors.
 */
export function createRowStream(source: Readable): RowStream {
  let closed = false;

  return {
    [Symbol.asyncIterator](): AsyncIterator<Row> {
      const iterator: AsyncIterator<unknown> = source[Symbol.asyncIterator]();
      return {
        async next(): Promise<IteratorResult<Row>> {
          if (closed) {
            return { done: true, value: undefined };
          }
          let result: IteratorResult<unknown>;
          try {
            result = await iterator.next();
          } catch (error) {
            closed = true;
            throw fromDriverError(error);
          }
          if (result.done) {
            closed = true;
            return { done: true, value: undefined };
          }
          return { done: false, value: toRow(result.value) };
        },
        async return(): Promise<IteratorResult<Row>> {
          closed = true;
          source.destroy();
          return { done: true, value: undefined };
        },
      };
    },
    async close(): Promise<void> {
      closed = true;
      source.destroy();
    },
    get closed(): boolean {
      return closed;
    },
  };
}

function toRow(value: unknown): Row {
  if (typeof value !== 'object' || value === null) {
    return { value };
  }
  return Object.fromEntries(Object.entries(value));
}

// ============================================================================
// Statement Builder
// ============================================================================

/**
 * Options for the statement builder.
 */
export interface StatementBuilderOptions {
  logger?: Logger;
  metrics?: MetricsCollector;
  /** Log each statement and its bind values at debug level */
  logStatements?: boolean;
  /** Rows buffered by the statement's stream */
  highWaterMark?: number;
}

/**
 * Creates prepared statements whose WHERE clause comes from a tuple domain.
 *
 * @example
 * ```typescript
 * const builder = new StatementBuilder();
 * const statement = builder.create(
 *   poolConnection.connection,
 *   'SELECT shard_uuid, table_id FROM shards',
 *   ['shard_uuid', 'table_id'],
 *   [VARBINARY, BIGINT],
 *   new Set([0]),
 *   TupleDomain.withColumnDomains([[1, Domain.singleValue(BIGINT, 7)]])
 * );
 * for await (const row of statement.stream()) { ... }
 * ```
 */
export class StatementBuilder {
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly logStatements: boolean;
  private readonly highWaterMark?: number;

  constructor(options: StatementBuilderOptions = {}) {
    this.logger = options.logger ?? new NoopLogger();
    this.metrics = options.metrics ?? new NoopMetricsCollector();
    this.logStatements = options.logStatements ?? false;
    this.highWaterMark = options.highWaterMark;
  }

  /**
   * Appends the tuple domain's WHERE clause to `sql`, prepares the result and
   * binds every value in placeholder order.
   *
   * @param connection - Connection the statement runs on
   * @param sql - Base statement without a WHERE clause or any `?`
   * @param columnNames - Column names, indexed like the tuple domain
   * @param columnTypes - Declared column types, indexed like the tuple domain
   * @param identifierColumnIndexes - Columns holding UUIDs stored as 16 bytes
   * @param tupleDomain - Constraints to push down
   * @throws {InvalidArgumentError} If `sql` is empty or holds a `?`, or the column lists differ in length
   */
  create(
    connection: StreamingConnection,
    sql: string,
    columnNames: readonly string[],
    columnTypes: readonly ColumnType[],
    identifierColumnIndexes: ReadonlySet<number>,
    tupleDomain: TupleDomain
  ): MysqlPreparedStatement {
    if (sql.trim().length === 0) {
      throw new InvalidArgumentError('sql is null or empty');
    }
    if (countPlaceholders(sql) > 0) {
      throw new InvalidArgumentError('Base statement must not contain ? characters');
    }
    if (columnNames.length !== columnTypes.length) {
      throw new InvalidArgumentError(
        `Column names and types differ in length (${columnNames.length} != ${columnTypes.length})`
      );
    }

    const predicate = compilePredicate(tupleDomain, columnNames, columnTypes, identifierColumnIndexes);
    const fullSql = appendClause(sql, predicate.sql);

    const statement = new MysqlPreparedStatement(connection, fullSql, { highWaterMark: this.highWaterMark });
    bindParameters(statement, predicate.bindValues, identifierColumnIndexes);

    this.metrics.increment(PushdownMetricNames.STATEMENTS_CREATED_TOTAL);
    this.metrics.increment(PushdownMetricNames.BIND_VALUES_TOTAL, predicate.bindValues.length);

    if (this.logStatements) {
      this.logger.debug('Prepared pushdown statement', {
        sql: fullSql,
        bindValues: predicate.bindValues.map(describeBindValue),
      });
    }

    return statement;
  }
}

function appendClause(sql: string, clause: string): string {
  if (clause.length === 0) {
    return sql;
  }
  return /\s$/.test(sql) ? `${sql}${clause}` : `${sql} ${clause}`;
}

function describeBindValue({ columnIndex, type, value }: PendingBindValue): Record<string, unknown> {
  return {
    columnIndex,
    type: type.name,
    value: value instanceof Uint8Array ? `0x${Buffer.from(value).toString('hex')}` : value,
  };
}
