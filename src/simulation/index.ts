/**
 * In-process stand-ins for mysql2 connections.
 *
 * {@link MockConnection} records every query it receives and streams rows
 * registered for that SQL, so statements and scans can be tested without a
 * live database.
 *
 * @module simulation
 */

import { Readable } from 'node:stream';
import type { ConnectionProvider, LeasedConnection } from '../client/index.js';
import type { DriverErrorResponse } from '../errors/index.js';
import type { Row, StreamingConnection, StreamingQueryOptions } from '../statement/index.js';

// ============================================================================
// Query Normalization
// ============================================================================

/**
 * Normalizes a SQL query for matching: lowercase, collapsed whitespace, trimmed.
 */
export function normalizeQuery(query: string): string {
  return query
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim();
}

// ============================================================================
// Mock Connection
// ============================================================================

/**
 * A query the mock connection received.
 */
export interface RecordedQuery {
  sql: string;
  values: unknown[];
  highWaterMark?: number;
  timestamp: Date;
}

type Response =
  | { kind: 'rows'; rows: Row[] }
  | { kind: 'error'; error: DriverErrorResponse | Error };

/**
 * Mock streaming connection.
 *
 * Responses are matched on the normalized SQL, or on a regex pattern.
 * Unmatched queries stream no rows.
 */
export class MockConnection implements StreamingConnection {
  private readonly responses = new Map<string, Response>();
  private readonly patterns: Array<{ pattern: RegExp; response: Response }> = [];
  private readonly queries: RecordedQuery[] = [];
  private readonly streams: Readable[] = [];

  /**
   * Streams `rows` for queries matching `sqlPattern`.
   */
  withRows(sqlPattern: string | RegExp, rows: Row[]): this {
    return this.register(sqlPattern, { kind: 'rows', rows });
  }

  /**
   * Fails the stream of queries matching `sqlPattern` with `error`.
   */
  withError(sqlPattern: string | RegExp, error: DriverErrorResponse | Error): this {
    return this.register(sqlPattern, { kind: 'error', error });
  }

  query(options: StreamingQueryOptions): { stream(options?: { highWaterMark?: number }): Readable } {
    const response = this.findResponse(options.sql);
    return {
      stream: (streamOptions?: { highWaterMark?: number }): Readable => {
        this.queries.push({
          sql: options.sql,
          values: [...options.values],
          highWaterMark: streamOptions?.highWaterMark,
          timestamp: new Date(),
        });
        const stream = toReadable(response);
        this.streams.push(stream);
        return stream;
      },
    };
  }

  /** Queries received so far, oldest first */
  getQueries(): RecordedQuery[] {
    return [...this.queries];
  }

  /** The most recent query, if any */
  getLastQuery(): RecordedQuery | undefined {
    return this.queries[this.queries.length - 1];
  }

  /** Streams handed out so far */
  getStreams(): Readable[] {
    return [...this.streams];
  }

  clear(): void {
    this.queries.length = 0;
    this.streams.length = 0;
  }

  private register(sqlPattern: string | RegExp, response: Response): this {
    if (sqlPattern instanceof RegExp) {
      this.patterns.push({ pattern: sqlPattern, response });
    } else {
      this.responses.set(normalizeQuery(sqlPattern), response);
    }
    return this;
  }

  private findResponse(sql: string): Response | undefined {
    const exact = this.responses.get(normalizeQuery(sql));
    if (exact !== undefined) {
      return exact;
    }
    return this.patterns.find(({ pattern }) => pattern.test(sql))?.response;
  }
}

function toReadable(response: Response | undefined): Readable {
  if (response === undefined) {
    return Readable.from([]);
  }
  if (response.kind === 'rows') {
    return Readable.from(response.rows.map(row => ({ ...row })));
  }
  const { error } = response;
  return new Readable({
    objectMode: true,
    read() {
      this.destroy(error instanceof Error ? error : Object.assign(new Error(error.message ?? 'driver error'), error));
    },
  });
}

// ============================================================================
// Mock Connection Provider
// ============================================================================

/**
 * Connection provider that leases one shared {@link MockConnection} and
 * counts how leases are acquired and settled.
 */
export class MockConnectionProvider implements ConnectionProvider {
  readonly connection: MockConnection;
  private acquired = 0;
  private released = 0;
  private destroyed = 0;
  private ended = false;
  private acquireError?: Error;

  constructor(connection: MockConnection = new MockConnection()) {
    this.connection = connection;
  }

  /** Makes the next acquisitions fail with `error` */
  failAcquireWith(error: Error): this {
    this.acquireError = error;
    return this;
  }

  async acquire(): Promise<LeasedConnection> {
    if (this.acquireError !== undefined) {
      throw this.acquireError;
    }
    this.acquired++;
    return {
      connection: this.connection,
      release: () => {
        this.released++;
      },
      destroy: () => {
        this.destroyed++;
      },
    };
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  get acquiredCount(): number {
    return this.acquired;
  }

  get releasedCount(): number {
    return this.released;
  }

  get destroyedCount(): number {
    return this.destroyed;
  }

  /** Connections acquired and neither released nor destroyed */
  get activeCount(): number {
    return this.acquired - this.released - this.destroyed;
  }

  get isEnded(): boolean {
    return this.ended;
  }
}
