/**
 * MySQL predicate pushdown.
 *
 * Compiles per-column constraints into parameterized WHERE clauses, binds the
 * values by declared type and streams the filtered rows through mysql2.
 *
 * @example
 * ```typescript
 * import { createPushdownClient, configFromEnv, TupleDomain, Domain, BIGINT } from 'mysql-predicate-pushdown';
 *
 * const client = createPushdownClient(configFromEnv());
 * const rows = await client.openScan({
 *   sql: 'SELECT table_id, row_count FROM tables',
 *   columnNames: ['table_id', 'row_count'],
 *   columnTypes: [BIGINT, BIGINT],
 *   tupleDomain: TupleDomain.withColumnDomains([[0, Domain.multipleValues(BIGINT, [1, 2, 3])]]),
 * });
 * ```
 *
 * @module mysql-predicate-pushdown
 */

export * from './errors/index.js';
export * from './types/index.js';
export * from './uuid/index.js';
export * from './observability/index.js';
export * from './config/index.js';
export * from './predicate/index.js';
export * from './binding/index.js';
export * from './statement/index.js';
export * from './client/index.js';
export * from './simulation/index.js';
