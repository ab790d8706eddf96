/**
 * Predicate compiler.
 *
 * Renders a tuple domain as a parameterized WHERE clause. Literal values never
 * appear in the SQL text; each one becomes a "?" placeholder and a pending
 * bind value, listed in the order the placeholders appear.
 *
 * @module predicate
 */

import {
  DegenerateDomainError,
  InvalidArgumentError,
  InvalidMarkerError,
} from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import { NoopLogger } from '../observability/index.js';
import type {
  ColumnType,
  CompiledPredicate,
  Domain,
  DomainValue,
  HighMarker,
  LowMarker,
  PendingBindValue,
  TupleDomain,
} from '../types/index.js';
import { Bound } from '../types/index.js';
import { identifierBindValue } from '../uuid/index.js';

/** Placeholder for one bind value */
const PLACEHOLDER = '?';

const EMPTY_PREDICATE: CompiledPredicate = Object.freeze({ sql: '', bindValues: [] });

/**
 * Column being rendered, with the sink its bind values go to.
 */
interface ColumnContext {
  readonly index: number;
  readonly name: string;
  readonly type: ColumnType;
  readonly identifier: boolean;
  readonly bindValues: PendingBindValue[];
}

/**
 * Compiles a tuple domain into a WHERE clause and its bind values.
 *
 * A none tuple domain yields an empty clause, the same as an unconstrained one.
 * Callers that need "no rows" semantics must check `isNone()` themselves.
 *
 * @param tupleDomain - Per-column constraints
 * @param columnNames - Column names, indexed like the tuple domain
 * @param columnTypes - Declared column types, indexed like the tuple domain
 * @param identifierColumnIndexes - Columns holding UUIDs stored as 16 bytes
 * @throws {InvalidArgumentError} If a constrained column has no name or type
 *
 * @example
 * ```typescript
 * const { sql, bindValues } = compilePredicate(
 *   TupleDomain.withColumnDomains([[0, Domain.singleValue(BIGINT, 5)]]),
 *   ['shard_id'],
 *   [BIGINT],
 *   new Set()
 * );
 * // sql: "WHERE (shard_id = ?)", bindValues: [{ columnIndex: 0, type: BIGINT, value: 5 }]
 * ```
 */
export function compilePredicate(
  tupleDomain: TupleDomain,
  columnNames: readonly string[],
  columnTypes: readonly ColumnType[],
  identifierColumnIndexes: ReadonlySet<number>
): CompiledPredicate {
  if (tupleDomain.isNone()) {
    return EMPTY_PREDICATE;
  }

  const bindValues: PendingBindValue[] = [];
  const conjuncts: string[] = [];

  for (const [index, domain] of tupleDomain.getDomains()) {
    const name = columnNames[index];
    const type = columnTypes[index];
    if (name === undefined || type === undefined) {
      throw new InvalidArgumentError(`No column name or type for column index ${index}`, {
        columnIndex: index,
        columnCount: Math.min(columnNames.length, columnTypes.length),
      });
    }

    conjuncts.push(toColumnPredicate(domain, {
      index,
      name,
      type,
      identifier: identifierColumnIndexes.has(index),
      bindValues,
    }));
  }

  if (conjuncts.length === 0) {
    return EMPTY_PREDICATE;
  }

  return {
    sql: `WHERE ${conjuncts.join(' AND ')}`,
    bindValues,
  };
}

function toColumnPredicate(domain: Domain, column: ColumnContext): string {
  if (domain.isOnlyNull()) {
    return `${column.name} IS NULL`;
  }

  if (domain.isNotNull()) {
    return `${column.name} IS NOT NULL`;
  }

  const disjuncts: string[] = [];
  const singleValues: DomainValue[] = [];

  for (const range of domain.values) {
    if (range.isSingleValue()) {
      singleValues.push(range.getSingleValue());
      continue;
    }

    const rangeConjuncts: string[] = [];
    const low = toLowComparison(range.low);
    if (low !== undefined) {
      rangeConjuncts.push(toBindPredicate(column.name, low.operator));
      addBindValue(column, low.value);
    }
    const high = toHighComparison(range.high);
    if (high !== undefined) {
      rangeConjuncts.push(toBindPredicate(column.name, high.operator));
      addBindValue(column, high.value);
    }

    // an unbounded range is all, handled above as IS NOT NULL
    if (rangeConjuncts.length === 0) {
      throw new DegenerateDomainError(column.name);
    }
    disjuncts.push(`(${rangeConjuncts.join(' AND ')})`);
  }

  if (singleValues.length === 1) {
    disjuncts.push(toBindPredicate(column.name, '='));
    addBindValue(column, singleValues[0]);
  } else if (singleValues.length > 1) {
    disjuncts.push(`${column.name} IN (${Array(singleValues.length).fill(PLACEHOLDER).join(',')})`);
    for (const value of singleValues) {
      addBindValue(column, value);
    }
  }

  if (disjuncts.length === 0) {
    throw new DegenerateDomainError(column.name);
  }

  if (domain.nullAllowed) {
    disjuncts.push(`${column.name} IS NULL`);
  }

  return `(${disjuncts.join(' OR ')})`;
}

interface Comparison {
  operator: '>' | '>=' | '<' | '<=';
  value: DomainValue;
}

function toLowComparison(marker: LowMarker): Comparison | undefined {
  if (marker.kind === 'unbounded') {
    return undefined;
  }
  const bound: Bound = marker.bound;
  switch (bound) {
    case Bound.Above:
      return { operator: '>', value: marker.value };
    case Bound.Exactly:
      return { operator: '>=', value: marker.value };
    default:
      throw new InvalidMarkerError('low', String(bound));
  }
}

function toHighComparison(marker: HighMarker): Comparison | undefined {
  if (marker.kind === 'unbounded') {
    return undefined;
  }
  const bound: Bound = marker.bound;
  switch (bound) {
    case Bound.Below:
      return { operator: '<', value: marker.value };
    case Bound.Exactly:
      return { operator: '<=', value: marker.value };
    default:
      throw new InvalidMarkerError('high', String(bound));
  }
}

function toBindPredicate(columnName: string, operator: string): string {
  return `${columnName} ${operator} ${PLACEHOLDER}`;
}

function addBindValue(column: ColumnContext, value: DomainValue): void {
  column.bindValues.push({
    columnIndex: column.index,
    type: column.type,
    value: column.identifier ? identifierBindValue(value) : value,
  });
}

/**
 * Counts the placeholders in a SQL string.
 *
 * Every `?` counts, quoted or not, matching how mysql2 substitutes values.
 */
export function countPlaceholders(sql: string): number {
  let count = 0;
  for (const char of sql) {
    if (char === PLACEHOLDER) {
      count++;
    }
  }
  return count;
}

// ============================================================================
// Predicate Compiler
// ============================================================================

/**
 * Class form of {@link compilePredicate} that logs what it renders.
 */
export class PredicateCompiler {
  private readonly logger: Logger;

  constructor(logger: Logger = new NoopLogger()) {
    this.logger = logger;
  }

  compile(
    tupleDomain: TupleDomain,
    columnNames: readonly string[],
    columnTypes: readonly ColumnType[],
    identifierColumnIndexes: ReadonlySet<number> = new Set()
  ): CompiledPredicate {
    const compiled = compilePredicate(tupleDomain, columnNames, columnTypes, identifierColumnIndexes);

    this.logger.trace('Compiled predicate', {
      none: tupleDomain.isNone(),
      predicate: compiled.sql,
      bindValueCount: compiled.bindValues.length,
    });

    return compiled;
  }
}
