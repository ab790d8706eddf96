/**
 * Parameter binding.
 *
 * Attaches compiled bind values to a prepared statement by position, choosing
 * the setter from the declared column type.
 *
 * @module binding
 */

import { InvalidBindValueError, UnknownTypeError } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import { NoopLogger } from '../observability/index.js';
import type { ColumnType, DomainValue, PendingBindValue } from '../types/index.js';
import { BIGINT, BOOLEAN, DOUBLE, VARBINARY, VARCHAR } from '../types/index.js';

/**
 * SQL type reported when binding a null.
 */
export enum SqlNullType {
  BigInt = 'BIGINT',
  Double = 'DOUBLE',
  Boolean = 'BOOLEAN',
  VarChar = 'VARCHAR',
  VarBinary = 'VARBINARY',
}

/** Null type per declared type name. Extend by adding rows. */
const SQL_NULL_TYPES: ReadonlyMap<string, SqlNullType> = new Map([
  [BIGINT.name, SqlNullType.BigInt],
  [DOUBLE.name, SqlNullType.Double],
  [BOOLEAN.name, SqlNullType.Boolean],
  [VARCHAR.name, SqlNullType.VarChar],
  [VARBINARY.name, SqlNullType.VarBinary],
]);

/**
 * Looks up the SQL null type of a declared type.
 *
 * @throws {UnknownTypeError} If the type is not in the supported set
 */
export function sqlNullTypeFor(type: ColumnType): SqlNullType {
  const sqlType = SQL_NULL_TYPES.get(type.name);
  if (sqlType === undefined) {
    throw new UnknownTypeError(type.name);
  }
  return sqlType;
}

/**
 * Positional parameter setters of a prepared statement. Positions start at 1.
 */
export interface StatementParameters {
  setNull(position: number, sqlType: SqlNullType): void;
  setLong(position: number, value: bigint): void;
  setDouble(position: number, value: number): void;
  setBoolean(position: number, value: boolean): void;
  setBytes(position: number, value: Uint8Array): void;
  setString(position: number, value: string): void;
}

const utf8 = new TextDecoder('utf-8');

/**
 * Binds each value at position `i + 1`, in list order.
 *
 * @param statement - Statement to bind into; must not be shared while binding
 * @param values - Bind values in placeholder order
 * @param identifierColumnIndexes - Columns whose values are bound as raw bytes
 * @throws {UnknownTypeError} If a declared type cannot be bound
 * @throws {InvalidBindValueError} If a value does not match its declared type
 */
export function bindParameters(
  statement: StatementParameters,
  values: readonly PendingBindValue[],
  identifierColumnIndexes: ReadonlySet<number>
): void {
  values.forEach((value, i) => {
    bindValue(statement, i + 1, value, identifierColumnIndexes.has(value.columnIndex));
  });
}

function bindValue(
  statement: StatementParameters,
  position: number,
  { type, value }: PendingBindValue,
  identifier: boolean
): void {
  if (value === null) {
    statement.setNull(position, sqlNullTypeFor(type));
    return;
  }

  switch (type.representation) {
    case 'long':
      statement.setLong(position, toLong(position, type, value));
      return;
    case 'double':
      if (typeof value !== 'number') {
        throw new InvalidBindValueError(position, type.name, value);
      }
      statement.setDouble(position, value);
      return;
    case 'boolean':
      if (typeof value !== 'boolean') {
        throw new InvalidBindValueError(position, type.name, value);
      }
      statement.setBoolean(position, value);
      return;
    case 'slice':
      if (identifier) {
        // converted to 16 bytes at compile time
        if (!(value instanceof Uint8Array)) {
          throw new InvalidBindValueError(position, type.name, value);
        }
        statement.setBytes(position, value);
      } else {
        statement.setString(position, toText(position, type, value));
      }
      return;
    default:
      throw new UnknownTypeError(type.name, type.representation);
  }
}

function toLong(position: number, type: ColumnType, value: DomainValue): bigint {
  if (typeof value === 'bigint') {
    return value;
  }
  if (typeof value === 'number' && Number.isInteger(value)) {
    return BigInt(value);
  }
  throw new InvalidBindValueError(position, type.name, value);
}

function toText(position: number, type: ColumnType, value: DomainValue): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value instanceof Uint8Array) {
    return utf8.decode(value);
  }
  throw new InvalidBindValueError(position, type.name, value);
}

// ============================================================================
// Parameter Binder
// ============================================================================

/**
 * Class form of {@link bindParameters} that logs each bind pass.
 */
export class ParameterBinder {
  private readonly logger: Logger;

  constructor(logger: Logger = new NoopLogger()) {
    this.logger = logger;
  }

  bind(
    statement: StatementParameters,
    values: readonly PendingBindValue[],
    identifierColumnIndexes: ReadonlySet<number> = new Set()
  ): void {
    bindParameters(statement, values, identifierColumnIndexes);
    this.logger.trace('Bound parameters', { count: values.length });
  }
}
