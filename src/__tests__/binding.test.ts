/**
 * Tests for parameter binding.
 */

import {
  BIGINT,
  BOOLEAN,
  DOUBLE,
  InMemoryLogger,
  InvalidBindValueError,
  LogLevel,
  ParameterBinder,
  SqlNullType,
  UnknownTypeError,
  VARBINARY,
  VARCHAR,
  bindParameters,
  sqlNullTypeFor,
} from '../index.js';
import type { ColumnType, PendingBindValue, StatementParameters } from '../index.js';

function createStatement() {
  return {
    setNull: vi.fn<[number, SqlNullType], void>(),
    setLong: vi.fn<[number, bigint], void>(),
    setDouble: vi.fn<[number, number], void>(),
    setBoolean: vi.fn<[number, boolean], void>(),
    setBytes: vi.fn<[number, Uint8Array], void>(),
    setString: vi.fn<[number, string], void>(),
  } satisfies StatementParameters;
}

const JSON_TYPE: ColumnType = { name: 'json', representation: 'object' };

describe('sqlNullTypeFor', () => {
  it('should map every supported type', () => {
    expect(sqlNullTypeFor(BIGINT)).toBe(SqlNullType.BigInt);
    expect(sqlNullTypeFor(DOUBLE)).toBe(SqlNullType.Double);
    expect(sqlNullTypeFor(BOOLEAN)).toBe(SqlNullType.Boolean);
    expect(sqlNullTypeFor(VARCHAR)).toBe(SqlNullType.VarChar);
    expect(sqlNullTypeFor(VARBINARY)).toBe(SqlNullType.VarBinary);
  });

  it('should reject unknown types', () => {
    expect(() => sqlNullTypeFor(JSON_TYPE)).toThrow(UnknownTypeError);
    expect(() => sqlNullTypeFor(JSON_TYPE)).toThrow('Unknown type: json');
  });
});

describe('bindParameters', () => {
  it('should bind each value at its one-based position by type', () => {
    const statement = createStatement();
    const values: PendingBindValue[] = [
      { columnIndex: 0, type: BIGINT, value: 5 },
      { columnIndex: 1, type: DOUBLE, value: 2.5 },
      { columnIndex: 2, type: BOOLEAN, value: true },
      { columnIndex: 3, type: VARCHAR, value: 'orders' },
    ];

    bindParameters(statement, values, new Set());

    expect(statement.setLong).toHaveBeenCalledWith(1, 5n);
    expect(statement.setDouble).toHaveBeenCalledWith(2, 2.5);
    expect(statement.setBoolean).toHaveBeenCalledWith(3, true);
    expect(statement.setString).toHaveBeenCalledWith(4, 'orders');
  });

  it('should keep bigint values as they are', () => {
    const statement = createStatement();
    bindParameters(statement, [{ columnIndex: 0, type: BIGINT, value: 9007199254740993n }], new Set());
    expect(statement.setLong).toHaveBeenCalledWith(1, 9007199254740993n);
  });

  it('should bind nulls with the null type of the declared type', () => {
    const statement = createStatement();
    bindParameters(statement, [
      { columnIndex: 0, type: VARBINARY, value: null },
      { columnIndex: 1, type: BIGINT, value: null },
    ], new Set());

    expect(statement.setNull.mock.calls).toEqual([
      [1, SqlNullType.VarBinary],
      [2, SqlNullType.BigInt],
    ]);
  });

  it('should bind identifier columns as raw bytes', () => {
    const statement = createStatement();
    const bytes = new Uint8Array(16).fill(0xab);

    bindParameters(statement, [{ columnIndex: 2, type: VARBINARY, value: bytes }], new Set([2]));

    expect(statement.setBytes).toHaveBeenCalledWith(1, bytes);
    expect(statement.setString).not.toHaveBeenCalled();
  });

  it('should decode bytes as text on other slice columns', () => {
    const statement = createStatement();
    bindParameters(
      statement,
      [{ columnIndex: 0, type: VARBINARY, value: new TextEncoder().encode('héllo') }],
      new Set()
    );
    expect(statement.setString).toHaveBeenCalledWith(1, 'héllo');
  });

  it('should reject text on an identifier column', () => {
    const statement = createStatement();
    expect(() => bindParameters(
      statement,
      [{ columnIndex: 0, type: VARBINARY, value: 'not-bytes' }],
      new Set([0])
    )).toThrow(InvalidBindValueError);
  });

  it('should reject fractional values on integer columns', () => {
    const statement = createStatement();
    expect(() => bindParameters(statement, [{ columnIndex: 0, type: BIGINT, value: 1.5 }], new Set()))
      .toThrow('Cannot bind 1.5 as bigint at position 1');
  });

  it('should reject types it cannot bind', () => {
    const statement = createStatement();
    expect(() => bindParameters(statement, [{ columnIndex: 0, type: JSON_TYPE, value: 'x' }], new Set()))
      .toThrow('Unknown type: json (object)');
  });

  it('should stop at the first failing value', () => {
    const statement = createStatement();
    expect(() => bindParameters(statement, [
      { columnIndex: 0, type: BIGINT, value: 1 },
      { columnIndex: 1, type: BOOLEAN, value: 'yes' },
      { columnIndex: 2, type: BIGINT, value: 3 },
    ], new Set())).toThrow(InvalidBindValueError);

    expect(statement.setLong.mock.calls).toEqual([[1, 1n]]);
  });
});

describe('ParameterBinder', () => {
  it('should log the number of bound values', () => {
    const logger = new InMemoryLogger();
    const statement = createStatement();

    new ParameterBinder(logger).bind(statement, [{ columnIndex: 0, type: BIGINT, value: 1 }]);

    expect(statement.setLong).toHaveBeenCalledWith(1, 1n);
    const [entry] = logger.getEntriesAtLevel(LogLevel.TRACE);
    expect(entry.message).toBe('Bound parameters');
    expect(entry.context).toEqual({ count: 1 });
  });
});
