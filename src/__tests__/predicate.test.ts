/**
 * Tests for the predicate compiler.
 */

import {
  BIGINT,
  DOUBLE,
  Domain,
  InMemoryLogger,
  InvalidArgumentError,
  LogLevel,
  PredicateCompiler,
  Range,
  TupleDomain,
  VARBINARY,
  VARCHAR,
  ValueSet,
  compilePredicate,
  countPlaceholders,
} from '../index.js';
import type { ColumnType } from '../index.js';

const ID = '3fa85f64-5717-4562-b3fc-2c963f66afa6';
const ID_BYTES = [0x3f, 0xa8, 0x5f, 0x64, 0x57, 0x17, 0x45, 0x62, 0xb3, 0xfc, 0x2c, 0x96, 0x3f, 0x66, 0xaf, 0xa6];

function compileColumn(domain: Domain, type: ColumnType = BIGINT, identifier = false) {
  return compilePredicate(
    TupleDomain.withColumnDomains([[0, domain]]),
    ['x'],
    [type],
    new Set<number>(identifier ? [0] : [])
  );
}

function values(compiled: { bindValues: readonly { value: unknown }[] }): unknown[] {
  return compiled.bindValues.map(b => b.value);
}

describe('compilePredicate', () => {
  describe('null handling', () => {
    it('should render IS NULL for a null-only domain', () => {
      const compiled = compileColumn(Domain.onlyNull(BIGINT));
      expect(compiled.sql).toBe('WHERE x IS NULL');
      expect(compiled.bindValues).toEqual([]);
    });

    it('should render IS NOT NULL for a not-null domain', () => {
      const compiled = compileColumn(Domain.notNull(BIGINT));
      expect(compiled.sql).toBe('WHERE x IS NOT NULL');
      expect(compiled.bindValues).toEqual([]);
    });
  });

  describe('single values', () => {
    it('should render IN with one placeholder per value in insertion order', () => {
      const compiled = compileColumn(Domain.multipleValues(BIGINT, [5, 7, 9]));
      expect(compiled.sql).toBe('WHERE (x IN (?,?,?))');
      expect(values(compiled)).toEqual([5, 7, 9]);
    });

    it('should keep unsorted insertion order', () => {
      const compiled = compileColumn(Domain.multipleValues(BIGINT, [9, 5, 7]));
      expect(values(compiled)).toEqual([9, 5, 7]);
    });

    it('should render equality with a null disjunct', () => {
      const compiled = compileColumn(Domain.singleValue(BIGINT, 5).withNullAllowed());
      expect(compiled.sql).toBe('WHERE (x = ? OR x IS NULL)');
      expect(values(compiled)).toEqual([5]);
    });
  });

  describe('ranges', () => {
    it('should render a bounded range as one parenthesized disjunct', () => {
      const compiled = compileColumn(
        Domain.create(BIGINT, ValueSet.ofRanges(Range.between(3, 10, { highInclusive: false })), false)
      );
      expect(compiled.sql).toBe('WHERE ((x >= ? AND x < ?))');
      expect(values(compiled)).toEqual([3, 10]);
    });

    it('should render each bound kind with its operator', () => {
      expect(compileColumn(Domain.create(BIGINT, ValueSet.ofRanges(Range.greaterThan(1)), false)).sql)
        .toBe('WHERE ((x > ?))');
      expect(compileColumn(Domain.create(BIGINT, ValueSet.ofRanges(Range.greaterThanOrEqual(1)), false)).sql)
        .toBe('WHERE ((x >= ?))');
      expect(compileColumn(Domain.create(DOUBLE, ValueSet.ofRanges(Range.lessThan(1.5)), false), DOUBLE).sql)
        .toBe('WHERE ((x < ?))');
      expect(compileColumn(Domain.create(BIGINT, ValueSet.ofRanges(Range.lessThanOrEqual(1)), false)).sql)
        .toBe('WHERE ((x <= ?))');
    });

    it('should bind range values before single values', () => {
      const domain = Domain.create(
        BIGINT,
        ValueSet.ofRanges(Range.equal(1), Range.greaterThan(100), Range.equal(2)),
        true
      );
      const compiled = compileColumn(domain);
      expect(compiled.sql).toBe('WHERE ((x > ?) OR x IN (?,?) OR x IS NULL)');
      expect(values(compiled)).toEqual([100, 1, 2]);
    });
  });

  describe('multiple columns', () => {
    it('should join column predicates with AND in column index order', () => {
      const tupleDomain = TupleDomain.withColumnDomains([
        [1, Domain.singleValue(VARCHAR, 'orders')],
        [0, Domain.notNull(BIGINT)],
      ]);
      const compiled = compilePredicate(tupleDomain, ['table_id', 'table_name'], [BIGINT, VARCHAR], new Set());
      expect(compiled.sql).toBe('WHERE table_id IS NOT NULL AND (table_name = ?)');
      expect(compiled.bindValues).toEqual([{ columnIndex: 1, type: VARCHAR, value: 'orders' }]);
    });

    it('should reject a constrained column without a name', () => {
      const tupleDomain = TupleDomain.withColumnDomains([[3, Domain.notNull(BIGINT)]]);
      expect(() => compilePredicate(tupleDomain, ['x'], [BIGINT], new Set())).toThrow(InvalidArgumentError);
    });
  });

  describe('identifier columns', () => {
    it('should store the 16-byte form instead of the text', () => {
      const compiled = compileColumn(Domain.singleValue(VARBINARY, ID), VARBINARY, true);
      expect(compiled.sql).toBe('WHERE (x = ?)');
      const [bindValue] = compiled.bindValues;
      expect(bindValue.value).toBeInstanceOf(Uint8Array);
      expect(bindValue.value instanceof Uint8Array ? Array.from(bindValue.value) : undefined).toEqual(ID_BYTES);
    });

    it('should convert time-ordered identifiers', () => {
      const compiled = compileColumn(
        Domain.singleValue(VARBINARY, '018f3b7e-7c1a-7a3e-9b2d-0c4f5e6a7b8c'),
        VARBINARY,
        true
      );
      const [bindValue] = compiled.bindValues;
      expect(bindValue.value instanceof Uint8Array ? Buffer.from(bindValue.value).toString('hex') : undefined)
        .toBe('018f3b7e7c1a7a3e9b2d0c4f5e6a7b8c');
    });

    it('should leave values on other columns unchanged', () => {
      const compiled = compileColumn(Domain.singleValue(VARBINARY, ID), VARBINARY, false);
      expect(values(compiled)).toEqual([ID]);
    });
  });

  describe('none and all', () => {
    it('should return an empty fragment for a none tuple domain', () => {
      const compiled = compilePredicate(TupleDomain.none(), ['x'], [BIGINT], new Set());
      expect(compiled.sql).toBe('');
      expect(compiled.bindValues).toEqual([]);
    });

    it('should return an empty fragment when no column is constrained', () => {
      const compiled = compilePredicate(TupleDomain.all(), ['x'], [BIGINT], new Set());
      expect(compiled.sql).toBe('');
      expect(compiled.bindValues).toEqual([]);
    });
  });

  describe('properties', () => {
    const tupleDomain = TupleDomain.withColumnDomains([
      [0, Domain.create(BIGINT, ValueSet.ofRanges(Range.between(1, 5), Range.equal(9), Range.equal(11)), true)],
      [1, Domain.onlyNull(VARCHAR)],
      [2, Domain.create(DOUBLE, ValueSet.ofRanges(Range.greaterThan(0.5)), false)],
    ]);
    const names = ['a', 'b', 'c'];
    const types = [BIGINT, VARCHAR, DOUBLE];

    it('should emit one bind value per placeholder', () => {
      const compiled = compilePredicate(tupleDomain, names, types, new Set());
      expect(compiled.sql).toBe('WHERE ((a >= ? AND a <= ?) OR a IN (?,?) OR a IS NULL) AND b IS NULL AND ((c > ?))');
      expect(countPlaceholders(compiled.sql)).toBe(compiled.bindValues.length);
      expect(values(compiled)).toEqual([1, 5, 9, 11, 0.5]);
    });

    it('should be idempotent', () => {
      const first = compilePredicate(tupleDomain, names, types, new Set());
      const second = compilePredicate(tupleDomain, names, types, new Set());
      expect(second.sql).toBe(first.sql);
      expect(second.bindValues).toEqual(first.bindValues);
    });
  });
});

describe('countPlaceholders', () => {
  it('should count every question mark', () => {
    expect(countPlaceholders('')).toBe(0);
    expect(countPlaceholders('WHERE (x IN (?,?,?))')).toBe(3);
  });
});

describe('PredicateCompiler', () => {
  it('should log what it compiles at trace level', () => {
    const logger = new InMemoryLogger();
    const compiler = new PredicateCompiler(logger);

    const compiled = compiler.compile(
      TupleDomain.withColumnDomains([[0, Domain.singleValue(BIGINT, 5)]]),
      ['x'],
      [BIGINT]
    );

    expect(compiled.sql).toBe('WHERE (x = ?)');
    const entries = logger.getEntriesAtLevel(LogLevel.TRACE);
    expect(entries).toHaveLength(1);
    expect(entries[0].message).toBe('Compiled predicate');
    expect(entries[0].context).toEqual({ none: false, predicate: 'WHERE (x = ?)', bindValueCount: 1 });
  });
});
