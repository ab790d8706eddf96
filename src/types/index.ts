/**
 * Constraint model for predicate pushdown.
 *
 * A {@link TupleDomain} maps column indexes to {@link Domain}s; each domain is a
 * {@link ValueSet} of {@link Range}s plus a null allowance.
 */

import {
  InvalidArgumentError,
  InvalidDomainError,
  InvalidMarkerError,
  InvalidRangeError,
} from '../errors/index.js';

// ============================================================================
// Column Types
// ============================================================================

/**
 * Runtime representation of a column's values.
 */
export type Representation = 'long' | 'double' | 'boolean' | 'slice' | 'object';

/**
 * Declared column type. Two types are the same type when their names match.
 */
export interface ColumnType {
  /** Type name */
  readonly name: string;
  /** How values of this type are carried at runtime */
  readonly representation: Representation;
}

/** 64-bit signed integer */
export const BIGINT: ColumnType = { name: 'bigint', representation: 'long' };

/** IEEE 754 double */
export const DOUBLE: ColumnType = { name: 'double', representation: 'double' };

/** Boolean */
export const BOOLEAN: ColumnType = { name: 'boolean', representation: 'boolean' };

/** Variable-length text */
export const VARCHAR: ColumnType = { name: 'varchar', representation: 'slice' };

/** Variable-length binary */
export const VARBINARY: ColumnType = { name: 'varbinary', representation: 'slice' };

/**
 * Checks whether two declared types are the same type.
 */
export function isSameType(a: ColumnType, b: ColumnType): boolean {
  return a.name === b.name;
}

// ============================================================================
// Values
// ============================================================================

/**
 * A value carried by a range marker or a bind value.
 *
 * Slice-backed columns carry either UTF-8 text or raw bytes.
 */
export type DomainValue = bigint | number | boolean | string | Uint8Array;

/**
 * Checks whether a value fits the representation of a type.
 */
export function valueMatchesType(type: ColumnType, value: DomainValue): boolean {
  switch (type.representation) {
    case 'long':
      return typeof value === 'bigint' || (typeof value === 'number' && Number.isInteger(value));
    case 'double':
      return typeof value === 'number';
    case 'boolean':
      return typeof value === 'boolean';
    case 'slice':
      return typeof value === 'string' || value instanceof Uint8Array;
    case 'object':
      return true;
  }
}

/**
 * Orders two values of the same representation.
 *
 * @returns negative, zero or positive like Array.prototype.sort comparators
 * @throws {InvalidArgumentError} If the values are not comparable
 */
export function compareValues(a: DomainValue, b: DomainValue): number {
  if (isNumeric(a) && isNumeric(b)) {
    // bigint and number compare exactly with relational operators
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return Number(a) - Number(b);
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (a instanceof Uint8Array && b instanceof Uint8Array) {
    return compareBytes(a, b);
  }
  throw new InvalidArgumentError(`Cannot compare values of type ${typeof a} and ${typeof b}`);
}

/**
 * Checks two values for equality (bytes compare by content).
 */
export function valuesEqual(a: DomainValue, b: DomainValue): boolean {
  if (a instanceof Uint8Array || b instanceof Uint8Array) {
    return a instanceof Uint8Array && b instanceof Uint8Array && compareBytes(a, b) === 0;
  }
  if (isNumeric(a) && isNumeric(b)) {
    return a == b;
  }
  return a === b;
}

function isNumeric(value: DomainValue): value is bigint | number {
  return typeof value === 'bigint' || typeof value === 'number';
}

function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) {
      return a[i] - b[i];
    }
  }
  return a.length - b.length;
}

// ============================================================================
// Markers
// ============================================================================

/**
 * How a bounded marker relates to its value.
 */
export enum Bound {
  /** Strictly greater than the value (low side only) */
  Above = 'ABOVE',
  /** Equal to the value (either side) */
  Exactly = 'EXACTLY',
  /** Strictly less than the value (high side only) */
  Below = 'BELOW',
}

/** Bounds a low marker may carry */
export type LowBound = Bound.Above | Bound.Exactly;

/** Bounds a high marker may carry */
export type HighBound = Bound.Exactly | Bound.Below;

/**
 * One end of a range.
 */
export type Marker<B extends Bound = Bound> =
  | { readonly kind: 'unbounded' }
  | { readonly kind: 'bounded'; readonly bound: B; readonly value: DomainValue };

/** Marker on the low side of a range */
export type LowMarker = Marker<LowBound>;

/** Marker on the high side of a range */
export type HighMarker = Marker<HighBound>;

const UNBOUNDED: Marker<never> = { kind: 'unbounded' };

export const Marker = {
  /** A marker with no bound */
  unbounded(): Marker<never> {
    return UNBOUNDED;
  },

  /** Strictly above the value */
  above(value: DomainValue): Marker<Bound.Above> {
    return { kind: 'bounded', bound: Bound.Above, value };
  },

  /** Exactly the value */
  exactly(value: DomainValue): Marker<Bound.Exactly> {
    return { kind: 'bounded', bound: Bound.Exactly, value };
  },

  /** Strictly below the value */
  below(value: DomainValue): Marker<Bound.Below> {
    return { kind: 'bounded', bound: Bound.Below, value };
  },
} as const;

function toLowMarker(marker: Marker): LowMarker {
  if (marker.kind === 'unbounded') {
    return marker;
  }
  switch (marker.bound) {
    case Bound.Above:
    case Bound.Exactly:
      return { kind: 'bounded', bound: marker.bound, value: marker.value };
    default:
      throw new InvalidMarkerError('low', String(marker.bound));
  }
}

function toHighMarker(marker: Marker): HighMarker {
  if (marker.kind === 'unbounded') {
    return marker;
  }
  switch (marker.bound) {
    case Bound.Exactly:
    case Bound.Below:
      return { kind: 'bounded', bound: marker.bound, value: marker.value };
    default:
      throw new InvalidMarkerError('high', String(marker.bound));
  }
}

// ============================================================================
// Ranges
// ============================================================================

/**
 * Interval over one column's value space.
 *
 * @example
 * ```typescript
 * // 3 <= x < 10
 * const range = new Range(Marker.exactly(3), Marker.below(10));
 * ```
 */
export class Range {
  readonly low: LowMarker;
  readonly high: HighMarker;

  /**
   * @throws {InvalidMarkerError} If low uses BELOW or high uses ABOVE
   * @throws {InvalidRangeError} If the range is inverted or empty
   */
  constructor(low: Marker, high: Marker) {
    this.low = toLowMarker(low);
    this.high = toHighMarker(high);

    if (this.low.kind === 'bounded' && this.high.kind === 'bounded') {
      const comparison = compareValues(this.low.value, this.high.value);
      if (comparison > 0) {
        throw new InvalidRangeError('low value must be less than or equal to high value');
      }
      if (comparison === 0 && (this.low.bound !== Bound.Exactly || this.high.bound !== Bound.Exactly)) {
        throw new InvalidRangeError('range with equal ends must include both ends');
      }
    }
  }

  static all(): Range {
    return new Range(Marker.unbounded(), Marker.unbounded());
  }

  static equal(value: DomainValue): Range {
    return new Range(Marker.exactly(value), Marker.exactly(value));
  }

  static greaterThan(value: DomainValue): Range {
    return new Range(Marker.above(value), Marker.unbounded());
  }

  static greaterThanOrEqual(value: DomainValue): Range {
    return new Range(Marker.exactly(value), Marker.unbounded());
  }

  static lessThan(value: DomainValue): Range {
    return new Range(Marker.unbounded(), Marker.below(value));
  }

  static lessThanOrEqual(value: DomainValue): Range {
    return new Range(Marker.unbounded(), Marker.exactly(value));
  }

  static between(
    low: DomainValue,
    high: DomainValue,
    options: { lowInclusive?: boolean; highInclusive?: boolean } = {}
  ): Range {
    return new Range(
      (options.lowInclusive ?? true) ? Marker.exactly(low) : Marker.above(low),
      (options.highInclusive ?? true) ? Marker.exactly(high) : Marker.below(high)
    );
  }

  /** Both ends unbounded */
  isAll(): boolean {
    return this.low.kind === 'unbounded' && this.high.kind === 'unbounded';
  }

  /** Both ends EXACTLY the same value */
  isSingleValue(): boolean {
    return this.low.kind === 'bounded'
      && this.high.kind === 'bounded'
      && this.low.bound === Bound.Exactly
      && this.high.bound === Bound.Exactly
      && valuesEqual(this.low.value, this.high.value);
  }

  /**
   * @throws {InvalidArgumentError} If the range is not a single value
   */
  getSingleValue(): DomainValue {
    if (!this.isSingleValue() || this.low.kind !== 'bounded') {
      throw new InvalidArgumentError('Range does not have just a single value');
    }
    return this.low.value;
  }

  toString(): string {
    const low = this.low.kind === 'unbounded'
      ? '(<min>'
      : `${this.low.bound === Bound.Exactly ? '[' : '('}${formatValue(this.low.value)}`;
    const high = this.high.kind === 'unbounded'
      ? '<max>)'
      : `${formatValue(this.high.value)}${this.high.bound === Bound.Exactly ? ']' : ')'}`;
    return `${low}, ${high}`;
  }
}

function formatValue(value: DomainValue): string {
  if (value instanceof Uint8Array) {
    return `0x${Buffer.from(value).toString('hex')}`;
  }
  return String(value);
}

// ============================================================================
// Value Sets
// ============================================================================

/**
 * Ranges allowed for one column, kept in insertion order.
 */
export class ValueSet {
  private constructor(
    private readonly ranges: readonly Range[],
    private readonly unconstrained: boolean
  ) {}

  /** No value is allowed */
  static none(): ValueSet {
    return new ValueSet([], false);
  }

  /** Every value is allowed */
  static all(): ValueSet {
    return new ValueSet([Range.all()], true);
  }

  /**
   * Set of the given ranges. Any all-range makes the whole set all.
   */
  static ofRanges(...ranges: Range[]): ValueSet {
    if (ranges.some(range => range.isAll())) {
      return ValueSet.all();
    }
    return new ValueSet([...ranges], false);
  }

  /**
   * Set of single values.
   */
  static of(...values: DomainValue[]): ValueSet {
    return ValueSet.ofRanges(...values.map(value => Range.equal(value)));
  }

  isNone(): boolean {
    return this.ranges.length === 0;
  }

  isAll(): boolean {
    return this.unconstrained;
  }

  getRanges(): readonly Range[] {
    return this.ranges;
  }

  [Symbol.iterator](): Iterator<Range> {
    return this.ranges[Symbol.iterator]();
  }
}

// ============================================================================
// Domains
// ============================================================================

/**
 * Constraint on one column: the allowed ranges and whether null is allowed.
 */
export class Domain {
  private constructor(
    readonly type: ColumnType,
    readonly values: ValueSet,
    readonly nullAllowed: boolean
  ) {}

  /**
   * @throws {InvalidDomainError} If a range carries a value that does not fit the type
   */
  static create(type: ColumnType, values: ValueSet, nullAllowed: boolean): Domain {
    for (const range of values) {
      for (const marker of [range.low, range.high]) {
        if (marker.kind === 'bounded' && !valueMatchesType(type, marker.value)) {
          throw new InvalidDomainError(type.name, marker.value);
        }
      }
    }
    return new Domain(type, values, nullAllowed);
  }

  /** Column must be null */
  static onlyNull(type: ColumnType): Domain {
    return Domain.create(type, ValueSet.none(), true);
  }

  /** Column must not be null */
  static notNull(type: ColumnType): Domain {
    return Domain.create(type, ValueSet.all(), false);
  }

  static singleValue(type: ColumnType, value: DomainValue): Domain {
    return Domain.create(type, ValueSet.of(value), false);
  }

  static multipleValues(type: ColumnType, values: DomainValue[]): Domain {
    if (values.length === 0) {
      throw new InvalidArgumentError('values cannot be empty for multiple values domain');
    }
    return Domain.create(type, ValueSet.of(...values), false);
  }

  /** No constraint at all */
  static all(type: ColumnType): Domain {
    return Domain.create(type, ValueSet.all(), true);
  }

  /** Unsatisfiable */
  static none(type: ColumnType): Domain {
    return Domain.create(type, ValueSet.none(), false);
  }

  isNone(): boolean {
    return this.values.isNone() && !this.nullAllowed;
  }

  isAll(): boolean {
    return this.values.isAll() && this.nullAllowed;
  }

  isOnlyNull(): boolean {
    return this.values.isNone() && this.nullAllowed;
  }

  isNotNull(): boolean {
    return this.values.isAll() && !this.nullAllowed;
  }

  /** Returns a copy of this domain with null allowed */
  withNullAllowed(): Domain {
    return new Domain(this.type, this.values, true);
  }
}

// ============================================================================
// Tuple Domains
// ============================================================================

/**
 * Per-column constraints across a row, keyed by column index.
 *
 * A none tuple domain admits no row. An empty tuple domain admits every row.
 */
export class TupleDomain {
  private static readonly NONE = new TupleDomain(undefined);
  private static readonly ALL = new TupleDomain(new Map());

  private constructor(private readonly domains: ReadonlyMap<number, Domain> | undefined) {}

  static none(): TupleDomain {
    return TupleDomain.NONE;
  }

  static all(): TupleDomain {
    return TupleDomain.ALL;
  }

  /**
   * Builds a tuple domain from column domains.
   *
   * A none column domain makes the result none; all column domains are dropped.
   *
   * @throws {InvalidArgumentError} If a column index is not a non-negative integer
   */
  static withColumnDomains(domains: Iterable<readonly [number, Domain]>): TupleDomain {
    const entries = Array.from(domains).sort(([a], [b]) => a - b);
    const normalized = new Map<number, Domain>();

    for (const [index, domain] of entries) {
      if (!Number.isInteger(index) || index < 0) {
        throw new InvalidArgumentError(`Invalid column index: ${index}`, { columnIndex: index });
      }
      if (domain.isNone()) {
        return TupleDomain.none();
      }
      if (!domain.isAll()) {
        normalized.set(index, domain);
      }
    }

    return normalized.size === 0 ? TupleDomain.all() : new TupleDomain(normalized);
  }

  isNone(): boolean {
    return this.domains === undefined;
  }

  isAll(): boolean {
    return this.domains !== undefined && this.domains.size === 0;
  }

  /**
   * Column domains in ascending column index order.
   *
   * @throws {InvalidArgumentError} If the tuple domain is none
   */
  getDomains(): ReadonlyMap<number, Domain> {
    if (this.domains === undefined) {
      throw new InvalidArgumentError('A none tuple domain has no column domains');
    }
    return this.domains;
  }
}

// ============================================================================
// Bind Values
// ============================================================================

/**
 * A value waiting to be bound, produced by the compiler and consumed by the binder.
 */
export interface PendingBindValue {
  /** Column the value constrains */
  readonly columnIndex: number;
  /** Declared type of that column */
  readonly type: ColumnType;
  /** Value to bind; identifier columns carry their 16-byte form */
  readonly value: DomainValue | null;
}

/**
 * Compiled predicate: the WHERE clause and its bind values in placeholder order.
 */
export interface CompiledPredicate {
  /** Empty, or a clause starting with "WHERE " */
  readonly sql: string;
  /** One entry per "?" in sql, left to right */
  readonly bindValues: readonly PendingBindValue[];
}
