// ============================================================================
// @pvlkit/core - Values & Containers
// ============================================================================
//
// One ordered multi-valued container backs all three aggregation roles
// (module, group, object). Keys repeat; order is insertion order; a
// single-key lookup answers with the first occurrence.
//
// ============================================================================

import { PvlDate, PvlDateTime, PvlTime } from './datetime.js';
import type { PvlDateTimeValue } from './datetime.js';
import { IndexOutOfRangeError, KeyNotFoundError, QuantityError } from './errors.js';

export type PvlScalar = null | boolean | number | bigint | string | PvlDateTimeValue;

export type PvlValue =
  | PvlScalar
  | Quantity
  | PvlSet
  | EmptyValueAtLine
  | PvlValue[]
  | PvlContainer;

export type Entry = readonly [key: string, value: PvlValue];

// ---------------------------------------------------------------------------
// Quantity
// ---------------------------------------------------------------------------

/**
 * A value paired with a units string, e.g. `10 <km>`.
 */
export class Quantity {
  public readonly value: PvlValue;
  public readonly units: string;

  constructor(value: PvlValue, units: string) {
    if (value instanceof Quantity) {
      throw new QuantityError(`A Quantity cannot wrap another Quantity (units "${value.units}")`);
    }
    this.value = value;
    this.units = units;
    Object.freeze(this);
  }

  equals(other: Quantity): boolean {
    return this.units === other.units && valueEquals(this.value, other.value);
  }
}

// ---------------------------------------------------------------------------
// Set
// ---------------------------------------------------------------------------

/**
 * An unordered collection of values without structural duplicates.
 * Members are kept in first-seen order so that encoding is stable.
 */
export class PvlSet implements Iterable<PvlValue> {
  private readonly members: PvlValue[] = [];

  constructor(values: Iterable<PvlValue> = []) {
    for (const value of values) {
      if (!this.has(value)) this.members.push(value);
    }
    Object.freeze(this.members);
  }

  get size(): number {
    return this.members.length;
  }

  has(value: PvlValue): boolean {
    return this.members.some((member) => valueEquals(member, value));
  }

  values(): PvlValue[] {
    return [...this.members];
  }

  [Symbol.iterator](): Iterator<PvlValue> {
    return this.members[Symbol.iterator]();
  }

  equals(other: PvlSet): boolean {
    return this.size === other.size && this.members.every((member) => other.has(member));
  }
}

// ---------------------------------------------------------------------------
// Empty value placeholder
// ---------------------------------------------------------------------------

/**
 * Stands in for the value of an assignment that had none. Only the
 * lenient parser creates these; `lineno` is the 1-based line of the `=`.
 */
export class EmptyValueAtLine {
  constructor(public readonly lineno: number) {}

  toString(): string {
    return '';
  }
}

// ---------------------------------------------------------------------------
// Container
// ---------------------------------------------------------------------------

export type ContainerRole = 'module' | 'group' | 'object';

/**
 * Ordered (key, value) entries with repeatable keys.
 */
export abstract class PvlContainer implements Iterable<Entry> {
  abstract readonly role: ContainerRole;
  protected items: Entry[];

  constructor(entries: Iterable<Entry> = []) {
    this.items = [...entries];
  }

  get size(): number {
    return this.items.length;
  }

  /** Add a trailing entry. Never overwrites. */
  append(key: string, value: PvlValue): this {
    this.items.push([key, value]);
    return this;
  }

  extend(entries: Iterable<Entry>): this {
    for (const [key, value] of entries) this.append(key, value);
    return this;
  }

  /**
   * Replace the first occurrence of `key` and drop every later one.
   * Appends when the key is absent.
   */
  set(key: string, value: PvlValue): void {
    const first = this.items.findIndex(([k]) => k === key);
    if (first === -1) {
      this.append(key, value);
      return;
    }
    this.items = this.items
      .map((entry, i): Entry => (i === first ? [key, value] : entry))
      .filter(([k], i) => i === first || k !== key);
  }

  /**
   * First value stored under `key`.
   * @throws KeyNotFoundError when the key is absent.
   */
  get(key: string): PvlValue {
    const entry = this.items.find(([k]) => k === key);
    if (!entry) throw new KeyNotFoundError(key);
    return entry[1];
  }

  getAll(key: string): PvlValue[] {
    return this.items.filter(([k]) => k === key).map(([, v]) => v);
  }

  has(key: string): boolean {
    return this.items.some(([k]) => k === key);
  }

  /** Remove every occurrence of `key`. Returns whether anything was removed. */
  delete(key: string): boolean {
    const before = this.items.length;
    this.items = this.items.filter(([k]) => k !== key);
    return this.items.length !== before;
  }

  /** Remove every occurrence of `key` and return their values in order. */
  popAll(key: string): PvlValue[] {
    const values = this.getAll(key);
    this.delete(key);
    return values;
  }

  /** Remove and return the final entry. */
  popLast(): Entry | undefined {
    return this.items.pop();
  }

  clear(): void {
    this.items = [];
  }

  /** Entry at `index`; negative indexes count from the end. */
  at(index: number): Entry | undefined {
    return this.items.at(index);
  }

  /**
   * Splice `entries` in at position `index` (0 to size inclusive).
   */
  insert(index: number, entries: Iterable<Entry>): void {
    if (!Number.isInteger(index) || index < 0 || index > this.items.length) {
      throw new IndexOutOfRangeError(
        `Position ${index} is outside 0..${this.items.length}`,
        index,
        this.items.length,
      );
    }
    this.items.splice(index, 0, ...entries);
  }

  /**
   * Insert `entries` immediately before the `occurrence`-th (0-based)
   * entry whose key is `key`.
   *
   * @example
   * ```ts
   * // [a 1, b 2, a 3]
   * group.insertBefore('a', 1, [['a', 4]]);
   * // [a 1, b 2, a 4, a 3]
   * ```
   */
  insertBefore(key: string, entries: Iterable<Entry>): void;
  insertBefore(key: string, occurrence: number, entries: Iterable<Entry>): void;
  insertBefore(
    key: string,
    occurrenceOrEntries: number | Iterable<Entry>,
    entries?: Iterable<Entry>,
  ): void {
    this.insertAround(key, occurrenceOrEntries, entries, 0);
  }

  /**
   * Insert `entries` immediately after the `occurrence`-th (0-based)
   * entry whose key is `key`.
   */
  insertAfter(key: string, entries: Iterable<Entry>): void;
  insertAfter(key: string, occurrence: number, entries: Iterable<Entry>): void;
  insertAfter(
    key: string,
    occurrenceOrEntries: number | Iterable<Entry>,
    entries?: Iterable<Entry>,
  ): void {
    this.insertAround(key, occurrenceOrEntries, entries, 1);
  }

  private insertAround(
    key: string,
    occurrenceOrEntries: number | Iterable<Entry>,
    maybeEntries: Iterable<Entry> | undefined,
    shift: 0 | 1,
  ): void {
    const occurrence = typeof occurrenceOrEntries === 'number' ? occurrenceOrEntries : 0;
    const entries = typeof occurrenceOrEntries === 'number' ? (maybeEntries ?? []) : occurrenceOrEntries;

    const positions: number[] = [];
    this.items.forEach(([k], i) => {
      if (k === key) positions.push(i);
    });
    if (positions.length === 0) throw new KeyNotFoundError(key);

    const position = positions[occurrence];
    if (!Number.isInteger(occurrence) || occurrence < 0 || position === undefined) {
      throw new IndexOutOfRangeError(
        `Occurrence ${occurrence} of "${key}" requested, but there are only ${positions.length}`,
        occurrence,
        positions.length,
      );
    }
    this.items.splice(position + shift, 0, ...entries);
  }

  keys(): string[] {
    return this.items.map(([k]) => k);
  }

  values(): PvlValue[] {
    return this.items.map(([, v]) => v);
  }

  entries(): Entry[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<Entry> {
    return this.items[Symbol.iterator]();
  }

  /**
   * Structural equality over the ordered entries. The role is not
   * compared, so a group and an object with the same entries are equal.
   */
  equals(other: PvlContainer): boolean {
    if (this.items.length !== other.items.length) return false;
    return this.items.every(([key, value], i) => {
      const theirs = other.items[i];
      return theirs !== undefined && theirs[0] === key && valueEquals(value, theirs[1]);
    });
  }

  /** A deep copy of the same role. */
  abstract copy(): PvlContainer;

  protected copiedEntries(): Entry[] {
    return this.items.map(([k, v]): Entry => [k, copyValue(v)]);
  }
}

/** The root of a parsed document. */
export class PvlModule extends PvlContainer {
  readonly role = 'module';
  /** 1-based lines where the lenient parser recovered an empty value. */
  public errors: number[];

  constructor(entries: Iterable<Entry> = [], errors: number[] = []) {
    super(entries);
    this.errors = errors;
  }

  copy(): PvlModule {
    return new PvlModule(this.copiedEntries(), [...this.errors]);
  }
}

export class PvlGroup extends PvlContainer {
  readonly role = 'group';

  copy(): PvlGroup {
    return new PvlGroup(this.copiedEntries());
  }
}

export class PvlObject extends PvlContainer {
  readonly role = 'object';

  copy(): PvlObject {
    return new PvlObject(this.copiedEntries());
  }
}

// ---------------------------------------------------------------------------
// Structural helpers
// ---------------------------------------------------------------------------

function copyValue(value: PvlValue): PvlValue {
  if (Array.isArray(value)) return value.map(copyValue);
  if (value instanceof PvlContainer) return value.copy();
  return value;
}

/**
 * Structural equality across every value kind. A safe integer and a
 * bigint of the same magnitude are equal.
 */
export function valueEquals(a: PvlValue, b: PvlValue): boolean {
  if (a === b) return true;

  if (typeof a === 'number' || typeof a === 'bigint') {
    if (typeof b === 'number' || typeof b === 'bigint') return numericEquals(a, b);
    return false;
  }

  if (a === null || b === null || typeof a !== 'object' || typeof b !== 'object') return false;

  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) return false;
    const others: PvlValue[] = b;
    return a.every((v, i) => {
      const w = others[i];
      return w !== undefined && valueEquals(v, w);
    });
  }
  if (a instanceof PvlContainer) return b instanceof PvlContainer && a.equals(b);
  if (a instanceof PvlSet) return b instanceof PvlSet && a.equals(b);
  if (a instanceof Quantity) return b instanceof Quantity && a.equals(b);
  if (a instanceof EmptyValueAtLine) return b instanceof EmptyValueAtLine && a.lineno === b.lineno;
  if (a instanceof PvlDateTime) return b instanceof PvlDateTime && a.equals(b);
  if (a instanceof PvlDate) return b instanceof PvlDate && a.equals(b);
  if (a instanceof PvlTime) return b instanceof PvlTime && a.equals(b);
  return false;
}

function numericEquals(a: number | bigint, b: number | bigint): boolean {
  if (typeof a === 'number' && typeof b === 'number') return a === b || (Number.isNaN(a) && Number.isNaN(b));
  if (typeof a === 'bigint' && typeof b === 'bigint') return a === b;
  const n = typeof a === 'number' ? a : b;
  const big = typeof a === 'bigint' ? a : b;
  return typeof n === 'number' && typeof big === 'bigint' && Number.isInteger(n) && BigInt(n) === big;
}
