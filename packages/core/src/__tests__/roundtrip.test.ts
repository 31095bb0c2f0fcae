// ============================================================================
// Round-trip properties
// ============================================================================
//
// For every encodable dialect:
//   decode(encode(m)) equals m
//   encode(decode(encode(m))) === encode(m)
//
// The generators stay inside what every dialect can represent: identifier
// keys, single-spaced words, finite numbers and scalar sequences.
// ============================================================================

import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { PvlGroup, PvlModule, PvlObject, PvlSet } from '../collections.js';
import type { Entry, PvlValue } from '../collections.js';
import { PvlDate, PvlDateTime, PvlTime } from '../datetime.js';
import { getDialect, requireEncoder } from '../dialects.js';
import type { DialectName } from '../dialects.js';

const RESERVED = new Set(['END', 'GROUP', 'OBJECT']);

const key = fc
  .tuple(
    fc.constantFrom(...'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ'),
    fc.stringOf(fc.constantFrom(...'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789'), {
      maxLength: 10,
    }),
  )
  .map(([head, tail]) => head + tail)
  .filter((k) => !RESERVED.has(k.toUpperCase()));

const word = fc.stringOf(fc.constantFrom(...'abcXYZ019._-'), { minLength: 1, maxLength: 8 });

const text = fc.array(word, { minLength: 1, maxLength: 4 }).map((words) => words.join(' '));

const number = fc.oneof(
  fc.integer(),
  fc.double({ noNaN: true, noDefaultInfinity: true }),
  fc.bigInt({ min: -(2n ** 80n), max: 2n ** 80n }),
);

const date = fc
  .tuple(fc.integer({ min: 1, max: 9999 }), fc.integer({ min: 1, max: 12 }), fc.integer({ min: 1, max: 28 }))
  .map(([y, m, d]) => new PvlDate(y, m, d));

const time = fc
  .tuple(fc.integer({ min: 0, max: 23 }), fc.integer({ min: 0, max: 59 }), fc.integer({ min: 0, max: 59 }))
  .map(([h, m, s]) => new PvlTime(h, m, s));

const scalar: fc.Arbitrary<PvlValue> = fc.oneof(
  number,
  text,
  fc.boolean(),
  date,
  time,
  fc.tuple(date, time).map(([d, t]) => new PvlDateTime(d, t)),
);

const value: fc.Arbitrary<PvlValue> = fc.oneof(
  { arbitrary: scalar, weight: 4 },
  { arbitrary: fc.array(scalar, { minLength: 1, maxLength: 4 }), weight: 1 },
);

const entries = (v: fc.Arbitrary<PvlValue>) =>
  fc.array(
    fc.tuple(key, v).map(([k, x]): Entry => [k, x]),
    { maxLength: 6 },
  );

const moduleOf = (v: fc.Arbitrary<PvlValue>) =>
  fc
    .tuple(entries(v), entries(v), entries(v))
    .map(
      ([top, grouped, objected]) =>
        new PvlModule([
          ...top,
          ['Inner', new PvlGroup(grouped)],
          ['Outer', new PvlObject([...objected, ['Nested', new PvlGroup(top)]])],
        ]),
    );

function roundTrip(dialect: DialectName, module: PvlModule): void {
  const { parser } = getDialect(dialect);
  const encoder = requireEncoder(getDialect(dialect));
  const encoded = encoder.encode(module);
  const decoded = parser.parse(encoded);
  expect(decoded.equals(module)).toBe(true);
  expect(decoded.errors).toEqual([]);
  expect(encoder.encode(decoded)).toBe(encoded);
}

describe('Round trip', () => {
  it.each<DialectName>(['pvl', 'odl', 'pds3', 'isis'])('decode(encode(m)) equals m in %s', (dialect) => {
    fc.assert(
      fc.property(moduleOf(value), (module) => {
        roundTrip(dialect, module);
      }),
      { numRuns: 150 },
    );
  });

  it('keeps null and sets in PVL', () => {
    const extra = fc.oneof(
      value,
      fc.constant(null),
      fc.array(scalar, { maxLength: 4 }).map((members) => new PvlSet(members)),
    );
    fc.assert(
      fc.property(moduleOf(extra), (module) => {
        roundTrip('pvl', module);
      }),
      { numRuns: 100 },
    );
  });

  it('keeps PDS3 symbol and integer sets', () => {
    const member = fc.oneof(fc.integer(), key);
    const set = fc.array(member, { minLength: 1, maxLength: 5 }).map((members) => new PvlSet(members));
    fc.assert(
      fc.property(entries(set), (top) => {
        roundTrip('pds3', new PvlModule(top));
      }),
    );
  });
});
