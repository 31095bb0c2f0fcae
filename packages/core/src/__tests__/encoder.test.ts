import { describe, expect, it } from 'vitest';
import { EmptyValueAtLine, PvlGroup, PvlModule, PvlObject, PvlSet, Quantity } from '../collections.js';
import type { Entry } from '../collections.js';
import { PvlDate, PvlDateTime, PvlTime } from '../datetime.js';
import { getDialect, requireEncoder } from '../dialects.js';
import type { DialectName, LayoutOptions } from '../dialects.js';
import { EncodeError } from '../errors.js';

function encode(entries: Entry[], dialect: DialectName = 'pvl', layout: LayoutOptions = {}): string {
  return requireEncoder(getDialect(dialect, { layout })).encode(new PvlModule(entries));
}

function value(v: Entry[1], dialect: DialectName = 'pvl'): string {
  return requireEncoder(getDialect(dialect)).encodeValue(v);
}

describe('Encoder', () => {
  describe('layout', () => {
    it('writes PVL with delimiters, aligned keys and named block ends', () => {
      const text = encode([
        ['a', 1],
        ['long_name', 'text'],
        ['g', new PvlGroup([['b', true]])],
      ]);
      expect(text).toBe(
        'a         = 1;\nlong_name = text;\nBEGIN_GROUP = g;\n  b = TRUE;\nEND_GROUP = g;\nEND;',
      );
    });

    it('writes ODL with CRLF, no delimiters and a trailing newline', () => {
      const text = encode(
        [
          ['a', 1],
          ['g', new PvlGroup([['b', 'two words']])],
        ],
        'odl',
      );
      expect(text).toBe("a = 1\r\nGROUP = g\r\n  b = 'two words'\r\nEND_GROUP = g\r\nEND\r\n");
    });

    it('writes ISIS CamelCase block keywords', () => {
      const text = encode(
        [
          ['a', 'x'],
          ['g', new PvlGroup([['b', 2]])],
          ['o', new PvlObject([['c', 3]])],
        ],
        'isis',
      );
      expect(text).toBe('a = x\nGroup = g\n  b = 2\nEnd_Group = g\nObject = o\n  c = 3\nEnd_Object = o\nEnd');
    });

    it('wraps long values at spaces under the width', () => {
      const text = encode([['v', [100000, 200000, 300000, 400000, 500000]]], 'pvl', { width: 30 });
      expect(text).toBe('v = (100000, 200000, 300000,\n    400000, 500000);\nEND;');
    });

    it('honours layout overrides', () => {
      const text = encode([['g', new PvlObject([['x', 1]])]], 'pvl', {
        indent: 4,
        endDelimiter: false,
        aggregationEnd: false,
        trailingNewline: true,
      });
      expect(text).toBe('BEGIN_OBJECT = g\n    x = 1\nEND_OBJECT\nEND\n');
    });

    it('writes an empty module as just the end statement', () => {
      expect(encode([])).toBe('END;');
    });
  });

  describe('strings', () => {
    it('leaves plain words bare', () => {
      expect(value('Mars')).toBe('Mars');
      expect(value('1.2.3')).toBe('1.2.3');
      expect(value('C:\\data')).toBe('C:\\data');
    });

    it.each([
      ['', '""'],
      ['END', '"END"'],
      ['true', '"true"'],
      ['123', '"123"'],
      ['2001-01-01', '"2001-01-01"'],
      ['two words', '"two words"'],
      ['a=b', '"a=b"'],
      ['/*x', '"/*x"'],
      ["it's", '"it\'s"'],
      ['say "hi"', '\'say "hi"\''],
      ['a"b\'c', '"a\\"b\'c"'],
      ['line\nbreak', '"line\\nbreak"'],
      ['tab\there', '"tab\\there"'],
    ])('quotes %j as %s', (input, expected) => {
      expect(value(input)).toBe(expected);
    });

    it('quotes strings ending in a dash where continuations are joined', () => {
      expect(value('abc-')).toBe('abc-');
      expect(value('abc-', 'isis')).toBe('"abc-"');
    });

    it('uses ODL identifiers and symbols', () => {
      expect(value('NAME_1', 'odl')).toBe('NAME_1');
      expect(value('_x', 'odl')).toBe("'_x'");
      expect(value("it's", 'odl')).toBe('"it\'s"');
    });

    it('refuses a string the folding reader would change', () => {
      expect(() => value('a  b', 'odl')).toThrow(EncodeError);
      expect(value('a  b')).toBe('"a  b"');
    });
  });

  describe('other values', () => {
    it('writes keywords, numbers and placeholders', () => {
      expect(value(null)).toBe('NULL');
      expect(value(false)).toBe('FALSE');
      expect(value(-2.5)).toBe('-2.5');
      expect(value(9007199254740993n)).toBe('9007199254740993');
      expect(value(new EmptyValueAtLine(3))).toBe('""');
    });

    it('writes sets, sequences and units', () => {
      expect(value(new PvlSet(['a', 1]))).toBe('{a, 1}');
      expect(value([1, [2, 3]])).toBe('(1, (2, 3))');
      expect(value(new Quantity(5, 'km'))).toBe('5 <km>');
      expect(value([new Quantity(1, 'm'), 2])).toBe('(1 <m>, 2)');
    });

    it('writes dates and times per dialect', () => {
      const dt = new PvlDateTime(new PvlDate(2001, 1, 1), new PvlTime(12, 0));
      expect(value(dt)).toBe('2001-01-01T12:00');
      expect(value(dt, 'odl')).toBe('2001-01-01T12:00Z');
      expect(value(new PvlTime(12, 0, 0, 0, 420), 'odl')).toBe('12:00+07');
      expect(value(new PvlTime(23, 59, 60))).toBe('23:59:60');
    });
  });

  describe('rejections', () => {
    it('names the key of a value it cannot write', () => {
      try {
        encode([['x', Number.NaN]]);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(EncodeError);
        if (!(err instanceof EncodeError)) return;
        expect(err.key).toBe('x');
        expect(err.dialect).toBe('pvl');
        expect(err.message).toBe('NaN cannot be written as a number (key "x")');
      }
    });

    it.each<[string, Entry[], DialectName]>([
      ['infinite numbers', [['x', Number.POSITIVE_INFINITY]], 'pvl'],
      ['an aggregation inside a sequence', [['x', [new PvlGroup()]]], 'pvl'],
      ['a key with whitespace', [['bad key', 1]], 'pvl'],
      ['a reserved keyword as key', [['END', 1]], 'pvl'],
      ['a non-UTC time in PVL', [['t', new PvlTime(1, 0, 0, 0, 60)]], 'pvl'],
      ['a non-UTC time in ISIS', [['t', new PvlTime(1, 0, 0, 0, 60)]], 'isis'],
      ['a non-UTC time in PDS3', [['t', new PvlTime(1, 0, 0, 0, 60)]], 'pds3'],
      ['a leap second in ODL', [['t', new PvlTime(23, 59, 60)]], 'odl'],
      ['units after a string in ODL', [['u', new Quantity('abc', 'm')]], 'odl'],
      ['an empty sequence in ODL', [['s', []]], 'odl'],
      ['a three-dimensional sequence in ODL', [['s', [[[1]]]]], 'odl'],
      ['a sequence inside a set in ODL', [['s', new PvlSet([[1]])]], 'odl'],
      ['a non-identifier key in ODL', [['bad-key', 1]], 'odl'],
      ['an over-long key in ODL', [['K'.repeat(31), 1]], 'odl'],
      ['a set of reals in PDS3', [['s', new PvlSet([1.5])]], 'pds3'],
      ['a character outside the character set', [['s', 'π']], 'pvl'],
      ['a non-ASCII character in ODL', [['s', 'é']], 'odl'],
      ['units with edge whitespace', [['u', new Quantity(5, ' m ')]], 'pvl'],
      ['units holding a line continuation in ISIS', [['u', new Quantity(5, 'm-\ns')]], 'isis'],
      ['a five-digit year', [['d', new PvlDate(12345, 1, 1)]], 'pvl'],
      ['month 13', [['d', new PvlDate(2001, 13, 1)]], 'pvl'],
      ['February 30', [['d', new PvlDate(2001, 2, 30)]], 'odl'],
      ['hour 24', [['t', new PvlTime(24, 0)]], 'pvl'],
      ['a fractional minute', [['t', new PvlTime(1, 1.5)]], 'pvl'],
      ['a microsecond field of one million', [['t', new PvlTime(1, 0, 0, 1_000_000)]], 'isis'],
      ['an invalid date inside a date-time', [['t', new PvlDateTime(new PvlDate(0, 1, 1), new PvlTime(1, 0))]], 'pvl'],
    ])('rejects %s', (_label, entries, dialect) => {
      expect(() => encode(entries, dialect)).toThrow(EncodeError);
    });

    it('explains why a date or units expression was refused', () => {
      expect(() => encode([['d', new PvlDate(12345, 1, 1)]])).toThrow('12345-01-01 is not a valid date (key "d")');
      expect(() => encode([['u', new Quantity(5, ' m ')]])).toThrow('Units " m " begin or end with whitespace');
    });

    it('accepts ODL namespaced and pointer keys', () => {
      expect(encode([['ns:KEY', 1], ['^IMAGE', 12]], 'odl')).toBe('ns:KEY = 1\r\n^IMAGE = 12\r\nEND\r\n');
    });

    it('refuses to encode with a decode-only dialect', () => {
      expect(() => requireEncoder(getDialect('omni'))).toThrow(EncodeError);
    });
  });

  describe('PDS3 aggregation rules', () => {
    it('writes a lone GROUP as an OBJECT', () => {
      const text = encode([['g', new PvlGroup([['a', 1]])]], 'pds3');
      expect(text).toBe('OBJECT = g\r\n  a = 1\r\nEND_OBJECT = g\r\nEND\r\n');
    });

    it('keeps a valid GROUP alongside an OBJECT', () => {
      const text = encode(
        [
          ['o', new PvlObject([['a', 1]])],
          ['g', new PvlGroup([['b', 2]])],
        ],
        'pds3',
      );
      expect(text).toBe('OBJECT = o\r\n  a = 1\r\nEND_OBJECT = o\r\nGROUP = g\r\n  b = 2\r\nEND_GROUP = g\r\nEND\r\n');
    });

    it('converts a GROUP that holds an aggregation', () => {
      const text = encode(
        [['o', new PvlObject([['g', new PvlGroup([['x', new PvlObject([['y', 1]])]])]])]],
        'pds3',
      );
      expect(text).toContain('  OBJECT = g\r\n');
      expect(text).not.toContain('GROUP');
    });

    it('fails instead when conversion is disabled', () => {
      expect(() =>
        encode([['g', new PvlGroup([['a', 1]])]], 'pds3', { convertGroupToObject: false }),
      ).toThrow('A PDS label with GROUPs must also have an OBJECT');
    });

    it('does not modify the container it encodes', () => {
      const module = new PvlModule([['g', new PvlGroup([['a', 1]])]]);
      requireEncoder(getDialect('pds3')).encode(module);
      expect(module.get('g')).toBeInstanceOf(PvlGroup);
    });
  });
});
