// ============================================================================
// @pvlkit/core - Primitive Decoder
// ============================================================================
//
// Turns the text of a single token into a value. Candidates are tried in a
// fixed order and the first success wins:
//
//   quoted string → non-decimal integer → decimal number → date/time
//   → boolean → null → unquoted string
//
// Every decode* method throws DecodeError on failure so that callers can
// fall through to the next candidate.
//
// ============================================================================

import { Quantity } from './collections.js';
import type { PvlScalar, PvlValue } from './collections.js';
import { parseDateTime } from './datetime.js';
import type { PvlDateTimeValue } from './datetime.js';
import { DecodeError } from './errors.js';
import type { Grammar } from './grammar.js';

export interface DecoderOptions {
  /**
   * Remove `-` + line break continuations inside quoted strings, collapse
   * whitespace runs to one space and trim the ends.
   */
  foldQuotedStrings?: boolean;
  /** Accept numeric UTC offsets such as `+7` or `-05:30` after times. */
  numericTimeZones?: boolean;
}

const ESCAPES: ReadonlyMap<string, string> = new Map([
  ['n', '\n'],
  ['t', '\t'],
  ['f', '\f'],
  ['v', '\v'],
  ['r', '\r'],
  ['\\', '\\'],
  ['"', '"'],
  ["'", "'"],
]);

const DECIMAL_RE = /^[+-]?(\d+|\d+\.\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_RE = /^[+-]?\d+$/;
const DIGITS = '0123456789abcdef';

/** Build a regex character class from a set of literal characters. */
function charClass(chars: Iterable<string>): string {
  return `[${[...chars].map((c) => c.replace(/[\]\\^-]/g, '\\$&')).join('')}]`;
}

/** Narrow a bigint to a number when no precision is lost. */
export function toNumeric(value: bigint): number | bigint {
  if (value <= BigInt(Number.MAX_SAFE_INTEGER) && value >= BigInt(Number.MIN_SAFE_INTEGER)) {
    return Number(value);
  }
  return value;
}

export class PrimitiveDecoder {
  readonly grammar: Grammar;
  readonly foldQuotedStrings: boolean;
  readonly numericTimeZones: boolean;

  private readonly continuationRe: RegExp;
  private readonly whitespaceRunRe: RegExp;
  private readonly edgeWhitespaceRe: RegExp;

  constructor(grammar: Grammar, options: DecoderOptions = {}) {
    this.grammar = grammar;
    this.foldQuotedStrings = options.foldQuotedStrings ?? false;
    this.numericTimeZones = options.numericTimeZones ?? false;

    const ws = charClass(grammar.whitespace);
    this.continuationRe = new RegExp(`-${charClass(grammar.formatEffectors)}${ws}*`, 'g');
    this.whitespaceRunRe = new RegExp(`${ws}+`, 'g');
    this.edgeWhitespaceRe = new RegExp(`^${ws}+|${ws}+$`, 'g');
  }

  /**
   * Decode `text` as the first candidate type that accepts it.
   * @throws DecodeError when no candidate does.
   */
  decodeSimpleValue(text: string): PvlScalar {
    const candidates: Array<(t: string) => PvlScalar> = [
      (t) => this.decodeQuotedString(t),
      (t) => this.decodeNonDecimal(t),
      (t) => this.decodeDecimal(t),
      (t) => this.decodeDateTime(t),
      (t) => this.decodeBoolean(t),
      (t) => this.decodeNull(t),
      (t) => this.decodeUnquotedString(t),
    ];
    for (const candidate of candidates) {
      try {
        return candidate(text);
      } catch (err) {
        if (!(err instanceof DecodeError)) throw err;
      }
    }
    throw new DecodeError(`"${text}" is not a simple value`, text);
  }

  // ---- Strings ----

  /**
   * Strip matching quotes, fold (when enabled) and then un-escape.
   * Unknown escapes are kept as written.
   */
  decodeQuotedString(text: string): string {
    const open = text.charAt(0);
    if (text.length < 2 || !this.grammar.quotes.includes(open) || !text.endsWith(open)) {
      throw new DecodeError(`"${text}" is not a quoted string`, text);
    }
    let body = text.slice(1, -1);
    if (this.foldQuotedStrings) {
      body = body
        .replace(this.continuationRe, '')
        .replace(this.edgeWhitespaceRe, '')
        .replace(this.whitespaceRunRe, ' ');
    }
    return body.replace(/\\([\s\S])/g, (escape: string, char: string) => ESCAPES.get(char) ?? escape);
  }

  /**
   * Accept `text` as an unquoted string unless it contains whitespace,
   * reserved characters or comment delimiters, names a reserved keyword,
   * or reads as a date/time.
   */
  decodeUnquotedString(text: string): string {
    const { grammar } = this;
    if (text.length === 0) throw new DecodeError('An unquoted string cannot be empty', text);

    for (const char of text) {
      if (grammar.whitespace.has(char)) {
        throw new DecodeError(`Unquoted string "${text}" contains whitespace`, text);
      }
      if (grammar.reservedCharacters.has(char)) {
        throw new DecodeError(`Unquoted string "${text}" contains the reserved character "${char}"`, text);
      }
    }
    for (const { open, close } of grammar.comments) {
      if (text.includes(open) || text.includes(close)) {
        throw new DecodeError(`Unquoted string "${text}" contains a comment delimiter`, text);
      }
    }
    if (grammar.reservedKeywords.has(text.toUpperCase())) {
      throw new DecodeError(`"${text}" is a reserved keyword`, text);
    }
    if (this.parseDateTime(text) !== undefined) {
      throw new DecodeError(`"${text}" is a date/time, not a string`, text);
    }
    return text;
  }

  // ---- Numbers ----

  /**
   * Decode `[sign]radix#digits#` (placement of the sign follows the grammar).
   * Integers beyond the safe range come back as bigint.
   */
  decodeNonDecimal(text: string): number | bigint {
    const groups = this.grammar.nonDecimal.exec(text)?.groups;
    if (!groups) throw new DecodeError(`"${text}" is not a non-decimal integer`, text);

    const sign = groups.sign ?? '';
    const secondSign = groups.secondSign ?? '';
    if (sign !== '' && secondSign !== '') {
      throw new DecodeError(`The non-decimal value "${text}" has two signs`, text);
    }

    const radix = Number(groups.radix);
    let magnitude = 0n;
    for (const char of (groups.digits ?? '').toLowerCase()) {
      const digit = DIGITS.indexOf(char);
      if (digit === -1 || digit >= radix) {
        throw new DecodeError(`"${char}" is not a valid digit in radix ${radix}`, text);
      }
      magnitude = magnitude * BigInt(radix) + BigInt(digit);
    }

    return toNumeric((sign || secondSign) === '-' ? -magnitude : magnitude);
  }

  decodeDecimal(text: string): number | bigint {
    if (!DECIMAL_RE.test(text)) throw new DecodeError(`"${text}" is not a decimal number`, text);
    if (INTEGER_RE.test(text)) {
      return toNumeric(BigInt(text.startsWith('+') ? text.slice(1) : text));
    }
    return Number(text);
  }

  // ---- Dates & times ----

  decodeDateTime(text: string): PvlDateTimeValue {
    const value = this.parseDateTime(text);
    if (value === undefined) throw new DecodeError(`"${text}" is not a date/time`, text);
    return value;
  }

  /** True when `text` is a time (or date-time) whose seconds field is 60. */
  isLeapSecond(text: string): boolean {
    return this.grammar.leapSecond?.test(text) ?? false;
  }

  private parseDateTime(text: string): PvlDateTimeValue | undefined {
    return parseDateTime(text, {
      numericTimeZones: this.numericTimeZones,
      leapSeconds: this.grammar.leapSecond !== null,
    });
  }

  // ---- Keywords ----

  decodeBoolean(text: string): boolean {
    const upper = text.toUpperCase();
    if (upper === this.grammar.trueKeyword.toUpperCase()) return true;
    if (upper === this.grammar.falseKeyword.toUpperCase()) return false;
    throw new DecodeError(`"${text}" is not a boolean`, text);
  }

  decodeNull(text: string): null {
    if (text.toUpperCase() === this.grammar.noneKeyword.toUpperCase()) return null;
    throw new DecodeError(`"${text}" is not null`, text);
  }

  // ---- Quantities ----

  /**
   * @throws QuantityError when `value` is itself a Quantity.
   */
  decodeQuantity(value: PvlValue, units: string): Quantity {
    return new Quantity(value, units);
  }
}
