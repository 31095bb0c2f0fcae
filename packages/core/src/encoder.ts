// ============================================================================
// @pvlkit/core - Encoder
// ============================================================================
//
// Writes a container back to text under one dialect's rules. Anything the
// dialect's own parser would read back differently is rejected with an
// EncodeError rather than approximated.
//
// ============================================================================

import {
  EmptyValueAtLine,
  PvlContainer,
  PvlModule,
  PvlObject,
  PvlSet,
  Quantity,
} from './collections.js';
import type { Entry, PvlValue } from './collections.js';
import { PvlDate, PvlDateTime, PvlTime, formatOffset, isValidDate, isValidTime } from './datetime.js';
import type { PrimitiveDecoder } from './decoder.js';
import { DecodeError, EncodeError, LexerError } from './errors.js';
import type { Grammar } from './grammar.js';
import { lex } from './lexer.js';
import { timer } from './logger.js';
import { TokenClassifier, token } from './token.js';

export interface EncoderRules {
  /** Name used in errors and log output. */
  dialect: string;
  grammar: Grammar;
  /** The dialect's reader; strings are left bare only if it reads them back unchanged. */
  decoder: PrimitiveDecoder;
  /** Spaces per nesting level. */
  indent: number;
  /** Lines longer than this are wrapped at spaces outside quotes and units. */
  width: number;
  newline: string;
  /** Write the statement delimiter after each statement. */
  endDelimiter: boolean;
  /** Repeat the block name after the end-aggregation keyword. */
  aggregationEnd: boolean;
  endKeyword: string;
  trailingNewline: boolean;
  /** What to do with a time whose UTC offset is not zero. */
  timeZones: 'reject' | 'allow';
  /** Suffix written after UTC times. */
  utcSuffix: string;
  leapSeconds: boolean;
  /** The dialect's reader joins `-` + line break; strings ending in `-` must be quoted. */
  joinContinuationLines: boolean;
  /** ODL value rules: identifier keys, scalar members, numeric-only units. */
  odl: boolean;
  /** PDS label rules on top of ODL: restricted GROUPs and sets, UTC only. */
  pds: boolean;
  /** Write GROUPs that PDS would reject as OBJECTs instead of failing. */
  convertGroupToObject: boolean;
}

const ODL_KEY_LIMIT = 30;
const IDENTIFIER_RE = /^[A-Za-z](?:[A-Za-z0-9_]*[A-Za-z0-9])?$/;
const CONTROL_RE = /[\u0000-\u001f\u007f]/;

const WRITE_ESCAPES: ReadonlyArray<readonly [string, string]> = [
  ['\\', '\\\\'],
  ['\n', '\\n'],
  ['\t', '\\t'],
  ['\f', '\\f'],
  ['\v', '\\v'],
  ['\r', '\\r'],
];

export function isIdentifier(s: string): boolean {
  return IDENTIFIER_RE.test(s);
}

function isInteger(value: PvlValue): boolean {
  return typeof value === 'bigint' || (typeof value === 'number' && Number.isInteger(value));
}

function isNumber(value: PvlValue): boolean {
  return typeof value === 'number' || typeof value === 'bigint';
}

export class Encoder {
  readonly rules: EncoderRules;
  private readonly classifier: TokenClassifier;

  constructor(rules: EncoderRules) {
    this.rules = rules;
    this.classifier = new TokenClassifier(rules.decoder);
  }

  get grammar(): Grammar {
    return this.rules.grammar;
  }

  /**
   * Encode `container` as a complete document, end statement included.
   * The container is not modified.
   *
   * @throws EncodeError when any key or value cannot be represented.
   */
  encode(container: PvlContainer): string {
    const t = timer(`encode (${this.rules.dialect})`);
    const root = this.rules.pds ? this.promoteGroups(container) : container;

    const lines = this.encodeBody(root, 0);
    lines.push(this.rules.endKeyword + this.delimiter());

    let text = lines.join(this.rules.newline);
    if (this.rules.trailingNewline) text += this.rules.newline;

    this.checkCharacters(text);
    t.endWith({ entries: container.size, chars: text.length });
    return text;
  }

  // ---- Structure ----

  private encodeBody(container: PvlContainer, level: number): string[] {
    const keyWidth = Math.max(
      0,
      ...container.entries().filter(([, v]) => !(v instanceof PvlContainer)).map(([k]) => k.length),
    );

    const lines: string[] = [];
    for (const [key, value] of container) {
      if (value instanceof PvlContainer) {
        lines.push(...this.encodeAggregation(key, value, level));
      } else {
        lines.push(this.encodeAssignment(key, value, level, keyWidth));
      }
    }
    return lines;
  }

  private encodeAggregation(key: string, block: PvlContainer, level: number): string[] {
    this.checkKey(key);

    let isGroup = block.role === 'group';
    if (isGroup && this.rules.pds && !this.isPdsGroup(block)) {
      if (!this.rules.convertGroupToObject) {
        throw new EncodeError('This GROUP is not a valid PDS GROUP', this.rules.dialect, key);
      }
      isGroup = false;
    }
    const [begin, end] = isGroup ? this.grammar.groupPrefKeywords : this.grammar.objectPrefKeywords;

    const closing = this.rules.aggregationEnd ? `${end} = ${key}` : end;
    return [
      this.format(`${begin} = ${key}${this.delimiter()}`, level),
      ...this.encodeBody(block, level + 1),
      this.format(closing + this.delimiter(), level),
    ];
  }

  private encodeAssignment(key: string, value: PvlValue, level: number, keyWidth: number): string {
    this.checkKey(key);
    try {
      return this.format(`${key.padEnd(keyWidth)} = ${this.encodeValue(value)}${this.delimiter()}`, level);
    } catch (err) {
      if (err instanceof EncodeError && err.key === undefined) {
        throw new EncodeError(err.message, err.dialect, key);
      }
      throw err;
    }
  }

  private checkKey(key: string): void {
    const { dialect } = this.rules;
    if (!this.isBareWord(key) || !this.classifier.isParameterName(token(key))) {
      throw new EncodeError(`"${key}" is not a valid parameter name`, dialect);
    }
    if (this.rules.odl) {
      if (key.length > ODL_KEY_LIMIT) {
        throw new EncodeError(`ODL keywords are limited to ${ODL_KEY_LIMIT} characters: "${key}"`, dialect);
      }
      const name = key.startsWith('^') ? key.slice(1) : key;
      const [namespace, element, ...rest] = name.split(':');
      const valid =
        rest.length === 0 &&
        (element === undefined ? isIdentifier(name) : isIdentifier(namespace ?? '') && isIdentifier(element));
      if (!valid) throw new EncodeError(`"${key}" is not a valid ODL identifier`, dialect);
    }
  }

  // ---- Values ----

  encodeValue(value: PvlValue): string {
    if (value instanceof Quantity) {
      if (this.rules.odl && !isNumber(value.value)) {
        throw new EncodeError('Units expressions may only follow numeric values', this.rules.dialect);
      }
      return `${this.encodeInner(value.value)} ${this.encodeUnits(value.units)}`;
    }
    return this.encodeInner(value);
  }

  private encodeInner(value: PvlValue): string {
    const { grammar, rules } = this;
    if (value === null) return grammar.noneKeyword;
    if (typeof value === 'boolean') return value ? grammar.trueKeyword : grammar.falseKeyword;
    if (typeof value === 'number') {
      if (!Number.isFinite(value)) {
        throw new EncodeError(`${value} cannot be written as a number`, rules.dialect);
      }
      const text = String(value);
      // Plain digits beyond the safe range read back as an exact bigint.
      return /^-?\d+$/.test(text) && !Number.isSafeInteger(value) ? BigInt(value).toString() : text;
    }
    if (typeof value === 'bigint') return value.toString();
    if (typeof value === 'string') return this.encodeString(value);
    if (value instanceof EmptyValueAtLine) return this.quote('');
    if (value instanceof PvlDateTime) return `${this.encodeDate(value.date)}T${this.encodeTime(value.time)}`;
    if (value instanceof PvlDate) return this.encodeDate(value);
    if (value instanceof PvlTime) return this.encodeTime(value);
    if (Array.isArray(value)) return this.encodeSequence(value);
    if (value instanceof PvlSet) return this.encodeSet(value);
    if (value instanceof Quantity) {
      throw new EncodeError('A Quantity cannot carry a second units expression', rules.dialect);
    }
    throw new EncodeError('An aggregation cannot appear inside a value', rules.dialect);
  }

  private encodeSequence(values: PvlValue[]): string {
    if (this.rules.odl) {
      if (values.length === 0) throw new EncodeError('ODL does not allow empty sequences', this.rules.dialect);
      for (const v of values) {
        const row = Array.isArray(v) ? v : [v];
        for (const member of row) {
          if (Array.isArray(member)) {
            throw new EncodeError('ODL sequences have at most two dimensions', this.rules.dialect);
          }
          this.requireScalar(member, 'sequences');
        }
      }
    }
    const [open, close] = this.grammar.sequenceDelimiters;
    return `${open}${values.map((v) => this.encodeValue(v)).join(', ')}${close}`;
  }

  private encodeSet(set: PvlSet): string {
    const members = set.values();
    if (this.rules.odl) {
      for (const member of members) this.requireScalar(member, 'sets');
    }
    if (this.rules.pds) {
      for (const member of members) {
        if (!isInteger(member) && !(typeof member === 'string' && this.isSymbol(member))) {
          throw new EncodeError('PDS sets may only hold symbols and integers', this.rules.dialect);
        }
      }
    }
    const [open, close] = this.grammar.setDelimiters;
    return `${open}${members.map((v) => this.encodeValue(v)).join(', ')}${close}`;
  }

  private requireScalar(value: PvlValue, where: string): void {
    const scalar =
      typeof value === 'boolean' ||
      typeof value === 'string' ||
      isNumber(value) ||
      value instanceof PvlDate ||
      value instanceof PvlTime ||
      value instanceof PvlDateTime ||
      (value instanceof Quantity && isNumber(value.value));
    if (!scalar) {
      throw new EncodeError(`ODL only allows scalar values in ${where}`, this.rules.dialect);
    }
  }

  private encodeDate(date: PvlDate): string {
    if (!isValidDate(date)) {
      throw new EncodeError(`${date.toString()} is not a valid date`, this.rules.dialect);
    }
    return date.toString();
  }

  private encodeTime(time: PvlTime): string {
    const { rules } = this;
    if (!isValidTime(time)) {
      throw new EncodeError(`${time.toString()} is not a valid time`, rules.dialect);
    }
    if (time.isLeapSecond && !rules.leapSeconds) {
      throw new EncodeError(`${rules.dialect} does not allow a seconds value of 60`, rules.dialect);
    }
    const offset = time.utcOffset;
    if (offset === 0) return time.toString() + rules.utcSuffix;

    if (rules.timeZones === 'reject') {
      throw new EncodeError(`${rules.dialect} only allows UTC times`, rules.dialect);
    }
    if (!Number.isInteger(offset) || Math.abs(offset) >= 13 * 60) {
      throw new EncodeError(`A UTC offset of ${offset} minutes cannot be written`, rules.dialect);
    }
    return time.toString() + formatOffset(offset);
  }

  private encodeUnits(units: string): string {
    const [open, close] = this.grammar.unitsDelimiters;
    if (units.includes(open) || units.includes(close)) {
      throw new EncodeError(`Units "${units}" contain a units delimiter`, this.rules.dialect);
    }
    const { whitespace } = this.grammar;
    if (whitespace.has(units.charAt(0)) || whitespace.has(units.charAt(units.length - 1))) {
      throw new EncodeError(`Units "${units}" begin or end with whitespace`, this.rules.dialect);
    }
    if (this.rules.joinContinuationLines && /-[\n\r\f]/.test(units)) {
      throw new EncodeError(`Units "${units}" contain a line continuation`, this.rules.dialect);
    }
    if (this.rules.odl) {
      const stripped = units.replace(/[\s*/()-]/g, '');
      const exponents = units.match(/\*\*[^\s*/()]*/g) ?? [];
      if (!isIdentifier(stripped) || exponents.some((e) => !/^\*\*-?\d+$/.test(e))) {
        throw new EncodeError(`"${units}" is not an ODL units expression`, this.rules.dialect);
      }
    }
    return `${open}${units}${close}`;
  }

  // ---- Strings ----

  encodeString(s: string): string {
    if (this.canBeBare(s)) return s;
    if (this.rules.odl && this.isSymbol(s)) {
      const symbol = `'${s}'`;
      if (this.readsBackAs(symbol, s)) return symbol;
    }
    return this.quote(s);
  }

  private quote(s: string): string {
    const q = s.includes('"') && !s.includes("'") ? "'" : '"';
    let body = s;
    for (const [raw, escaped] of WRITE_ESCAPES) body = body.split(raw).join(escaped);
    body = body.split(q).join(`\\${q}`);
    const quoted = `${q}${body}${q}`;

    if (!this.readsBackAs(quoted, s)) {
      throw new EncodeError(
        `The string ${JSON.stringify(s)} would not read back unchanged in ${this.rules.dialect}`,
        this.rules.dialect,
      );
    }
    return quoted;
  }

  private readsBackAs(quoted: string, s: string): boolean {
    try {
      return this.rules.decoder.decodeQuotedString(quoted) === s;
    } catch (err) {
      if (err instanceof DecodeError) return false;
      throw err;
    }
  }

  /** An ODL symbol: printable, one line, no apostrophe and no backslash. */
  private isSymbol(s: string): boolean {
    if (s.length === 0 || s.includes("'") || s.includes('\\') || CONTROL_RE.test(s)) return false;
    return ![...this.grammar.formatEffectors].some((fe) => s.includes(fe));
  }

  private canBeBare(s: string): boolean {
    if (!this.isBareWord(s)) return false;
    if (this.rules.odl && !isIdentifier(s)) return false;
    if (this.grammar.reservedKeywords.has(s.toUpperCase())) return false;
    try {
      return this.rules.decoder.decodeSimpleValue(s) === s;
    } catch (err) {
      if (err instanceof DecodeError) return false;
      throw err;
    }
  }

  /** True when `s` lexes back as exactly one token with the same text. */
  private isBareWord(s: string): boolean {
    const { grammar, rules } = this;
    if (s.length === 0 || (rules.joinContinuationLines && s.endsWith('-'))) return false;
    for (const char of s) {
      if (grammar.whitespace.has(char) || grammar.reservedCharacters.has(char)) return false;
    }
    if (grammar.comments.some(({ open, close }) => s.includes(open) || s.includes(close))) return false;
    try {
      const tokens = lex(s, grammar, rules.decoder);
      const first = tokens.next();
      return first !== undefined && first.text === s && tokens.next() === undefined;
    } catch (err) {
      if (err instanceof LexerError) return false;
      throw err;
    }
  }

  // ---- PDS ----

  /**
   * PDS forbids GROUPs in a label without OBJECTs. Convert one top-level
   * GROUP (preferring one that is not a valid PDS GROUP) when allowed.
   */
  private promoteGroups(container: PvlContainer): PvlContainer {
    const blocks = container.values().filter((v): v is PvlContainer => v instanceof PvlContainer);
    const groups = blocks.filter((b) => b.role === 'group').length;
    if (groups === 0 || groups < blocks.length) return container;

    if (!this.rules.convertGroupToObject) {
      throw new EncodeError('A PDS label with GROUPs must also have an OBJECT', this.rules.dialect);
    }
    const entries = container.entries();
    const invalid = entries.findIndex(([, v]) => v instanceof PvlContainer && !this.isPdsGroup(v));
    const target = invalid !== -1 ? invalid : entries.findIndex(([, v]) => v instanceof PvlContainer);

    const promoted = entries.map(([k, v], i): Entry =>
      i === target && v instanceof PvlContainer ? [k, new PvlObject(v.entries())] : [k, v],
    );
    return new PvlModule(promoted);
  }

  /**
   * A PDS GROUP holds no aggregations, repeats no key, and has no
   * integer data-location pointers (`^KEY = 12`).
   */
  private isPdsGroup(group: PvlContainer): boolean {
    const keys = group.keys();
    if (new Set(keys).size !== keys.length) return false;
    return group.entries().every(([k, v]) => {
      if (v instanceof PvlContainer) return false;
      if (!k.startsWith('^')) return true;
      return !isInteger(v) && !(v instanceof Quantity && isInteger(v.value));
    });
  }

  // ---- Layout ----

  private delimiter(): string {
    return this.rules.endDelimiter ? (this.grammar.delimiters[0] ?? '') : '';
  }

  /**
   * Indent `s` and wrap it when it would exceed the width. Breaks happen
   * only at spaces outside quoted strings and units expressions.
   */
  private format(s: string, level: number): string {
    const prefix = ' '.repeat(level * this.rules.indent);
    const limit = this.rules.width - this.rules.newline.length;
    const eq = s.indexOf(' = ');
    if (prefix.length + s.length <= limit || eq === -1) return prefix + s;

    const head = prefix + s.slice(0, eq + 3);
    const hang = ' '.repeat(head.length);
    const lines: string[] = [];
    let line = head;
    let fresh = true;
    for (const word of this.words(s.slice(eq + 3))) {
      if (!fresh && line.length + 1 + word.length > limit) {
        lines.push(line);
        line = hang + word;
      } else {
        line += fresh ? word : ` ${word}`;
      }
      fresh = false;
    }
    lines.push(line);
    return lines.join(this.rules.newline);
  }

  private words(s: string): string[] {
    const [unitsOpen, unitsClose] = this.grammar.unitsDelimiters;
    const words: string[] = [];
    let current = '';
    let quote = '';
    let inUnits = false;
    for (let i = 0; i < s.length; i++) {
      const c = s.charAt(i);
      if (quote !== '') {
        if (c === '\\') {
          current += c + s.charAt(i + 1);
          i++;
          continue;
        }
        if (c === quote) quote = '';
      } else if (inUnits) {
        if (c === unitsClose) inUnits = false;
      } else if (this.grammar.quotes.includes(c)) {
        quote = c;
      } else if (c === unitsOpen) {
        inUnits = true;
      } else if (c === ' ') {
        if (current !== '') words.push(current);
        current = '';
        continue;
      }
      current += c;
    }
    if (current !== '') words.push(current);
    return words;
  }

  private checkCharacters(text: string): void {
    for (const char of text) {
      if (!this.grammar.isCharAllowed(char)) {
        throw new EncodeError(
          `Character U+${(char.codePointAt(0) ?? 0).toString(16).toUpperCase().padStart(4, '0')} is not allowed in ${this.rules.dialect}`,
          this.rules.dialect,
        );
      }
    }
  }
}
