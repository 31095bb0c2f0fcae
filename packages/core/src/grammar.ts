// ============================================================================
// @pvlkit/core - Grammar Profiles
// ============================================================================
//
// A grammar is a frozen table of lexical and syntactic rules. The lexer,
// decoder, parser and encoder all read from the same profile; nothing in a
// profile changes after construction.
//
// ============================================================================

/** A start/end pair that encloses a comment. A one-character start is a line comment. */
export interface CommentPair {
  readonly open: string;
  readonly close: string;
}

export type DelimiterPair = readonly [open: string, close: string];

export interface Grammar {
  readonly name: string;
  readonly spacingCharacters: ReadonlySet<string>;
  readonly formatEffectors: ReadonlySet<string>;
  readonly whitespace: ReadonlySet<string>;
  readonly reservedCharacters: ReadonlySet<string>;
  readonly comments: readonly CommentPair[];
  /** Upper-cased begin keyword → end keyword. */
  readonly groupKeywords: ReadonlyMap<string, string>;
  readonly objectKeywords: ReadonlyMap<string, string>;
  /** The begin/end pair an encoder writes. */
  readonly groupPrefKeywords: DelimiterPair;
  readonly objectPrefKeywords: DelimiterPair;
  readonly endStatements: readonly string[];
  /** Upper-cased end statements and aggregation keywords. */
  readonly reservedKeywords: ReadonlySet<string>;
  readonly noneKeyword: string;
  readonly trueKeyword: string;
  readonly falseKeyword: string;
  readonly quotes: readonly string[];
  readonly setDelimiters: DelimiterPair;
  readonly sequenceDelimiters: DelimiterPair;
  readonly unitsDelimiters: DelimiterPair;
  readonly delimiters: readonly string[];
  readonly numericStartChars: readonly string[];
  /** Matches a literal up to and including its first radix marker. */
  readonly nonDecimalPrefix: RegExp;
  /** Matches a whole literal; named groups `sign`, `radix`, `secondSign`, `digits`. */
  readonly nonDecimal: RegExp;
  /** Matches a time (or date-time) whose seconds field is 60, or null when leap seconds are illegal. */
  readonly leapSecond: RegExp | null;
  readonly isCharAllowed: (char: string) => boolean;
}

export type GrammarInit = Omit<Grammar, 'whitespace' | 'reservedKeywords'>;

/**
 * Build a frozen grammar from its tables. Derived sets (whitespace and
 * reserved keywords) are computed here.
 */
export function defineGrammar(init: GrammarInit): Grammar {
  const whitespace = new Set([...init.spacingCharacters, ...init.formatEffectors]);

  const reservedKeywords = new Set<string>();
  for (const end of init.endStatements) reservedKeywords.add(end.toUpperCase());
  for (const keywords of [init.groupKeywords, init.objectKeywords]) {
    for (const [begin, end] of keywords) {
      reservedKeywords.add(begin.toUpperCase());
      reservedKeywords.add(end.toUpperCase());
    }
  }

  return Object.freeze({
    ...init,
    whitespace,
    reservedKeywords,
    comments: Object.freeze([...init.comments]),
  });
}

// ---- Lookups ----

/** Returns the comment pair whose opener starts at `pos`, if any. */
export function commentAt(grammar: Grammar, text: string, pos: number): CommentPair | undefined {
  return grammar.comments.find((pair) => text.startsWith(pair.open, pos));
}

/** Returns the comment pair whose opener is `open`. */
export function commentFor(grammar: Grammar, open: string): CommentPair | undefined {
  return grammar.comments.find((pair) => pair.open === open);
}

/**
 * The end keyword paired with `begin`, matched case-insensitively,
 * or undefined when `begin` is not an aggregation keyword.
 */
export function aggregationEnd(grammar: Grammar, begin: string): string | undefined {
  const key = begin.toUpperCase();
  return grammar.groupKeywords.get(key) ?? grammar.objectKeywords.get(key);
}

export function isGroupKeyword(grammar: Grammar, begin: string): boolean {
  return grammar.groupKeywords.has(begin.toUpperCase());
}

export function isEndStatement(grammar: Grammar, text: string): boolean {
  const upper = text.toUpperCase();
  return grammar.endStatements.some((end) => end.toUpperCase() === upper);
}

// ---------------------------------------------------------------------------
// Character sets
// ---------------------------------------------------------------------------

/** ISO 8859-1 without the control ranges PVL excludes. Vertical tab is legal. */
function latin1Allowed(char: string): boolean {
  const code = char.codePointAt(0) ?? -1;
  if (code < 0 || code > 255) return false;
  if (code <= 8) return false;
  if (code >= 14 && code <= 31) return false;
  if (code >= 127 && code <= 159) return false;
  return true;
}

function asciiAllowed(char: string): boolean {
  const code = char.codePointAt(0) ?? -1;
  return code >= 0 && code <= 127;
}

/** Anything but control characters that are not whitespace. */
function permissiveAllowed(char: string): boolean {
  const code = char.codePointAt(0) ?? -1;
  if (code < 0) return false;
  if (code <= 8) return false;
  if (code >= 14 && code <= 31) return false;
  return code !== 127;
}

// ---------------------------------------------------------------------------
// Shared tables
// ---------------------------------------------------------------------------

const SPACING = new Set([' ', '\t']);
const FORMAT_EFFECTORS = new Set(['\n', '\r', '\v', '\f']);

const PVL_RESERVED = [
  '&', '<', '>', "'", '{', '}', ',', '[', ']', '=', '!', '#', '(', ')', '%', '+', '"', ';', '~', '|',
];

const withoutPlus = (chars: readonly string[]): Set<string> => new Set(chars.filter((c) => c !== '+'));

const LEAP_SECOND = /^(\d{4}-(\d{2}-\d{2}|\d{3})T)?([01]\d|2[0-3]):[0-5]\d:60(\.\d+)?[Zz]?$/;

const BLOCK_COMMENT: CommentPair = { open: '/*', close: '*/' };
const HASH_COMMENT: CommentPair = { open: '#', close: '\n' };

const baseTables = {
  spacingCharacters: SPACING,
  formatEffectors: FORMAT_EFFECTORS,
  endStatements: ['END'],
  noneKeyword: 'NULL',
  trueKeyword: 'TRUE',
  falseKeyword: 'FALSE',
  quotes: ['"', "'"],
  setDelimiters: ['{', '}'],
  sequenceDelimiters: ['(', ')'],
  unitsDelimiters: ['<', '>'],
  delimiters: [';'],
  numericStartChars: ['+', '-'],
} as const;

// ---------------------------------------------------------------------------
// Profiles
// ---------------------------------------------------------------------------

/** CCSDS 641.0-B-2 Parameter Value Language. */
export const PVL_GRAMMAR: Grammar = defineGrammar({
  ...baseTables,
  name: 'pvl',
  reservedCharacters: new Set(PVL_RESERVED),
  comments: [BLOCK_COMMENT],
  groupKeywords: new Map([
    ['GROUP', 'END_GROUP'],
    ['BEGIN_GROUP', 'END_GROUP'],
  ]),
  objectKeywords: new Map([
    ['OBJECT', 'END_OBJECT'],
    ['BEGIN_OBJECT', 'END_OBJECT'],
  ]),
  groupPrefKeywords: ['BEGIN_GROUP', 'END_GROUP'],
  objectPrefKeywords: ['BEGIN_OBJECT', 'END_OBJECT'],
  nonDecimalPrefix: /^(?<sign>[+-]?)(?<radix>2|8|16)#$/,
  nonDecimal: /^(?<sign>[+-]?)(?<radix>2|8|16)#(?<secondSign>)(?<digits>[0-9A-Fa-f]+)#$/,
  leapSecond: LEAP_SECOND,
  isCharAllowed: latin1Allowed,
});

/** PDS3 Object Description Language. The sign of a non-decimal sits inside the radix marker. */
export const ODL_GRAMMAR: Grammar = defineGrammar({
  ...baseTables,
  name: 'odl',
  reservedCharacters: new Set(PVL_RESERVED),
  comments: [BLOCK_COMMENT],
  groupKeywords: PVL_GRAMMAR.groupKeywords,
  objectKeywords: PVL_GRAMMAR.objectKeywords,
  groupPrefKeywords: ['GROUP', 'END_GROUP'],
  objectPrefKeywords: ['OBJECT', 'END_OBJECT'],
  nonDecimalPrefix: /^(?<radix>[2-9]|1[0-6])#(?<secondSign>[+-]?)$/,
  nonDecimal: /^(?<sign>)(?<radix>[2-9]|1[0-6])#(?<secondSign>[+-]?)(?<digits>[0-9A-Fa-f]+)#$/,
  leapSecond: null,
  isCharAllowed: asciiAllowed,
});

/**
 * The flavor written by ISIS: CamelCase aggregation keywords, no BEGIN_
 * forms, `#` line comments, and unquoted `+`.
 */
export const ISIS_GRAMMAR: Grammar = defineGrammar({
  ...baseTables,
  name: 'isis',
  reservedCharacters: withoutPlus(PVL_RESERVED),
  comments: [BLOCK_COMMENT, HASH_COMMENT],
  groupKeywords: new Map([['GROUP', 'END_GROUP']]),
  objectKeywords: new Map([['OBJECT', 'END_OBJECT']]),
  groupPrefKeywords: ['Group', 'End_Group'],
  objectPrefKeywords: ['Object', 'End_Object'],
  nonDecimalPrefix: PVL_GRAMMAR.nonDecimalPrefix,
  nonDecimal: PVL_GRAMMAR.nonDecimal,
  leapSecond: LEAP_SECOND,
  isCharAllowed: latin1Allowed,
});

/**
 * Reads anything the other profiles read. The non-decimal sign may sit on
 * either side of the first radix marker (but not both).
 */
export const OMNI_GRAMMAR: Grammar = defineGrammar({
  ...baseTables,
  name: 'omni',
  reservedCharacters: withoutPlus(PVL_RESERVED),
  comments: [BLOCK_COMMENT, HASH_COMMENT],
  groupKeywords: PVL_GRAMMAR.groupKeywords,
  objectKeywords: PVL_GRAMMAR.objectKeywords,
  groupPrefKeywords: PVL_GRAMMAR.groupPrefKeywords,
  objectPrefKeywords: PVL_GRAMMAR.objectPrefKeywords,
  nonDecimalPrefix: /^(?<sign>[+-]?)(?<radix>[2-9]|1[0-6])#(?<secondSign>[+-]?)$/,
  nonDecimal: /^(?<sign>[+-]?)(?<radix>[2-9]|1[0-6])#(?<secondSign>[+-]?)(?<digits>[0-9A-Fa-f]+)#$/,
  leapSecond: LEAP_SECOND,
  isCharAllowed: permissiveAllowed,
});
