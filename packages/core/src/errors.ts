// ============================================================================
// @pvlkit/core - Error Types
// ============================================================================

import type { Token } from './token.js';

/**
 * Base error class for all pvlkit errors.
 */
export class PvlError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PvlError';
  }
}

// ---------------------------------------------------------------------------
// Decoding Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when the lexer meets a character the grammar forbids, or text that
 * ends inside a comment, quoted string, units expression or non-decimal
 * literal. Always fatal to the decode call.
 */
export class LexerError extends PvlError {
  public readonly reason: string;
  public readonly pos: number;
  public readonly lineno: number;
  public readonly colno: number;
  public readonly context: string;

  constructor(reason: string, doc: string, pos: number) {
    const lineno = lineCount(doc, pos);
    const colno = pos - (pos > 0 ? doc.lastIndexOf('\n', pos - 1) : -1);
    const context = snippet(doc, pos);
    super(`${reason}: line ${lineno} column ${colno} (char ${pos}) near "${context}"`);
    this.name = 'LexerError';
    this.reason = reason;
    this.pos = pos;
    this.lineno = lineno;
    this.colno = colno;
    this.context = context;
  }
}

/**
 * Thrown when a statement is malformed: an unexpected token, a mismatched
 * aggregation name, or a missing value under the strict policy.
 */
export class ParseError extends PvlError {
  public readonly token?: Token;
  public readonly lineno?: number;

  constructor(message: string, options?: { token?: Token; lineno?: number }) {
    const where = options?.lineno !== undefined ? ` (line ${options.lineno})` : '';
    super(`${message}${where}`);
    this.name = 'ParseError';
    this.token = options?.token;
    this.lineno = options?.lineno;
  }
}

/**
 * Thrown when token text cannot be coerced to the requested value type.
 * The decoder's classification chain catches it and tries the next candidate.
 */
export class DecodeError extends PvlError {
  public readonly text: string;

  constructor(message: string, text: string) {
    super(message);
    this.name = 'DecodeError';
    this.text = text;
  }
}

/**
 * Thrown when a Quantity is built around another Quantity.
 */
export class QuantityError extends PvlError {
  constructor(message: string) {
    super(message);
    this.name = 'QuantityError';
  }
}

// ---------------------------------------------------------------------------
// Encoding Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a value cannot be written in the target dialect without
 * changing its meaning.
 */
export class EncodeError extends PvlError {
  public readonly dialect: string;
  public readonly key?: string;

  constructor(message: string, dialect: string, key?: string) {
    super(key !== undefined ? `${message} (key "${key}")` : message);
    this.name = 'EncodeError';
    this.dialect = dialect;
    this.key = key;
  }
}

// ---------------------------------------------------------------------------
// Container Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a key-addressed container operation names an absent key.
 */
export class KeyNotFoundError extends PvlError {
  public readonly key: string;

  constructor(key: string) {
    super(`Key "${key}" not found`);
    this.name = 'KeyNotFoundError';
    this.key = key;
  }
}

/**
 * Thrown when an occurrence or position lies outside a container.
 */
export class IndexOutOfRangeError extends PvlError {
  public readonly index: number;
  public readonly available: number;

  constructor(message: string, index: number, available: number) {
    super(message);
    this.name = 'IndexOutOfRangeError';
    this.index = index;
    this.available = available;
  }
}

// ---------------------------------------------------------------------------
// Configuration Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when environment configuration or call options fail validation.
 */
export class PvlConfigError extends PvlError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'PvlConfigError';
    this.issues = issues;
  }
}

// ---- Helpers ----

/** 1-based line number of `pos` within `doc`. */
export function lineCount(doc: string, pos: number): number {
  let lines = 1;
  for (let i = 0; i < pos && i < doc.length; i++) {
    if (doc.charAt(i) === '\n') lines++;
  }
  return lines;
}

function snippet(doc: string, pos: number): string {
  const start = Math.max(0, pos - 15);
  const fragments = doc.slice(start, pos + 15).split(' ');
  // Drop partial words at either edge when there is anything else to show.
  if (fragments.length > 2) return fragments.slice(1, -1).join(' ');
  return fragments.join(' ');
}
