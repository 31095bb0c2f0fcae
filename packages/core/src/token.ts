// ============================================================================
// @pvlkit/core - Tokens
// ============================================================================

import { DecodeError } from './errors.js';
import type { PrimitiveDecoder } from './decoder.js';
import { aggregationEnd, isEndStatement } from './grammar.js';
import type { Grammar } from './grammar.js';

/** A slice of source text and where it started. */
export interface Token {
  readonly text: string;
  readonly offset: number;
}

export function token(text: string, offset = 0): Token {
  return Object.freeze({ text, offset });
}

function succeeds(attempt: () => unknown): boolean {
  try {
    attempt();
    return true;
  } catch (err) {
    if (err instanceof DecodeError) return false;
    throw err;
  }
}

/**
 * Stateless predicates over tokens, answered against one decoder and
 * the grammar it carries.
 */
export class TokenClassifier {
  readonly grammar: Grammar;

  constructor(readonly decoder: PrimitiveDecoder) {
    this.grammar = decoder.grammar;
  }

  /** Block comments must be closed; a line comment runs to the end of its line or input. */
  isComment(t: Token): boolean {
    return this.grammar.comments.some(({ open, close }) => {
      if (!t.text.startsWith(open)) return false;
      if (open.length === 1) return true;
      return t.text.length >= open.length + close.length && t.text.endsWith(close);
    });
  }

  isWhitespace(t: Token): boolean {
    return t.text.length > 0 && [...t.text].every((c) => this.grammar.whitespace.has(c));
  }

  isWSC(t: Token): boolean {
    return this.isComment(t) || this.isWhitespace(t);
  }

  isQuote(t: Token): boolean {
    return this.grammar.quotes.includes(t.text);
  }

  isQuotedString(t: Token): boolean {
    return succeeds(() => this.decoder.decodeQuotedString(t.text));
  }

  isDecimal(t: Token): boolean {
    return succeeds(() => this.decoder.decodeDecimal(t.text));
  }

  isNonDecimal(t: Token): boolean {
    return succeeds(() => this.decoder.decodeNonDecimal(t.text));
  }

  isNumeric(t: Token): boolean {
    return this.isNonDecimal(t) || this.isDecimal(t);
  }

  isDateTime(t: Token): boolean {
    return succeeds(() => this.decoder.decodeDateTime(t.text));
  }

  isBeginAggregation(t: Token): boolean {
    return aggregationEnd(this.grammar, t.text) !== undefined;
  }

  /** True when `t` closes an aggregation opened by `begin`. */
  isEndAggregation(t: Token, begin: string): boolean {
    const end = aggregationEnd(this.grammar, begin);
    return end !== undefined && end.toUpperCase() === t.text.toUpperCase();
  }

  isEndStatement(t: Token): boolean {
    return isEndStatement(this.grammar, t.text);
  }

  isDelimiter(t: Token): boolean {
    return this.grammar.delimiters.includes(t.text);
  }

  isReservedKeyword(t: Token): boolean {
    return this.grammar.reservedKeywords.has(t.text.toUpperCase());
  }

  isUnquotedString(t: Token): boolean {
    return succeeds(() => this.decoder.decodeUnquotedString(t.text));
  }

  isParameterName(t: Token): boolean {
    return !this.isReservedKeyword(t) && !this.isComment(t) && this.isUnquotedString(t);
  }

  isUnitsExpression(t: Token): boolean {
    const [open, close] = this.grammar.unitsDelimiters;
    return t.text.length >= 2 && t.text.startsWith(open) && t.text.endsWith(close);
  }

  isSimpleValue(t: Token): boolean {
    return succeeds(() => this.decoder.decodeSimpleValue(t.text));
  }
}
