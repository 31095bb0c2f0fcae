// ============================================================================
// @pvlkit/core - Lexer
// ============================================================================
//
// Scans one character at a time and emits tokens on demand. Comments,
// quoted strings, units expressions and non-decimal literals are
// "preserved": their characters accumulate verbatim until the terminator.
// Whitespace outside a preserved construct only separates tokens and is
// never emitted.
//
// The stream is lazy. Nothing past the last token a consumer asked for is
// examined, so text after an end statement is never checked against the
// character set.
//
// ============================================================================

import type { PrimitiveDecoder } from './decoder.js';
import { LexerError } from './errors.js';
import { commentAt } from './grammar.js';
import type { Grammar } from './grammar.js';
import { TokenClassifier, token } from './token.js';
import type { Token } from './token.js';

type Preserve = 'none' | 'block-comment' | 'line-comment' | 'quote' | 'units' | 'non-decimal';

const UNTERMINATED: Record<Exclude<Preserve, 'none'>, string> = {
  'block-comment': 'Unterminated comment',
  'line-comment': 'Unterminated comment',
  quote: 'Unterminated quoted string',
  units: 'Unterminated units expression',
  'non-decimal': 'Unterminated non-decimal literal',
};

/** A mantissa with its exponent marker, awaiting a signed exponent. */
const EXPONENT_STEM = /^[+-]?(\d+\.?\d*|\.\d+)[eE]$/;
const DIGIT = /^\d$/;
const DIGIT_OR_POINT = /^[\d.]$/;

/**
 * A cursor over the tokens of one document. Tokens handed back with
 * `pushBack` are returned again, most recent first, before scanning resumes.
 */
export class TokenStream implements Iterable<Token> {
  private pos = 0;
  private readonly pushed: Token[] = [];
  private readonly classifier: TokenClassifier;

  constructor(
    readonly text: string,
    readonly grammar: Grammar,
    readonly decoder: PrimitiveDecoder,
  ) {
    this.classifier = new TokenClassifier(decoder);
  }

  next(): Token | undefined {
    return this.pushed.pop() ?? this.scan();
  }

  peek(): Token | undefined {
    const t = this.next();
    if (t !== undefined) this.pushBack(t);
    return t;
  }

  pushBack(t: Token): void {
    this.pushed.push(t);
  }

  /** Rewind to the start of the document and forget pushed-back tokens. */
  restart(): void {
    this.pos = 0;
    this.pushed.length = 0;
  }

  *[Symbol.iterator](): Iterator<Token> {
    let t = this.next();
    while (t !== undefined) {
      yield t;
      t = this.next();
    }
  }

  // ---- Scanning ----

  private take(): string {
    const char = this.text.charAt(this.pos);
    if (!this.grammar.isCharAllowed(char)) {
      throw new LexerError(`Character "${char}" (U+${charCode(char)}) is not allowed`, this.text, this.pos);
    }
    this.pos += 1;
    return char;
  }

  private scan(): Token | undefined {
    const { text, grammar } = this;
    let lexeme = '';
    let start = this.pos;
    let state: Preserve = 'none';
    let open = '';
    let close = '';

    while (this.pos < text.length) {
      const at = this.pos;
      const char = this.take();
      let closed = false;

      switch (state) {
        case 'none': {
          if (lexeme === '') {
            if (grammar.whitespace.has(char)) continue;
            start = at;
            const comment = commentAt(grammar, text, at);
            if (comment) {
              state = comment.open.length === 1 ? 'line-comment' : 'block-comment';
              ({ open, close } = comment);
            } else if (grammar.quotes.includes(char)) {
              state = 'quote';
              open = char;
              close = char;
            } else if (char === grammar.unitsDelimiters[0]) {
              state = 'units';
              [open, close] = grammar.unitsDelimiters;
            }
          }
          lexeme += char;
          break;
        }
        case 'non-decimal':
          if (grammar.whitespace.has(char)) {
            throw new LexerError(UNTERMINATED[state], text, start);
          }
          lexeme += char;
          break;
        default:
          lexeme += char;
      }

      switch (state) {
        case 'none':
          break;
        case 'quote':
          if (char === '\\' && lexeme.length > 1) {
            if (this.pos < text.length) lexeme += this.take();
            continue;
          }
          if (lexeme.length === 1 || char !== close) continue;
          closed = true;
          break;
        case 'units':
          if (lexeme.length === 1 || char !== close) continue;
          closed = true;
          break;
        case 'block-comment':
          if (lexeme.length < open.length + close.length || !lexeme.endsWith(close)) continue;
          closed = true;
          break;
        case 'line-comment':
          if (this.pos < text.length && !text.startsWith(close, this.pos)) continue;
          closed = true;
          break;
        case 'non-decimal':
          if (!grammar.nonDecimal.test(lexeme)) continue;
          break;
      }

      state = 'none';
      if (closed || this.pos >= text.length) return token(lexeme, start);

      const next = text.charAt(this.pos);

      if (this.startsNonDecimal(lexeme, next)) {
        lexeme += this.take();
        state = 'non-decimal';
        continue;
      }
      if (this.continuesNumber(lexeme, next)) continue;

      if (
        grammar.whitespace.has(next) ||
        grammar.reservedCharacters.has(next) ||
        commentAt(grammar, text, this.pos) !== undefined ||
        (lexeme.length === 1 && grammar.reservedCharacters.has(lexeme))
      ) {
        return token(lexeme, start);
      }
    }

    if (state !== 'none') throw new LexerError(UNTERMINATED[state], text, start);
    return lexeme === '' ? undefined : token(lexeme, start);
  }

  /**
   * True when `lexeme` plus `next` opens a non-decimal literal. Where the
   * radix marker also opens a line comment, it is a literal only when a
   * second marker follows with no whitespace in between; the digits are
   * checked later.
   */
  private startsNonDecimal(lexeme: string, next: string): boolean {
    const { grammar, text } = this;
    if (!grammar.nonDecimalPrefix.test(lexeme + next)) return false;
    if (!grammar.comments.some((pair) => pair.open === next)) return true;
    const end = text.indexOf(next, this.pos + 1);
    if (end === -1) return false;
    const body = text.slice(this.pos + 1, end);
    return body.length > 0 && ![...body].some((char) => grammar.whitespace.has(char));
  }

  /**
   * Signs, exponents and numeric UTC offsets can begin with reserved
   * characters; keep them inside the current lexeme.
   */
  private continuesNumber(lexeme: string, next: string): boolean {
    const { grammar } = this;
    const after = this.text.charAt(this.pos + 1);
    const signed = grammar.numericStartChars.includes(next) && DIGIT.test(after);

    if (grammar.numericStartChars.includes(lexeme) && DIGIT_OR_POINT.test(next)) return true;
    if (signed && EXPONENT_STEM.test(lexeme)) return true;
    if (signed && this.decoder.numericTimeZones && this.classifier.isDateTime(token(lexeme))) return true;
    return false;
  }
}

function charCode(char: string): string {
  return (char.codePointAt(0) ?? 0).toString(16).toUpperCase().padStart(4, '0');
}

/**
 * Tokenize `text` lazily under `grammar`.
 */
export function lex(text: string, grammar: Grammar, decoder: PrimitiveDecoder): TokenStream {
  return new TokenStream(text, grammar, decoder);
}
