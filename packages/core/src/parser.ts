// ============================================================================
// @pvlkit/core - Parser
// ============================================================================
//
// Recursive descent over the token stream:
//
//   Module      ::= (WSC | Aggregation | Assignment)* EndStatement?
//   Aggregation ::= Begin '=' Name Delim (WSC | Aggregation | Assignment)*
//                   End ('=' Name)? Delim
//   Assignment  ::= Name '=' Value Delim
//   Value       ::= (Simple | Set | Sequence) Units?
//
// Strict parsers throw on the first malformed statement. Lenient parsers
// store an EmptyValueAtLine for an assignment that lost its value, record
// the line on the module, and carry on.
//
// ============================================================================

import {
  EmptyValueAtLine,
  PvlGroup,
  PvlModule,
  PvlObject,
  PvlSet,
} from './collections.js';
import type { PvlContainer, PvlValue } from './collections.js';
import type { PrimitiveDecoder } from './decoder.js';
import { DecodeError, LexerError, ParseError, lineCount } from './errors.js';
import { isGroupKeyword } from './grammar.js';
import type { Grammar } from './grammar.js';
import { lex } from './lexer.js';
import type { TokenStream } from './lexer.js';
import { debug, logRecovery, timer } from './logger.js';
import { TokenClassifier } from './token.js';
import type { Token } from './token.js';

export interface ParserOptions {
  /** Throw on malformed statements instead of recovering. Default true. */
  strict?: boolean;
  /** Remove `-` + line break + indentation from the whole document first. */
  joinContinuationLines?: boolean;
  /** Reject a units expression after a non-numeric value. */
  unitsOnNumericOnly?: boolean;
  /** Name used in log output. */
  dialect?: string;
}

/** State for a single parse call. */
interface ParseContext {
  readonly doc: string;
  readonly tokens: TokenStream;
  readonly errors: number[];
}

const CONTINUATION = /-[\n\r\f]\s*/g;

export class Parser {
  readonly grammar: Grammar;
  readonly decoder: PrimitiveDecoder;
  readonly strict: boolean;
  readonly joinContinuationLines: boolean;
  readonly unitsOnNumericOnly: boolean;
  readonly dialect: string;
  private readonly classifier: TokenClassifier;

  constructor(decoder: PrimitiveDecoder, options: ParserOptions = {}) {
    this.decoder = decoder;
    this.grammar = decoder.grammar;
    this.strict = options.strict ?? true;
    this.joinContinuationLines = options.joinContinuationLines ?? false;
    this.unitsOnNumericOnly = options.unitsOnNumericOnly ?? false;
    this.dialect = options.dialect ?? this.grammar.name;
    this.classifier = new TokenClassifier(decoder);
  }

  /**
   * Parse a whole document.
   *
   * @throws LexerError on illegal characters or unterminated constructs.
   * @throws ParseError on malformed statements (always for strict parsers;
   *   lenient parsers only throw for what they cannot recover).
   */
  parse(text: string): PvlModule {
    const t = timer(`parse (${this.dialect})`);
    const doc = this.joinContinuationLines ? text.replace(CONTINUATION, '') : text;
    const ctx: ParseContext = { doc, tokens: lex(doc, this.grammar, this.decoder), errors: [] };

    const module = this.parseModule(ctx);
    module.errors = [...ctx.errors].sort((a, b) => a - b);

    t.endWith({ chars: doc.length, entries: module.size, recovered: module.errors.length });
    return module;
  }

  // ---- Statements ----

  private parseModule(ctx: ParseContext): PvlModule {
    const module = new PvlModule();
    for (;;) {
      this.skipWSC(ctx);
      const next = ctx.tokens.peek();
      if (next === undefined) return module;

      if (this.classifier.isEndStatement(next)) {
        ctx.tokens.next();
        this.parseEndStatement(ctx);
        return module;
      }
      if (this.classifier.isBeginAggregation(next)) {
        const [name, block] = this.parseAggregation(ctx);
        module.append(name, block);
        continue;
      }
      this.parseAssignment(module, ctx);
    }
  }

  /** After the end keyword, swallow one trailing delimiter or comment and stop. */
  private parseEndStatement(ctx: ParseContext): void {
    try {
      const trailing = ctx.tokens.next();
      if (trailing === undefined) return;
      if (!this.classifier.isDelimiter(trailing) && !this.classifier.isComment(trailing)) {
        ctx.tokens.pushBack(trailing);
      }
    } catch (err) {
      if (!(err instanceof LexerError)) throw err;
      debug('ignoring unreadable text after end statement', { dialect: this.dialect, pos: err.pos });
    }
  }

  private parseAggregation(ctx: ParseContext): [string, PvlContainer] {
    const begin = this.expectToken(ctx, 'an aggregation keyword');
    this.expectEquals(ctx, begin.text);

    this.skipWSC(ctx);
    const nameToken = this.expectToken(ctx, `a block name after "${begin.text} ="`);
    if (!this.classifier.isParameterName(nameToken)) {
      throw this.error(`Expected a block name after "${begin.text} =", found "${nameToken.text}"`, ctx, nameToken);
    }
    const name = nameToken.text;
    this.parseStatementDelimiter(ctx);

    const block: PvlContainer = isGroupKeyword(this.grammar, begin.text) ? new PvlGroup() : new PvlObject();

    for (;;) {
      this.skipWSC(ctx);
      const next = ctx.tokens.peek();
      if (next === undefined) {
        throw this.error(`Aggregation "${name}" was never closed`, ctx, begin);
      }
      if (this.classifier.isEndAggregation(next, begin.text)) {
        ctx.tokens.next();
        break;
      }
      if (this.classifier.isBeginAggregation(next)) {
        const [childName, child] = this.parseAggregation(ctx);
        block.append(childName, child);
        continue;
      }
      this.parseAssignment(block, ctx);
    }

    this.skipWSC(ctx);
    const equals = ctx.tokens.peek();
    if (equals !== undefined && equals.text === '=') {
      ctx.tokens.next();
      this.skipWSC(ctx);
      const endName = this.expectToken(ctx, `the name "${name}" after the end keyword`);
      if (endName.text.toUpperCase() !== name.toUpperCase()) {
        throw this.error(`End name "${endName.text}" does not match block name "${name}"`, ctx, endName);
      }
    }
    this.parseStatementDelimiter(ctx);

    return [name, block];
  }

  private parseAssignment(container: PvlContainer, ctx: ParseContext): void {
    const nameToken = this.expectToken(ctx, 'a parameter name');
    if (!this.classifier.isParameterName(nameToken)) {
      throw this.error(`Expected a parameter name, found "${nameToken.text}"`, ctx, nameToken);
    }
    const key = nameToken.text;
    const equals = this.expectEquals(ctx, key);

    const value = this.parseAssignedValue(key, equals, ctx);
    this.parseStatementDelimiter(ctx);
    container.append(key, value);
  }

  /**
   * The value after `key =`, or a recovered placeholder when the value is
   * missing: end of input, a reserved keyword, a statement delimiter, or a
   * bare word that turns out to be the next statement's name.
   */
  private parseAssignedValue(key: string, equals: Token, ctx: ParseContext): PvlValue {
    this.skipWSC(ctx);
    const next = ctx.tokens.peek();

    if (
      next === undefined ||
      this.classifier.isReservedKeyword(next) ||
      this.classifier.isDelimiter(next)
    ) {
      return this.recover(key, equals, ctx);
    }

    if (!this.strict && this.classifier.isParameterName(next)) {
      ctx.tokens.next();
      this.skipWSC(ctx);
      const after = ctx.tokens.peek();
      ctx.tokens.pushBack(next);
      if (after !== undefined && after.text === '=') return this.recover(key, equals, ctx);
    }

    return this.parseValue(ctx);
  }

  private recover(key: string, equals: Token, ctx: ParseContext): EmptyValueAtLine {
    const lineno = lineCount(ctx.doc, equals.offset);
    if (this.strict) {
      throw new ParseError(`Missing value for "${key}"`, { token: equals, lineno });
    }
    ctx.errors.push(lineno);
    logRecovery(this.dialect, key, lineno);
    return new EmptyValueAtLine(lineno);
  }

  // ---- Values ----

  private parseValue(ctx: ParseContext): PvlValue {
    this.skipWSC(ctx);
    const t = this.expectToken(ctx, 'a value');
    const [setOpen, setClose] = this.grammar.setDelimiters;
    const [seqOpen, seqClose] = this.grammar.sequenceDelimiters;

    let value: PvlValue;
    if (t.text === setOpen) {
      value = new PvlSet(this.parseMembers(ctx, setClose));
    } else if (t.text === seqOpen) {
      value = this.parseMembers(ctx, seqClose);
    } else {
      try {
        value = this.decoder.decodeSimpleValue(t.text);
      } catch (err) {
        if (!(err instanceof DecodeError)) throw err;
        throw this.error(`Expected a simple value, set or sequence, found "${t.text}"`, ctx, t);
      }
    }

    this.skipWSC(ctx);
    const units = ctx.tokens.peek();
    if (units !== undefined && this.classifier.isUnitsExpression(units)) {
      ctx.tokens.next();
      return this.parseUnits(value, units, ctx);
    }
    return value;
  }

  /** Comma-separated values up to `close`; the opener is already consumed. */
  private parseMembers(ctx: ParseContext, close: string): PvlValue[] {
    const members: PvlValue[] = [];
    this.skipWSC(ctx);
    const first = ctx.tokens.peek();
    if (first !== undefined && first.text === close) {
      ctx.tokens.next();
      return members;
    }

    for (;;) {
      members.push(this.parseValue(ctx));
      const t = this.expectToken(ctx, `"," or "${close}"`);
      if (t.text === close) return members;
      if (t.text !== ',') {
        throw this.error(`Expected "," or "${close}", found "${t.text}"`, ctx, t);
      }
    }
  }

  private parseUnits(value: PvlValue, t: Token, ctx: ParseContext): PvlValue {
    const [open, close] = this.grammar.unitsDelimiters;
    const inner = t.text.slice(open.length, -close.length);
    if (inner.includes(open) || inner.includes(close)) {
      throw this.error(`Units expression "${t.text}" contains a nested units delimiter`, ctx, t);
    }
    if (this.unitsOnNumericOnly && typeof value !== 'number' && typeof value !== 'bigint') {
      throw this.error(`Units expressions may only follow numeric values, found "${t.text}"`, ctx, t);
    }
    return this.decoder.decodeQuantity(value, this.trimWhitespace(inner));
  }

  // ---- Helpers ----

  private trimWhitespace(s: string): string {
    let startAt = 0;
    let endAt = s.length;
    while (startAt < endAt && this.grammar.whitespace.has(s.charAt(startAt))) startAt++;
    while (endAt > startAt && this.grammar.whitespace.has(s.charAt(endAt - 1))) endAt--;
    return s.slice(startAt, endAt);
  }

  private skipWSC(ctx: ParseContext): void {
    let t = ctx.tokens.peek();
    while (t !== undefined && this.classifier.isWSC(t)) {
      ctx.tokens.next();
      t = ctx.tokens.peek();
    }
  }

  private parseStatementDelimiter(ctx: ParseContext): void {
    this.skipWSC(ctx);
    const t = ctx.tokens.peek();
    if (t !== undefined && this.classifier.isDelimiter(t)) ctx.tokens.next();
  }

  private expectToken(ctx: ParseContext, expected: string): Token {
    const t = ctx.tokens.next();
    if (t === undefined) {
      throw new ParseError(`Expected ${expected}, but ran out of input`, {
        lineno: lineCount(ctx.doc, ctx.doc.length),
      });
    }
    return t;
  }

  private expectEquals(ctx: ParseContext, after: string): Token {
    this.skipWSC(ctx);
    const t = this.expectToken(ctx, `"=" after "${after}"`);
    if (t.text !== '=') {
      throw this.error(`Expected "=" after "${after}", found "${t.text}"`, ctx, t);
    }
    return t;
  }

  private error(message: string, ctx: ParseContext, t: Token): ParseError {
    return new ParseError(message, { token: t, lineno: lineCount(ctx.doc, t.offset) });
  }
}
