// ============================================================================
// @pvlkit/core - Public API
// ============================================================================

// High-level API
export { decode, encode, loads, dumps } from './pvl.js';

// Dialects
export { DIALECT_NAMES, ENCODABLE_DIALECTS, getDialect, isDialectName, requireEncoder } from './dialects.js';
export type { Dialect, DialectName, DialectOptions, LayoutOptions } from './dialects.js';

// Containers & values
export {
  PvlContainer,
  PvlModule,
  PvlGroup,
  PvlObject,
  PvlSet,
  Quantity,
  EmptyValueAtLine,
  valueEquals,
} from './collections.js';
export type { ContainerRole, Entry, PvlScalar, PvlValue } from './collections.js';

// Dates & times
export {
  PvlDate,
  PvlTime,
  PvlDateTime,
  LEAP_SECOND_POLICY,
  isDateTimeValue,
  isValidDate,
  isValidTime,
  parseDate,
  parseTime,
  parseDateTime,
} from './datetime.js';
export type { DateTimeParseOptions, PvlDateTimeValue } from './datetime.js';

// Grammar profiles
export {
  PVL_GRAMMAR,
  ODL_GRAMMAR,
  ISIS_GRAMMAR,
  OMNI_GRAMMAR,
  defineGrammar,
  commentFor,
} from './grammar.js';
export type { CommentPair, DelimiterPair, Grammar, GrammarInit } from './grammar.js';

// Pipeline stages
export { lex, TokenStream } from './lexer.js';
export { token, TokenClassifier } from './token.js';
export type { Token } from './token.js';
export { PrimitiveDecoder } from './decoder.js';
export type { DecoderOptions } from './decoder.js';
export { Parser } from './parser.js';
export type { ParserOptions } from './parser.js';
export { Encoder } from './encoder.js';
export type { EncoderRules } from './encoder.js';

// Configuration
export { resolveConfig, decodeOptionsSchema, encodeOptionsSchema } from './config.js';
export type { DecodeOptions, EncodeOptions, PvlConfig } from './config.js';

// Errors
export {
  PvlError,
  LexerError,
  ParseError,
  DecodeError,
  QuantityError,
  EncodeError,
  KeyNotFoundError,
  IndexOutOfRangeError,
  PvlConfigError,
} from './errors.js';

// Logging
export { onLog, setLogLevel, getLogLevel, isDebugEnabled } from './logger.js';
export type { LogCallback, LogEntry, LogLevel } from './logger.js';
