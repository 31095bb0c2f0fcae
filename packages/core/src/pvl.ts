// ============================================================================
// @pvlkit/core - Entry Points
// ============================================================================

import type { PvlContainer, PvlModule } from './collections.js';
import { decodeOptionsSchema, encodeOptionsSchema, resolveConfig, validate } from './config.js';
import type { DecodeOptions, EncodeOptions } from './config.js';
import { getDialect, requireEncoder } from './dialects.js';

/**
 * Parse a PVL-family document.
 *
 * The dialect defaults to `PVL_DIALECT` (omni unless set), which reads
 * anything the other dialects read.
 *
 * @example
 * ```ts
 * const label = decode('a = 1\nGROUP = g\n  b = (2, 3) <m>\nEND_GROUP = g\nEND');
 * label.get('a');  // 1
 * ```
 */
export function decode(text: string, options: DecodeOptions = {}): PvlModule {
  const opts = validate(decodeOptionsSchema, options, 'decode options');
  const config = resolveConfig();
  const dialect = getDialect(opts.dialect ?? config.decodeDialect, {
    strict: opts.strict ?? config.strict,
  });
  return dialect.parser.parse(text);
}

/**
 * Write `container` in a dialect (default `PVL_ENCODE_DIALECT`, else pvl).
 *
 * @throws EncodeError when a key or value cannot be written in the dialect.
 */
export function encode(container: PvlContainer, options: EncodeOptions = {}): string {
  const { dialect: name, ...layout } = validate(encodeOptionsSchema, options, 'encode options');
  const config = resolveConfig();
  const dialect = getDialect(name ?? config.encodeDialect, { layout });
  return requireEncoder(dialect).encode(container);
}

/** Alias of {@link decode}. */
export const loads = decode;

/** Alias of {@link encode}. */
export const dumps = encode;
