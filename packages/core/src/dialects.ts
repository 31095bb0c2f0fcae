// ============================================================================
// @pvlkit/core - Dialects
// ============================================================================
//
// A dialect is a grammar profile plus the policies the decoder, parser and
// encoder apply on top of it. Presets are built from tables; callers pick
// one by name.
//
//   | Dialect | Grammar | Strict | Folds | Numeric TZ | Writes          |
//   |---------|---------|--------|-------|------------|-----------------|
//   | pvl     | PVL     | yes    | no    | no         | BEGIN_GROUP ... |
//   | odl     | ODL     | yes    | yes   | yes        | GROUP ...       |
//   | pds3    | ODL     | yes    | yes   | yes        | GROUP ... (UTC) |
//   | isis    | ISIS    | no     | yes   | yes        | Group ...       |
//   | omni    | OMNI    | no     | yes   | yes        | (decode only)   |
//
// ============================================================================

import { PrimitiveDecoder } from './decoder.js';
import type { DecoderOptions } from './decoder.js';
import { Encoder } from './encoder.js';
import type { EncoderRules } from './encoder.js';
import { EncodeError } from './errors.js';
import { ISIS_GRAMMAR, ODL_GRAMMAR, OMNI_GRAMMAR, PVL_GRAMMAR } from './grammar.js';
import type { Grammar } from './grammar.js';
import { Parser } from './parser.js';

export const DIALECT_NAMES = ['pvl', 'odl', 'pds3', 'isis', 'omni'] as const;
export type DialectName = (typeof DIALECT_NAMES)[number];

/** Dialects that have encoder rules. */
export const ENCODABLE_DIALECTS = ['pvl', 'odl', 'pds3', 'isis'] as const satisfies readonly DialectName[];

/** Encoder settings a caller may override per call. */
export type LayoutOptions = Partial<
  Pick<
    EncoderRules,
    'indent' | 'width' | 'newline' | 'endDelimiter' | 'aggregationEnd' | 'trailingNewline' | 'convertGroupToObject'
  >
>;

export interface DialectOptions {
  /** Override the preset's strictness. */
  strict?: boolean;
  layout?: LayoutOptions;
}

export interface Dialect {
  readonly name: DialectName;
  readonly grammar: Grammar;
  readonly decoder: PrimitiveDecoder;
  readonly parser: Parser;
  /** Undefined for decode-only dialects. */
  readonly encoder: Encoder | undefined;
}

type EncoderPreset = Omit<EncoderRules, 'dialect' | 'grammar' | 'decoder'>;

interface DialectPreset {
  grammar: Grammar;
  decoder: DecoderOptions;
  strict: boolean;
  joinContinuationLines: boolean;
  unitsOnNumericOnly: boolean;
  encoder: EncoderPreset | null;
}

const PVL_ENCODER: EncoderPreset = {
  indent: 2,
  width: 80,
  newline: '\n',
  endDelimiter: true,
  aggregationEnd: true,
  endKeyword: 'END',
  trailingNewline: false,
  timeZones: 'reject',
  utcSuffix: '',
  leapSeconds: true,
  joinContinuationLines: false,
  odl: false,
  pds: false,
  convertGroupToObject: false,
};

const ODL_ENCODER: EncoderPreset = {
  ...PVL_ENCODER,
  newline: '\r\n',
  endDelimiter: false,
  trailingNewline: true,
  timeZones: 'allow',
  utcSuffix: 'Z',
  leapSeconds: false,
  odl: true,
};

const PRESETS: Record<DialectName, DialectPreset> = {
  pvl: {
    grammar: PVL_GRAMMAR,
    decoder: {},
    strict: true,
    joinContinuationLines: false,
    unitsOnNumericOnly: false,
    encoder: PVL_ENCODER,
  },
  odl: {
    grammar: ODL_GRAMMAR,
    decoder: { foldQuotedStrings: true, numericTimeZones: true },
    strict: true,
    joinContinuationLines: false,
    unitsOnNumericOnly: true,
    encoder: ODL_ENCODER,
  },
  pds3: {
    grammar: ODL_GRAMMAR,
    decoder: { foldQuotedStrings: true, numericTimeZones: true },
    strict: true,
    joinContinuationLines: false,
    unitsOnNumericOnly: true,
    encoder: { ...ODL_ENCODER, timeZones: 'reject', pds: true, convertGroupToObject: true },
  },
  isis: {
    grammar: ISIS_GRAMMAR,
    decoder: { foldQuotedStrings: true, numericTimeZones: true },
    strict: false,
    joinContinuationLines: true,
    unitsOnNumericOnly: false,
    encoder: {
      ...PVL_ENCODER,
      endDelimiter: false,
      endKeyword: 'End',
      joinContinuationLines: true,
    },
  },
  omni: {
    grammar: OMNI_GRAMMAR,
    decoder: { foldQuotedStrings: true, numericTimeZones: true },
    strict: false,
    joinContinuationLines: true,
    unitsOnNumericOnly: false,
    encoder: null,
  },
};

export function isDialectName(name: string): name is DialectName {
  return DIALECT_NAMES.some((known) => known === name);
}

/**
 * Build the decoder, parser and (where the dialect has one) encoder for
 * `name`. Each call returns fresh instances.
 */
export function getDialect(name: DialectName, options: DialectOptions = {}): Dialect {
  const preset = PRESETS[name];
  const decoder = new PrimitiveDecoder(preset.grammar, preset.decoder);
  const parser = new Parser(decoder, {
    strict: options.strict ?? preset.strict,
    joinContinuationLines: preset.joinContinuationLines,
    unitsOnNumericOnly: preset.unitsOnNumericOnly,
    dialect: name,
  });
  const encoder =
    preset.encoder === null
      ? undefined
      : new Encoder({ ...preset.encoder, ...options.layout, dialect: name, grammar: preset.grammar, decoder });

  return { name, grammar: preset.grammar, decoder, parser, encoder };
}

/**
 * The dialect's encoder.
 * @throws EncodeError for decode-only dialects.
 */
export function requireEncoder(dialect: Dialect): Encoder {
  if (dialect.encoder === undefined) {
    throw new EncodeError(
      `The ${dialect.name} dialect only decodes; encode with one of ${ENCODABLE_DIALECTS.join(', ')}`,
      dialect.name,
    );
  }
  return dialect.encoder;
}
