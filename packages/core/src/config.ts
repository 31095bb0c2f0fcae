// ============================================================================
// @pvlkit/core - Configuration
// ============================================================================
//
// Defaults come from the environment and per-call options; both are
// validated with zod and rejected with a PvlConfigError listing every issue.
//
//   PVL_DIALECT         dialect used by decode()   (default: omni)
//   PVL_ENCODE_DIALECT  dialect used by encode()   (default: pvl)
//   PVL_STRICT          true|false, overrides the dialect's strictness
//   PVL_DEBUG           log level, read by the logger
//
// ============================================================================

import process from 'node:process';
import { z } from 'zod';
import { DIALECT_NAMES, ENCODABLE_DIALECTS } from './dialects.js';
import type { DialectName } from './dialects.js';
import { PvlConfigError } from './errors.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  PVL_DIALECT: z.enum(DIALECT_NAMES).optional().default('omni'),
  PVL_ENCODE_DIALECT: z.enum(ENCODABLE_DIALECTS).optional().default('pvl'),
  PVL_STRICT: booleanFlag.optional(),
});

export const decodeOptionsSchema = z
  .object({
    dialect: z.enum(DIALECT_NAMES).optional(),
    strict: z.boolean().optional(),
  })
  .strict();

export const encodeOptionsSchema = z
  .object({
    dialect: z.enum(ENCODABLE_DIALECTS).optional(),
    indent: z.number().int().min(0).max(16).optional(),
    width: z.number().int().min(20).max(10_000).optional(),
    newline: z.enum(['\n', '\r\n']).optional(),
    endDelimiter: z.boolean().optional(),
    aggregationEnd: z.boolean().optional(),
    trailingNewline: z.boolean().optional(),
    convertGroupToObject: z.boolean().optional(),
  })
  .strict();

export type DecodeOptions = z.input<typeof decodeOptionsSchema>;
export type EncodeOptions = z.input<typeof encodeOptionsSchema>;

export interface PvlConfig {
  decodeDialect: DialectName;
  encodeDialect: DialectName;
  /** Undefined means each dialect keeps its own default. */
  strict: boolean | undefined;
}

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Parse `value` with `schema`, turning validation failures into a
 * PvlConfigError.
 */
export function validate<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = issuesOf(result.error);
    throw new PvlConfigError(`Invalid ${what}`, issues);
  }
  return result.data;
}

/**
 * Read pvlkit settings from `env`.
 * @throws PvlConfigError when a variable holds an unknown value.
 */
export function resolveConfig(env: NodeJS.ProcessEnv = process.env): PvlConfig {
  const parsed = validate(
    envSchema,
    {
      PVL_DIALECT: env.PVL_DIALECT,
      PVL_ENCODE_DIALECT: env.PVL_ENCODE_DIALECT,
      PVL_STRICT: env.PVL_STRICT,
    },
    'environment',
  );
  return {
    decodeDialect: parsed.PVL_DIALECT,
    encodeDialect: parsed.PVL_ENCODE_DIALECT,
    strict: parsed.PVL_STRICT,
  };
}
