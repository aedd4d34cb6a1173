import { ConversionError } from '@bookpack/shared';
import { z } from 'zod/v4';

/**
 * External package compiler invocation. `{sources}` and `{output}` in `args`
 * are replaced with the sources directory and the compiled output path; a
 * relative `output` resolves against the package directory.
 */
const compileOptionsSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default(['{sources}', '{output}']),
  output: z.string().min(1),
  timeoutMs: z.number().int().positive().optional(),
});

const cacheOptionsSchema = z.object({
  path: z.string().min(1).optional(),
  write: z.boolean().default(true),
  fallbackOnFailure: z.boolean().default(false),
});

/**
 * Options for one conversion run, validated and defaulted in one place
 */
export const conversionOptionsSchema = z.object({
  packageId: z
    .string()
    .regex(
      /^[a-z0-9][a-z0-9-]*$/,
      'packageId must be lowercase letters, digits and dashes',
    ),
  title: z.string().min(1).optional(),
  pages: z.string().min(1).optional(),
  workers: z.number().int().min(1).max(32).default(1),
  tableMode: z.enum(['structured', 'auto', 'image-only']).default('auto'),
  tableConfidenceThreshold: z.number().min(0).max(1).default(0.6),
  lowConfidenceRasterThreshold: z.number().min(0).max(1).default(0.3),
  ocrMode: z.enum(['auto', 'on', 'off']).default('off'),
  textCoverageThreshold: z.number().min(0).max(1).default(0.05),
  captions: z.boolean().default(false),
  deterministicIds: z.boolean().default(true),
  generateToc: z.boolean().default(true),
  tocTitle: z.string().min(1).default('Table of Contents'),
  cache: cacheOptionsSchema.default({ write: true, fallbackOnFailure: false }),
  cacheCapacity: z.number().int().positive().default(2000),
  operationTimeoutMs: z.number().int().positive().optional(),
  compile: compileOptionsSchema.optional(),
});

export type ConversionOptions = z.output<typeof conversionOptionsSchema>;

export type ConversionOptionsInput = z.input<typeof conversionOptionsSchema>;

export type CompileOptions = z.output<typeof compileOptionsSchema>;

/**
 * Validate run options, filling defaults
 *
 * @throws {ConversionError} with category 'configuration' on invalid input
 */
export function parseConversionOptions(input: unknown): ConversionOptions {
  const parsed = conversionOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConversionError(
      `Invalid conversion options:\n${z.prettifyError(parsed.error)}`,
      'configuration',
      { cause: parsed.error },
    );
  }
  return parsed.data;
}
