/**
 * PCR Configuration Zod Schema
 *
 * Runtime validation for pcr.config.yaml. Every section is optional and
 * falls back to its defaults, so an empty file is a valid config.
 *
 * @example
 * ```typescript
 * const result = validatePcrConfig(parseYaml(text));
 * if (!result.success) {
 *   console.error('Invalid PCR config:', result.error.issues);
 * }
 * ```
 */

import { z } from 'zod';

const displaySchema = z
  .object({
    decimals: z.number().int().min(0).max(6).default(2),
  })
  .default({});

const chartSchema = z
  .object({
    width: z.number().int().min(10).max(200).default(60),
    height: z.number().int().min(4).max(50).default(12),
  })
  .default({});

const sentimentSchema = z
  .object({
    bullish_below: z.number().positive().default(1.0),
    bearish_above: z.number().positive().default(1.0),
  })
  .refine((data) => data.bullish_below <= data.bearish_above, {
    message: 'bullish_below must be <= bearish_above',
  })
  .default({});

export const pcrConfigSchema = z.object({
  display: displaySchema,
  chart: chartSchema,
  sentiment: sentimentSchema,
});

export type PcrConfig = z.infer<typeof pcrConfigSchema>;

export function validatePcrConfig(raw: unknown) {
  // An empty YAML document parses to null
  return pcrConfigSchema.safeParse(raw ?? {});
}

export function assertValidPcrConfig(raw: unknown): PcrConfig {
  const result = validatePcrConfig(raw);
  if (!result.success) {
    const errors = result.error.issues
      .map((i) => `  ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new Error(`Invalid PCR config:\n${errors}`);
  }
  return result.data;
}

export const DEFAULT_CONFIG: PcrConfig = pcrConfigSchema.parse({});
