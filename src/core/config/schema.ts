/**
 * Configuration schema for `.optbind/config.yaml`.
 */
import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * This helper makes the field optional and applies schema defaults when undefined.
 * Note: Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Token classification settings handed to the resolution engine. */
export const EngineConfigSchema = z.object({
  /** Token that ends option matching; null disables it */
  terminator: z.string().min(1).nullable().default('--'),
  /** Accept `--name=value` */
  inline_values: z.boolean().default(true),
  /** Prefixes that make an unknown token option-like */
  option_prefixes: z.array(z.string().min(1)).min(1).default(['-']),
});

export const OutputFormatSchema = z.enum(['human', 'json']);

export const OutputSettingsSchema = z.object({
  format: OutputFormatSchema.default('human'),
});

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  engine: withDefaults(EngineConfigSchema),
  output: withDefaults(OutputSettingsSchema),
  log_level: LogLevelSchema.default('info'),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
