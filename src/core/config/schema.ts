/**
 * Configuration schema for `.doctag/config.yaml`.
 */
import { z } from 'zod';

/**
 * Make an object field optional and apply its inner defaults when missing.
 * Both undefined and null are treated as missing.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const NameConventionSchema = z.enum(['lowercase', 'preserve']);

export const MethodSchema = z.enum(['create', 'update', 'validate']);

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const OutputFormatSchema = z.enum(['human', 'json']);

/** Where model files live and how their store names are derived. */
export const ModelSettingsSchema = z.object({
  /** Model file, relative to the project root */
  path: z.string().default('models.yaml'),
  /** Default for models that do not set name_convention */
  name_convention: NameConventionSchema.default('lowercase'),
});

/** Engine defaults applied by the CLI. */
export const EngineSettingsSchema = z.object({
  default_method: MethodSchema.default('validate'),
  /** Fail before processing when a model names an unregistered rule */
  strict_rules: z.boolean().default(false),
});

export const LoggingSettingsSchema = z.object({
  level: LogLevelSchema.default('info'),
});

export const OutputSettingsSchema = z.object({
  format: OutputFormatSchema.default('human'),
  colors: z.boolean().default(true),
});

export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  models: withDefaults(ModelSettingsSchema),
  engine: withDefaults(EngineSettingsSchema),
  logging: withDefaults(LoggingSettingsSchema),
  output: withDefaults(OutputSettingsSchema),
});

export type Config = z.infer<typeof ConfigSchema>;
