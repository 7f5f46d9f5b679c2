import { z } from 'zod';

/**
 * Helper to create an optional object field with schema defaults.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/** Output format for CLI commands. */
export const OutputFormatSchema = z.enum(['human', 'json']);

export const OutputSettingsSchema = z.object({
  format: OutputFormatSchema.default('human'),
});

export const ConfigSchema = z.object({
  /** Descriptor file, relative to the project root. */
  descriptor: z.string().min(1).default('devshell.yaml'),
  /** Source identifier → catalog file, relative to the project root. */
  catalogs: z.record(z.string(), z.string().min(1)).default({}),
  /** Dev shell used when a command is not given one. */
  default_shell: z.string().min(1).default('default'),
  log_level: LogLevelSchema.default('info'),
  output: withDefaults(OutputSettingsSchema),
});

export type Config = z.infer<typeof ConfigSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
