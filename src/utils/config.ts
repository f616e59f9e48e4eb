import { z } from 'zod';
import { ConfigurationError } from './errors.js';

/**
 * Runtime configuration, read from the environment and overridable by CLI flags
 */
export const ConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('warn'),
  mode: z.enum(['fail-fast', 'collect-all']).default('fail-fast'),
  outputFormat: z.enum(['text', 'json']).default('text'),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Build the configuration from environment variables
 * (`LOG_LEVEL`, `VALIDATION_MODE`, `OUTPUT_FORMAT`), with explicit
 * overrides taking precedence.
 *
 * @throws {ConfigurationError} If any value is outside its allowed set
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<Record<keyof Config, string | undefined>> = {}
): Config {
  const parsed = ConfigSchema.safeParse({
    logLevel: overrides.logLevel ?? emptyToUndefined(env.LOG_LEVEL),
    mode: overrides.mode ?? emptyToUndefined(env.VALIDATION_MODE),
    outputFormat: overrides.outputFormat ?? emptyToUndefined(env.OUTPUT_FORMAT),
  });

  if (!parsed.success) {
    throw ConfigurationError.fromZodError(parsed.error);
  }
  return parsed.data;
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}
