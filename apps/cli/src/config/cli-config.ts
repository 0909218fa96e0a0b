import { LOG_LEVELS } from '@tocio/logger';
import { z } from 'zod';

/**
 * Defaults applied when the environment leaves a setting unset
 */
export const CLI_DEFAULTS = {
  LOG_LEVEL: 'warn',
  OUTPUT_SUFFIX: '_out',
} as const;

export const logLevelSchema = z.enum([...LOG_LEVELS, 'silent']);

/**
 * Environment variables read by the command
 */
export const envConfigSchema = z.object({
  TOCIO_LOG_LEVEL: logLevelSchema.default(CLI_DEFAULTS.LOG_LEVEL),
  TOCIO_OUTPUT_SUFFIX: z
    .string()
    .min(1, { message: 'Output suffix must not be empty' })
    .default(CLI_DEFAULTS.OUTPUT_SUFFIX),
});

export type EnvConfig = z.infer<typeof envConfigSchema>;

export const titleEncodingModeSchema = z.enum(['auto', 'pdfdoc', 'utf16be'], {
  errorMap: () => ({
    message: 'Encoding must be one of: auto, pdfdoc, utf16be',
  }),
});

/**
 * Command-line options after parsing
 */
export const cliOptionsSchema = z.object({
  input: z.string().min(1, { message: 'Input PDF path is required' }),
  out: z.string().min(1, { message: 'Output path must not be empty' }).optional(),
  toc: z.string().min(1, { message: 'ToC path must not be empty' }).optional(),
  humanReadable: z.boolean().default(false),
  encoding: titleEncodingModeSchema.default('auto'),
  replaceUnsupported: z.boolean().default(false),
  debug: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

/**
 * Read settings from environment variables; empty values count as unset
 *
 * @throws {z.ZodError} When a variable holds an unsupported value
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv): EnvConfig {
  return envConfigSchema.parse({
    TOCIO_LOG_LEVEL: env.TOCIO_LOG_LEVEL || undefined,
    TOCIO_OUTPUT_SUFFIX: env.TOCIO_OUTPUT_SUFFIX || undefined,
  });
}
