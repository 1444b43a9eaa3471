import { z } from 'zod';

import { ConfigError } from './errors.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const LOG_FORMATS = ['pretty', 'json'] as const;
export type LogFormat = (typeof LOG_FORMATS)[number];

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('production'),
  EXIFSWEEP_ROOT: z.string().min(1).default('/photos'),
  EXIFSWEEP_STATE: z.string().min(1).optional(),
  EXIFSWEEP_ON_DUPLICATE: z.enum(['delete', 'move']).default('delete'),
  EXIFSWEEP_STABLE_SECONDS: z
    .string()
    .default('120')
    .transform(value => Number(value))
    .pipe(
      z
        .number()
        .int()
        .min(0)
        .describe('EXIFSWEEP_STABLE_SECONDS must be a non-negative integer')
    ),
  EXIFSWEEP_ENGINE: z.enum(['exiftool', 'builtin']).default('exiftool'),
  EXIFTOOL_PATH: z.string().min(1).default('exiftool'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  LOG_FORMAT: z.enum(LOG_FORMATS).optional(),
  ALLOW_ROOT: z
    .string()
    .default('0')
    .transform(value => value === '1'),
});

export type AppConfig = z.infer<typeof envSchema>;

/**
 * Validate an environment map. Blank values count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const parseResult = envSchema.safeParse(present);

  if (!parseResult.success) {
    const formatted = parseResult.error.flatten();
    const errors = Object.entries(formatted.fieldErrors)
      .map(([field, messages]) => `${field}: ${messages?.join(', ')}`)
      .join('\n');

    throw new ConfigError(`Environment validation failed:\n${errors}`);
  }

  return parseResult.data;
}
