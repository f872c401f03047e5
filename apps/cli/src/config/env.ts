import type { LogLevel } from '@pagescribe/logger';

import { LOG_LEVELS } from '@pagescribe/logger';
import { ConfigurationError } from '@pagescribe/converter';
import { z } from 'zod';

export const DEFAULT_API_BASE = 'https://api.openai.com';
export const DEFAULT_MODEL = 'gpt-4o';
export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

const envSchema = z.object({
  OPENAI_API_KEY: z.string({
    required_error: 'Please set the OPENAI_API_KEY environment variable',
  }),
  OPENAI_API_BASE: z
    .string()
    .url('OPENAI_API_BASE must be a URL')
    .default(DEFAULT_API_BASE),
  OPENAI_DEFAULT_MODEL: z.string().default(DEFAULT_MODEL),
  LOG_LEVEL: z
    .enum(['debug', 'info', 'warn', 'error'], {
      errorMap: () => ({
        message: `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`,
      }),
    })
    .default(DEFAULT_LOG_LEVEL),
});

export interface AppConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  logLevel: LogLevel;
}

/**
 * Drop unset and blank variables so defaults apply to them.
 */
function withoutBlankValues(
  env: Record<string, string | undefined>,
): Record<string, string> {
  const entries: Array<[string, string]> = [];
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      entries.push([key, value.trim()]);
    }
  }
  return Object.fromEntries(entries);
}

/**
 * Read and validate the environment.
 *
 * @throws ConfigurationError naming the first invalid or missing variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const result = envSchema.safeParse(withoutBlankValues(env));

  if (!result.success) {
    throw new ConfigurationError(result.error.issues[0].message, {
      cause: result.error,
    });
  }

  return {
    apiKey: result.data.OPENAI_API_KEY,
    baseUrl: result.data.OPENAI_API_BASE,
    model: result.data.OPENAI_DEFAULT_MODEL,
    logLevel: result.data.LOG_LEVEL,
  };
}
