/**
 * Runtime configuration, read from the environment (and .env when present).
 */

import 'dotenv/config';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

const EnvSchema = z.object({
  YOUTUBE_API_KEY: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT: z.enum(['json', 'pretty']).default('json'),
  COMMENT_LIMIT: z.coerce.number().int().min(1).max(100).default(100),
  BATCH_CONCURRENCY: z.coerce.number().int().min(1).default(4),
  HISTORY_LIMIT: z.coerce.number().int().min(1).default(50),
});

export interface AppConfig {
  youtube: {
    apiKey?: string;
    commentLimit: number;
  };
  logging: {
    level: 'debug' | 'info' | 'warn' | 'error';
    format: 'json' | 'pretty';
  };
  batch: {
    concurrency: number;
  };
  history: {
    limit: number;
  };
}

/**
 * Build a config from an environment map. Throws ConfigurationError on bad values.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid environment configuration', parsed.error.flatten().fieldErrors);
  }

  const e = parsed.data;
  return Object.freeze({
    youtube: { apiKey: e.YOUTUBE_API_KEY, commentLimit: e.COMMENT_LIMIT },
    logging: { level: e.LOG_LEVEL, format: e.LOG_FORMAT },
    batch: { concurrency: e.BATCH_CONCURRENCY },
    history: { limit: e.HISTORY_LIMIT },
  });
}

export const CONFIG: AppConfig = loadConfig();
