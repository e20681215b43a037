/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';
import 'dotenv/config';

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 ' +
  '(KHTML, like Gecko) Chrome/120.0 Safari/537.36';

const envSchema = z.object({
  // Scraping
  SCRAPE_DELAY_SECONDS: z.coerce.number().nonnegative().default(2.5),
  SCRAPE_TIMEOUT_SECONDS: z.coerce.number().positive().default(20),
  SCRAPE_MAX_ARTICLES_PER_RUN: z.coerce.number().int().positive().default(10),
  SCRAPE_MIN_CONTENT_LENGTH: z.coerce.number().int().positive().default(150),
  SCRAPE_USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),

  // Database (required only once storage is opened)
  DATABASE_URL: z.string().min(1).optional(),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // Scheduling
  CRON_SCHEDULE: z.string().default('*/15 * * * *'),
  TZ: z.string().default('Europe/Bratislava'),

  // Read-only API
  APP_NAME: z.string().default('hockeyslovakia-api-scraper'),
  PORT: z.coerce.number().int().positive().default(8000),
  CORS_ORIGINS: z.string().default('*'),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

export function validateEnv(source: Record<string, string | undefined> = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const errors = result.error.format();
    throw new Error(`Environment validation failed:\n${JSON.stringify(errors, null, 2)}`);
  }

  return result.data;
}

export const env = validateEnv();
