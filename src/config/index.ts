/**
 * Application configuration
 */

import { env } from './env.js';
import type { CategoryListing } from '../types/index.js';

const BASE_URL = 'https://www.hockeyslovakia.sk';

/**
 * Category listings scraped on every run, in processing order
 */
export const LISTINGS: readonly CategoryListing[] = [
  { category: 'extraliga', listingUrl: `${BASE_URL}/sk/articles/extraliga` },
  { category: 'reprezentacia', listingUrl: `${BASE_URL}/sk/articles/reprezentacia` },
];

export const config = {
  app: {
    name: env.APP_NAME,
    version: '1.0.0',
    env: env.NODE_ENV,
  },

  scraper: {
    baseUrl: BASE_URL,
    robotsUrl: `${BASE_URL}/robots.txt`,
    articlePathPrefix: '/sk/article/',
    listings: LISTINGS,
    delayMs: Math.round(env.SCRAPE_DELAY_SECONDS * 1000),
    timeoutMs: Math.round(env.SCRAPE_TIMEOUT_SECONDS * 1000),
    maxArticlesPerRun: env.SCRAPE_MAX_ARTICLES_PER_RUN,
    minContentLength: env.SCRAPE_MIN_CONTENT_LENGTH,
    userAgent: env.SCRAPE_USER_AGENT,
  },

  database: {
    url: env.DATABASE_URL,
  },

  logging: {
    level: env.LOG_LEVEL,
  },

  scheduler: {
    cronExpression: env.CRON_SCHEDULE,
    timezone: env.TZ,
  },

  api: {
    port: env.PORT,
    corsOrigins: env.CORS_ORIGINS,
  },

  retry: {
    maxAttempts: 3,
    initialDelayMs: 1000,
    maxDelayMs: 8000,
    factor: 2,
  },
} as const;

export type Config = typeof config;
export { env, validateEnv } from './env.js';
