/**
 * Hockey News Scraper
 *
 * Harvests the newest articles from the hockeyslovakia.sk category
 * listings, extracts them and reconciles them into PostgreSQL.
 *
 * Usage:
 *   node dist/src/index.js --service  - Run on the cron schedule (default)
 *   node dist/src/index.js --run      - Run one scrape and exit
 *   node dist/src/index.js --api      - Serve the read-only article API
 */

import type { Server } from 'node:http';
import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { initDatabase, closeDatabase } from './db/index.js';
import { PgArticleRepository } from './db/queries.js';
import { runConfiguredScrape } from './pipeline.js';
import { executeScheduledRun, startScheduler, stopScheduler } from './scheduler.js';
import { createApp } from './api/server.js';

// Parse command line arguments
const args = process.argv.slice(2);
const isRunOnce = args.includes('--run');
const isApi = args.includes('--api');
const mode = isRunOnce ? 'run-once' : isApi ? 'api' : 'service';

async function runOnce(): Promise<void> {
  const result = await runConfiguredScrape();

  logger.info('');
  logger.info('Scrape Complete:');
  logger.info(`  ✓ Scanned:   ${result.scanned} articles`);
  logger.info(`  ✓ Inserted:  ${result.inserted} articles`);
  logger.info(`  ✓ Updated:   ${result.updated} articles`);
  logger.info(`  ✓ Unchanged: ${result.unchanged} articles`);
  logger.info(`  ✓ Skipped:   ${result.skipped} pages`);
  if (result.errors > 0) {
    logger.info(`  ⚠ Errors:    ${result.errors}`);
  }
  logger.info(`  ⏱ Duration:  ${(result.durationMs / 1000).toFixed(1)}s`);
}

function startApi(): Server {
  const app = createApp({
    reader: new PgArticleRepository(),
    appName: config.app.name,
    corsOrigins: config.api.corsOrigins,
  });

  return app.listen(config.api.port, () => {
    logger.info({ port: config.api.port }, 'API listening');
  });
}

async function main(): Promise<void> {
  logger.info({ app: config.app.name, env: config.app.env, mode }, 'Starting application');

  try {
    await initDatabase();
  } catch (error) {
    logger.fatal({ error }, 'Failed to initialize database');
    process.exit(1);
  }

  let server: Server | null = null;

  // Graceful shutdown handler
  const shutdown = async (): Promise<void> => {
    logger.info('Shutting down...');
    stopScheduler();
    server?.close();
    await closeDatabase();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      logger.error({ error }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  if (isRunOnce) {
    try {
      await runOnce();
    } catch (error) {
      logger.fatal({ error }, 'Scrape failed');
      await closeDatabase();
      process.exit(1);
    }
    await closeDatabase();
    return;
  }

  if (isApi) {
    server = startApi();
    return;
  }

  // Service mode: run once immediately, then on schedule
  await executeScheduledRun(runConfiguredScrape);
  startScheduler({ run: runConfiguredScrape });
  logger.info('Scheduler running. Press Ctrl+C to stop.');
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Application failed');
  process.exit(1);
});
