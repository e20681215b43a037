/**
 * Scheduler
 *
 * Runs the scrape pipeline on a cron schedule
 */

import cron, { type ScheduledTask } from 'node-cron';
import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import type { RunSummary } from './types/index.js';

export interface SchedulerOptions {
  cronExpression?: string;
  timezone?: string;
  run: () => Promise<RunSummary>;
}

/**
 * Scheduler state
 */
let scheduledTask: ScheduledTask | null = null;
let isRunning = false;

/**
 * Execute a run with a lock to prevent overlapping runs. A failed run is
 * logged and does not stop later ones.
 */
export async function executeScheduledRun(run: () => Promise<RunSummary>): Promise<RunSummary | null> {
  if (isRunning) {
    logger.warn('Scrape already running, skipping this execution');
    return null;
  }

  isRunning = true;
  const startTime = new Date();

  logger.info({ startTime: startTime.toISOString() }, 'Scheduled scrape starting');

  try {
    const result = await run();

    logger.info(
      {
        startTime: startTime.toISOString(),
        endTime: new Date().toISOString(),
        result,
      },
      'Scheduled scrape completed'
    );
    return result;
  } catch (error) {
    logger.error({ error }, 'Scheduled scrape failed');
    return null;
  } finally {
    isRunning = false;
  }
}

/**
 * Start the scheduler
 */
export function startScheduler(options: SchedulerOptions): void {
  const cronExpression = options.cronExpression ?? config.scheduler.cronExpression;
  const timezone = options.timezone ?? config.scheduler.timezone;

  if (!cron.validate(cronExpression)) {
    throw new Error(`Invalid cron expression: ${cronExpression}`);
  }

  if (scheduledTask) {
    logger.warn('Scheduler already started');
    return;
  }

  logger.info({ cronExpression, timezone }, 'Starting scheduler');

  scheduledTask = cron.schedule(
    cronExpression,
    () => {
      void executeScheduledRun(options.run);
    },
    { timezone }
  );

  logger.info('Scheduler started');
}

/**
 * Stop the scheduler
 */
export function stopScheduler(): void {
  if (scheduledTask) {
    scheduledTask.stop();
    scheduledTask = null;
    logger.info('Scheduler stopped');
  }
}

/**
 * Check if scheduler is running
 */
export function isSchedulerRunning(): boolean {
  return scheduledTask !== null;
}
