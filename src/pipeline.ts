/**
 * Scrape Pipeline
 *
 * One run, strictly sequential:
 * 1. Load the robots policy
 * 2. For each category listing: gate, fetch, extract candidates
 * 3. For each candidate: gate, fetch, extract, reconcile, commit
 *
 * Per-item and per-category failures are counted and skipped; only a
 * storage lookup failure ends the run early.
 */

import { config } from './config/index.js';
import { PgArticleRepository } from './db/queries.js';
import { PersistenceError } from './db/errors.js';
import type { ArticleRepository } from './db/repository.js';
import {
  PoliteHttpClient,
  buildRobotsGate,
  extractListing,
  extractDetail,
  RobotsDisallowedError,
  type PageFetcher,
  type RobotsGate,
} from './scraper/index.js';
import { reconcile, commitDecision } from './reconcile/index.js';
import { logger } from './utils/logger.js';
import type { CategoryListing, ListingCandidate, RunSummary } from './types/index.js';

/**
 * Pipeline options
 */
export interface ScrapeRunOptions {
  fetcher: PageFetcher;
  repository: ArticleRepository;
  /** Processed in this order */
  listings: readonly CategoryListing[];
  robotsUrl: string;
  userAgent: string;
  baseUrl: string;
  articlePathPrefix: string;
  maxArticles: number;
  minContentLength: number;
  now?: () => Date;
}

interface RunContext {
  options: ScrapeRunOptions;
  gate: RobotsGate;
  summary: RunSummary;
  now: () => Date;
}

/**
 * Run the scrape → extract → reconcile pipeline once
 */
export async function runScrape(options: ScrapeRunOptions): Promise<RunSummary> {
  const startTime = Date.now();
  const summary: RunSummary = {
    scanned: 0,
    inserted: 0,
    updated: 0,
    unchanged: 0,
    skipped: 0,
    errors: 0,
    durationMs: 0,
  };

  logger.info({ categories: options.listings.map((l) => l.category) }, 'Starting scrape run');

  let gate: RobotsGate;
  try {
    gate = await buildRobotsGate(options.fetcher, {
      robotsUrl: options.robotsUrl,
      userAgent: options.userAgent,
    });
  } catch (error) {
    logger.error({ error, robotsUrl: options.robotsUrl }, 'Robots policy unavailable, not crawling');
    summary.errors++;
    return finish(summary, startTime);
  }

  const context: RunContext = {
    options,
    gate,
    summary,
    now: options.now ?? (() => new Date()),
  };

  for (const listing of options.listings) {
    const candidates = await scrapeListing(context, listing);
    if (!candidates) {
      continue;
    }

    for (const candidate of candidates) {
      await processCandidate(context, listing, candidate);
    }
  }

  return finish(summary, startTime);
}

/**
 * Fetch one category listing; null when the category has to be skipped
 */
async function scrapeListing(
  { options, gate, summary }: RunContext,
  { category, listingUrl }: CategoryListing
): Promise<ListingCandidate[] | null> {
  if (!gate.allows(listingUrl)) {
    logger.error({ error: new RobotsDisallowedError(listingUrl), category }, 'Listing blocked by robots policy');
    summary.errors++;
    return null;
  }

  try {
    const html = await options.fetcher.fetch(listingUrl);
    const candidates = extractListing(html, {
      baseUrl: options.baseUrl,
      articlePathPrefix: options.articlePathPrefix,
      maxArticles: options.maxArticles,
    });

    if (candidates.length === 0) {
      logger.warn({ category, listingUrl }, 'No article links found on listing');
    } else {
      logger.info({ category, count: candidates.length }, 'Found articles on listing');
    }
    return candidates;
  } catch (error) {
    logger.error({ error, category, listingUrl }, 'Listing failed, skipping category');
    summary.errors++;
    return null;
  }
}

async function processCandidate(
  { options, gate, summary, now }: RunContext,
  { category }: CategoryListing,
  candidate: ListingCandidate
): Promise<void> {
  const url = candidate.originUrl;

  if (!gate.allows(url)) {
    logger.debug({ url }, 'Article blocked by robots policy, skipping');
    return;
  }

  let html: string;
  try {
    html = await options.fetcher.fetch(url);
  } catch (error) {
    logger.error({ error, url }, 'Failed to fetch article');
    summary.errors++;
    return;
  }

  const result = extractDetail(html, {
    url,
    category,
    imageHint: candidate.imageUrl,
    minContentLength: options.minContentLength,
  });

  if (!result.success) {
    const { error } = result;
    switch (error.kind) {
      case 'content_too_short':
        logger.info({ url, length: error.length }, 'Not an article, skipping');
        summary.skipped++;
        return;
      case 'missing_title':
      case 'missing_content_container':
        logger.warn({ url, reason: error.kind }, 'Article extraction failed, skipping');
        summary.errors++;
        return;
    }
  }

  summary.scanned++;

  const existing = await options.repository.findByUrl(url);
  const decision = reconcile(existing, result.item, now());

  try {
    const outcome = await commitDecision(options.repository, decision);
    summary[outcome]++;
    logger.debug({ url, outcome }, 'Article reconciled');
  } catch (error) {
    if (!(error instanceof PersistenceError)) {
      throw error;
    }
    logger.error({ error, url }, 'Failed to store article');
    summary.errors++;
  }
}

function finish(summary: RunSummary, startTime: number): RunSummary {
  summary.durationMs = Date.now() - startTime;
  logger.info({ result: summary }, 'Scrape run complete');
  return summary;
}

/**
 * Run the pipeline with the environment's configuration against the
 * PostgreSQL store. The database must already be initialized.
 */
export async function runConfiguredScrape(): Promise<RunSummary> {
  const client = new PoliteHttpClient({
    userAgent: config.scraper.userAgent,
    timeoutMs: config.scraper.timeoutMs,
    delayMs: config.scraper.delayMs,
    retry: config.retry,
  });

  try {
    return await runScrape({
      fetcher: client,
      repository: new PgArticleRepository(),
      listings: config.scraper.listings,
      robotsUrl: config.scraper.robotsUrl,
      userAgent: config.scraper.userAgent,
      baseUrl: config.scraper.baseUrl,
      articlePathPrefix: config.scraper.articlePathPrefix,
      maxArticles: config.scraper.maxArticlesPerRun,
      minContentLength: config.scraper.minContentLength,
    });
  } finally {
    await client.close();
  }
}
