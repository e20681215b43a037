/**
 * Listing page extractor
 *
 * Turns a category listing into an ordered, deduplicated and capped list
 * of article candidates. The site lists newest first; document order is
 * kept as-is.
 */

import { load, type CheerioAPI, type Cheerio } from 'cheerio';
import type { AnyNode } from 'domhandler';
import { firstMatch, type Strategy } from './strategies.js';
import { isLikelyArticleUrl, resolveUrl, type ArticleUrlRules } from './urls.js';
import { logger } from '../utils/logger.js';
import type { ListingCandidate } from '../types/index.js';

export interface ListingExtractionOptions extends ArticleUrlRules {
  maxArticles: number;
}

/**
 * Containers that hold one article tile on listing pages
 */
const TILE_SELECTOR = [
  '.article-item',
  '.articles-list .item',
  '.news-item',
  '[class*="article-box"]',
  'article',
].join(', ');

const BACKGROUND_IMAGE_PATTERN = /background(?:-image)?\s*:[^;]*url\(\s*(['"]?)(.*?)\1\s*\)/i;

interface ListingInput {
  $: CheerioAPI;
  options: ListingExtractionOptions;
}

const LISTING_STRATEGIES: ReadonlyArray<Strategy<ListingInput, ListingCandidate[]>> = [
  {
    // Anchors inside article tiles, skipping navigation and footer links
    name: 'tiles',
    run: ({ $, options }) => nonEmpty(collectCandidates($, options, { requireTile: true })),
  },
  {
    // Any anchor shaped like an article URL
    name: 'article-path',
    run: ({ $, options }) => nonEmpty(collectCandidates($, options, { requireTile: false })),
  },
];

export function extractListing(html: string, options: ListingExtractionOptions): ListingCandidate[] {
  const $ = load(html);
  const match = firstMatch(LISTING_STRATEGIES, { $, options });
  if (!match) {
    return [];
  }

  const candidates = dedupeCandidates(match.value).slice(0, Math.max(0, options.maxArticles));
  logger.debug({ strategy: match.strategy, count: candidates.length }, 'Listing links extracted');
  return candidates;
}

/**
 * Walk anchors in document order, keeping those shaped like article URLs
 */
function collectCandidates(
  $: CheerioAPI,
  options: ListingExtractionOptions,
  { requireTile }: { requireTile: boolean }
): ListingCandidate[] {
  const candidates: ListingCandidate[] = [];

  for (const element of $('a[href]').toArray()) {
    const anchor = $(element);
    const closestTile = anchor.closest(TILE_SELECTOR);
    const tile = closestTile.length > 0 ? closestTile : null;
    if (requireTile && !tile) {
      continue;
    }

    const originUrl = resolveUrl(anchor.attr('href') ?? '', options.baseUrl);
    if (!originUrl || !isLikelyArticleUrl(originUrl, options)) {
      continue;
    }

    candidates.push({
      originUrl,
      imageUrl: findBackgroundImage($, tile ? [anchor, tile] : [anchor], options.baseUrl),
    });
  }

  return candidates;
}

/**
 * Lazy-loaded thumbnails are set as an inline background-image on the
 * anchor, one of its children, or the tile.
 */
function findBackgroundImage(
  $: CheerioAPI,
  scopes: Array<Cheerio<AnyNode>>,
  baseUrl: string
): string | null {
  for (const scope of scopes) {
    const styled = [...scope.toArray(), ...scope.find('[style]').toArray()];
    for (const element of styled) {
      const match = BACKGROUND_IMAGE_PATTERN.exec($(element).attr('style') ?? '');
      const resolved = match?.[2] ? resolveUrl(match[2], baseUrl) : null;
      if (resolved) {
        return resolved;
      }
    }
  }
  return null;
}

/**
 * Keep the first occurrence of each URL; a later duplicate may still
 * supply the thumbnail the first one lacked.
 */
function dedupeCandidates(candidates: ListingCandidate[]): ListingCandidate[] {
  const byUrl = new Map<string, ListingCandidate>();

  for (const candidate of candidates) {
    const seen = byUrl.get(candidate.originUrl);
    if (!seen) {
      byUrl.set(candidate.originUrl, { ...candidate });
    } else if (!seen.imageUrl && candidate.imageUrl) {
      seen.imageUrl = candidate.imageUrl;
    }
  }

  return [...byUrl.values()];
}

function nonEmpty<T>(items: T[]): T[] | null {
  return items.length > 0 ? items : null;
}
