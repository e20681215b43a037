/**
 * Scraper Module
 *
 * HTTP access, robots policy and the two page extractors
 */

export { PoliteHttpClient, type PageFetcher, type PoliteHttpClientOptions } from './http-client.js';

export { buildRobotsGate, RobotsGate, parseRobotsTxt, isPathAllowed } from './robots.js';

export { extractListing, type ListingExtractionOptions } from './listing.js';

export {
  extractDetail,
  DEFAULT_MIN_CONTENT_LENGTH,
  type DetailExtractionOptions,
  type DetailExtractionResult,
} from './detail.js';

export { isLikelyArticleUrl, resolveUrl } from './urls.js';

export {
  FetchError,
  RobotsDisallowedError,
  MissingTitleError,
  MissingContentContainerError,
  ContentTooShortError,
  type DetailExtractionError,
} from './errors.js';
