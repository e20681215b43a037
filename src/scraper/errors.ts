/**
 * Scraper error taxonomy
 *
 * Each error carries a `kind` so callers can switch on it instead of
 * chaining instanceof checks.
 */

interface FetchErrorOptions extends ErrorOptions {
  status?: number;
}

/**
 * Network failure or HTTP status >= 400 after all retry attempts
 */
export class FetchError extends Error {
  readonly kind = 'fetch' as const;
  readonly url: string;
  readonly status: number | null;

  constructor(url: string, message: string, { status, ...options }: FetchErrorOptions = {}) {
    super(message, options);
    this.name = 'FetchError';
    this.url = url;
    this.status = status ?? null;
  }
}

export class RobotsDisallowedError extends Error {
  readonly kind = 'robots_disallowed' as const;
  readonly url: string;

  constructor(url: string) {
    super(`Robots policy disallows ${url}`);
    this.name = 'RobotsDisallowedError';
    this.url = url;
  }
}

export class MissingTitleError extends Error {
  readonly kind = 'missing_title' as const;
  readonly url: string;

  constructor(url: string) {
    super(`Missing h1 on ${url}`);
    this.name = 'MissingTitleError';
    this.url = url;
  }
}

export class MissingContentContainerError extends Error {
  readonly kind = 'missing_content_container' as const;
  readonly url: string;

  constructor(url: string) {
    super(`Missing content container on ${url}`);
    this.name = 'MissingContentContainerError';
    this.url = url;
  }
}

/**
 * Body text below the article threshold: an info/static page, not news
 */
export class ContentTooShortError extends Error {
  readonly kind = 'content_too_short' as const;
  readonly url: string;
  readonly length: number;
  readonly minLength: number;

  constructor(url: string, length: number, minLength: number) {
    super(`Content too short on ${url} (${length} < ${minLength} characters)`);
    this.name = 'ContentTooShortError';
    this.url = url;
    this.length = length;
    this.minLength = minLength;
  }
}

export type DetailExtractionError =
  | MissingTitleError
  | MissingContentContainerError
  | ContentTooShortError;
