/**
 * URL helpers shared by the extractors
 */

/**
 * Slugs under the article prefix that are static/info pages, not news
 */
const NON_ARTICLE_SLUGS = new Set([
  'kontakty',
  'newsletter',
  'partneri',
  'ochrana-osobnych-udajov',
  'podmienky-pouzivania',
  'pravidla-sutaze',
]);

const MIN_SLUG_LENGTH = 8;

export interface ArticleUrlRules {
  baseUrl: string;
  articlePathPrefix: string;
}

/**
 * Resolve `href` against `baseUrl`, dropping the fragment. Returns null
 * for anything that is not an http(s) URL.
 */
export function resolveUrl(href: string, baseUrl: string): string | null {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith('data:')) {
    return null;
  }

  try {
    const url = new URL(trimmed, baseUrl);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return null;
    }
    url.hash = '';
    return url.toString();
  } catch {
    return null;
  }
}

export function isLikelyArticleUrl(url: string, rules: ArticleUrlRules): boolean {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }

  // Whole origin, scheme included: the robots gate governs only this one
  if (parsed.origin !== new URL(rules.baseUrl).origin) {
    return false;
  }
  if (!parsed.pathname.startsWith(rules.articlePathPrefix)) {
    return false;
  }

  const slug = parsed.pathname.slice(rules.articlePathPrefix.length).split('/')[0] ?? '';
  if (slug.length < MIN_SLUG_LENGTH) {
    return false;
  }

  return !NON_ARTICLE_SLUGS.has(slug.toLowerCase());
}
