/**
 * Article detail extractor
 *
 * Pulls title, byline, image and body text out of one article page.
 * Pages that fail the checks come back as a tagged failure rather than a
 * thrown error so the run loop can decide what to do with each kind.
 */

import { load, type CheerioAPI, type Cheerio } from 'cheerio';
import { isTag, isText, type AnyNode, type Element } from 'domhandler';
import {
  ContentTooShortError,
  MissingContentContainerError,
  MissingTitleError,
  type DetailExtractionError,
} from './errors.js';
import { firstMatch, selectorStrategies, type Strategy } from './strategies.js';
import { resolveUrl } from './urls.js';
import { cleanText } from '../utils/text.js';
import type { Category, ScrapedItem } from '../types/index.js';

export const DEFAULT_MIN_CONTENT_LENGTH = 150;

/** Most specific class combination first */
const CONTENT_SELECTORS = [
  '.col-md-8.col-lg-9.col-content',
  '[class*="col-content"]',
  '.article-content',
  'article',
] as const;

const META_SELECTORS = ['.article-meta.clearfix', '.article-meta'] as const;

const GALLERY_SELECTORS = ['.document-gallery.margin-bottom-30', '.document-gallery'] as const;

/** Lazy-load attributes in priority order */
const IMAGE_ATTRIBUTES = ['src', 'data-src', 'data-original', 'data-lazy-src'] as const;

const BODY_NODES = 'p, h2, h3, li';

const INVISIBLE_TAGS = new Set(['script', 'style', 'noscript', 'template']);

export interface DetailExtractionOptions {
  url: string;
  category: Category;
  /** Listing thumbnail, used when the page itself has no image */
  imageHint?: string | null;
  minContentLength?: number;
}

export type DetailExtractionResult =
  | { success: true; item: ScrapedItem }
  | { success: false; error: DetailExtractionError };

export function extractDetail(html: string, options: DetailExtractionOptions): DetailExtractionResult {
  const { url, category, imageHint = null, minContentLength = DEFAULT_MIN_CONTENT_LENGTH } = options;
  const $ = load(html);

  const title = inlineText($('h1').first().toArray());
  if (!title) {
    return { success: false, error: new MissingTitleError(url) };
  }

  const content = findFirst($, CONTENT_SELECTORS);
  if (!content) {
    return { success: false, error: new MissingContentContainerError(url) };
  }

  const contentText = extractBody($, content);
  if (contentText.length < minContentLength) {
    return {
      success: false,
      error: new ContentTooShortError(url, contentText.length, minContentLength),
    };
  }

  const meta = findFirst($, META_SELECTORS);
  const metaText = meta ? inlineText(meta.toArray()) : '';

  return {
    success: true,
    item: {
      originUrl: url,
      category,
      title,
      metaText: metaText || null,
      imageUrl: extractImage($, content, url) ?? imageHint,
      contentText,
    },
  };
}

/**
 * Body text: paragraphs, sub-headings and list items in document order,
 * or the whole container's text when it has none of those.
 */
function extractBody($: CheerioAPI, content: Cheerio<Element>): string {
  const parts = content
    .find(BODY_NODES)
    .toArray()
    .map((node) => inlineText([node]))
    .filter((text) => text.length > 0);

  if (parts.length > 0) {
    return cleanText(parts.join('\n'));
  }

  return cleanText(visibleText(content.toArray(), '\n'));
}

interface ImageInput {
  $: CheerioAPI;
  content: Cheerio<Element>;
  baseUrl: string;
}

const IMAGE_STRATEGIES: ReadonlyArray<Strategy<ImageInput, string>> = [
  {
    name: 'gallery-hero',
    run: ({ $, baseUrl }) => {
      const hero = findFirst($, GALLERY_SELECTORS)?.find('img').first();
      return hero && hero.length > 0 ? imageSource(hero, baseUrl) : null;
    },
  },
  {
    name: 'gallery-any',
    run: ({ $, baseUrl }) => firstImageSource($, findFirst($, GALLERY_SELECTORS), baseUrl),
  },
  {
    name: 'content-any',
    run: ({ $, content, baseUrl }) => firstImageSource($, content, baseUrl),
  },
];

function extractImage($: CheerioAPI, content: Cheerio<Element>, baseUrl: string): string | null {
  return firstMatch(IMAGE_STRATEGIES, { $, content, baseUrl })?.value ?? null;
}

function firstImageSource(
  $: CheerioAPI,
  container: Cheerio<Element> | null,
  baseUrl: string
): string | null {
  for (const img of container?.find('img').toArray() ?? []) {
    const source = imageSource($(img), baseUrl);
    if (source) {
      return source;
    }
  }
  return null;
}

/**
 * First usable lazy-load attribute of an <img>, resolved; inline data:
 * placeholders don't count.
 */
function imageSource(img: Cheerio<Element>, baseUrl: string): string | null {
  for (const attribute of IMAGE_ATTRIBUTES) {
    const value = img.attr(attribute);
    const resolved = value ? resolveUrl(value, baseUrl) : null;
    if (resolved) {
      return resolved;
    }
  }
  return null;
}

function findFirst($: CheerioAPI, selectors: readonly string[]): Cheerio<Element> | null {
  const strategies = selectorStrategies(selectors, (doc: CheerioAPI, selector) => {
    const found = doc<Element, string>(selector).first();
    return found.length > 0 ? found : null;
  });
  return firstMatch(strategies, $)?.value ?? null;
}

/**
 * Text nodes under `nodes`, each trimmed, empty ones dropped, joined by
 * `separator`. Script and style contents are not visible text.
 */
export function visibleText(nodes: AnyNode[], separator: string): string {
  const pieces: string[] = [];

  const walk = (node: AnyNode): void => {
    if (isText(node)) {
      const text = node.data.trim();
      if (text) {
        pieces.push(text);
      }
    } else if (isTag(node) && !INVISIBLE_TAGS.has(node.name)) {
      node.children.forEach(walk);
    }
  };

  nodes.forEach(walk);
  return pieces.join(separator);
}

/**
 * Visible text on a single line
 */
function inlineText(nodes: AnyNode[]): string {
  return visibleText(nodes, ' ').replace(/\s+/g, ' ').trim();
}
