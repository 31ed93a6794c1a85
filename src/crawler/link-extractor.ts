/**
 * Link Extractor
 * Extracts links, images, the title and full-data page metadata from HTML
 * content for crawling
 */

import * as cheerio from 'cheerio';
import { isDomainMatch } from '../utils/canonicalize.js';
import type { ContentMetrics, PageImage, PageSeo } from '../types/index.js';
import { IMAGE_EXCLUDE_PATTERNS, matchesAny } from './url-patterns.js';

const BACKGROUND_URL = /url\(["']?([^"')\s]+)["']?\)/;
const IMAGE_SOURCE_ATTRIBUTES = ['src', 'data-src', 'data-lazy-src', 'data-original'] as const;

export interface ImageFilterOptions {
  minWidth?: number;
  minHeight?: number;
  excludePatterns?: readonly RegExp[];
}

function resolve(href: string, baseUrl: string): URL | null {
  try {
    return new URL(href, baseUrl);
  } catch {
    return null;
  }
}

/**
 * Extracts all http(s) links from HTML content
 * @param baseUrl - Base URL for resolving relative links
 * @returns Unique absolute URLs without fragments, in document order
 */
export function extractLinks(html: string, baseUrl: string): string[] {
  const $ = cheerio.load(html);
  const links: string[] = [];

  for (const el of $('a[href]').toArray()) {
    const href = ($(el).attr('href') ?? '').trim();

    // Skip anchors, javascript, mailto, tel links
    if (!href || /^(#|javascript:|mailto:|tel:|data:)/i.test(href)) {
      continue;
    }

    const absolute = resolve(href, baseUrl);
    if (!absolute || (absolute.protocol !== 'http:' && absolute.protocol !== 'https:')) {
      continue;
    }

    absolute.hash = '';
    links.push(absolute.href);
  }

  return [...new Set(links)];
}

/**
 * Declared dimension below the minimum; undeclared or non-numeric sizes pass
 */
function tooSmall(value: string | undefined, minimum: number): boolean {
  if (!value || minimum <= 0) {
    return false;
  }
  const size = parseInt(value, 10);
  return Number.isFinite(size) && size > 0 && size < minimum;
}

/**
 * Extracts `img` elements and inline background images, deduplicated per page
 */
export function extractImages(html: string, pageUrl: string, options: ImageFilterOptions = {}): PageImage[] {
  const $ = cheerio.load(html);
  const minWidth = options.minWidth ?? 50;
  const minHeight = options.minHeight ?? 50;
  const excluded = options.excludePatterns ?? IMAGE_EXCLUDE_PATTERNS;

  const images: PageImage[] = [];
  const seen = new Set<string>();

  for (const el of $('img').toArray()) {
    const img = $(el);
    const raw = IMAGE_SOURCE_ATTRIBUTES.map((attr) => img.attr(attr)).find((value) => !!value) ?? '';
    if (!raw || raw.startsWith('data:')) {
      continue;
    }

    const src = resolve(raw, pageUrl)?.href;
    if (!src || seen.has(src)) {
      continue;
    }
    seen.add(src);

    if (matchesAny(src, excluded)) {
      continue;
    }

    const width = img.attr('width');
    const height = img.attr('height');
    if (tooSmall(width, minWidth) || tooSmall(height, minHeight)) {
      continue;
    }

    images.push({
      src,
      alt: (img.attr('alt') ?? '').trim(),
      width: width ?? null,
      height: height ?? null,
    });
  }

  for (const el of $('[style]').toArray()) {
    const match = ($(el).attr('style') ?? '').match(BACKGROUND_URL);
    const src = match ? resolve(match[1], pageUrl)?.href : undefined;
    if (!src || seen.has(src) || matchesAny(src, excluded)) {
      continue;
    }
    seen.add(src);
    images.push({ src, alt: '(background image)', width: null, height: null });
  }

  return images;
}

/**
 * Extracts the page title, falling back to og:title
 */
export function extractPageTitle(html: string): string {
  const $ = cheerio.load(html);
  const title = $('title').first().text().trim();
  return title || ($('meta[property="og:title"]').attr('content') ?? '').trim();
}

/**
 * SEO tags of a page; missing tags come back as empty strings
 */
export function extractPageSeo(html: string): PageSeo {
  const $ = cheerio.load(html);
  const attr = (selector: string, name: string) => ($(selector).first().attr(name) ?? '').trim();

  return {
    metaTitle: $('title').first().text().trim(),
    metaDescription: attr('meta[name="description"]', 'content'),
    h1: $('h1').first().text().replace(/\s+/g, ' ').trim(),
    canonicalUrl: attr('link[rel="canonical"]', 'href'),
    ogImage: attr('meta[property="og:image"]', 'content'),
    ogTitle: attr('meta[property="og:title"]', 'content'),
    ogDescription: attr('meta[property="og:description"]', 'content'),
  };
}

/**
 * Word, image and link counts. Script and style text is not counted; links
 * without a host (mailto:, tel:) count as internal.
 */
export function extractContentMetrics(html: string, pageUrl: string, domain: string): ContentMetrics {
  const $ = cheerio.load(html);

  const words = $('body')
    .find('*')
    .addBack()
    .not('script, style, noscript')
    .contents()
    .toArray()
    .filter((node) => node.nodeType === 3)
    .map((node) => $(node).text())
    .join(' ')
    .split(/\s+/)
    .filter((word) => word.length > 0);

  let internalLinkCount = 0;
  let externalLinkCount = 0;
  for (const el of $('a[href]').toArray()) {
    const href = ($(el).attr('href') ?? '').trim();
    if (!href || href.startsWith('#') || /^javascript:/i.test(href)) {
      continue;
    }

    const absolute = resolve(href, pageUrl);
    if (!absolute) {
      continue;
    }
    if (absolute.hostname && !isDomainMatch(absolute.href, domain)) {
      externalLinkCount++;
    } else {
      internalLinkCount++;
    }
  }

  return {
    wordCount: words.length,
    totalImageCount: $('img').length,
    internalLinkCount,
    externalLinkCount,
  };
}
