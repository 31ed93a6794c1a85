/**
 * URL Pattern Tables
 * Path patterns for page classification, link following and image filtering.
 * Matched case-insensitively against the URL path (deny patterns also see
 * the query string).
 */

import type { FollowScope } from '../utils/config.js';

function patterns(sources: readonly string[]): readonly RegExp[] {
  return Object.freeze(sources.map((source) => new RegExp(source, 'i')));
}

export const DEFAULT_PRODUCT_PATTERNS = patterns([
  '/product/',
  '/products/',
  '/p/',
  '/item/',
  '/items/',
  '/dp/',
  '/pd/',
]);

export const DEFAULT_CATEGORY_PATTERNS = patterns([
  '/category/',
  '/categories/',
  '/cat/',
  '/c/',
  '/collections/',
  '/shop/',
  '/browse/',
]);

export const BLOG_PATTERNS = patterns(['/blog/', '/news/', '/articles/', '/posts/', '/journal/']);

/**
 * Always skipped: carts, accounts and admin pages
 */
export const DEFAULT_DENY_PATTERNS = patterns([
  '/cart/',
  '/checkout/',
  '/account/',
  '/login/',
  '/register/',
  '/my-account/',
  '/admin/',
  '/wp-admin/',
  '/wp-login/',
  '\\?add-to-cart=',
  '\\?remove_item=',
  '/wishlist/',
  '/compare/',
]);

/**
 * Icons, placeholders and tracking pixels
 */
export const IMAGE_EXCLUDE_PATTERNS = patterns([
  'placeholder',
  'loading',
  'spinner',
  'icon',
  'pixel',
  'tracking',
  'spacer',
  'blank',
  '1x1',
  'transparent',
  '/wp-includes/',
  '/wp-content/plugins/',
  'gravatar\\.com',
]);

const STATIC_ASSET =
  /\.(jpg|jpeg|png|gif|svg|webp|ico|bmp|pdf|docx?|xlsx?|pptx?|mp3|mp4|avi|mov|wmv|flv|zip|rar|tar|gz|7z|css|js|woff2?|ttf|eot)$/i;

/**
 * Links a crawl of the given scope follows; empty means every internal link
 */
export function followPatternsFor(scope: FollowScope): readonly RegExp[] {
  switch (scope) {
    case 'product':
      return DEFAULT_PRODUCT_PATTERNS;
    case 'category':
      return DEFAULT_CATEGORY_PATTERNS;
    case 'blog':
      return BLOG_PATTERNS;
    case 'fullmonty':
      return [...DEFAULT_CATEGORY_PATTERNS, ...DEFAULT_PRODUCT_PATTERNS];
    case 'all':
      return [];
  }
}

export function matchesAny(value: string, list: readonly RegExp[]): boolean {
  return list.some((pattern) => pattern.test(value));
}

/**
 * Path of a URL; relative or unparseable values are treated as a bare path
 */
export function urlPath(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    return url.split(/[?#]/)[0];
  }
}

/**
 * Checks if a URL is likely a static asset (not worth crawling)
 */
export function isStaticAsset(url: string): boolean {
  return STATIC_ASSET.test(urlPath(url));
}
