/**
 * Link Classifier
 * Labels a URL as product, category or other. Caller-supplied URL lists win
 * over the path patterns.
 */

import type { PageType } from '../types/index.js';
import { DEFAULT_CATEGORY_PATTERNS, DEFAULT_PRODUCT_PATTERNS, matchesAny, urlPath } from './url-patterns.js';

export interface LinkClassifierOptions {
  knownProductUrls?: Iterable<string>;
  knownCategoryUrls?: Iterable<string>;
  productPatterns?: readonly RegExp[];
  categoryPatterns?: readonly RegExp[];
}

export class LinkClassifier {
  private readonly knownProducts: ReadonlySet<string>;
  private readonly knownCategories: ReadonlySet<string>;
  private readonly productPatterns: readonly RegExp[];
  private readonly categoryPatterns: readonly RegExp[];

  constructor(options: LinkClassifierOptions = {}) {
    this.knownProducts = new Set(options.knownProductUrls ?? []);
    this.knownCategories = new Set(options.knownCategoryUrls ?? []);
    this.productPatterns = options.productPatterns ?? DEFAULT_PRODUCT_PATTERNS;
    this.categoryPatterns = options.categoryPatterns ?? DEFAULT_CATEGORY_PATTERNS;
  }

  classify(url: string): PageType {
    if (this.knownProducts.has(url)) {
      return 'product';
    }
    if (this.knownCategories.has(url)) {
      return 'category';
    }

    const path = urlPath(url);
    if (matchesAny(path, this.productPatterns)) {
      return 'product';
    }
    if (matchesAny(path, this.categoryPatterns)) {
      return 'category';
    }
    return 'other';
  }
}
