/**
 * Crawler Module
 * Exports all link-following crawl functionality
 */

// Link and image extraction
export { extractLinks, extractImages, extractPageTitle, type ImageFilterOptions } from './link-extractor.js';

// URL pattern tables and filtering
export {
  DEFAULT_PRODUCT_PATTERNS,
  DEFAULT_CATEGORY_PATTERNS,
  BLOG_PATTERNS,
  DEFAULT_DENY_PATTERNS,
  IMAGE_EXCLUDE_PATTERNS,
  followPatternsFor,
  matchesAny,
  isStaticAsset,
} from './url-patterns.js';

// Page classification
export { LinkClassifier, type LinkClassifierOptions } from './link-classifier.js';

// Crawl state
export { CrawlFrontier, type FrontierEntry } from './crawl-frontier.js';
export { CrawlRegistry, type RegistrySnapshot } from './crawl-registry.js';

// Crawler orchestration
export {
  CrawlerOrchestrator,
  type CrawlOptions,
  type CrawlResult,
  type CrawlerDependencies,
} from './crawler-orchestrator.js';
