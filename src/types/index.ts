// Catalog Types

/** Numeric item ID as it appears in `/itm/<id>` links */
export type ItemIdentifier = string;

export type CompatMode = 'skip' | 'sampled' | 'exhaustive';

export interface CompatibilityEntry {
  make: string;
  year: string;
}

/**
 * - skipped: extraction disabled for the run
 * - absent: the page has no compatibility table
 * - empty: the table wrapper exists but no row could be parsed
 * - present: at least one row was parsed
 */
export type CompatibilityStatus = 'skipped' | 'absent' | 'empty' | 'present';

export interface Compatibility {
  status: CompatibilityStatus;
  makes: string[];
  years: string[];
  entries: CompatibilityEntry[];
  totalPages: number;
  pagesVisited: number;
  complete: boolean;
  warning?: string;
}

export interface DetailRecord {
  itemId: ItemIdentifier;
  url: string;
  title: string;
  price: string;
  currency: string;
  brand: string;
  condition: string;
  productType: string;
  mpn: string;
  description: string;
  specifics: Record<string, string>;
  images: string[];
  compatibility: Compatibility;
  scrapedAt: string;
}

export type CrawlErrorType =
  | 'FetchTimeout'
  | 'FetchFailed'
  | 'BlockedPage'
  | 'MalformedPage'
  | 'PaginationDesync';

export interface ErrorRecord {
  itemId: ItemIdentifier;
  url: string;
  errorType: CrawlErrorType;
  message: string;
  occurredAt: string;
}

export type ExtractionOutcome =
  | { kind: 'record'; record: DetailRecord }
  | { kind: 'error'; error: ErrorRecord };

export type ItemStatus = 'completed' | 'errored';

export interface CrawlProgress {
  target: string;
  records: DetailRecord[];
  errors: ErrorRecord[];
  status: ReadonlyMap<ItemIdentifier, ItemStatus>;
}

// Link-following Types

export type PageType = 'product' | 'category' | 'other';

export interface PageImage {
  src: string;
  alt: string;
  width: string | null;
  height: string | null;
}

export interface PageSeo {
  metaTitle: string;
  metaDescription: string;
  h1: string;
  canonicalUrl: string;
  ogImage: string;
  ogTitle: string;
  ogDescription: string;
}

export interface ContentMetrics {
  wordCount: number;
  /** Every `img` element, before image filtering */
  totalImageCount: number;
  internalLinkCount: number;
  externalLinkCount: number;
}

/** Full-data capture, collected only under the fullmonty follow scope */
export interface PageDetails {
  seo: PageSeo;
  metrics: ContentMetrics;
  /** `@type` values of every JSON-LD node, in document order */
  schemaTypes: string[];
}

export interface CrawledPage {
  url: string;
  pageType: PageType;
  title: string;
  images: PageImage[];
  product?: ProductFields;
  details?: PageDetails;
}

export interface LinkCrawlError {
  url: string;
  errorType: 'http_error' | CrawlErrorType;
  status?: number;
  message?: string;
  occurredAt: string;
}

export interface ImageSighting {
  src: string;
  alt: string;
  foundOn: string[];
}

// Extraction Types

/** Scalar and list fields a single extraction strategy may contribute */
export interface ProductFields {
  title?: string;
  price?: string;
  currency?: string;
  brand?: string;
  condition?: string;
  productType?: string;
  mpn?: string;
  sku?: string;
  /** schema.org availability without its URL prefix, e.g. "InStock" */
  availability?: string;
  description?: string;
  images?: string[];
  specifics?: Record<string, string>;
}

// Utility Types
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

/** Injectable delay so loops can be driven without real timers */
export type Sleeper = (ms: number) => Promise<void>;
