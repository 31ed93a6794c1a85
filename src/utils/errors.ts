import type { CrawlErrorType } from '../types/index.js';

/**
 * Crawl error taxonomy
 *
 * Per-item and per-sub-page failures are CrawlErrors: they are caught at the
 * item boundary and stored as data. CheckpointError and ConfigError are fatal
 * and halt the run.
 */
export class CrawlError extends Error {
  readonly type: CrawlErrorType;
  readonly url?: string;

  constructor(type: CrawlErrorType, message: string, url?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = `${type}Error`;
    this.type = type;
    this.url = url;
  }
}

export class FetchTimeoutError extends CrawlError {
  constructor(url: string, timeoutMs: number, options?: { cause?: unknown }) {
    super('FetchTimeout', `Timed out after ${timeoutMs}ms loading ${url}`, url, options);
  }
}

export class FetchFailedError extends CrawlError {
  constructor(url: string, reason: string, options?: { cause?: unknown }) {
    super('FetchFailed', `Failed to load ${url}: ${reason}`, url, options);
  }
}

/** Anti-automation interstitial still showing after the single re-check */
export class BlockedPageError extends CrawlError {
  constructor(url: string, pageTitle: string) {
    super('BlockedPage', `Blocked by interstitial page "${pageTitle}"`, url);
  }
}

export class MalformedPageError extends CrawlError {
  constructor(url: string, detail: string) {
    super('MalformedPage', `Unexpected page structure: ${detail}`, url);
  }
}

/** Sub-table reports more pages than it serves */
export class PaginationDesyncError extends CrawlError {
  readonly pageNumber: number;
  readonly totalPages: number;

  constructor(pageNumber: number, totalPages: number, detail: string) {
    super('PaginationDesync', `Sub-page ${pageNumber}/${totalPages}: ${detail}`);
    this.pageNumber = pageNumber;
    this.totalPages = totalPages;
  }
}

export class CheckpointError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`Checkpoint ${path}: ${message}`, options);
    this.name = 'CheckpointError';
    this.path = path;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function isFatalError(error: unknown): boolean {
  return error instanceof CheckpointError || error instanceof ConfigError;
}

/**
 * Convert an unknown thrown value to a message
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}
