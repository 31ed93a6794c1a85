import axios, { AxiosInstance } from 'axios';
import { config } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { sleep as defaultSleep } from '../utils/sleep.js';
import { FetchFailedError, FetchTimeoutError, toErrorMessage, type CrawlError } from '../utils/errors.js';
import type { Sleeper } from '../types/index.js';

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export interface FetchedPage {
  url: string;
  status: number;
  html: string;
}

export interface PageFetcher {
  fetch(url: string): Promise<FetchedPage>;
}

export interface HttpClientOptions {
  timeoutMs?: number;
  maxRetries?: number;
  userAgent?: string;
  sleep?: Sleeper;
}

/**
 * Plain HTTP page fetcher for link-following crawls.
 *
 * 4xx responses are returned as pages with their status. Network errors and
 * 5xx responses are retried with exponential backoff; a 5xx that survives
 * every retry is also returned as a page so the crawler can log it.
 */
export class HttpClient implements PageFetcher {
  private client: AxiosInstance;
  private maxRetries: number;
  private timeoutMs: number;
  private sleep: Sleeper;

  constructor(options: HttpClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? config.store.requestTimeoutMs;
    this.maxRetries = options.maxRetries ?? 3;
    this.sleep = options.sleep ?? defaultSleep;

    this.client = axios.create({
      timeout: this.timeoutMs,
      maxRedirects: 5,
      responseType: 'text',
      headers: {
        'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
        Accept: 'text/html,application/xhtml+xml',
      },
      validateStatus: (status) => status < 500,
    });
  }

  async fetch(url: string): Promise<FetchedPage> {
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        return await this.doFetch(url);
      } catch (error) {
        lastError = error;

        if (!this.shouldRetry(error, attempt)) {
          break;
        }

        const delay = Math.pow(2, attempt) * 1000;
        logger.warn('Page request failed, retrying', {
          url,
          attempt,
          maxRetries: this.maxRetries,
          delayMs: delay,
          error: toErrorMessage(error),
        });
        await this.sleep(delay);
      }
    }

    if (axios.isAxiosError(lastError) && lastError.response) {
      return { url, status: lastError.response.status, html: '' };
    }

    throw this.toCrawlError(url, lastError);
  }

  private async doFetch(url: string): Promise<FetchedPage> {
    const response = await this.client.get<string>(url);

    logger.debug('Page fetched', { url, status: response.status });

    return {
      url,
      status: response.status,
      html: typeof response.data === 'string' ? response.data : '',
    };
  }

  /**
   * Network errors and 5xx responses are retryable
   */
  private shouldRetry(error: unknown, attempt: number): boolean {
    if (attempt >= this.maxRetries) {
      return false;
    }

    if (axios.isAxiosError(error)) {
      if (!error.response) {
        return true;
      }
      return error.response.status >= 500;
    }

    return true;
  }

  private toCrawlError(url: string, error: unknown): CrawlError {
    if (axios.isAxiosError(error) && error.code && TIMEOUT_CODES.has(error.code)) {
      return new FetchTimeoutError(url, this.timeoutMs, { cause: error });
    }
    return new FetchFailedError(url, toErrorMessage(error), { cause: error });
  }
}
