/**
 * Crawler Orchestrator
 * Breadth-first link-following crawl of one site with a bounded worker pool.
 * Classifies every fetched page and collects its images; product pages also
 * get the detail extraction strategies. The fullmonty scope runs the
 * strategies on every page and adds SEO tags, content metrics and schema
 * types.
 */

import * as cheerio from 'cheerio';
import { canonicalizeUrl, isDomainMatch } from '../utils/canonicalize.js';
import { logger } from '../utils/logger.js';
import { sleep as defaultSleep } from '../utils/sleep.js';
import { CrawlError, toErrorMessage } from '../utils/errors.js';
import type { FollowScope } from '../utils/config.js';
import type { FetchedPage, PageFetcher } from '../scraper/http-client.js';
import {
  runStrategies,
  createDefaultStrategies,
  structuredDataTypes,
  type ExtractionStrategy,
} from '../scraper/extraction-strategies.js';
import { defaultStoreSelectors } from '../scraper/store-selectors.js';
import type { CrawledPage, ImageSighting, LinkCrawlError, Sleeper } from '../types/index.js';
import { CrawlFrontier, type FrontierEntry } from './crawl-frontier.js';
import { CrawlRegistry } from './crawl-registry.js';
import { LinkClassifier } from './link-classifier.js';
import {
  extractContentMetrics,
  extractImages,
  extractLinks,
  extractPageSeo,
  extractPageTitle,
  type ImageFilterOptions,
} from './link-extractor.js';
import { DEFAULT_DENY_PATTERNS, followPatternsFor, isStaticAsset, matchesAny } from './url-patterns.js';

/**
 * Options for configuring a crawl run
 */
export interface CrawlOptions {
  /** Host to crawl, without protocol; links to other hosts are ignored */
  domain: string;
  /** Extra start URLs besides the home page */
  seedUrls?: string[];
  /** Cap on dispatched fetches; 0 for no cap */
  maxPages?: number;
  /** Minimum delay between requests of one worker */
  delayMs?: number;
  concurrency?: number;
  follow?: FollowScope;
  signal?: AbortSignal;
}

export interface CrawlerDependencies {
  fetcher: PageFetcher;
  classifier?: LinkClassifier;
  strategies?: ExtractionStrategy[];
  imageFilter?: ImageFilterOptions;
  denyPatterns?: readonly RegExp[];
  sleep?: Sleeper;
  now?: () => Date;
}

/**
 * Result of a complete crawl run
 */
export interface CrawlResult {
  domain: string;
  pagesCrawled: number;
  pages: CrawledPage[];
  errors: LinkCrawlError[];
  uniqueImages: ImageSighting[];
  /** Distinct canonical URLs discovered, fetched or not */
  urlsDiscovered: number;
  budgetReached: boolean;
  aborted: boolean;
  durationMs: number;
}

interface CrawlContext {
  domain: string;
  registry: CrawlRegistry;
  frontier: CrawlFrontier;
  followPatterns: readonly RegExp[];
  fullData: boolean;
}

export class CrawlerOrchestrator {
  private readonly fetcher: PageFetcher;
  private readonly classifier: LinkClassifier;
  private readonly strategies: ExtractionStrategy[];
  private readonly denyPatterns: readonly RegExp[];
  private readonly sleep: Sleeper;
  private readonly now: () => Date;

  constructor(private readonly deps: CrawlerDependencies) {
    this.fetcher = deps.fetcher;
    this.classifier = deps.classifier ?? new LinkClassifier();
    this.strategies = deps.strategies ?? createDefaultStrategies(defaultStoreSelectors);
    this.denyPatterns = deps.denyPatterns ?? DEFAULT_DENY_PATTERNS;
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  async crawl(options: CrawlOptions): Promise<CrawlResult> {
    const startTime = Date.now();
    const maxPages = options.maxPages ?? 0;
    const delayMs = options.delayMs ?? 1000;
    const concurrency = Math.max(1, options.concurrency ?? 2);
    const follow = options.follow ?? 'all';

    const context: CrawlContext = {
      domain: options.domain,
      registry: new CrawlRegistry(),
      frontier: new CrawlFrontier(),
      followPatterns: followPatternsFor(follow),
      fullData: follow === 'fullmonty',
    };

    for (const url of [`https://${options.domain}/`, ...(options.seedUrls ?? [])]) {
      const canonical = canonicalizeUrl(url);
      if (canonical && context.registry.markSeen(canonical)) {
        context.frontier.enqueue({ url, depth: 0 });
      }
    }

    logger.info('Starting site crawl', {
      domain: options.domain,
      seedUrls: context.frontier.size(),
      maxPages,
      concurrency,
      follow,
    });

    let dispatched = 0;
    let inFlight = 0;
    let waiters: Array<() => void> = [];

    const budgetReached = () => maxPages > 0 && dispatched >= maxPages;
    const notify = () => {
      const pending = waiters;
      waiters = [];
      pending.forEach((wake) => wake());
    };
    const waitForWork = () => new Promise<void>((resolve) => waiters.push(resolve));

    const worker = async (slot: number): Promise<void> => {
      let requests = 0;

      for (;;) {
        if (budgetReached() || options.signal?.aborted) {
          return;
        }

        const entry = context.frontier.dequeue();
        if (!entry) {
          if (inFlight === 0) {
            notify();
            return;
          }
          await waitForWork();
          continue;
        }

        dispatched++;
        inFlight++;
        try {
          if (requests > 0 && delayMs > 0) {
            await this.sleep(delayMs);
          }
          requests++;

          const fetched = await this.fetcher.fetch(entry.url);
          this.handlePage(entry, fetched, context);
        } catch (error) {
          this.handleFailure(entry, error, context, slot);
        } finally {
          inFlight--;
          notify();
        }
      }
    };

    await Promise.all(Array.from({ length: concurrency }, (_, slot) => worker(slot)));

    const snapshot = context.registry.snapshot();
    const result: CrawlResult = {
      domain: options.domain,
      pagesCrawled: snapshot.pages.length,
      pages: snapshot.pages,
      errors: snapshot.errors,
      uniqueImages: snapshot.images,
      urlsDiscovered: snapshot.seenUrls,
      budgetReached: budgetReached(),
      aborted: options.signal?.aborted ?? false,
      durationMs: Date.now() - startTime,
    };

    logger.info('Crawl completed', {
      domain: result.domain,
      pagesCrawled: result.pagesCrawled,
      urlsDiscovered: result.urlsDiscovered,
      uniqueImages: result.uniqueImages.length,
      errorCount: result.errors.length,
      budgetReached: result.budgetReached,
      aborted: result.aborted,
      durationMs: result.durationMs,
    });

    return result;
  }

  /**
   * Completion handler: registry updates and enqueueing happen here, with no
   * await in between
   */
  private handlePage(entry: FrontierEntry, fetched: FetchedPage, context: CrawlContext): void {
    const { registry, frontier } = context;

    if (fetched.status >= 400) {
      logger.warn('Page returned error status', { url: entry.url, status: fetched.status });
      registry.recordError({
        url: entry.url,
        errorType: 'http_error',
        status: fetched.status,
        occurredAt: this.now().toISOString(),
      });
      return;
    }

    const pageType = this.classifier.classify(entry.url);
    const page: CrawledPage = {
      url: entry.url,
      pageType,
      title: extractPageTitle(fetched.html),
      images: extractImages(fetched.html, entry.url, this.deps.imageFilter),
    };
    if (pageType === 'product' || context.fullData) {
      page.product = runStrategies(fetched.html, this.strategies);
    }
    if (context.fullData) {
      page.details = {
        seo: extractPageSeo(fetched.html),
        metrics: extractContentMetrics(fetched.html, entry.url, context.domain),
        schemaTypes: structuredDataTypes(cheerio.load(fetched.html)),
      };
    }
    registry.recordPage(page);

    let enqueued = 0;
    for (const link of extractLinks(fetched.html, entry.url)) {
      if (!this.shouldFollow(link, context)) {
        continue;
      }
      const canonical = canonicalizeUrl(link);
      if (canonical && registry.markSeen(canonical)) {
        frontier.enqueue({ url: link, depth: entry.depth + 1 });
        enqueued++;
      }
    }

    logger.debug('Page crawled', {
      url: entry.url,
      pageType,
      images: page.images.length,
      enqueued,
    });

    if (registry.pageCount % 10 === 0) {
      logger.info('Crawl progress', {
        domain: context.domain,
        pagesCrawled: registry.pageCount,
        queueSize: frontier.size(),
        errors: registry.errorCount,
      });
    }
  }

  private handleFailure(entry: FrontierEntry, error: unknown, context: CrawlContext, slot: number): void {
    const message = toErrorMessage(error);
    logger.warn('Failed to fetch page', { url: entry.url, slot, error: message });
    context.registry.recordError({
      url: entry.url,
      errorType: error instanceof CrawlError ? error.type : 'FetchFailed',
      message,
      occurredAt: this.now().toISOString(),
    });
  }

  private shouldFollow(link: string, context: CrawlContext): boolean {
    if (!isDomainMatch(link, context.domain) || isStaticAsset(link)) {
      return false;
    }

    const url = new URL(link);
    if (matchesAny(`${url.pathname}${url.search}`, this.denyPatterns)) {
      return false;
    }

    return context.followPatterns.length === 0 || matchesAny(url.pathname, context.followPatterns);
  }
}
