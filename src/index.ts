#!/usr/bin/env node

import { join } from 'path';
import { parseCliArgs } from './cli-args.js';
import { config, resolveRunConfig, type CatalogRunConfig, type LinkRunConfig } from './utils/config.js';
import { logger } from './utils/logger.js';
import { captureError, flushSentry } from './utils/sentry.js';
import { isFatalError, toErrorMessage } from './utils/errors.js';
import { readLines } from './utils/seed-file.js';
import { createStoreProfile } from './scraper/store-selectors.js';
import { PuppeteerClient } from './scraper/puppeteer-client.js';
import { BrowserListingSource, ListingPaginator } from './scraper/listing-paginator.js';
import { DetailExtractor } from './scraper/detail-extractor.js';
import { ScraperOrchestrator } from './scraper/scraper-orchestrator.js';
import { HttpClient } from './scraper/http-client.js';
import { CrawlerOrchestrator, LinkClassifier } from './crawler/index.js';
import { CrawlStateStore } from './state/crawl-state-store.js';
import { RecordSink, slugify } from './output/record-sink.js';
import { writeLinkCrawlOutputs } from './output/output-writer.js';

const USAGE = `Usage:
  catalog-crawler catalog --store=<name> [--max-items=N] [--resume] [--compat-mode=skip|sampled|exhaustive] [--vendor=<name>]
  catalog-crawler links --domain=<host> [--max-pages=N] [--concurrency=N] [--follow=all|product|category|blog|fullmonty]
                        [--seed-file=<path>] [--known-products-file=<path>] [--known-categories-file=<path>]`;

/**
 * Sequential item mode: listing walk, per-item extraction, checkpoints, CSV
 */
async function runCatalog(run: CatalogRunConfig, signal: AbortSignal): Promise<void> {
  const profile = createStoreProfile(config.store.baseUrl);
  const outputDir = join(config.app.outputDir, `store-${slugify(run.store)}`);

  const browser = new PuppeteerClient({
    wsEndpoint: config.browser.wsEndpoint,
    executablePath: config.browser.executablePath,
    navigationTimeoutMs: config.store.requestTimeoutMs,
    selectors: profile.selectors,
  });

  try {
    const session = await browser.openSession();
    const orchestrator = new ScraperOrchestrator({
      stateStore: new CrawlStateStore(`${profile.baseUrl}/str/${run.store}`, outputDir),
      paginator: new ListingPaginator(new BrowserListingSource(session, profile, run.store, run.pageSize), {
        delayMs: run.listingDelayMs,
      }),
      extractor: new DetailExtractor(session, { profile, compatMode: run.compatMode }),
      sink: new RecordSink({ vendor: run.vendor }),
      outputDir,
    });

    const summary = await orchestrator.runCatalogScrape({
      maxItems: run.maxItems,
      delayMs: run.delayMs,
      resume: run.resume,
      checkpointEvery: run.checkpointEvery,
      signal,
    });

    logger.info('=== Catalog run summary ===', {
      succeeded: summary.succeeded,
      failed: summary.failed,
      skipped: summary.skipped,
      withCompatibility: summary.withCompatibility,
      stoppedEarly: summary.stoppedEarly,
      csvPath: summary.outputs.csvPath,
      jsonPath: summary.outputs.jsonPath,
    });
  } finally {
    await browser.close();
  }
}

/**
 * Link-following mode: breadth-first crawl of one site
 */
async function runLinks(run: LinkRunConfig, signal: AbortSignal): Promise<void> {
  const crawler = new CrawlerOrchestrator({
    fetcher: new HttpClient(),
    classifier: new LinkClassifier({
      knownProductUrls: run.knownProductUrls,
      knownCategoryUrls: run.knownCategoryUrls,
    }),
  });

  const result = await crawler.crawl({
    domain: run.domain,
    seedUrls: run.seedUrls,
    maxPages: run.maxPages,
    delayMs: run.delayMs,
    concurrency: run.concurrency,
    follow: run.follow,
    signal,
  });

  const outputDir = join(config.app.outputDir, run.domain.replace(/^www\./, '').replace(/[^a-z0-9]+/gi, '-'));
  const outputs = await writeLinkCrawlOutputs(outputDir, result.pages, result.uniqueImages, new RecordSink({ vendor: '' }));

  logger.info('=== Link crawl summary ===', {
    pagesCrawled: result.pagesCrawled,
    urlsDiscovered: result.urlsDiscovered,
    uniqueImages: result.uniqueImages.length,
    errors: result.errors.length,
    budgetReached: result.budgetReached,
    pagesPath: outputs.pagesPath,
    imagesPath: outputs.imagesPath,
  });
}

async function main(): Promise<void> {
  const { options, files } = parseCliArgs(process.argv.slice(2));

  if (options.help === true || options.mode === undefined) {
    console.log(USAGE);
    return;
  }

  for (const [key, path] of Object.entries(files)) {
    if (path) {
      options[key] = await readLines(path);
    }
  }

  const run = resolveRunConfig(options);

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupt received, finishing current item');
    controller.abort();
  });

  if (run.mode === 'catalog') {
    await runCatalog(run, controller.signal);
  } else {
    await runLinks(run, controller.signal);
  }
}

main()
  .then(() => flushSentry())
  .catch(async (error: unknown) => {
    logger.error('Run failed', { error: toErrorMessage(error), fatal: isFatalError(error) });
    if (error instanceof Error) {
      captureError(error, { argv: process.argv.slice(2) });
    }
    await flushSentry();
    process.exit(1);
  });
