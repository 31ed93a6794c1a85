import { logger } from '../utils/logger.js';
import { sleep as defaultSleep } from '../utils/sleep.js';
import { addBreadcrumb } from '../utils/sentry.js';
import { emptyProgress, isProcessed, recordOutcome } from '../state/crawl-progress.js';
import type { CrawlStateStore } from '../state/crawl-state-store.js';
import { writeCatalogOutputs, type CatalogOutputPaths } from '../output/output-writer.js';
import type { RecordSink } from '../output/record-sink.js';
import type { CrawlProgress, ItemIdentifier, Sleeper } from '../types/index.js';
import type { ItemExtractor } from './detail-extractor.js';
import type { ListingPaginator } from './listing-paginator.js';

export interface ScraperDependencies {
  stateStore: CrawlStateStore;
  paginator: Pick<ListingPaginator, 'collect'>;
  extractor: ItemExtractor;
  sink: RecordSink;
  outputDir: string;
  sleep?: Sleeper;
}

export interface CatalogScrapeOptions {
  /** 0 for every listed item */
  maxItems: number;
  /** Delay between item pages */
  delayMs: number;
  resume: boolean;
  checkpointEvery: number;
  signal?: AbortSignal;
}

export interface CatalogScrapeSummary {
  listed: number;
  targeted: number;
  processedThisRun: number;
  succeeded: number;
  failed: number;
  /** Already processed by an earlier run */
  skipped: number;
  withCompatibility: number;
  stoppedEarly: boolean;
  progress: CrawlProgress;
  outputs: CatalogOutputPaths;
}

/**
 * Sequential item-mode scraper
 *
 * Flow: identifiers (saved list or listing walk) -> per-item extraction with
 * periodic checkpoints -> final checkpoint -> JSON and CSV output.
 */
export class ScraperOrchestrator {
  private readonly sleep: Sleeper;

  constructor(private readonly deps: ScraperDependencies) {
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async runCatalogScrape(options: CatalogScrapeOptions): Promise<CatalogScrapeSummary> {
    const { stateStore } = this.deps;

    const listed = await this.loadIdentifiers(options.resume);
    const targets = options.maxItems > 0 ? listed.slice(0, options.maxItems) : listed;

    let progress = options.resume ? await stateStore.resume() : emptyProgress(stateStore.target);

    const pending = targets.filter((id) => !isProcessed(progress, id));
    const skipped = targets.length - pending.length;

    logger.info('Starting catalog scrape', {
      listed: listed.length,
      targeted: targets.length,
      pending: pending.length,
      skipped,
    });

    let processedThisRun = 0;
    let sinceCheckpoint = 0;
    let stoppedEarly = false;

    for (const itemId of pending) {
      if (options.signal?.aborted) {
        stoppedEarly = true;
        break;
      }

      if (processedThisRun > 0 && options.delayMs > 0) {
        await this.sleep(options.delayMs);
        if (options.signal?.aborted) {
          stoppedEarly = true;
          break;
        }
      }

      const outcome = await this.deps.extractor.extract(itemId);
      progress = recordOutcome(progress, outcome);
      processedThisRun++;
      sinceCheckpoint++;

      addBreadcrumb({
        category: 'scrape',
        message: `Item ${itemId} ${outcome.kind === 'record' ? 'extracted' : 'failed'}`,
        level: outcome.kind === 'record' ? 'info' : 'warning',
      });

      logger.info(`Item ${processedThisRun}/${pending.length}`, {
        itemId,
        outcome: outcome.kind,
        title: outcome.kind === 'record' ? outcome.record.title.slice(0, 60) : undefined,
        errorType: outcome.kind === 'error' ? outcome.error.errorType : undefined,
      });

      if (sinceCheckpoint >= options.checkpointEvery) {
        await stateStore.checkpoint(progress);
        sinceCheckpoint = 0;
      }
    }

    await stateStore.checkpoint(progress);

    if (stoppedEarly) {
      logger.warn('Catalog scrape stopped before finishing', {
        processedThisRun,
        remaining: pending.length - processedThisRun,
      });
    }

    const outputs = await writeCatalogOutputs(this.deps.outputDir, progress.records, this.deps.sink);

    const summary: CatalogScrapeSummary = {
      listed: listed.length,
      targeted: targets.length,
      processedThisRun,
      succeeded: progress.records.length,
      failed: progress.errors.length,
      skipped,
      withCompatibility: progress.records.filter((record) => record.compatibility.status === 'present').length,
      stoppedEarly,
      progress,
      outputs,
    };

    logger.info('Catalog scrape completed', {
      listed: summary.listed,
      processedThisRun: summary.processedThisRun,
      succeeded: summary.succeeded,
      failed: summary.failed,
      skipped: summary.skipped,
      withCompatibility: summary.withCompatibility,
      stoppedEarly: summary.stoppedEarly,
    });

    return summary;
  }

  /**
   * Saved identifier list on resume, otherwise a fresh listing walk
   */
  private async loadIdentifiers(resume: boolean): Promise<ItemIdentifier[]> {
    const { stateStore, paginator } = this.deps;

    if (resume) {
      const saved = await stateStore.loadIdentifiers();
      if (saved) {
        logger.info('Loaded saved item identifiers', { count: saved.length });
        return saved;
      }
      logger.info('No saved item identifiers, walking the listing');
    }

    const identifiers = await paginator.collect();
    await stateStore.saveIdentifiers(identifiers);
    return identifiers;
  }
}
