/**
 * Detail Extractor
 *
 * Turns one item identifier into either a DetailRecord or an ErrorRecord.
 * Every failure is caught here so a bad item never stops the run.
 */

import { logger } from '../utils/logger.js';
import { BlockedPageError, CrawlError, MalformedPageError, toErrorMessage } from '../utils/errors.js';
import type { CompatMode, CrawlErrorType, DetailRecord, ExtractionOutcome, ItemIdentifier } from '../types/index.js';
import { AttributeTableExtractor } from './attribute-table-extractor.js';
import { createDefaultStrategies, runStrategies, type ExtractionStrategy } from './extraction-strategies.js';
import type { PageSession } from './page-session.js';
import type { StoreProfile } from './store-selectors.js';

export interface ItemExtractor {
  extract(itemId: ItemIdentifier): Promise<ExtractionOutcome>;
}

export interface DetailExtractorOptions {
  profile: StoreProfile;
  compatMode: CompatMode;
  /** Wait after navigation for client-rendered sections */
  settleMs?: number;
  /** Wait before re-checking a blocked page */
  blockedRetryMs?: number;
  strategies?: ExtractionStrategy[];
  tableExtractor?: AttributeTableExtractor;
  now?: () => Date;
}

export class DetailExtractor implements ItemExtractor {
  private readonly strategies: ExtractionStrategy[];
  private readonly tableExtractor: AttributeTableExtractor;
  private readonly now: () => Date;

  constructor(
    private readonly session: PageSession,
    private readonly options: DetailExtractorOptions
  ) {
    this.strategies = options.strategies ?? createDefaultStrategies(options.profile.selectors);
    this.tableExtractor =
      options.tableExtractor ?? new AttributeTableExtractor({ selectors: options.profile.selectors });
    this.now = options.now ?? (() => new Date());
  }

  async extract(itemId: ItemIdentifier): Promise<ExtractionOutcome> {
    const url = this.options.profile.itemUrl(itemId);

    try {
      return { kind: 'record', record: await this.extractRecord(itemId, url) };
    } catch (error) {
      const errorType: CrawlErrorType = error instanceof CrawlError ? error.type : 'FetchFailed';
      const message = toErrorMessage(error);

      logger.warn('Item extraction failed', { itemId, url, errorType, error: message });

      return {
        kind: 'error',
        error: { itemId, url, errorType, message, occurredAt: this.now().toISOString() },
      };
    }
  }

  private async extractRecord(itemId: ItemIdentifier, url: string): Promise<DetailRecord> {
    await this.session.open(url);
    await this.session.wait(this.options.settleMs ?? 4000);
    await this.ensureNotBlocked(url);

    const html = await this.session.html();
    const fields = runStrategies(html, this.strategies);

    if (!fields.title) {
      throw new MalformedPageError(url, 'no title in structured data, microdata or heading');
    }

    const compatibility = await this.tableExtractor.extract(this.session, this.options.compatMode, html);

    logger.debug('Item extracted', {
      itemId,
      specifics: Object.keys(fields.specifics ?? {}).length,
      images: fields.images?.length ?? 0,
      compatibility: compatibility.status,
    });

    return {
      itemId,
      url,
      title: fields.title,
      price: fields.price ?? '',
      currency: fields.currency ?? this.options.profile.defaultCurrency,
      brand: fields.brand ?? '',
      condition: fields.condition ?? '',
      productType: fields.productType ?? '',
      mpn: fields.mpn ?? '',
      description: fields.description ?? '',
      specifics: fields.specifics ?? {},
      images: fields.images ?? [],
      compatibility,
      scrapedAt: this.now().toISOString(),
    };
  }

  /**
   * Interstitial check: wait once and re-check before giving up
   */
  private async ensureNotBlocked(url: string): Promise<void> {
    let title = await this.session.title();
    if (!this.isBlocked(title)) {
      return;
    }

    logger.warn('Blocked page detected, waiting before re-check', { url, title });
    await this.session.wait(this.options.blockedRetryMs ?? 5000);

    title = await this.session.title();
    if (this.isBlocked(title)) {
      throw new BlockedPageError(url, title);
    }
  }

  private isBlocked(title: string): boolean {
    const lower = title.toLowerCase();
    return this.options.profile.blockedTitleMarkers.some((marker) => lower.includes(marker.toLowerCase()));
  }
}
