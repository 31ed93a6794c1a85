/**
 * Listing Paginator
 *
 * Walks a store's listing pages in order and stops on either signal the
 * listing gives for "past the end": a page with no item links, or a page
 * whose item links were all seen before (the store keeps serving its last
 * page for out-of-range page numbers).
 */

import * as cheerio from 'cheerio';
import { logger } from '../utils/logger.js';
import { sleep as defaultSleep } from '../utils/sleep.js';
import { extractItemIds } from '../utils/extract-item-id.js';
import type { ItemIdentifier, Sleeper } from '../types/index.js';
import type { PageSession } from './page-session.js';
import type { StoreProfile } from './store-selectors.js';

export interface ListingSource {
  /** Item identifiers linked from listing page `pageNumber` (1-based) */
  fetchPage(pageNumber: number): Promise<ItemIdentifier[]>;
}

export interface ListingPageResult {
  pageNumber: number;
  identifiers: Set<ItemIdentifier>;
  newIdentifiers: number;
}

export interface ListingPaginatorOptions {
  delayMs: number;
  /** Hard cap on pages fetched; 0 for no cap */
  maxPages?: number;
  sleep?: Sleeper;
}

export class ListingPaginator {
  private readonly sleep: Sleeper;

  constructor(
    private readonly source: ListingSource,
    private readonly options: ListingPaginatorOptions
  ) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Lazily fetch listing pages, one identifier set per page. Fetch errors
   * propagate: a listing that cannot be read leaves nothing to crawl.
   */
  async *walk(): AsyncGenerator<ListingPageResult> {
    const seen = new Set<ItemIdentifier>();
    const maxPages = this.options.maxPages ?? 0;

    for (let pageNumber = 1; maxPages === 0 || pageNumber <= maxPages; pageNumber++) {
      if (pageNumber > 1 && this.options.delayMs > 0) {
        await this.sleep(this.options.delayMs);
      }

      const identifiers = new Set(await this.source.fetchPage(pageNumber));
      let newIdentifiers = 0;
      for (const id of identifiers) {
        if (!seen.has(id)) {
          seen.add(id);
          newIdentifiers++;
        }
      }

      logger.info('Listing page read', {
        pageNumber,
        identifiers: identifiers.size,
        newIdentifiers,
        total: seen.size,
      });

      yield { pageNumber, identifiers, newIdentifiers };

      if (identifiers.size === 0) {
        logger.info('Listing exhausted: page has no items', { pageNumber });
        return;
      }
      if (newIdentifiers === 0) {
        logger.info('Listing exhausted: page repeats earlier items', { pageNumber });
        return;
      }
    }

    logger.warn('Listing page cap reached', { maxPages });
  }

  /**
   * Union of every page's identifiers, sorted
   */
  async collect(): Promise<ItemIdentifier[]> {
    const all = new Set<ItemIdentifier>();
    for await (const page of this.walk()) {
      page.identifiers.forEach((id) => all.add(id));
    }
    return [...all].sort();
  }
}

/**
 * Item identifiers linked from a listing page's HTML
 */
export function extractListingIdentifiers(html: string, profile: StoreProfile): ItemIdentifier[] {
  const $ = cheerio.load(html);
  const hrefs = $(profile.selectors.listingLink)
    .toArray()
    .map((el) => $(el).attr('href') ?? '');
  return [...extractItemIds(hrefs, profile.itemIdPattern)];
}

/**
 * Listing pages read through the shared browser tab
 */
export class BrowserListingSource implements ListingSource {
  constructor(
    private readonly session: PageSession,
    private readonly profile: StoreProfile,
    private readonly store: string,
    private readonly pageSize: number,
    private readonly settleMs = 3000
  ) {}

  async fetchPage(pageNumber: number): Promise<ItemIdentifier[]> {
    await this.session.open(this.profile.listingUrl(this.store, pageNumber, this.pageSize));
    await this.session.wait(this.settleMs);
    return extractListingIdentifiers(await this.session.html(), this.profile);
  }
}
