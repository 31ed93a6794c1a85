/**
 * Store page layout: URL templates, CSS selectors and blocking markers
 * for listing and item detail pages.
 *
 * Profiles are plain data injected into the paginator and extractors so a
 * store with different markup only needs a new profile.
 */

import { ITEM_ID_PATTERN } from '../utils/extract-item-id.js';
import type { ItemIdentifier } from '../types/index.js';

export interface StoreSelectors {
  /** Anchors scanned for item links on a listing page */
  listingLink: string;
  /** Primary heading used as the last-resort title */
  heading: string;
  specifics: {
    row: string;
    label: string;
    value: string;
  };
  compatibility: {
    /** Wrapper element; its presence alone means "compatibility exists" */
    wrapper: string;
    table: string;
    paginationButton: string;
  };
}

export interface StoreProfile {
  baseUrl: string;
  itemIdPattern: RegExp;
  /** Page titles containing any of these (case-insensitive) are interstitials */
  blockedTitleMarkers: readonly string[];
  defaultCurrency: string;
  selectors: StoreSelectors;
  listingUrl(store: string, pageNumber: number, pageSize: number): string;
  itemUrl(itemId: ItemIdentifier): string;
}

export const defaultStoreSelectors: StoreSelectors = {
  listingLink: 'a[href]',
  heading: 'h1',
  specifics: {
    row: '.ux-labels-values',
    label: '.ux-labels-values__labels',
    value: '.ux-labels-values__values',
  },
  compatibility: {
    wrapper: '#d-motors-compatibility-table',
    table: 'table',
    paginationButton: 'button.pagination__item',
  },
};

/**
 * Build a profile for the store layout at `baseUrl`
 */
export function createStoreProfile(baseUrl: string, overrides: Partial<Omit<StoreProfile, 'baseUrl'>> = {}): StoreProfile {
  const root = baseUrl.replace(/\/+$/, '');

  return {
    baseUrl: root,
    itemIdPattern: ITEM_ID_PATTERN,
    blockedTitleMarkers: ['security'],
    defaultCurrency: 'GBP',
    selectors: defaultStoreSelectors,
    listingUrl: (store, pageNumber, pageSize) =>
      `${root}/str/${encodeURIComponent(store)}?_pgn=${pageNumber}&_ipg=${pageSize}`,
    itemUrl: (itemId) => `${root}/itm/${itemId}`,
    ...overrides,
  };
}
