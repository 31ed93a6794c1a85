import { skippedCompatibility } from '../../scraper/attribute-table-extractor.js';
import type { DetailRecord, ErrorRecord } from '../../types/index.js';

export function makeRecord(itemId: string, overrides: Partial<DetailRecord> = {}): DetailRecord {
  return {
    itemId,
    url: `https://shop.example.test/itm/${itemId}`,
    title: `Item ${itemId}`,
    price: '10.00',
    currency: 'GBP',
    brand: '',
    condition: '',
    productType: '',
    mpn: '',
    description: '',
    specifics: {},
    images: [],
    compatibility: skippedCompatibility(),
    scrapedAt: '2024-03-01T10:00:00.000Z',
    ...overrides,
  };
}

export function makeErrorRecord(itemId: string, overrides: Partial<ErrorRecord> = {}): ErrorRecord {
  return {
    itemId,
    url: `https://shop.example.test/itm/${itemId}`,
    errorType: 'FetchTimeout',
    message: 'Timed out',
    occurredAt: '2024-03-01T10:00:00.000Z',
    ...overrides,
  };
}
