/**
 * Output files for both run modes, named with a run timestamp
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { format } from 'date-fns';
import { logger } from '../utils/logger.js';
import type { DetailRecord, ImageSighting, CrawledPage } from '../types/index.js';
import { toCsv } from './csv.js';
import { PAGE_IMAGE_COLUMNS, PRODUCT_COLUMNS, UNIQUE_IMAGE_COLUMNS, type RecordSink } from './record-sink.js';

export interface CatalogOutputPaths {
  jsonPath: string;
  csvPath: string;
  rows: number;
}

export interface LinkCrawlOutputPaths {
  pagesPath: string;
  imagesPath: string;
  rows: number;
}

export function runTimestamp(date: Date = new Date()): string {
  return format(date, 'yyyyMMdd-HHmmss');
}

/**
 * JSON dump of every record plus the store-import CSV
 */
export async function writeCatalogOutputs(
  directory: string,
  records: readonly DetailRecord[],
  sink: RecordSink,
  timestamp: string = runTimestamp()
): Promise<CatalogOutputPaths> {
  await mkdir(directory, { recursive: true });

  const jsonPath = join(directory, `products-${timestamp}.json`);
  const csvPath = join(directory, `product-import-${timestamp}.csv`);
  const rows = sink.toRows(records);

  await writeFile(jsonPath, JSON.stringify(records, null, 2), 'utf-8');
  await writeFile(csvPath, toCsv(PRODUCT_COLUMNS, rows), 'utf-8');

  logger.info('Catalog output written', { jsonPath, csvPath, products: records.length, rows: rows.length });

  return { jsonPath, csvPath, rows: rows.length };
}

/**
 * Page/image table and unique-image table of a link crawl
 */
export async function writeLinkCrawlOutputs(
  directory: string,
  pages: readonly CrawledPage[],
  images: readonly ImageSighting[],
  sink: RecordSink,
  timestamp: string = runTimestamp()
): Promise<LinkCrawlOutputPaths> {
  await mkdir(directory, { recursive: true });

  const pagesPath = join(directory, `images-${timestamp}.csv`);
  const imagesPath = join(directory, `unique-images-${timestamp}.csv`);
  const rows = sink.pageImageRows(pages);

  await writeFile(pagesPath, toCsv(PAGE_IMAGE_COLUMNS, rows), 'utf-8');
  await writeFile(imagesPath, toCsv(UNIQUE_IMAGE_COLUMNS, sink.uniqueImageRows(images)), 'utf-8');

  logger.info('Link crawl output written', { pagesPath, imagesPath, rows: rows.length, uniqueImages: images.length });

  return { pagesPath, imagesPath, rows: rows.length };
}
