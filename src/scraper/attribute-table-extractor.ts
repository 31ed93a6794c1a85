/**
 * Attribute Table Extractor
 *
 * Reads the paginated make/year compatibility table of an item page. The
 * first sub-page comes with the page HTML; later sub-pages are rendered by
 * clicking the table's own pagination controls, so traversal needs a live
 * page session.
 */

import * as cheerio from 'cheerio';
import { logger } from '../utils/logger.js';
import { PaginationDesyncError, toErrorMessage } from '../utils/errors.js';
import type { CompatMode, Compatibility, CompatibilityEntry } from '../types/index.js';
import type { PageSession } from './page-session.js';
import type { StoreSelectors } from './store-selectors.js';

const YEAR_RANGE = /^(\d{4})\s*[-–]\s*(\d{4})/;
const LEADING_YEAR = /^\d{4}/;

export interface CompatibilityRow {
  make: string;
  yearText: string;
}

export interface CompatibilityPage {
  /** Wrapper element present */
  exists: boolean;
  hasTable: boolean;
  rows: CompatibilityRow[];
  /** Highest page indicator; 0 when there are no pagination controls */
  totalPages: number;
}

export interface CompatibilityProgress {
  pageNumber: number;
  totalPages: number;
  rows: number;
}

export interface AttributeTableExtractorOptions {
  selectors: StoreSelectors;
  /** Log and report progress every N sub-pages */
  progressInterval?: number;
  onProgress?: (progress: CompatibilityProgress) => void;
}

/**
 * Expand a year cell into individual years.
 *
 * - "2004-2008" (hyphen or en dash) -> 2004..2008 inclusive
 * - a reversed range such as "2008-2004" yields nothing
 * - "2010" -> ["2010"]
 * - text without a leading year passes through unchanged
 */
export function expandYear(text: string): string[] {
  const value = text.trim();
  if (!value) {
    return [];
  }

  const range = value.match(YEAR_RANGE);
  if (range) {
    const start = Number(range[1]);
    const end = Number(range[2]);
    if (start > end) {
      return [];
    }
    return Array.from({ length: end - start + 1 }, (_, offset) => String(start + offset));
  }

  const leading = value.match(LEADING_YEAR);
  return [leading ? leading[0] : value];
}

/**
 * Parse the currently rendered compatibility sub-page
 */
export function parseCompatibilityPage(html: string, selectors: StoreSelectors): CompatibilityPage {
  const $ = cheerio.load(html);
  const { wrapper: wrapperSelector, table: tableSelector, paginationButton } = selectors.compatibility;

  const wrapper = $(wrapperSelector).first();
  if (wrapper.length === 0) {
    return { exists: false, hasTable: false, rows: [], totalPages: 0 };
  }

  const labels = wrapper
    .find(paginationButton)
    .toArray()
    .map((el) => $(el).text().trim());
  const numbered = labels.map((label) => parseInt(label, 10)).filter((n) => Number.isFinite(n) && n > 0);
  const totalPages = labels.length === 0 ? 0 : numbered.length > 0 ? Math.max(...numbered) : labels.length;

  const table = wrapper.find(tableSelector).first();
  if (table.length === 0) {
    return { exists: true, hasTable: false, rows: [], totalPages };
  }

  const headers = table
    .find('thead th, thead td')
    .toArray()
    .map((el) => $(el).text().trim().toLowerCase());
  const makeIndex = headers.indexOf('make');
  const yearIndex = headers.indexOf('year');

  const body = table.find('tbody').first();
  const rowElements = (body.length > 0 ? body : table).find('tr').toArray();

  const cellText = (cells: string[], index: number, header: string): string => {
    const text = index >= 0 && index < cells.length ? cells[index] : '';
    return text.toLowerCase() === header ? '' : text;
  };

  const rows: CompatibilityRow[] = [];
  for (const tr of rowElements) {
    const cells = $(tr)
      .find('td')
      .toArray()
      .map((el) => $(el).text().trim());
    const make = cellText(cells, makeIndex, 'make');
    const yearText = cellText(cells, yearIndex, 'year');
    if (make || yearText) {
      rows.push({ make, yearText });
    }
  }

  return { exists: true, hasTable: true, rows, totalPages };
}

function sortedUnique(values: Iterable<string>): string[] {
  return [...new Set(values)].sort();
}

/**
 * Fold parsed rows into deduplicated makes, years and make/year pairs
 */
export function summarizeRows(rows: readonly CompatibilityRow[]): Pick<Compatibility, 'makes' | 'years' | 'entries'> {
  const makes: string[] = [];
  const years: string[] = [];
  const entries: CompatibilityEntry[] = [];
  const seenEntries = new Set<string>();

  for (const row of rows) {
    const rowYears = expandYear(row.yearText);
    if (row.make) {
      makes.push(row.make);
    }
    years.push(...rowYears);

    if (!row.make) {
      continue;
    }
    for (const year of rowYears) {
      const key = `${row.make}\u0000${year}`;
      if (!seenEntries.has(key)) {
        seenEntries.add(key);
        entries.push({ make: row.make, year });
      }
    }
  }

  return { makes: sortedUnique(makes), years: sortedUnique(years), entries };
}

export function skippedCompatibility(): Compatibility {
  return {
    status: 'skipped',
    makes: [],
    years: [],
    entries: [],
    totalPages: 0,
    pagesVisited: 0,
    complete: true,
  };
}

export class AttributeTableExtractor {
  private readonly progressInterval: number;

  constructor(private readonly options: AttributeTableExtractorOptions) {
    this.progressInterval = options.progressInterval ?? 20;
  }

  /**
   * Extract compatibility for the page currently open in `session`.
   *
   * @param initialHtml - HTML already read for the first sub-page, if any
   */
  async extract(session: PageSession, mode: CompatMode, initialHtml?: string): Promise<Compatibility> {
    if (mode === 'skip') {
      return skippedCompatibility();
    }

    const first = parseCompatibilityPage(initialHtml ?? (await session.html()), this.options.selectors);

    if (!first.exists) {
      return { ...skippedCompatibility(), status: 'absent' };
    }

    const totalPages = Math.max(first.totalPages, 1);

    if (!first.hasTable) {
      return { ...skippedCompatibility(), status: 'empty', totalPages, pagesVisited: 1 };
    }

    const rows = [...first.rows];
    let pagesVisited = 1;
    let complete = totalPages === 1;
    let warning: string | undefined;

    if (mode === 'exhaustive' && totalPages > 1) {
      const traversal = await this.traverse(session, totalPages, rows);
      pagesVisited += traversal.pagesVisited;
      complete = traversal.warning === undefined;
      warning = traversal.warning;
    } else if (totalPages > 1) {
      logger.debug('Compatibility table sampled', { totalPages, rows: rows.length });
    }

    return {
      status: rows.length > 0 ? 'present' : 'empty',
      ...summarizeRows(rows),
      totalPages,
      pagesVisited,
      complete,
      ...(warning === undefined ? {} : { warning }),
    };
  }

  /**
   * Walk sub-pages 2..totalPages, appending their rows. Stops at the first
   * sub-page that cannot be activated, read, or renders no rows.
   */
  private async traverse(
    session: PageSession,
    totalPages: number,
    rows: CompatibilityRow[]
  ): Promise<{ pagesVisited: number; warning?: string }> {
    let pagesVisited = 0;

    for (let pageNumber = 2; pageNumber <= totalPages; pageNumber++) {
      let page: CompatibilityPage;
      try {
        if (!(await session.activateSubPage(pageNumber))) {
          const desync = new PaginationDesyncError(pageNumber, totalPages, 'pagination control not available');
          logger.warn('Compatibility traversal stopped', { error: desync.message });
          return { pagesVisited, warning: desync.message };
        }
        page = parseCompatibilityPage(await session.html(), this.options.selectors);
      } catch (error) {
        const desync = new PaginationDesyncError(pageNumber, totalPages, `sub-page read failed: ${toErrorMessage(error)}`);
        logger.warn('Compatibility traversal stopped', { error: desync.message });
        return { pagesVisited, warning: desync.message };
      }

      if (page.rows.length === 0) {
        // Either the real end of data or a control that did not re-render;
        // the page gives no way to tell them apart
        const desync = new PaginationDesyncError(pageNumber, totalPages, 'sub-page rendered no rows');
        logger.warn('Compatibility traversal stopped', { error: desync.message });
        return { pagesVisited, warning: desync.message };
      }

      rows.push(...page.rows);
      pagesVisited++;

      if (pageNumber % this.progressInterval === 0) {
        logger.info('Compatibility traversal progress', { pageNumber, totalPages, rows: rows.length });
        this.options.onProgress?.({ pageNumber, totalPages, rows: rows.length });
      }
    }

    return { pagesVisited };
  }
}
