import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import {
  AttributeTableExtractor,
  expandYear,
  parseCompatibilityPage,
  summarizeRows,
} from './attribute-table-extractor.js';
import { defaultStoreSelectors } from './store-selectors.js';
import { FakePageSession, compatibilityHtml } from './__fixtures__/fake-page-session.js';

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

function loadFixture(filename: string): string {
  return fs.readFileSync(path.join(__dirname, '__fixtures__', filename), 'utf-8');
}

const ITEM_URL = 'https://shop.example.test/itm/100000000001';

async function sessionWith(html: string, subPages: Record<number, string> = {}, subPageErrors: Record<number, Error> = {}) {
  const session = new FakePageSession({ [ITEM_URL]: { html, subPages, subPageErrors } });
  await session.open(ITEM_URL);
  return session;
}

describe('expandYear', () => {
  it('expands an inclusive range', () => {
    expect(expandYear('2004-2006')).toEqual(['2004', '2005', '2006']);
  });

  it('accepts an en dash and surrounding spaces', () => {
    expect(expandYear(' 2019 – 2020 ')).toEqual(['2019', '2020']);
  });

  it('keeps a single year', () => {
    expect(expandYear('2010')).toEqual(['2010']);
  });

  it('takes the year from a cell with trailing text', () => {
    expect(expandYear('2012 Model')).toEqual(['2012']);
  });

  it('expands a longer range', () => {
    expect(expandYear('2009-2015')).toEqual(['2009', '2010', '2011', '2012', '2013', '2014', '2015']);
  });

  it('returns nothing for a reversed range', () => {
    expect(expandYear('2015-2009')).toEqual([]);
  });

  it('passes through text without a leading year', () => {
    expect(expandYear('All years')).toEqual(['All years']);
  });

  it('returns nothing for an empty cell', () => {
    expect(expandYear('   ')).toEqual([]);
  });
});

describe('parseCompatibilityPage', () => {
  it('reads rows and the page count from the fixture', () => {
    const page = parseCompatibilityPage(loadFixture('item-page.html'), defaultStoreSelectors);

    expect(page).toEqual({
      exists: true,
      hasTable: true,
      rows: [
        { make: 'Ford', yearText: '2004-2006' },
        { make: 'Audi', yearText: '2010' },
      ],
      totalPages: 2,
    });
  });

  it('reports a missing wrapper', () => {
    expect(parseCompatibilityPage('<p>no table</p>', defaultStoreSelectors)).toEqual({
      exists: false,
      hasTable: false,
      rows: [],
      totalPages: 0,
    });
  });

  it('reports a wrapper without a table', () => {
    const html = '<div id="d-motors-compatibility-table"><p>Loading</p></div>';

    expect(parseCompatibilityPage(html, defaultStoreSelectors)).toEqual({
      exists: true,
      hasTable: false,
      rows: [],
      totalPages: 0,
    });
  });

  it('uses the highest numbered button as the page count', () => {
    const html = compatibilityHtml([['Fiat', '2001']], ['1', '2', '...', '14', 'Next']);

    expect(parseCompatibilityPage(html, defaultStoreSelectors).totalPages).toBe(14);
  });

  it('skips cells that repeat the header', () => {
    const html = compatibilityHtml([
      ['Make', 'Year'],
      ['Seat', '2015'],
    ]);

    expect(parseCompatibilityPage(html, defaultStoreSelectors).rows).toEqual([{ make: 'Seat', yearText: '2015' }]);
  });
});

describe('summarizeRows', () => {
  it('sorts makes and years and deduplicates entries in row order', () => {
    const summary = summarizeRows([
      { make: 'Ford', yearText: '2004-2005' },
      { make: 'Audi', yearText: '2010' },
      { make: 'Ford', yearText: '2005' },
      { make: '', yearText: '1999' },
    ]);

    expect(summary).toEqual({
      makes: ['Audi', 'Ford'],
      years: ['1999', '2004', '2005', '2010'],
      entries: [
        { make: 'Ford', year: '2004' },
        { make: 'Ford', year: '2005' },
        { make: 'Audi', year: '2010' },
      ],
    });
  });
});

describe('AttributeTableExtractor', () => {
  let extractor: AttributeTableExtractor;

  beforeEach(() => {
    vi.clearAllMocks();
    extractor = new AttributeTableExtractor({ selectors: defaultStoreSelectors });
  });

  it('does not read the page in skip mode', async () => {
    const session = await sessionWith(loadFixture('item-page.html'));
    const htmlSpy = vi.spyOn(session, 'html');

    const result = await extractor.extract(session, 'skip');

    expect(result.status).toBe('skipped');
    expect(result.complete).toBe(true);
    expect(htmlSpy).not.toHaveBeenCalled();
  });

  it('marks a page without the table as absent', async () => {
    const session = await sessionWith('<html><body></body></html>');

    const result = await extractor.extract(session, 'exhaustive');

    expect(result.status).toBe('absent');
    expect(result.entries).toEqual([]);
  });

  it('marks a wrapper without rows as empty', async () => {
    const session = await sessionWith('<div id="d-motors-compatibility-table"></div>');

    const result = await extractor.extract(session, 'sampled');

    expect(result).toEqual({
      status: 'empty',
      makes: [],
      years: [],
      entries: [],
      totalPages: 1,
      pagesVisited: 1,
      complete: true,
    });
  });

  it('reads only the first sub-page in sampled mode', async () => {
    const session = await sessionWith(loadFixture('item-page.html'));

    const result = await extractor.extract(session, 'sampled');

    expect(result).toEqual({
      status: 'present',
      makes: ['Audi', 'Ford'],
      years: ['2004', '2005', '2006', '2010'],
      entries: [
        { make: 'Ford', year: '2004' },
        { make: 'Ford', year: '2005' },
        { make: 'Ford', year: '2006' },
        { make: 'Audi', year: '2010' },
      ],
      totalPages: 2,
      pagesVisited: 1,
      complete: false,
    });
    expect(session.activated).toEqual([]);
  });

  it('walks every sub-page in exhaustive mode', async () => {
    const buttons = ['1', '2', '3'];
    const session = await sessionWith(compatibilityHtml([['Ford', '2004']], buttons), {
      2: compatibilityHtml([['Opel', '2007-2008']], buttons),
      3: compatibilityHtml([['Audi', '2010']], buttons),
    });

    const result = await extractor.extract(session, 'exhaustive');

    expect(session.activated).toEqual([2, 3]);
    expect(result.pagesVisited).toBe(3);
    expect(result.complete).toBe(true);
    expect(result.warning).toBeUndefined();
    expect(result.makes).toEqual(['Audi', 'Ford', 'Opel']);
    expect(result.years).toEqual(['2004', '2007', '2008', '2010']);
  });

  it('keeps collected rows and warns when a sub-page renders nothing', async () => {
    const buttons = ['1', '2', '3'];
    const session = await sessionWith(compatibilityHtml([['Ford', '2004']], buttons), {
      2: compatibilityHtml([], buttons),
    });

    const result = await extractor.extract(session, 'exhaustive');

    expect(result.status).toBe('present');
    expect(result.pagesVisited).toBe(1);
    expect(result.complete).toBe(false);
    expect(result.warning).toBe('Sub-page 2/3: sub-page rendered no rows');
    expect(result.entries).toEqual([{ make: 'Ford', year: '2004' }]);
  });

  it('stops when a pagination control is missing', async () => {
    const buttons = ['1', '2', '3'];
    const session = await sessionWith(compatibilityHtml([['Ford', '2004']], buttons), {
      2: compatibilityHtml([['Opel', '2007']], buttons),
    });

    const result = await extractor.extract(session, 'exhaustive');

    expect(session.activated).toEqual([2, 3]);
    expect(result.pagesVisited).toBe(2);
    expect(result.complete).toBe(false);
    expect(result.warning).toBe('Sub-page 3/3: pagination control not available');
  });

  it('stops when activating a sub-page throws', async () => {
    const buttons = ['1', '2'];
    const session = await sessionWith(compatibilityHtml([['Ford', '2004']], buttons), {}, {
      2: new Error('Node is detached from document'),
    });

    const result = await extractor.extract(session, 'exhaustive');

    expect(result.complete).toBe(false);
    expect(result.warning).toBe('Sub-page 2/2: sub-page read failed: Node is detached from document');
  });

  it('keeps earlier rows when reading a sub-page fails after the click', async () => {
    const buttons = ['1', '2'];
    const session = new FakePageSession({
      [ITEM_URL]: {
        html: compatibilityHtml([['Ford', '2004']], buttons),
        subPages: { 2: compatibilityHtml([['Opel', '2007']], buttons) },
        subPageReadErrors: { 2: new Error('Execution context was destroyed') },
      },
    });
    await session.open(ITEM_URL);

    const result = await extractor.extract(session, 'exhaustive');

    expect(session.activated).toEqual([2]);
    expect(result.status).toBe('present');
    expect(result.pagesVisited).toBe(1);
    expect(result.complete).toBe(false);
    expect(result.warning).toBe('Sub-page 2/2: sub-page read failed: Execution context was destroyed');
    expect(result.entries).toEqual([{ make: 'Ford', year: '2004' }]);
  });

  it('reports progress at the configured interval', async () => {
    const onProgress = vi.fn();
    extractor = new AttributeTableExtractor({ selectors: defaultStoreSelectors, progressInterval: 2, onProgress });
    const buttons = ['1', '2', '3', '4'];
    const session = await sessionWith(compatibilityHtml([['Ford', '2001']], buttons), {
      2: compatibilityHtml([['Ford', '2002']], buttons),
      3: compatibilityHtml([['Ford', '2003']], buttons),
      4: compatibilityHtml([['Ford', '2004']], buttons),
    });

    await extractor.extract(session, 'exhaustive');

    expect(onProgress.mock.calls).toEqual([
      [{ pageNumber: 2, totalPages: 4, rows: 2 }],
      [{ pageNumber: 4, totalPages: 4, rows: 4 }],
    ]);
  });
});
