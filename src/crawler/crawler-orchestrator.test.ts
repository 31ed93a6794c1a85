import { describe, it, expect, vi, beforeEach } from 'vitest';
import { CrawlerOrchestrator } from './crawler-orchestrator.js';
import { LinkClassifier } from './link-classifier.js';
import { FetchFailedError } from '../utils/errors.js';
import type { FetchedPage, PageFetcher } from '../scraper/http-client.js';
import type { Sleeper } from '../types/index.js';

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const ORIGIN = 'https://shop.example.test';

/** HTML body, HTTP status, or an error to throw */
type SiteEntry = string | number | Error;

class FakeFetcher implements PageFetcher {
  readonly requested: string[] = [];
  active = 0;
  maxActive = 0;

  constructor(
    private readonly site: Record<string, SiteEntry>,
    private readonly latencyMs = 0
  ) {}

  async fetch(url: string): Promise<FetchedPage> {
    this.requested.push(url);
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      if (this.latencyMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.latencyMs));
      }
      const entry = this.site[url];
      if (entry instanceof Error) {
        throw entry;
      }
      if (entry === undefined) {
        return { url, status: 404, html: '' };
      }
      if (typeof entry === 'number') {
        return { url, status: entry, html: '' };
      }
      return { url, status: 200, html: entry };
    } finally {
      this.active--;
    }
  }
}

const HOME = `
  <html><head><title>Shop Home</title></head><body>
    <img src="/img/hero.jpg" alt="Hero">
    <a href="/products/bulb">Bulb</a>
    <a href="/collections/lights">Lights</a>
    <a href="/about">About</a>
    <a href="/cart/">Cart</a>
    <a href="https://other.example.test/x">Elsewhere</a>
    <a href="/logo.png">Logo</a>
    <a href="/products/bulb#reviews">Reviews</a>
    <a href="/missing">Gone</a>
  </body></html>`;

const BULB = `
  <html><head><title>Bulb | Shop</title>
  <script type="application/ld+json">{"@type":"Product","name":"Bulb","offers":{"price":"5.00","priceCurrency":"GBP"}}</script>
  </head><body>
    <img src="/img/hero.jpg" alt="Hero">
    <img src="/img/bulb.jpg" alt="Bulb">
    <a href="/">Home</a>
  </body></html>`;

const LIGHTS = `
  <html><head><title>Lights</title></head><body>
    <a href="/products/bulb?utm_source=nav">Bulb</a>
    <a href="/products/lamp">Lamp</a>
  </body></html>`;

const SITE: Record<string, SiteEntry> = {
  [`${ORIGIN}/`]: HOME,
  [`${ORIGIN}/products/bulb`]: BULB,
  [`${ORIGIN}/collections/lights`]: LIGHTS,
  [`${ORIGIN}/about`]: '<html><head><title>About</title></head><body></body></html>',
  [`${ORIGIN}/missing`]: 404,
  [`${ORIGIN}/products/lamp`]: new FetchFailedError(`${ORIGIN}/products/lamp`, 'socket hang up'),
};

const NOW = new Date('2024-03-01T10:00:00.000Z');

describe('CrawlerOrchestrator', () => {
  const sleep = vi.fn<Sleeper>(async () => undefined);

  beforeEach(() => {
    vi.clearAllMocks();
  });

  function crawler(fetcher: PageFetcher) {
    return new CrawlerOrchestrator({ fetcher, sleep, now: () => NOW });
  }

  it('crawls breadth-first and visits each page once', async () => {
    const fetcher = new FakeFetcher(SITE);

    const result = await crawler(fetcher).crawl({ domain: 'shop.example.test', concurrency: 1, delayMs: 0 });

    expect(fetcher.requested).toEqual([
      `${ORIGIN}/`,
      `${ORIGIN}/products/bulb`,
      `${ORIGIN}/collections/lights`,
      `${ORIGIN}/about`,
      `${ORIGIN}/missing`,
      `${ORIGIN}/products/lamp`,
    ]);
    expect(result.pagesCrawled).toBe(4);
    expect(result.urlsDiscovered).toBe(6);
    expect(result.budgetReached).toBe(false);
    expect(result.aborted).toBe(false);
  });

  it('classifies pages and extracts product fields on product pages', async () => {
    const result = await crawler(new FakeFetcher(SITE)).crawl({ domain: 'shop.example.test', concurrency: 1, delayMs: 0 });

    const byUrl = new Map(result.pages.map((page) => [page.url, page]));
    expect(byUrl.get(`${ORIGIN}/`)?.pageType).toBe('other');
    expect(byUrl.get(`${ORIGIN}/collections/lights`)?.pageType).toBe('category');

    const bulb = byUrl.get(`${ORIGIN}/products/bulb`);
    expect(bulb?.pageType).toBe('product');
    expect(bulb?.title).toBe('Bulb | Shop');
    expect(bulb?.product?.title).toBe('Bulb');
    expect(bulb?.product?.price).toBe('5.00');
    expect(byUrl.get(`${ORIGIN}/`)?.product).toBeUndefined();
  });

  it('records HTTP errors and fetch failures without stopping', async () => {
    const result = await crawler(new FakeFetcher(SITE)).crawl({ domain: 'shop.example.test', concurrency: 1, delayMs: 0 });

    expect(result.errors).toEqual([
      { url: `${ORIGIN}/missing`, errorType: 'http_error', status: 404, occurredAt: '2024-03-01T10:00:00.000Z' },
      {
        url: `${ORIGIN}/products/lamp`,
        errorType: 'FetchFailed',
        message: `Failed to load ${ORIGIN}/products/lamp: socket hang up`,
        occurredAt: '2024-03-01T10:00:00.000Z',
      },
    ]);
  });

  it('aggregates images across pages', async () => {
    const result = await crawler(new FakeFetcher(SITE)).crawl({ domain: 'shop.example.test', concurrency: 1, delayMs: 0 });

    expect(result.uniqueImages).toEqual([
      { src: `${ORIGIN}/img/bulb.jpg`, alt: 'Bulb', foundOn: [`${ORIGIN}/products/bulb`] },
      { src: `${ORIGIN}/img/hero.jpg`, alt: 'Hero', foundOn: [`${ORIGIN}/`, `${ORIGIN}/products/bulb`] },
    ]);
  });

  it('stops dispatching at the page budget', async () => {
    const fetcher = new FakeFetcher(SITE);

    const result = await crawler(fetcher).crawl({ domain: 'shop.example.test', maxPages: 2, concurrency: 1, delayMs: 0 });

    expect(fetcher.requested).toEqual([`${ORIGIN}/`, `${ORIGIN}/products/bulb`]);
    expect(result.pagesCrawled).toBe(2);
    expect(result.budgetReached).toBe(true);
  });

  it('lets in-flight fetches finish when the budget is reached', async () => {
    const fetcher = new FakeFetcher(SITE, 5);

    const result = await crawler(fetcher).crawl({
      domain: 'shop.example.test',
      seedUrls: [`${ORIGIN}/collections/lights`],
      maxPages: 2,
      concurrency: 3,
      delayMs: 0,
    });

    expect(fetcher.requested).toEqual([`${ORIGIN}/`, `${ORIGIN}/collections/lights`]);
    expect(fetcher.maxActive).toBe(2);
    expect(result.pages.map((page) => page.url)).toEqual([`${ORIGIN}/`, `${ORIGIN}/collections/lights`]);
    expect(result.budgetReached).toBe(true);
  });

  it('follows only links in the chosen scope', async () => {
    const fetcher = new FakeFetcher(SITE);

    await crawler(fetcher).crawl({ domain: 'shop.example.test', follow: 'product', concurrency: 1, delayMs: 0 });

    expect(fetcher.requested).toEqual([`${ORIGIN}/`, `${ORIGIN}/products/bulb`]);
  });

  it('collects full page data on every page under the fullmonty scope', async () => {
    const fetcher = new FakeFetcher(SITE);

    const result = await crawler(fetcher).crawl({ domain: 'shop.example.test', follow: 'fullmonty', concurrency: 1, delayMs: 0 });

    expect(fetcher.requested).toEqual([
      `${ORIGIN}/`,
      `${ORIGIN}/products/bulb`,
      `${ORIGIN}/collections/lights`,
      `${ORIGIN}/products/lamp`,
    ]);

    const byUrl = new Map(result.pages.map((page) => [page.url, page]));
    expect(byUrl.get(`${ORIGIN}/`)?.product).toEqual({});
    expect(byUrl.get(`${ORIGIN}/`)?.details?.metrics).toEqual({
      wordCount: 8,
      totalImageCount: 1,
      internalLinkCount: 7,
      externalLinkCount: 1,
    });
    expect(byUrl.get(`${ORIGIN}/products/bulb`)?.details).toEqual({
      seo: {
        metaTitle: 'Bulb | Shop',
        metaDescription: '',
        h1: '',
        canonicalUrl: '',
        ogImage: '',
        ogTitle: '',
        ogDescription: '',
      },
      metrics: { wordCount: 1, totalImageCount: 2, internalLinkCount: 1, externalLinkCount: 0 },
      schemaTypes: ['Product'],
    });
    expect(byUrl.get(`${ORIGIN}/collections/lights`)?.details?.schemaTypes).toEqual([]);
  });

  it('adds seed URLs after the home page', async () => {
    const fetcher = new FakeFetcher(SITE);

    await crawler(fetcher).crawl({
      domain: 'shop.example.test',
      seedUrls: [`${ORIGIN}/products/lamp`, `${ORIGIN}/`],
      maxPages: 2,
      concurrency: 1,
      delayMs: 0,
    });

    expect(fetcher.requested).toEqual([`${ORIGIN}/`, `${ORIGIN}/products/lamp`]);
  });

  it('uses known product URLs from the classifier', async () => {
    const orchestrator = new CrawlerOrchestrator({
      fetcher: new FakeFetcher(SITE),
      classifier: new LinkClassifier({ knownProductUrls: [`${ORIGIN}/about`] }),
      sleep,
    });

    const result = await orchestrator.crawl({ domain: 'shop.example.test', concurrency: 1, delayMs: 0 });

    expect(result.pages.find((page) => page.url === `${ORIGIN}/about`)?.pageType).toBe('product');
  });

  it('waits between requests of the same worker', async () => {
    await crawler(new FakeFetcher(SITE)).crawl({ domain: 'shop.example.test', maxPages: 3, concurrency: 1, delayMs: 500 });

    expect(sleep.mock.calls).toEqual([[500], [500]]);
  });

  it('never runs more fetches at once than the concurrency limit', async () => {
    const links = Array.from({ length: 8 }, (_, i) => `<a href="/page-${i}">${i}</a>`).join('');
    const site: Record<string, SiteEntry> = { [`${ORIGIN}/`]: `<html><body>${links}</body></html>` };
    for (let i = 0; i < 8; i++) {
      site[`${ORIGIN}/page-${i}`] = '<html><body></body></html>';
    }
    const fetcher = new FakeFetcher(site, 5);

    const result = await crawler(fetcher).crawl({ domain: 'shop.example.test', concurrency: 3, delayMs: 0 });

    expect(result.pagesCrawled).toBe(9);
    expect(fetcher.maxActive).toBe(3);
  });

  it('does not fetch anything once aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fetcher = new FakeFetcher(SITE);

    const result = await crawler(fetcher).crawl({ domain: 'shop.example.test', signal: controller.signal });

    expect(fetcher.requested).toEqual([]);
    expect(result.pagesCrawled).toBe(0);
    expect(result.aborted).toBe(true);
  });
});
