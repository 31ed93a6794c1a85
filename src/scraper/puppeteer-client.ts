import puppeteer, { TimeoutError, type Browser, type Page } from 'puppeteer-core';
import { logger } from '../utils/logger.js';
import { ConfigError, FetchFailedError, FetchTimeoutError, toErrorMessage } from '../utils/errors.js';
import { sleep } from '../utils/sleep.js';
import type { PageSession } from './page-session.js';
import type { StoreSelectors } from './store-selectors.js';

export interface PuppeteerClientOptions {
  /** Connect to an already running browser (takes precedence) */
  wsEndpoint?: string;
  /** Launch a local Chrome/Chromium binary */
  executablePath?: string;
  navigationTimeoutMs: number;
  /** Wait after clicking a sub-table page */
  subPageSettleMs?: number;
  selectors: StoreSelectors;
}

/**
 * Puppeteer-based browser client
 *
 * Uses puppeteer-core, so no browser is downloaded: either connect to a
 * remote browser over WebSocket or launch a locally installed binary.
 */
export class PuppeteerClient {
  private browser: Browser | null = null;

  constructor(private readonly options: PuppeteerClientOptions) {
    if (!options.wsEndpoint && !options.executablePath) {
      throw new ConfigError('Set BROWSER_WS_ENDPOINT or CHROME_EXECUTABLE_PATH to run a catalog scrape');
    }
  }

  /**
   * Initialize browser connection
   */
  async initialize(): Promise<void> {
    if (this.browser) {
      return;
    }

    if (this.options.wsEndpoint) {
      logger.info('Connecting to remote browser');
      this.browser = await puppeteer.connect({ browserWSEndpoint: this.options.wsEndpoint });
    } else {
      logger.info('Launching local browser', { executablePath: this.options.executablePath });
      this.browser = await puppeteer.launch({
        executablePath: this.options.executablePath,
        headless: true,
        args: ['--no-sandbox', '--disable-blink-features=AutomationControlled'],
      });
    }
  }

  /**
   * Open a tab that lives for the whole run
   */
  async openSession(): Promise<PuppeteerPageSession> {
    await this.initialize();
    if (!this.browser) {
      throw new Error('Browser failed to initialize');
    }

    const page = await this.browser.newPage();
    await page.setViewport({ width: 1920, height: 1080 });

    return new PuppeteerPageSession(page, this.options);
  }

  /**
   * Close browser connection
   */
  async close(): Promise<void> {
    if (!this.browser) {
      return;
    }

    const browser = this.browser;
    this.browser = null;

    if (this.options.wsEndpoint) {
      await browser.disconnect();
    } else {
      await browser.close();
    }
    logger.info('Browser connection closed');
  }
}

export class PuppeteerPageSession implements PageSession {
  constructor(
    private readonly page: Page,
    private readonly options: PuppeteerClientOptions
  ) {}

  async open(url: string): Promise<void> {
    try {
      await this.page.goto(url, {
        waitUntil: 'load',
        timeout: this.options.navigationTimeoutMs,
      });
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw new FetchTimeoutError(url, this.options.navigationTimeoutMs, { cause: error });
      }
      throw new FetchFailedError(url, toErrorMessage(error), { cause: error });
    }
  }

  title(): Promise<string> {
    return this.page.title();
  }

  html(): Promise<string> {
    return this.page.content();
  }

  wait(ms: number): Promise<void> {
    return sleep(ms);
  }

  async activateSubPage(pageNumber: number): Promise<boolean> {
    const { wrapper, paginationButton } = this.options.selectors.compatibility;
    const buttons = await this.page.$$(`${wrapper} ${paginationButton}`);

    for (const button of buttons) {
      const label = await button.evaluate((el) => (el.textContent ?? '').trim());
      if (label !== String(pageNumber)) {
        continue;
      }

      if (!(await button.isVisible())) {
        return false;
      }

      await button.click();
      await this.wait(this.options.subPageSettleMs ?? 1500);
      return true;
    }

    logger.debug('Sub-page control not found', { pageNumber, candidates: buttons.length });
    return false;
  }
}
