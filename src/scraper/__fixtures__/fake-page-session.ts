import { FetchFailedError } from '../../utils/errors.js';
import type { PageSession } from '../page-session.js';

export interface FakePage {
  html: string;
  /** Successive title() results; the last one repeats */
  titles?: string[];
  /** HTML shown after activating compatibility sub-page n */
  subPages?: Record<number, string>;
  /** Thrown by activateSubPage(n) */
  subPageErrors?: Record<number, Error>;
  /** Thrown by html() once sub-page n has been activated */
  subPageReadErrors?: Record<number, Error>;
  /** Thrown by open() */
  openError?: Error;
}

/**
 * In-memory page session serving static HTML by URL
 */
export class FakePageSession implements PageSession {
  readonly opened: string[] = [];
  readonly waits: number[] = [];
  readonly activated: number[] = [];

  private current: FakePage | null = null;
  private currentHtml = '';
  private readError: Error | undefined;
  private titleCalls = 0;

  constructor(private readonly pages: Record<string, FakePage>) {}

  async open(url: string): Promise<void> {
    this.opened.push(url);
    const page = this.pages[url];
    if (!page) {
      throw new FetchFailedError(url, 'net::ERR_NAME_NOT_RESOLVED');
    }
    if (page.openError) {
      throw page.openError;
    }
    this.current = page;
    this.currentHtml = page.html;
    this.readError = undefined;
    this.titleCalls = 0;
  }

  async title(): Promise<string> {
    const titles = this.current?.titles ?? ['Item page'];
    const title = titles[Math.min(this.titleCalls, titles.length - 1)];
    this.titleCalls++;
    return title;
  }

  async html(): Promise<string> {
    if (this.readError) {
      throw this.readError;
    }
    return this.currentHtml;
  }

  async wait(ms: number): Promise<void> {
    this.waits.push(ms);
  }

  async activateSubPage(pageNumber: number): Promise<boolean> {
    this.activated.push(pageNumber);
    const error = this.current?.subPageErrors?.[pageNumber];
    if (error) {
      throw error;
    }
    const html = this.current?.subPages?.[pageNumber];
    if (html === undefined) {
      return false;
    }
    this.currentHtml = html;
    this.readError = this.current?.subPageReadErrors?.[pageNumber];
    return true;
  }
}

/**
 * Compatibility wrapper HTML with the given rows and page buttons
 */
export function compatibilityHtml(rows: Array<[make: string, year: string]>, buttons: string[] = []): string {
  const body = rows.map(([make, year]) => `<tr><td>${make}</td><td>Model</td><td>${year}</td></tr>`).join('');
  const controls = buttons.map((label) => `<button class="pagination__item">${label}</button>`).join('');
  return `<html><body><div id="d-motors-compatibility-table"><table><thead><tr><th>Make</th><th>Model</th><th>Year</th></tr></thead><tbody>${body}</tbody></table>${controls}</div></body></html>`;
}
