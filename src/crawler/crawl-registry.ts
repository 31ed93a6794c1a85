/**
 * Crawl Registry
 *
 * Single owner of link-crawl state. Workers only touch it from their
 * completion handlers, which run synchronously between awaits, so no two
 * updates interleave.
 */

import type { CrawledPage, ImageSighting, LinkCrawlError } from '../types/index.js';

export interface RegistrySnapshot {
  pages: CrawledPage[];
  errors: LinkCrawlError[];
  images: ImageSighting[];
  seenUrls: number;
}

export class CrawlRegistry {
  private readonly seen = new Set<string>();
  private readonly images = new Map<string, ImageSighting>();
  private readonly pages: CrawledPage[] = [];
  private readonly errors: LinkCrawlError[] = [];

  /**
   * Claim a canonical URL; false when it was already claimed
   */
  markSeen(canonicalUrl: string): boolean {
    if (this.seen.has(canonicalUrl)) {
      return false;
    }
    this.seen.add(canonicalUrl);
    return true;
  }

  recordPage(page: CrawledPage): void {
    this.pages.push(page);

    for (const image of page.images) {
      const sighting = this.images.get(image.src);
      if (!sighting) {
        this.images.set(image.src, { src: image.src, alt: image.alt, foundOn: [page.url] });
      } else if (!sighting.foundOn.includes(page.url)) {
        sighting.foundOn.push(page.url);
      }
    }
  }

  recordError(error: LinkCrawlError): void {
    this.errors.push(error);
  }

  get pageCount(): number {
    return this.pages.length;
  }

  get errorCount(): number {
    return this.errors.length;
  }

  snapshot(): RegistrySnapshot {
    return {
      pages: [...this.pages],
      errors: [...this.errors],
      images: [...this.images.values()]
        .map((sighting) => ({ ...sighting, foundOn: [...sighting.foundOn] }))
        .sort((a, b) => (a.src < b.src ? -1 : a.src > b.src ? 1 : 0)),
      seenUrls: this.seen.size,
    };
  }
}
