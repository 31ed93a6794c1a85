/**
 * Crawl Frontier
 * FIFO queue of pages waiting to be fetched, in breadth-first order
 */

export interface FrontierEntry {
  url: string;
  depth: number;
}

export class CrawlFrontier {
  private entries: FrontierEntry[] = [];
  private head = 0;

  enqueue(entry: FrontierEntry): void {
    this.entries.push(entry);
  }

  /**
   * Next entry, or null when the frontier is empty
   */
  dequeue(): FrontierEntry | null {
    if (this.head >= this.entries.length) {
      return null;
    }

    const entry = this.entries[this.head];
    this.head++;

    // Compact once the consumed prefix dominates
    if (this.head > 1024 && this.head * 2 > this.entries.length) {
      this.entries = this.entries.slice(this.head);
      this.head = 0;
    }

    return entry;
  }

  size(): number {
    return this.entries.length - this.head;
  }

  isEmpty(): boolean {
    return this.size() === 0;
  }
}
