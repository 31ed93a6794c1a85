/**
 * A single rendered browser tab, reused across listing and item pages.
 * The extractors only talk to this interface so tests can drive them with
 * static HTML.
 */
export interface PageSession {
  /** Navigate and wait for the load event; throws a CrawlError on failure */
  open(url: string): Promise<void>;
  title(): Promise<string>;
  html(): Promise<string>;
  wait(ms: number): Promise<void>;
  /**
   * Click the compatibility sub-table control labelled `pageNumber` and wait
   * for it to render. Resolves false when no such visible control exists.
   */
  activateSubPage(pageNumber: number): Promise<boolean>;
}
