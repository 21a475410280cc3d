/**
 * Browser capability interfaces
 * The fetcher and extractor only talk to these, so any automation
 * backend that implements them can drive a crawl.
 */

/**
 * Read-only view of a loaded page
 */
export interface PageHandle<TElement> {
  title(): Promise<string>;
  queryAll(selector: string): Promise<TElement[]>;
  textOf(element: TElement): Promise<string>;
  attributeOf(element: TElement, name: string): Promise<string | null>;
  /**
   * Scroll to a fraction (0-1) of the document height
   */
  scrollTo(fraction: number): Promise<void>;
}

/**
 * One isolated page, owned by a single fetch attempt
 */
export interface PageDriver<TElement> extends PageHandle<TElement> {
  /**
   * Navigate and wait for the document-ready event.
   * Resolves with the response status, or null when there was no response.
   * Rejects with NavigationTimeoutError on timeout.
   */
  navigate(url: string, timeout: number): Promise<number | null>;
  waitForNetworkIdle(timeout: number): Promise<void>;
  waitForSelector(selector: string, timeout: number): Promise<void>;
  close(): Promise<void>;
}

export interface BrowserBackend<TElement> {
  readonly name: string;
  launch(): Promise<void>;
  newPage(): Promise<PageDriver<TElement>>;
  close(): Promise<void>;
}

export interface ClientIdentity {
  userAgent: string;
  headers: Record<string, string>;
  viewport: { width: number; height: number };
}
