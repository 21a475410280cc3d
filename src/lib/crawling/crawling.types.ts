/**
 * Crawling Types
 * Type definitions for the single-domain crawl engine
 */

/**
 * Timings used for one page-fetch attempt (milliseconds)
 */
export interface FetchTimings {
  /**
   * Navigation timeout (document ready)
   */
  navigationTimeout: number;

  /**
   * Best-effort wait for network quiescence
   */
  networkIdleTimeout: number;

  /**
   * Best-effort wait for body / content selectors
   */
  selectorTimeout: number;

  /**
   * Unconditional delay after the layered waits
   */
  settleDelay: number;

  /**
   * Pause after each scroll step
   */
  scrollPause: number;
}

/**
 * Crawling configuration interface
 */
export interface CrawlingConfig {
  /**
   * Seed URL; its host is the crawl scope
   */
  startUrl: string;

  /**
   * Maximum pages successfully fetched
   */
  maxPages: number;

  /**
   * Maximum crawl depth (seed = 0)
   */
  maxDepth: number;

  /**
   * Politeness delay in milliseconds between pages
   */
  delayBetweenRequests: number;

  /**
   * Fetch attempts per URL
   */
  maxAttempts: number;

  /**
   * Delay in milliseconds between attempts for the same URL
   */
  retryDelay: number;

  timings: FetchTimings;
}

/**
 * Frontier entry: a discovered URL awaiting fetch
 */
export interface FrontierEntry {
  readonly url: string;
  readonly depth: number;
}

export type EnqueueResult = 'enqueued' | 'seen' | 'out_of_scope';

export type HeadingTag = 'h1' | 'h2' | 'h3' | 'h4';

export interface PageHeading {
  readonly tag: HeadingTag;
  readonly text: string;
}

/**
 * Durable output unit, one per successfully crawled page.
 * Keys are snake_case: the JSON file is read by the downstream pipeline.
 */
export interface PageDocument {
  readonly url: string;
  readonly depth: number;
  readonly title: string;
  readonly meta_description: string;
  readonly headings: readonly PageHeading[];
  readonly paragraphs: readonly string[];
  readonly lists: readonly string[];
  readonly text: string;
  /**
   * Length of the composite text before the output cap
   */
  readonly text_length: number;
  readonly crawled_at: string;
}

export enum CrawlState {
  IDLE = 'idle',
  RUNNING = 'running',
  COMPLETED = 'completed',
  ABORTED = 'aborted',
}

/**
 * Crawling statistics interface
 */
export interface CrawlingStatistics {
  /**
   * Pages that produced a document
   */
  pagesFetched: number;

  /**
   * Frontier entries handed to the retry controller
   */
  pagesAttempted: number;

  /**
   * URLs that exhausted every attempt
   */
  pagesFailed: number;

  /**
   * Entries dequeued beyond the maximum depth
   */
  pagesSkipped: number;

  /**
   * New URLs added to the frontier
   */
  linksEnqueued: number;

  /**
   * Links already in the seen set
   */
  duplicateLinks: number;

  /**
   * Links outside the crawl host
   */
  externalLinks: number;

  /**
   * Maximum depth of a fetched page
   */
  depthReached: number;

  /**
   * Total crawling time in milliseconds
   */
  totalTime: number;

  /**
   * Average time per fetched page in milliseconds
   */
  averagePageTime: number;

  /**
   * Success rate over attempted pages (0-1)
   */
  successRate: number;
}

/**
 * Aggregate numbers over the produced documents
 */
export interface DocumentSummary {
  documents: number;
  totalTextLength: number;
  averageTextLength: number;
  pagesWithContent: number;
}

/**
 * Outcome of one crawl run
 */
export interface CrawlSummary extends CrawlingStatistics, DocumentSummary {
  state: CrawlState.COMPLETED | CrawlState.ABORTED;
  startUrl: string;
  outputFile: string;
}
