/**
 * Crawling Statistics Tracker
 * Counters for one crawl run plus a summary over the produced documents
 */

import { CrawlingStatistics, DocumentSummary, PageDocument } from './crawling.types';

/**
 * Documents whose text is longer than this count as pages with content
 */
export const CONTENT_TEXT_THRESHOLD = 100;

export class CrawlingStatisticsTracker {
  private startTime: number;
  private pagesFetched: number = 0;
  private pagesAttempted: number = 0;
  private pagesFailed: number = 0;
  private pagesSkipped: number = 0;
  private linksEnqueued: number = 0;
  private duplicateLinks: number = 0;
  private externalLinks: number = 0;
  private maxDepthReached: number = 0;
  private pageTimes: number[] = [];

  constructor(private readonly clock: () => number = Date.now) {
    this.startTime = this.clock();
  }

  /**
   * Record an entry handed to the retry controller
   */
  recordAttempt(): void {
    this.pagesAttempted++;
  }

  /**
   * Record a page that produced a document
   */
  recordPageVisit(depth: number, time: number): void {
    this.pagesFetched++;
    this.maxDepthReached = Math.max(this.maxDepthReached, depth);
    this.pageTimes.push(time);
  }

  /**
   * Record an entry discarded for exceeding the depth budget
   */
  recordSkipped(): void {
    this.pagesSkipped++;
  }

  /**
   * Record a URL that exhausted its attempts
   */
  recordFailed(): void {
    this.pagesFailed++;
  }

  recordEnqueued(count: number = 1): void {
    this.linksEnqueued += count;
  }

  recordDuplicate(): void {
    this.duplicateLinks++;
  }

  recordExternal(): void {
    this.externalLinks++;
  }

  getPagesFetched(): number {
    return this.pagesFetched;
  }

  /**
   * Get final statistics
   */
  getStatistics(): CrawlingStatistics {
    const totalTime = this.clock() - this.startTime;
    const averagePageTime =
      this.pageTimes.length > 0
        ? this.pageTimes.reduce((sum, time) => sum + time, 0) / this.pageTimes.length
        : 0;

    const successRate = this.pagesAttempted > 0 ? this.pagesFetched / this.pagesAttempted : 0;

    return {
      pagesFetched: this.pagesFetched,
      pagesAttempted: this.pagesAttempted,
      pagesFailed: this.pagesFailed,
      pagesSkipped: this.pagesSkipped,
      linksEnqueued: this.linksEnqueued,
      duplicateLinks: this.duplicateLinks,
      externalLinks: this.externalLinks,
      depthReached: this.maxDepthReached,
      totalTime,
      averagePageTime,
      successRate,
    };
  }
}

/**
 * Totals over the text actually persisted for each document, in code points
 */
export function summarizeDocuments(documents: readonly PageDocument[]): DocumentSummary {
  const lengths = documents.map((doc) => Array.from(doc.text).length);
  const totalTextLength = lengths.reduce((sum, length) => sum + length, 0);

  return {
    documents: documents.length,
    totalTextLength,
    averageTextLength: documents.length > 0 ? totalTextLength / documents.length : 0,
    pagesWithContent: lengths.filter((length) => length > CONTENT_TEXT_THRESHOLD).length,
  };
}
