/**
 * Crawl Orchestrator
 * Owns one crawl run: the frontier, the page and depth budgets, the
 * fetch -> extract -> enqueue loop and the final flush.
 *
 * States: idle -> running -> completed | aborted
 */

import { BrowserBackend } from '../browser/browser.types';
import { buildPageDocument, extractContent } from '../extraction/content-extractor';
import { CrawlEventLog } from '../logging/crawl-events';
import { DocumentStore } from '../storage/document-store';
import { CrawlingQueue } from './crawling-queue';
import { CrawlingStatisticsTracker, summarizeDocuments } from './crawling-statistics';
import { CrawlError, FatalLaunchError, describeFailure, errorMessage } from './crawling.errors';
import { CrawlState, CrawlSummary, CrawlingConfig, FrontierEntry, PageDocument } from './crawling.types';
import { withFetchedPage } from './page-fetcher';
import { attemptWithRetry, delay } from './retry';
import { isSameDomain, normalizeLink } from './url-normalizer';

export interface CrawlOrchestratorOptions<E> {
  config: CrawlingConfig;
  backend: BrowserBackend<E>;
  store: DocumentStore;
  log?: CrawlEventLog;
  /**
   * External interruption: stops dequeuing, then flushes what was collected
   */
  signal?: AbortSignal;
  now?: () => Date;
}

function parseStartUrl(raw: string): URL | null {
  try {
    return normalizeLink(new URL(raw), raw);
  } catch {
    return null;
  }
}

export class CrawlOrchestrator<E> {
  private state: CrawlState = CrawlState.IDLE;
  private readonly config: CrawlingConfig;
  private readonly backend: BrowserBackend<E>;
  private readonly store: DocumentStore;
  private readonly log: CrawlEventLog;
  private readonly signal?: AbortSignal;
  private readonly now: () => Date;
  private readonly documents: PageDocument[] = [];
  private readonly statistics: CrawlingStatisticsTracker;
  private readonly startUrl: URL;
  private readonly frontier: CrawlingQueue;

  constructor(options: CrawlOrchestratorOptions<E>) {
    this.config = options.config;
    this.backend = options.backend;
    this.store = options.store;
    this.log = options.log ?? new CrawlEventLog();
    this.signal = options.signal;
    this.now = options.now ?? (() => new Date());
    this.statistics = new CrawlingStatisticsTracker(() => this.now().getTime());

    const startUrl = parseStartUrl(this.config.startUrl);
    if (!startUrl) {
      throw new CrawlError(`Start URL must be an http(s) URL: ${this.config.startUrl}`);
    }
    this.startUrl = startUrl;
    this.frontier = new CrawlingQueue(startUrl.host);
  }

  getState(): CrawlState {
    return this.state;
  }

  getDocuments(): readonly PageDocument[] {
    return this.documents;
  }

  getFrontier(): CrawlingQueue {
    return this.frontier;
  }

  /**
   * Run the crawl to completion or interruption. Documents collected so far
   * are flushed on every exit path; a fatal error is rethrown after the flush.
   */
  async run(): Promise<CrawlSummary> {
    if (this.state !== CrawlState.IDLE) {
      throw new CrawlError(`Crawl already ${this.state}`);
    }

    this.state = CrawlState.RUNNING;
    this.frontier.enqueue(this.startUrl.href, 0);
    this.log.action(`Starting crawl: ${this.startUrl.href}`, {
      maxPages: this.config.maxPages,
      maxDepth: this.config.maxDepth,
      backend: this.backend.name,
    });

    let fatal: { error: unknown } | null = null;

    try {
      await this.launchBackend();
      await this.crawlLoop();
      this.state = this.signal?.aborted ? CrawlState.ABORTED : CrawlState.COMPLETED;
    } catch (error) {
      this.state = CrawlState.ABORTED;
      fatal = { error };
      this.log.error('SUMMARY', `Crawl aborted: ${errorMessage(error)}`);
    } finally {
      await this.closeBackend();
    }

    const summary = await this.flush();

    if (fatal) {
      throw fatal.error;
    }
    return summary;
  }

  private async launchBackend(): Promise<void> {
    try {
      await this.backend.launch();
    } catch (error) {
      if (error instanceof FatalLaunchError) {
        throw error;
      }
      throw new FatalLaunchError(`Failed to launch ${this.backend.name} backend: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async closeBackend(): Promise<void> {
    try {
      await this.backend.close();
    } catch (error) {
      this.log.warn('ACTION', `Failed to close ${this.backend.name} backend`, { error: errorMessage(error) });
    }
  }

  private async crawlLoop(): Promise<void> {
    const { maxPages, maxDepth, delayBetweenRequests } = this.config;

    while (!this.frontier.isEmpty() && this.statistics.getPagesFetched() < maxPages) {
      if (this.signal?.aborted) {
        this.log.warn('ACTION', 'Interrupted, no further pages will be fetched');
        break;
      }

      const entry = this.frontier.dequeue();
      if (!entry) break;

      // Consumed without costing a budget slot
      if (entry.depth > maxDepth) {
        this.statistics.recordSkipped();
        continue;
      }

      await this.crawlEntry(entry);
      await delay(delayBetweenRequests, this.signal);
    }
  }

  private async crawlEntry(entry: FrontierEntry): Promise<void> {
    const { maxPages, maxAttempts, retryDelay, timings } = this.config;
    const pageStart = this.now().getTime();

    this.statistics.recordAttempt();
    this.log.navigate(`[${this.statistics.getPagesFetched() + 1}/${maxPages}] Depth ${entry.depth}: ${entry.url}`);

    const content = await attemptWithRetry(
      (attempt) => {
        this.log.action(`Attempt ${attempt}/${maxAttempts}`, { url: entry.url });
        return withFetchedPage(this.backend, entry.url, (page) => extractContent(page, this.log), timings, this.log);
      },
      {
        maxAttempts,
        retryDelay,
        signal: this.signal,
        onFailure: (failure, attempt) => {
          this.log.warn('NAVIGATION', `${describeFailure(failure)} on attempt ${attempt}`, { url: entry.url });
        },
      }
    );

    if (!content && this.signal?.aborted) {
      this.log.warn('NAVIGATION', `Interrupted while fetching ${entry.url}`);
      return;
    }

    if (!content) {
      this.statistics.recordFailed();
      this.log.error('NAVIGATION', `Giving up on ${entry.url} after ${maxAttempts} attempts`);
      return;
    }

    const document = buildPageDocument(entry.url, entry.depth, content, this.now());
    this.documents.push(document);
    this.statistics.recordPageVisit(entry.depth, this.now().getTime() - pageStart);

    this.log.extract(`Success! Text length: ${document.text_length} chars`, {
      url: entry.url,
      preview: document.text.slice(0, 200).replace(/\n/g, ' '),
    });

    const added = this.enqueueLinks(entry, content.links);
    this.log.observe(`Added ${added} new URLs to queue`, { url: entry.url, queued: this.frontier.size() });
  }

  /**
   * Normalize, scope-filter and enqueue a page's raw links at depth + 1
   */
  private enqueueLinks(entry: FrontierEntry, links: readonly string[]): number {
    const base = new URL(entry.url);
    const domain = this.frontier.getDomain();
    let added = 0;

    for (const href of links) {
      const url = normalizeLink(base, href);
      if (!url) continue;

      if (!isSameDomain(url, domain)) {
        this.statistics.recordExternal();
        continue;
      }

      if (this.frontier.enqueue(url.href, entry.depth + 1) === 'enqueued') {
        added++;
      } else {
        this.statistics.recordDuplicate();
      }
    }

    this.statistics.recordEnqueued(added);
    return added;
  }

  /**
   * Persist collected documents and report the summary
   */
  private async flush(): Promise<CrawlSummary> {
    await this.store.save(this.documents);

    const state = this.state === CrawlState.COMPLETED ? CrawlState.COMPLETED : CrawlState.ABORTED;
    const summary: CrawlSummary = {
      state,
      startUrl: this.startUrl.href,
      outputFile: this.store.location,
      ...this.statistics.getStatistics(),
      ...summarizeDocuments(this.documents),
    };

    if (summary.documents === 0) {
      this.log.error('SUMMARY', 'No pages were crawled successfully', { outputFile: summary.outputFile });
    } else {
      this.log.summary(`Crawl ${state}`, {
        pagesCrawled: summary.documents,
        pagesWithContent: summary.pagesWithContent,
        totalTextLength: summary.totalTextLength,
        averageTextLength: Math.round(summary.averageTextLength),
        pagesFailed: summary.pagesFailed,
        outputFile: summary.outputFile,
      });
    }

    return summary;
  }
}
