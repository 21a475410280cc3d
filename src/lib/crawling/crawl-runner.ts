/**
 * Crawl runner
 * Wires settings to a backend, a document store and an orchestrator
 */

import { CrawlSettings } from '../../config/crawl.config';
import { createClientIdentity } from '../browser/fingerprints';
import { PlaywrightBackend } from '../browser/playwright.backend';
import { StaticBackend } from '../browser/static.backend';
import { CrawlEventLog } from '../logging/crawl-events';
import { JsonDocumentStore } from '../storage/document-store';
import { CrawlOrchestrator } from './crawl-orchestrator';
import { CrawlSummary } from './crawling.types';

export interface RunCrawlOptions {
  signal?: AbortSignal;
  log?: CrawlEventLog;
}

export type CrawlRunner = (settings: CrawlSettings, options?: RunCrawlOptions) => Promise<CrawlSummary>;

export const runCrawl: CrawlRunner = (settings, options = {}) => {
  const store = new JsonDocumentStore(settings.outputFile);
  const identity = createClientIdentity(settings.userAgent);
  const log = options.log ?? new CrawlEventLog(settings.logLevel);

  if (settings.backend === 'static') {
    return new CrawlOrchestrator({
      config: settings,
      backend: new StaticBackend({ identity }),
      store,
      log,
      signal: options.signal,
    }).run();
  }

  return new CrawlOrchestrator({
    config: settings,
    backend: new PlaywrightBackend({ headless: settings.headless, identity }),
    store,
    log,
    signal: options.signal,
  }).run();
};
