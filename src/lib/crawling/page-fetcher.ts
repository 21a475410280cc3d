/**
 * Page Fetcher
 * Loads one URL through a browser backend with a layered content-settling
 * wait, hands the loaded page to a handler, and always releases the page.
 */

import { BrowserBackend, PageDriver, PageHandle } from '../browser/browser.types';
import { CrawlEventLog, silentLog } from '../logging/crawl-events';
import {
  FetchFailure,
  FetchFailureReason,
  classifyFetchError,
  errorMessage,
  isSuccessStatus,
} from './crawling.errors';
import { FetchTimings } from './crawling.types';
import { delay } from './retry';

/**
 * Selectors whose presence suggests the main content has rendered
 */
export const CONTENT_SELECTOR = 'p, article, section, div.content';

export const DEFAULT_FETCH_TIMINGS: FetchTimings = {
  navigationTimeout: 60000,
  networkIdleTimeout: 15000,
  selectorTimeout: 10000,
  settleDelay: 3000,
  scrollPause: 1000,
};

export type FetchResult<T> =
  | { ok: true; status: number; value: T }
  | { ok: false; failure: FetchFailure };

async function tolerate(
  log: CrawlEventLog,
  description: string,
  step: () => Promise<void>
): Promise<void> {
  try {
    await step();
  } catch (error) {
    log.observe(`${description} did not complete, continuing`, { error: errorMessage(error) });
  }
}

/**
 * Best-effort waits for asynchronously rendered content
 */
async function settle<E>(page: PageDriver<E>, timings: FetchTimings, log: CrawlEventLog): Promise<void> {
  log.wait('Waiting for network idle', { timeout: timings.networkIdleTimeout });
  await tolerate(log, 'Network idle wait', () => page.waitForNetworkIdle(timings.networkIdleTimeout));

  await tolerate(log, 'Body wait', () => page.waitForSelector('body', timings.selectorTimeout));

  await tolerate(log, 'Content selector wait', () =>
    page.waitForSelector(CONTENT_SELECTOR, timings.selectorTimeout)
  );

  log.wait('Settling', { delay: timings.settleDelay });
  await delay(timings.settleDelay);
}

/**
 * Two scroll steps to trigger lazily loaded content
 */
async function scrollForLazyContent<E>(
  page: PageDriver<E>,
  timings: FetchTimings,
  log: CrawlEventLog
): Promise<void> {
  await tolerate(log, 'Scrolling', async () => {
    await page.scrollTo(0.5);
    await delay(timings.scrollPause);
    await page.scrollTo(1);
    await delay(timings.scrollPause);
  });
}

/**
 * One fetch attempt. `handler` runs only for a 200-399 response, while the
 * page is still open.
 */
export async function withFetchedPage<E, T>(
  backend: BrowserBackend<E>,
  url: string,
  handler: (page: PageHandle<E>) => Promise<T>,
  timings: FetchTimings = DEFAULT_FETCH_TIMINGS,
  log: CrawlEventLog = silentLog
): Promise<FetchResult<T>> {
  let page: PageDriver<E> | null = null;

  try {
    page = await backend.newPage();
    const status = await page.navigate(url, timings.navigationTimeout);

    if (status === null || !isSuccessStatus(status)) {
      return { ok: false, failure: { reason: FetchFailureReason.BAD_STATUS, status } };
    }

    await settle(page, timings, log);
    await scrollForLazyContent(page, timings, log);

    const value = await handler(page);
    return { ok: true, status, value };
  } catch (error) {
    return { ok: false, failure: classifyFetchError(error) };
  } finally {
    if (page) {
      try {
        await page.close();
      } catch (error) {
        log.warn('ACTION', `Failed to close page for ${url}`, { error: errorMessage(error) });
      }
    }
  }
}
