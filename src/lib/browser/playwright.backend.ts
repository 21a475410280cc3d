/**
 * Playwright Backend
 * Headless Chromium for JavaScript-heavy sites.
 * One browser and one context per crawl run, one page per fetch attempt.
 */

import { chromium, errors } from 'playwright';
import type { Browser, BrowserContext, ElementHandle, Page } from 'playwright';
import { NavigationTimeoutError, FatalLaunchError, errorMessage } from '../crawling/crawling.errors';
import { BrowserBackend, ClientIdentity, PageDriver } from './browser.types';
import { createClientIdentity } from './fingerprints';

export type PlaywrightElement = ElementHandle<SVGElement | HTMLElement>;

export interface PlaywrightBackendOptions {
  headless?: boolean;
  identity?: ClientIdentity;
}

const LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--disable-extensions',
  '--mute-audio',
  '--no-first-run',
];

class PlaywrightPage implements PageDriver<PlaywrightElement> {
  constructor(private readonly page: Page) {}

  async navigate(url: string, timeout: number): Promise<number | null> {
    try {
      const response = await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout });
      return response ? response.status() : null;
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw new NavigationTimeoutError(url, timeout);
      }
      throw error;
    }
  }

  async waitForNetworkIdle(timeout: number): Promise<void> {
    await this.page.waitForLoadState('networkidle', { timeout });
  }

  async waitForSelector(selector: string, timeout: number): Promise<void> {
    await this.page.waitForSelector(selector, { timeout, state: 'attached' });
  }

  async title(): Promise<string> {
    return this.page.title();
  }

  async queryAll(selector: string): Promise<PlaywrightElement[]> {
    return this.page.$$(selector);
  }

  async textOf(element: PlaywrightElement): Promise<string> {
    return (await element.textContent()) ?? '';
  }

  async attributeOf(element: PlaywrightElement, name: string): Promise<string | null> {
    return element.getAttribute(name);
  }

  async scrollTo(fraction: number): Promise<void> {
    await this.page.evaluate((f) => {
      window.scrollTo(0, document.body.scrollHeight * f);
    }, fraction);
  }

  async close(): Promise<void> {
    await this.page.close();
  }
}

export class PlaywrightBackend implements BrowserBackend<PlaywrightElement> {
  readonly name = 'playwright';
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private readonly headless: boolean;
  private readonly identity: ClientIdentity;

  constructor(options: PlaywrightBackendOptions = {}) {
    this.headless = options.headless ?? true;
    this.identity = options.identity ?? createClientIdentity();
  }

  async launch(): Promise<void> {
    try {
      this.browser = await chromium.launch({ headless: this.headless, args: LAUNCH_ARGS });
      this.context = await this.browser.newContext({
        userAgent: this.identity.userAgent,
        viewport: this.identity.viewport,
        extraHTTPHeaders: this.identity.headers,
        ignoreHTTPSErrors: true,
        javaScriptEnabled: true,
      });
    } catch (error) {
      await this.close();
      throw new FatalLaunchError(`Failed to launch Chromium: ${errorMessage(error)}`, { cause: error });
    }
  }

  async newPage(): Promise<PageDriver<PlaywrightElement>> {
    if (!this.context) {
      throw new Error('Playwright backend used before launch()');
    }
    const page = await this.context.newPage();
    return new PlaywrightPage(page);
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.context = null;
    this.browser = null;
    if (browser) {
      await browser.close();
    }
  }
}
