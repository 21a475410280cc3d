/**
 * Static Backend
 * Plain HTTP fetch parsed with Cheerio - no browser, no JavaScript.
 * Waits and scrolling are no-ops; suitable for server-rendered sites.
 */

import * as cheerio from 'cheerio';
import { NavigationTimeoutError } from '../crawling/crawling.errors';
import { BrowserBackend, ClientIdentity, PageDriver, PageHandle } from './browser.types';
import { createClientIdentity } from './fingerprints';

/**
 * Snapshot of one matched element
 */
export interface StaticElement {
  text: string;
  attributes: Record<string, string>;
}

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Page handle over an HTML string
 */
export class StaticPage implements PageHandle<StaticElement> {
  private $: cheerio.CheerioAPI;

  constructor(html: string) {
    this.$ = cheerio.load(html);
  }

  async title(): Promise<string> {
    return this.$('title').first().text();
  }

  async queryAll(selector: string): Promise<StaticElement[]> {
    const $ = this.$;
    return $(selector)
      .toArray()
      .map((el) => ({
        text: $(el).text(),
        attributes: $(el).attr() ?? {},
      }));
  }

  async textOf(element: StaticElement): Promise<string> {
    return element.text;
  }

  async attributeOf(element: StaticElement, name: string): Promise<string | null> {
    return element.attributes[name] ?? null;
  }

  async scrollTo(_fraction: number): Promise<void> {
    // Nothing is lazily loaded without a browser
  }
}

class StaticPageDriver implements PageDriver<StaticElement> {
  private page: StaticPage = new StaticPage('');

  constructor(
    private readonly fetchFn: FetchFn,
    private readonly identity: ClientIdentity
  ) {}

  async navigate(url: string, timeout: number): Promise<number | null> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const response = await this.fetchFn(url, {
        method: 'GET',
        headers: { 'User-Agent': this.identity.userAgent, ...this.identity.headers },
        redirect: 'follow',
        signal: controller.signal,
      });
      this.page = new StaticPage(await response.text());
      return response.status;
    } catch (error) {
      if (controller.signal.aborted) {
        throw new NavigationTimeoutError(url, timeout);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async waitForNetworkIdle(_timeout: number): Promise<void> {}

  async waitForSelector(_selector: string, _timeout: number): Promise<void> {}

  title(): Promise<string> {
    return this.page.title();
  }

  queryAll(selector: string): Promise<StaticElement[]> {
    return this.page.queryAll(selector);
  }

  textOf(element: StaticElement): Promise<string> {
    return this.page.textOf(element);
  }

  attributeOf(element: StaticElement, name: string): Promise<string | null> {
    return this.page.attributeOf(element, name);
  }

  scrollTo(fraction: number): Promise<void> {
    return this.page.scrollTo(fraction);
  }

  async close(): Promise<void> {
    this.page = new StaticPage('');
  }
}

export interface StaticBackendOptions {
  identity?: ClientIdentity;
  fetchFn?: FetchFn;
}

export class StaticBackend implements BrowserBackend<StaticElement> {
  readonly name = 'static';
  private readonly identity: ClientIdentity;
  private readonly fetchFn: FetchFn;

  constructor(options: StaticBackendOptions = {}) {
    this.identity = options.identity ?? createClientIdentity();
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  async launch(): Promise<void> {}

  async newPage(): Promise<PageDriver<StaticElement>> {
    return new StaticPageDriver(this.fetchFn, this.identity);
  }

  async close(): Promise<void> {}
}
