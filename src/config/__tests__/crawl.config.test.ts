/**
 * Crawl Settings Tests
 */

import { ConfigurationError } from '../../lib/crawling/crawling.errors';
import { CrawlSettings, resolveCrawlSettings } from '../crawl.config';

const defaults: Record<keyof CrawlSettings, unknown> = {
  startUrl: '',
  maxPages: 100,
  maxDepth: 2,
  delayBetweenRequests: 2000,
  maxAttempts: 3,
  retryDelay: 5000,
  outputFile: 'crawl-output.json',
  backend: 'playwright',
  headless: true,
  userAgent: 'test-agent',
  logLevel: 'info',
  timings: {
    navigationTimeout: 60000,
    networkIdleTimeout: 15000,
    selectorTimeout: 10000,
    settleDelay: 3000,
    scrollPause: 1000,
  },
};

describe('resolveCrawlSettings', () => {
  it('should apply overrides over the defaults', () => {
    const settings = resolveCrawlSettings(
      { startUrl: 'https://docs.example.test', maxPages: 5, backend: 'static', timings: { settleDelay: 0 } },
      defaults
    );

    expect(settings).toEqual({
      ...defaults,
      startUrl: 'https://docs.example.test',
      maxPages: 5,
      backend: 'static',
      timings: {
        navigationTimeout: 60000,
        networkIdleTimeout: 15000,
        selectorTimeout: 10000,
        settleDelay: 0,
        scrollPause: 1000,
      },
    });
  });

  it('should ignore undefined overrides', () => {
    const settings = resolveCrawlSettings(
      { startUrl: 'https://docs.example.test', maxDepth: undefined, headless: undefined },
      defaults
    );

    expect(settings.maxDepth).toBe(2);
    expect(settings.headless).toBe(true);
  });

  it('should accept a depth budget of zero', () => {
    expect(resolveCrawlSettings({ startUrl: 'https://docs.example.test', maxDepth: 0 }, defaults).maxDepth).toBe(0);
  });

  it('should require a start URL', () => {
    expect(() => resolveCrawlSettings({}, defaults)).toThrow(ConfigurationError);
  });

  it('should reject a non-http start URL', () => {
    expect(() => resolveCrawlSettings({ startUrl: 'ftp://docs.example.test' }, defaults)).toThrow(
      'startUrl: must be an http(s) URL'
    );
  });

  it('should name every invalid field', () => {
    expect(() =>
      resolveCrawlSettings({ startUrl: 'https://docs.example.test', maxPages: 0, retryDelay: -1 }, defaults)
    ).toThrow(/maxPages: .*; retryDelay: /);
  });

  it('should reject an unknown backend from the environment', () => {
    expect(() =>
      resolveCrawlSettings({ startUrl: 'https://docs.example.test' }, { ...defaults, backend: 'firefox' })
    ).toThrow(/^Invalid crawl settings - backend: /);
  });
});
