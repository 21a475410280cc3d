/**
 * Playwright Backend Tests
 */

import { chromium } from 'playwright';
import { FatalLaunchError, NavigationTimeoutError } from '../../crawling/crawling.errors';
import { createClientIdentity } from '../fingerprints';
import { PlaywrightBackend } from '../playwright.backend';

jest.mock('playwright', () => {
  class TimeoutError extends Error {}

  const page = {
    goto: jest.fn(),
    waitForLoadState: jest.fn(async () => undefined),
    waitForSelector: jest.fn(async () => null),
    title: jest.fn(async () => 'Stub page'),
    $$: jest.fn(async () => []),
    evaluate: jest.fn(async () => undefined),
    close: jest.fn(async () => undefined),
  };
  const context = { newPage: jest.fn(async () => page) };
  const browser = {
    newContext: jest.fn(async () => context),
    close: jest.fn(async () => undefined),
  };

  return {
    chromium: { launch: jest.fn(async () => browser) },
    errors: { TimeoutError },
    stubPage: page,
    stubBrowser: browser,
  };
});

interface PlaywrightStub {
  errors: { TimeoutError: new (message: string) => Error };
  stubPage: Record<'goto' | 'waitForLoadState' | 'waitForSelector' | '$$' | 'evaluate' | 'close', jest.Mock>;
  stubBrowser: Record<'newContext' | 'close', jest.Mock>;
}

const stub = jest.requireMock<PlaywrightStub>('playwright');

const URL_A = 'https://docs.example.test/a';

async function launchedPage() {
  const backend = new PlaywrightBackend({ identity: createClientIdentity('test-agent') });
  await backend.launch();
  return { backend, page: await backend.newPage() };
}

describe('PlaywrightBackend', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('launch', () => {
    it('should wrap a launch failure in FatalLaunchError', async () => {
      jest
        .mocked(chromium.launch)
        .mockRejectedValueOnce(new Error('Executable does not exist'))
        .mockRejectedValueOnce(new Error('Executable does not exist'));
      const backend = new PlaywrightBackend({ headless: true });

      await expect(backend.launch()).rejects.toThrow(FatalLaunchError);
      await expect(backend.launch()).rejects.toThrow('Failed to launch Chromium: Executable does not exist');
    });

    it('should launch headless Chromium by default', async () => {
      await new PlaywrightBackend().launch();

      expect(chromium.launch).toHaveBeenCalledWith(expect.objectContaining({ headless: true }));
    });

    it('should open a context with the client identity', async () => {
      await launchedPage();

      expect(stub.stubBrowser.newContext).toHaveBeenCalledWith(
        expect.objectContaining({
          userAgent: 'test-agent',
          viewport: { width: 1920, height: 1080 },
          ignoreHTTPSErrors: true,
        })
      );
    });

    it('should refuse pages before launch', async () => {
      await expect(new PlaywrightBackend().newPage()).rejects.toThrow('Playwright backend used before launch()');
    });

    it('should close cleanly when never launched', async () => {
      await expect(new PlaywrightBackend().close()).resolves.toBeUndefined();
    });

    it('should close the browser it launched', async () => {
      const { backend } = await launchedPage();

      await backend.close();

      expect(stub.stubBrowser.close).toHaveBeenCalledTimes(1);
    });
  });

  describe('page driver', () => {
    it('should navigate until DOM content is loaded and return the status', async () => {
      stub.stubPage.goto.mockResolvedValueOnce({ status: () => 204 });
      const { page } = await launchedPage();

      const status = await page.navigate(URL_A, 5000);

      expect(status).toBe(204);
      expect(stub.stubPage.goto).toHaveBeenCalledWith(URL_A, { waitUntil: 'domcontentloaded', timeout: 5000 });
    });

    it('should return null when there is no response', async () => {
      stub.stubPage.goto.mockResolvedValueOnce(null);
      const { page } = await launchedPage();

      expect(await page.navigate(URL_A, 5000)).toBeNull();
    });

    it('should map a navigation timeout to NavigationTimeoutError', async () => {
      stub.stubPage.goto.mockRejectedValueOnce(new stub.errors.TimeoutError('Timeout 5000ms exceeded'));
      const { page } = await launchedPage();

      await expect(page.navigate(URL_A, 5000)).rejects.toThrow(
        new NavigationTimeoutError(URL_A, 5000)
      );
    });

    it('should rethrow other navigation errors unchanged', async () => {
      stub.stubPage.goto.mockRejectedValueOnce(new Error('net::ERR_NAME_NOT_RESOLVED'));
      const { page } = await launchedPage();

      await expect(page.navigate(URL_A, 5000)).rejects.toThrow('net::ERR_NAME_NOT_RESOLVED');
    });

    it('should wait for network idle and attached selectors with the given timeouts', async () => {
      const { page } = await launchedPage();

      await page.waitForNetworkIdle(15000);
      await page.waitForSelector('body', 10000);

      expect(stub.stubPage.waitForLoadState).toHaveBeenCalledWith('networkidle', { timeout: 15000 });
      expect(stub.stubPage.waitForSelector).toHaveBeenCalledWith('body', { timeout: 10000, state: 'attached' });
    });

    it('should read element text and attributes', async () => {
      stub.stubPage.$$.mockResolvedValueOnce([
        { textContent: async () => null, getAttribute: async () => '/next' },
      ]);
      const { page } = await launchedPage();

      const [anchor] = await page.queryAll('a');

      expect(stub.stubPage.$$).toHaveBeenCalledWith('a');
      expect(await page.textOf(anchor)).toBe('');
      expect(await page.attributeOf(anchor, 'href')).toBe('/next');
    });

    it('should scroll by evaluating in the page with the fraction', async () => {
      const { page } = await launchedPage();

      await page.scrollTo(0.5);

      expect(stub.stubPage.evaluate).toHaveBeenCalledWith(expect.any(Function), 0.5);
    });

    it('should close the underlying page', async () => {
      const { page } = await launchedPage();

      await page.close();

      expect(stub.stubPage.close).toHaveBeenCalledTimes(1);
    });
  });
});
