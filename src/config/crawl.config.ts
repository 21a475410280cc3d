/**
 * Crawl settings
 * Environment defaults merged with explicit overrides, then validated.
 */

import { z } from 'zod';
import { ConfigurationError } from '../lib/crawling/crawling.errors';
import { CrawlingConfig } from '../lib/crawling/crawling.types';
import { DEFAULT_USER_AGENT } from '../lib/browser/fingerprints';
import { LogLevel } from '../lib/logging/crawl-events';
import { env } from './env';

export const BACKEND_NAMES = ['playwright', 'static'] as const;
export type BackendName = (typeof BACKEND_NAMES)[number];

const positiveInt = z.number().int().positive();
const delayMs = z.number().int().nonnegative();

const CrawlSettingsSchema = z.object({
  startUrl: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), 'must be an http(s) URL'),
  maxPages: positiveInt,
  maxDepth: z.number().int().nonnegative(),
  delayBetweenRequests: delayMs,
  maxAttempts: positiveInt,
  retryDelay: delayMs,
  outputFile: z.string().min(1),
  backend: z.enum(BACKEND_NAMES),
  headless: z.boolean(),
  userAgent: z.string().min(1),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
  timings: z.object({
    navigationTimeout: positiveInt,
    networkIdleTimeout: delayMs,
    selectorTimeout: delayMs,
    settleDelay: delayMs,
    scrollPause: delayMs,
  }),
});

export interface CrawlSettings extends CrawlingConfig {
  outputFile: string;
  backend: BackendName;
  headless: boolean;
  userAgent: string;
  logLevel: LogLevel;
}

export type CrawlSettingsOverrides = Partial<Omit<CrawlSettings, 'timings'>> & {
  timings?: Partial<CrawlingConfig['timings']>;
};

/**
 * Defaults read from the environment
 */
export function settingsFromEnv(): Record<keyof CrawlSettings, unknown> {
  return {
    startUrl: env.CRAWL_START_URL,
    maxPages: env.CRAWL_MAX_PAGES,
    maxDepth: env.CRAWL_MAX_DEPTH,
    delayBetweenRequests: env.CRAWL_DELAY_MS,
    maxAttempts: env.CRAWL_MAX_ATTEMPTS,
    retryDelay: env.CRAWL_RETRY_DELAY_MS,
    outputFile: env.CRAWL_OUTPUT_FILE,
    backend: env.CRAWL_BACKEND,
    headless: env.HEADLESS,
    userAgent: env.USER_AGENT || DEFAULT_USER_AGENT,
    logLevel: env.LOG_LEVEL,
    timings: {
      navigationTimeout: env.NAVIGATION_TIMEOUT,
      networkIdleTimeout: env.NETWORK_IDLE_TIMEOUT,
      selectorTimeout: env.SELECTOR_TIMEOUT,
      settleDelay: env.SETTLE_DELAY,
      scrollPause: env.SCROLL_PAUSE,
    },
  };
}

/**
 * Merge overrides over `defaults` and validate the result
 */
export function resolveCrawlSettings(
  overrides: CrawlSettingsOverrides = {},
  defaults: Record<keyof CrawlSettings, unknown> = settingsFromEnv()
): CrawlSettings {
  const { timings: timingOverrides, ...rest } = overrides;
  const defaultTimings = typeof defaults.timings === 'object' && defaults.timings !== null ? defaults.timings : {};

  const definedOverrides = Object.fromEntries(Object.entries(rest).filter(([, value]) => value !== undefined));
  const definedTimings = Object.fromEntries(
    Object.entries(timingOverrides ?? {}).filter(([, value]) => value !== undefined)
  );

  const result = CrawlSettingsSchema.safeParse({
    ...defaults,
    ...definedOverrides,
    timings: { ...defaultTimings, ...definedTimings },
  });

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'settings'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid crawl settings - ${issues.join('; ')}`);
  }

  return result.data;
}
