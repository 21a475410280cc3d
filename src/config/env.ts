import dotenv from 'dotenv';

dotenv.config();

export const env = {
  NODE_ENV: process.env.NODE_ENV || 'development',

  // Crawl scope and budgets
  CRAWL_START_URL: process.env.CRAWL_START_URL || '',
  CRAWL_MAX_PAGES: parseInt(process.env.CRAWL_MAX_PAGES || '100', 10),
  CRAWL_MAX_DEPTH: parseInt(process.env.CRAWL_MAX_DEPTH || '2', 10),
  CRAWL_DELAY_MS: parseInt(process.env.CRAWL_DELAY_MS || '2000', 10), // Politeness delay between pages
  CRAWL_OUTPUT_FILE: process.env.CRAWL_OUTPUT_FILE || 'crawl-output.json',

  // Resilience
  CRAWL_MAX_ATTEMPTS: parseInt(process.env.CRAWL_MAX_ATTEMPTS || '3', 10),
  CRAWL_RETRY_DELAY_MS: parseInt(process.env.CRAWL_RETRY_DELAY_MS || '5000', 10),

  // Browser
  CRAWL_BACKEND: process.env.CRAWL_BACKEND || 'playwright', // playwright | static
  HEADLESS: process.env.HEADLESS !== 'false', // Default true
  USER_AGENT: process.env.USER_AGENT || '',

  // Content-settling waits
  NAVIGATION_TIMEOUT: parseInt(process.env.NAVIGATION_TIMEOUT || '60000', 10),
  NETWORK_IDLE_TIMEOUT: parseInt(process.env.NETWORK_IDLE_TIMEOUT || '15000', 10),
  SELECTOR_TIMEOUT: parseInt(process.env.SELECTOR_TIMEOUT || '10000', 10),
  SETTLE_DELAY: parseInt(process.env.SETTLE_DELAY || '3000', 10),
  SCROLL_PAUSE: parseInt(process.env.SCROLL_PAUSE || '1000', 10),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
} as const;

export default env;
