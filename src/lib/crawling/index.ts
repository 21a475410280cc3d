/**
 * Crawl engine
 * Main export file for the crawling system
 */

export * from './crawling.types';
export * from './crawling.errors';
export * from './url-normalizer';
export * from './crawling-queue';
export * from './crawling-statistics';
export * from './retry';
export * from './page-fetcher';
export * from './crawl-orchestrator';
export * from './crawl-runner';
