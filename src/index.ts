export * from './lib/crawling';
export * from './lib/browser';
export * from './lib/extraction';
export * from './lib/storage/document-store';
export * from './lib/logging/crawl-events';
export * from './config/crawl.config';
