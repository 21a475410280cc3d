export * from './browser.types';
export * from './fingerprints';
export * from './playwright.backend';
export * from './static.backend';
