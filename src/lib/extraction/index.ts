/**
 * Content extraction
 */

export * from './extraction.types';
export * from './content-extractor';
