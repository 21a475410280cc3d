/**
 * Extraction Types
 */

import { PageHeading } from '../crawling/crawling.types';

/**
 * Everything pulled from one loaded page, before output caps
 */
export interface ExtractedContent {
  title: string;
  metaDescription: string;
  headings: PageHeading[];
  paragraphs: string[];
  lists: string[];
  /**
   * Raw href values, resolved later by the orchestrator
   */
  links: string[];
  text: string;
}

/**
 * Scan limits and keep thresholds per field
 */
export const EXTRACTION_LIMITS = {
  headingsPerLevel: 30,
  minHeadingLength: 2,
  paragraphCandidates: 200,
  minParagraphLength: 20,
  listItemCandidates: 100,
  minListItemLength: 10,
  contentBlockCandidates: 50,
  minContentBlockLength: 100,
  maxContentBlockLength: 5000,
  linkCandidates: 300,
} as const;

/**
 * Caps applied when a PageDocument is persisted
 */
export const OUTPUT_CAPS = {
  paragraphs: 100,
  lists: 50,
  textLength: 10000,
} as const;

export const TEXT_SEPARATOR = '\n\n';
