/**
 * Content Extractor
 * Pulls structured fields from a loaded page. Every field is read on its
 * own; a failing field falls back to its empty default and a failing
 * element is skipped, so extraction as a whole never rejects.
 */

import { PageHandle } from '../browser/browser.types';
import { errorMessage } from '../crawling/crawling.errors';
import { HeadingTag, PageDocument, PageHeading } from '../crawling/crawling.types';
import { CrawlEventLog, silentLog } from '../logging/crawl-events';
import { EXTRACTION_LIMITS, ExtractedContent, OUTPUT_CAPS, TEXT_SEPARATOR } from './extraction.types';

const HEADING_TAGS: HeadingTag[] = ['h1', 'h2', 'h3', 'h4'];

const CONTENT_BLOCK_SELECTOR = 'div.content, div.main, article, section';

async function safeField<T>(
  log: CrawlEventLog,
  field: string,
  fallback: T,
  read: () => Promise<T>
): Promise<T> {
  try {
    return await read();
  } catch (error) {
    log.observe(`Extraction of ${field} failed`, { error: errorMessage(error) });
    return fallback;
  }
}

/**
 * Trimmed text of up to `limit` matches of `selector`, filtered by `keep`
 */
async function collectTexts<E>(
  page: PageHandle<E>,
  log: CrawlEventLog,
  selector: string,
  limit: number,
  keep: (text: string) => boolean
): Promise<string[]> {
  const elements = (await page.queryAll(selector)).slice(0, limit);
  const texts: string[] = [];

  for (const element of elements) {
    let text: string;
    try {
      text = (await page.textOf(element)).trim();
    } catch (error) {
      log.observe(`Skipping unreadable ${selector} element`, { error: errorMessage(error) });
      continue;
    }
    if (keep(text)) {
      texts.push(text);
    }
  }

  return texts;
}

async function extractMetaDescription<E>(page: PageHandle<E>): Promise<string> {
  const metas = await page.queryAll("meta[name='description']");
  if (metas.length === 0) {
    return '';
  }
  return (await page.attributeOf(metas[0], 'content')) ?? '';
}

async function extractHeadings<E>(page: PageHandle<E>, log: CrawlEventLog): Promise<PageHeading[]> {
  const headings: PageHeading[] = [];

  for (const tag of HEADING_TAGS) {
    // A failing level keeps the levels already collected
    const texts = await safeField<string[]>(log, `${tag} headings`, [], () =>
      collectTexts(
        page,
        log,
        tag,
        EXTRACTION_LIMITS.headingsPerLevel,
        (text) => text.length > EXTRACTION_LIMITS.minHeadingLength
      )
    );
    headings.push(...texts.map((text) => ({ tag, text })));
  }

  return headings;
}

/**
 * Generic content containers, for sites that render text outside <p>
 */
async function extractContentBlocks<E>(
  page: PageHandle<E>,
  log: CrawlEventLog,
  paragraphs: readonly string[]
): Promise<string[]> {
  const known = new Set(paragraphs);
  const blocks = await collectTexts(
    page,
    log,
    CONTENT_BLOCK_SELECTOR,
    EXTRACTION_LIMITS.contentBlockCandidates,
    (text) =>
      text.length > EXTRACTION_LIMITS.minContentBlockLength &&
      text.length < EXTRACTION_LIMITS.maxContentBlockLength
  );

  const added: string[] = [];
  for (const block of blocks) {
    if (!known.has(block)) {
      known.add(block);
      added.push(block);
    }
  }
  return added;
}

async function extractLinks<E>(page: PageHandle<E>, log: CrawlEventLog): Promise<string[]> {
  const anchors = (await page.queryAll('a[href]')).slice(0, EXTRACTION_LIMITS.linkCandidates);
  const links: string[] = [];

  for (const anchor of anchors) {
    try {
      const href = await page.attributeOf(anchor, 'href');
      if (href) {
        links.push(href);
      }
    } catch (error) {
      log.observe('Skipping unreadable link', { error: errorMessage(error) });
    }
  }

  return links;
}

/**
 * Composite text: title, meta description, headings, paragraphs, list items
 */
export function buildCompositeText(
  content: Pick<ExtractedContent, 'title' | 'metaDescription' | 'headings' | 'paragraphs' | 'lists'>
): string {
  const parts: string[] = [];

  if (content.title) parts.push(content.title);
  if (content.metaDescription) parts.push(content.metaDescription);
  parts.push(...content.headings.map((heading) => heading.text));
  parts.push(...content.paragraphs);
  parts.push(...content.lists);

  return parts.join(TEXT_SEPARATOR);
}

export async function extractContent<E>(
  page: PageHandle<E>,
  log: CrawlEventLog = silentLog
): Promise<ExtractedContent> {
  const title = await safeField(log, 'title', '', async () => (await page.title()) || '');
  const metaDescription = await safeField(log, 'meta description', '', () =>
    extractMetaDescription(page)
  );
  const headings = await extractHeadings(page, log);

  const paragraphs = await safeField<string[]>(log, 'paragraphs', [], () =>
    collectTexts(
      page,
      log,
      'p',
      EXTRACTION_LIMITS.paragraphCandidates,
      (text) => text.length > EXTRACTION_LIMITS.minParagraphLength
    )
  );

  const lists = await safeField<string[]>(log, 'list items', [], () =>
    collectTexts(
      page,
      log,
      'li',
      EXTRACTION_LIMITS.listItemCandidates,
      (text) => text.length > EXTRACTION_LIMITS.minListItemLength
    )
  );

  const contentBlocks = await safeField<string[]>(log, 'content blocks', [], () =>
    extractContentBlocks(page, log, paragraphs)
  );
  paragraphs.push(...contentBlocks);

  const links = await safeField<string[]>(log, 'links', [], () => extractLinks(page, log));

  const content = { title, metaDescription, headings, paragraphs, lists, links };
  return { ...content, text: buildCompositeText(content) };
}

/**
 * Truncate to at most `limit` code points, never splitting a surrogate pair
 */
function truncateCodePoints(text: string, limit: number): string {
  const codePoints = Array.from(text);
  return codePoints.length > limit ? codePoints.slice(0, limit).join('') : text;
}

/**
 * Apply output caps and freeze. Text is measured in code points;
 * `text_length` keeps the pre-cap length.
 */
export function buildPageDocument(
  url: string,
  depth: number,
  content: ExtractedContent,
  crawledAt: Date = new Date()
): PageDocument {
  return Object.freeze({
    url,
    depth,
    title: content.title,
    meta_description: content.metaDescription,
    headings: Object.freeze(content.headings.map((heading) => Object.freeze({ ...heading }))),
    paragraphs: Object.freeze(content.paragraphs.slice(0, OUTPUT_CAPS.paragraphs)),
    lists: Object.freeze(content.lists.slice(0, OUTPUT_CAPS.lists)),
    text: truncateCodePoints(content.text, OUTPUT_CAPS.textLength),
    text_length: Array.from(content.text).length,
    crawled_at: crawledAt.toISOString(),
  });
}
