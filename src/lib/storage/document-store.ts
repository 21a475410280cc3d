/**
 * Document Store
 * Persists the crawl output as one UTF-8 JSON array.
 * Writes go to a temporary file that is renamed into place, so a crash
 * never leaves a half-written output file.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { PageDocument } from '../crawling/crawling.types';

const PageDocumentSchema = z.object({
  url: z.string(),
  depth: z.number().int().nonnegative(),
  title: z.string(),
  meta_description: z.string(),
  headings: z.array(z.object({ tag: z.enum(['h1', 'h2', 'h3', 'h4']), text: z.string() })),
  paragraphs: z.array(z.string()),
  lists: z.array(z.string()),
  text: z.string(),
  text_length: z.number().int().nonnegative(),
  crawled_at: z.string(),
});

const PageDocumentListSchema = z.array(PageDocumentSchema);

export interface DocumentStore {
  /**
   * Where documents end up (reported in the crawl summary)
   */
  readonly location: string;
  save(documents: readonly PageDocument[]): Promise<void>;
}

export class JsonDocumentStore implements DocumentStore {
  readonly location: string;

  constructor(filePath: string) {
    this.location = path.resolve(filePath);
  }

  async save(documents: readonly PageDocument[]): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.location), { recursive: true });

    const tempPath = `${this.location}.${process.pid}.tmp`;
    const body = JSON.stringify(documents, null, 2);

    try {
      await fs.promises.writeFile(tempPath, body, 'utf-8');
      await fs.promises.rename(tempPath, this.location);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      throw error;
    }
  }

  /**
   * Read the output back; entries that do not match the document shape are rejected
   */
  async load(): Promise<PageDocument[]> {
    const raw = await fs.promises.readFile(this.location, 'utf-8');
    return PageDocumentListSchema.parse(JSON.parse(raw));
  }
}
