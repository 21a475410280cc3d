#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { BACKEND_NAMES, BackendName, CrawlSettingsOverrides, resolveCrawlSettings } from './config/crawl.config';
import { CrawlRunner, runCrawl } from './lib/crawling/crawl-runner';
import { CrawlError, errorMessage } from './lib/crawling/crawling.errors';

interface CrawlCommandOptions {
  maxPages?: number;
  maxDepth?: number;
  delay?: number;
  output?: string;
  attempts?: number;
  retryDelay?: number;
  backend?: BackendName;
  headed?: boolean;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function parseBackend(value: string): BackendName {
  const backend = BACKEND_NAMES.find((name) => name === value);
  if (!backend) {
    throw new InvalidArgumentError(`Expected one of: ${BACKEND_NAMES.join(', ')}.`);
  }
  return backend;
}

export function toOverrides(url: string | undefined, options: CrawlCommandOptions): CrawlSettingsOverrides {
  return {
    startUrl: url,
    maxPages: options.maxPages,
    maxDepth: options.maxDepth,
    delayBetweenRequests: options.delay,
    outputFile: options.output,
    maxAttempts: options.attempts,
    retryDelay: options.retryDelay,
    backend: options.backend,
    headless: options.headed ? false : undefined,
  };
}

export function createProgram(run: CrawlRunner = runCrawl): Command {
  const program = new Command();

  program
    .name('site-corpus-crawler')
    .description('Crawl one website into a JSON corpus of page documents');

  program
    .command('crawl')
    .description('Breadth-first crawl of a single host')
    .argument('[url]', 'start URL (defaults to CRAWL_START_URL)')
    .option('--max-pages <n>', 'maximum pages to fetch', parseInteger)
    .option('--max-depth <n>', 'maximum link depth from the start URL', parseInteger)
    .option('--delay <ms>', 'politeness delay between pages', parseInteger)
    .option('-o, --output <file>', 'output JSON file')
    .option('--attempts <n>', 'fetch attempts per page', parseInteger)
    .option('--retry-delay <ms>', 'delay between attempts', parseInteger)
    .option('--backend <name>', `page backend (${BACKEND_NAMES.join(' | ')})`, parseBackend)
    .option('--headed', 'show the browser window')
    .action(async (url: string | undefined, options: CrawlCommandOptions) => {
      const settings = resolveCrawlSettings(toOverrides(url, options));

      const controller = new AbortController();
      const interrupt = () => controller.abort();
      process.once('SIGINT', interrupt);
      process.once('SIGTERM', interrupt);

      try {
        await run(settings, { signal: controller.signal });
      } finally {
        process.off('SIGINT', interrupt);
        process.off('SIGTERM', interrupt);
      }
    });

  return program;
}

async function main() {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (error) {
    console.error(error instanceof CrawlError ? `${error.name}: ${error.message}` : errorMessage(error));
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
