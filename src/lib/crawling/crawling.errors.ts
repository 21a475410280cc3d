/**
 * Crawl Error Handling
 * Error classes and fetch-failure classification
 */

export enum FetchFailureReason {
  TIMEOUT = 'timeout',
  BAD_STATUS = 'bad_status',
  ERROR = 'error',
}

/**
 * Recoverable outcome of one fetch attempt
 */
export type FetchFailure =
  | { reason: FetchFailureReason.TIMEOUT; detail: string }
  | { reason: FetchFailureReason.BAD_STATUS; status: number | null }
  | { reason: FetchFailureReason.ERROR; detail: string };

export class CrawlError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CrawlError';
  }
}

/**
 * Invalid crawl settings, raised before anything is launched
 */
export class ConfigurationError extends CrawlError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * The browser/automation environment could not start; aborts the run
 */
export class FatalLaunchError extends CrawlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FatalLaunchError';
  }
}

/**
 * Raised by backends when navigation exceeds its timeout
 */
export class NavigationTimeoutError extends CrawlError {
  constructor(
    public readonly url: string,
    public readonly timeout: number
  ) {
    super(`Navigation to ${url} timed out after ${timeout}ms`);
    this.name = 'NavigationTimeoutError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Classify an error thrown during a fetch attempt
 */
export function classifyFetchError(error: unknown): FetchFailure {
  if (error instanceof NavigationTimeoutError) {
    return { reason: FetchFailureReason.TIMEOUT, detail: error.message };
  }
  return { reason: FetchFailureReason.ERROR, detail: errorMessage(error) };
}

/**
 * 200-399 counts as a loaded page
 */
export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 400;
}

export function describeFailure(failure: FetchFailure): string {
  switch (failure.reason) {
    case FetchFailureReason.TIMEOUT:
      return `Timeout: ${failure.detail}`;
    case FetchFailureReason.BAD_STATUS:
      return `Bad status: ${failure.status ?? 'no response'}`;
    case FetchFailureReason.ERROR:
      return `Error: ${failure.detail}`;
  }
}
