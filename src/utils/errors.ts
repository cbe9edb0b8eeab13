/**
 * Crawl error types
 */

export enum CrawlErrorType {
  INVALID_SEED = 'INVALID_SEED',
  FETCH_FAILED = 'FETCH_FAILED',
  BAD_STATUS = 'BAD_STATUS',
  PARSE_FAILED = 'PARSE_FAILED',
  CONFIG_INVALID = 'CONFIG_INVALID',
}

export class CrawlError extends Error {
  constructor(
    public readonly type: CrawlErrorType,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CrawlError';
  }
}

/**
 * The seed could not be turned into an absolute http(s) URL. Fatal.
 */
export class InvalidSeedUrlError extends CrawlError {
  constructor(public readonly seed: string, reason: string) {
    super(CrawlErrorType.INVALID_SEED, `Invalid seed URL "${seed}": ${reason}`);
    this.name = 'InvalidSeedUrlError';
  }
}

/**
 * A single URL could not be fetched. The crawl drops the URL and carries on.
 */
export class FetchError extends CrawlError {
  constructor(
    public readonly url: string,
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(
      statusCode === undefined ? CrawlErrorType.FETCH_FAILED : CrawlErrorType.BAD_STATUS,
      message,
      options
    );
    this.name = 'FetchError';
  }
}

export class ConfigError extends CrawlError {
  constructor(message: string) {
    super(CrawlErrorType.CONFIG_INVALID, message);
    this.name = 'ConfigError';
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
