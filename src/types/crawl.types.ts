/**
 * Crawl-related type definitions
 */

export type TerminationStrategy = 'counter' | 'debounce';

/**
 * Crawl options
 */
export interface CrawlOptions {
  fetchWorkers: number;
  indexWorkers: number;
  requestQueueCapacity: number;
  pageQueueCapacity: number;
  termination: TerminationStrategy;
  debounceMs: number;
  monitorPollMs: number;
  requestTimeoutSecs: number;
  defaultScheme: string;
  runId?: string;
}

/**
 * A page on the crawled site. Links and assets are same-host only.
 */
export interface Page {
  readonly url: string;
  readonly links: readonly string[];
  readonly assets: readonly string[];
}

/**
 * The finished sitemap, keyed by normalized path
 */
export interface Site {
  readonly domain: URL;
  readonly pages: ReadonlyMap<string, Page>;
}

/**
 * Response handed from the fetch capability to the parser
 */
export interface FetchedDocument {
  /** Final URL after redirects, used as the base for relative links */
  url: string;
  status: number;
  contentType: string | null;
  body: string;
}

export interface ParsedPage {
  links: string[];
  assets: string[];
}

/**
 * Fetch capability. Rejects on network failure or a bad status.
 */
export type PageFetcher = (url: URL, signal: AbortSignal) => Promise<FetchedDocument>;

/**
 * Parse capability. Returns only same-host links and assets.
 */
export type PageParser = (document: FetchedDocument) => ParsedPage;

export interface WorkerStatus {
  workerId: number;
  busy: boolean;
}

/**
 * Crawl statistics
 */
export interface CrawlStats {
  runId: string;
  pagesIndexed: number;
  linksDiscovered: number;
  fetchFailures: number;
  parseFailures: number;
  workerFailures: number;
  startTime: Date;
  endTime?: Date;
  durationMs?: number;
}

export interface CrawlResult {
  site: Site;
  stats: CrawlStats;
}
