/**
 * Crawl dispatcher
 * Seeds the crawl, runs the fetch and index worker pools until the termination
 * monitor stops them, and hands back the finished sitemap
 */

import { v4 as uuidv4 } from 'uuid';
import { FetchWorker } from './fetchWorker';
import { IndexWorker } from './indexWorker';
import { Sitemap } from './sitemap';
import { createTerminationMonitor } from './termination';
import { applyDefaultScheme, isHttpUrl, normalizeUrl } from './urlNormalizer';
import { WorkQueue } from './workQueue';
import { resolveCrawlOptions } from '../config/settings';
import { createHttpFetcher } from '../fetch/httpFetcher';
import { parseDocument } from '../parsers/pageParser';
import type {
  CrawlOptions,
  CrawlResult,
  CrawlStats,
  Page,
  PageFetcher,
  PageParser,
  Site,
} from '../types/crawl.types';
import { InvalidSeedUrlError } from '../utils/errors';
import { logCrawlStats, logger, workerLogger, type Logger } from '../utils/logger';

export const BOUNDED_REQUEST_QUEUE_WARNING =
  'Bounded request queue: a page with more links than the queues hold will deadlock the crawl';

/**
 * External capabilities of a crawl, replaceable for tests or other transports
 */
export interface CrawlDeps {
  fetcher?: PageFetcher;
  parser?: PageParser;
  logger?: Logger;
}

/**
 * Turn a seed string into the crawl's domain URL
 *
 * @param seed - Absolute URL, or one without a scheme
 * @param defaultScheme - Scheme applied when the seed has none
 * @throws InvalidSeedUrlError when the result is not an http(s) URL
 */
export function parseSeedUrl(seed: string, defaultScheme: string): URL {
  if (!seed || !seed.trim()) {
    throw new InvalidSeedUrlError(seed, 'must be a non-empty string');
  }

  const url = normalizeUrl(applyDefaultScheme(seed, defaultScheme));
  if (!url) {
    throw new InvalidSeedUrlError(seed, 'not a valid URL');
  }
  if (!isHttpUrl(url)) {
    throw new InvalidSeedUrlError(seed, `unsupported protocol "${url.protocol}"`);
  }
  if (!url.hostname) {
    throw new InvalidSeedUrlError(seed, 'missing host');
  }
  return url;
}

/**
 * Run a crawl from the given seed
 *
 * @param seed - Seed URL; a missing scheme gets the configured default
 * @param overrides - Crawl configuration, merged over environment and defaults
 * @param deps - Fetch and parse capabilities, logger
 * @returns The finished site and crawl statistics
 */
export async function runCrawl(
  seed: string,
  overrides: Partial<CrawlOptions> = {},
  deps: CrawlDeps = {}
): Promise<CrawlResult> {
  const options = resolveCrawlOptions(overrides);
  // Fails before anything is spawned
  const domain = parseSeedUrl(seed, options.defaultScheme);

  const runId = options.runId ?? uuidv4();
  const log = (deps.logger ?? logger).child({ runId });
  const fetcher = deps.fetcher ?? createHttpFetcher({ timeoutSecs: options.requestTimeoutSecs });
  const parser = deps.parser ?? parseDocument;

  const stats: CrawlStats = {
    runId,
    pagesIndexed: 0,
    linksDiscovered: 0,
    fetchFailures: 0,
    parseFailures: 0,
    workerFailures: 0,
    startTime: new Date(),
  };

  log.info(
    {
      domain: domain.href,
      fetchWorkers: options.fetchWorkers,
      indexWorkers: options.indexWorkers,
      termination: options.termination,
    },
    'Starting crawl'
  );

  if (options.requestQueueCapacity > 0) {
    log.warn(
      { requestQueueCapacity: options.requestQueueCapacity },
      BOUNDED_REQUEST_QUEUE_WARNING
    );
  }

  const sitemap = new Sitemap(domain);
  const requests = new WorkQueue<URL>(options.requestQueueCapacity);
  const pages = new WorkQueue<Page>(options.pageQueueCapacity);
  const monitor = createTerminationMonitor(
    options.termination,
    {
      workerCount: options.fetchWorkers + options.indexWorkers,
      debounceMs: options.debounceMs,
      pollIntervalMs: options.monitorPollMs,
    },
    log
  );

  // Seed
  sitemap.claim(domain.pathname);
  monitor.workAdded();
  await requests.push(domain);

  // Even ids fetch, odd ids index
  const workers: Array<FetchWorker | IndexWorker> = [];
  for (let i = 0; i < options.fetchWorkers; i++) {
    const id = i * 2;
    workers.push(
      new FetchWorker(id, {
        requests,
        pages,
        monitor,
        fetcher,
        parser,
        domain,
        stats,
        log: workerLogger(log, 'fetch', id),
      })
    );
  }
  for (let i = 0; i < options.indexWorkers; i++) {
    const id = i * 2 + 1;
    workers.push(
      new IndexWorker(id, {
        pages,
        requests,
        monitor,
        sitemap,
        stats,
        log: workerLogger(log, 'index', id),
      })
    );
  }

  const barrier = Promise.all(workers.map((worker) => worker.run()));
  monitor.start();
  try {
    await barrier;
  } finally {
    monitor.stop();
  }

  const site = sitemap.snapshot();

  stats.endTime = new Date();
  stats.durationMs = stats.endTime.getTime() - stats.startTime.getTime();
  logCrawlStats(log, stats);

  return { site, stats };
}

/**
 * Crawl a site and return only the sitemap
 */
export async function crawlSite(
  seed: string,
  overrides: Partial<CrawlOptions> = {},
  deps: CrawlDeps = {}
): Promise<Site> {
  const { site } = await runCrawl(seed, overrides, deps);
  return site;
}
