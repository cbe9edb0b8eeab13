/**
 * Fetch Worker
 * Pulls URLs off the request queue, fetches and parses them, and hands the resulting
 * pages to the index workers.
 */

import { CrawlWorker } from './worker';
import type { TerminationMonitor } from './termination';
import type { WorkQueue } from './workQueue';
import { isSameHost, normalizeUrl } from './urlNormalizer';
import type { CrawlStats, FetchedDocument, Page, PageFetcher, PageParser, ParsedPage } from '../types/crawl.types';
import { errorMessage } from '../utils/errors';
import type { Logger } from '../utils/logger';

export interface FetchWorkerDeps {
  requests: WorkQueue<URL>;
  pages: WorkQueue<Page>;
  monitor: TerminationMonitor;
  fetcher: PageFetcher;
  parser: PageParser;
  domain: URL;
  stats: CrawlStats;
  log: Logger;
}

export class FetchWorker extends CrawlWorker<URL> {
  private readonly pages: WorkQueue<Page>;
  private readonly fetcher: PageFetcher;
  private readonly parser: PageParser;
  private readonly domain: URL;
  private readonly stats: CrawlStats;

  constructor(id: number, deps: FetchWorkerDeps) {
    super(id, deps.requests, deps.monitor, deps.log);
    this.pages = deps.pages;
    this.fetcher = deps.fetcher;
    this.parser = deps.parser;
    this.domain = deps.domain;
    this.stats = deps.stats;
  }

  protected async process(url: URL): Promise<void> {
    let document: FetchedDocument;
    try {
      document = await this.fetcher(url, this.monitor.signal);
    } catch (error) {
      // Best effort: the URL is dropped for the rest of the crawl
      this.log.warn({ url: url.href, error: errorMessage(error) }, 'Request failed');
      this.stats.fetchFailures++;
      this.monitor.workDone();
      return;
    }
    this.log.debug({ url: url.href, statusCode: document.status }, 'Page fetched');

    const { links, assets } = this.parse(document);
    const page: Page = {
      url: url.href,
      links: this.sameHostOnly(links),
      assets,
    };

    // Waits while the page queue is full; a fetched page is never dropped
    await this.pages.push(page);
  }

  protected onFailure(): void {
    this.stats.workerFailures++;
    this.monitor.workDone();
  }

  private parse(document: FetchedDocument): ParsedPage {
    try {
      return this.parser(document);
    } catch (error) {
      this.log.warn({ url: document.url, error: errorMessage(error) }, 'Failed to parse page');
      this.stats.parseFailures++;
      return { links: [], assets: [] };
    }
  }

  private sameHostOnly(links: string[]): string[] {
    const kept: string[] = [];
    for (const link of links) {
      const url = normalizeUrl(link);
      if (url && isSameHost(url, this.domain)) {
        kept.push(url.href);
      }
    }
    return kept;
  }
}
