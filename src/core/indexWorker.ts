/**
 * Index Worker
 * Adds fetched pages to the sitemap and sends links nobody has claimed yet back to
 * the fetch workers.
 */

import { CrawlWorker } from './worker';
import type { Sitemap } from './sitemap';
import type { TerminationMonitor } from './termination';
import type { WorkQueue } from './workQueue';
import { getPageKey, isHttpUrl, isSameHost, normalizeUrl } from './urlNormalizer';
import type { CrawlStats, Page } from '../types/crawl.types';
import type { Logger } from '../utils/logger';

export interface IndexWorkerDeps {
  pages: WorkQueue<Page>;
  requests: WorkQueue<URL>;
  monitor: TerminationMonitor;
  sitemap: Sitemap;
  stats: CrawlStats;
  log: Logger;
}

export class IndexWorker extends CrawlWorker<Page> {
  private readonly requests: WorkQueue<URL>;
  private readonly sitemap: Sitemap;
  private readonly stats: CrawlStats;

  constructor(id: number, deps: IndexWorkerDeps) {
    super(id, deps.pages, deps.monitor, deps.log);
    this.requests = deps.requests;
    this.sitemap = deps.sitemap;
    this.stats = deps.stats;
  }

  protected async process(page: Page): Promise<void> {
    const key = getPageKey(page.url);
    if (key === null) {
      throw new Error(`Page has an unparseable URL: ${page.url}`);
    }

    this.sitemap.store(key, page);
    this.stats.pagesIndexed++;
    this.log.debug({ url: page.url, links: page.links.length, assets: page.assets.length }, 'Page indexed');

    // Claim every new link first; nothing is awaited between check and insert
    const discovered: URL[] = [];
    for (const link of page.links) {
      const url = normalizeUrl(link);
      if (!url || !isHttpUrl(url) || !isSameHost(url, this.sitemap.domain)) {
        continue;
      }
      if (this.sitemap.claim(url.pathname)) {
        discovered.push(url);
      }
    }

    for (let i = 0; i < discovered.length; i++) {
      this.monitor.workAdded();
    }
    this.stats.linksDiscovered += discovered.length;

    // Queue only after all claims so a full request queue never holds up the sitemap
    for (const url of discovered) {
      await this.requests.push(url);
    }

    this.monitor.workDone();
  }

  protected onFailure(): void {
    this.stats.workerFailures++;
    this.monitor.workDone();
  }
}
