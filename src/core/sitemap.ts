/**
 * Sitemap
 * Owns the path → page mapping of one crawl. Callers never touch the map directly;
 * every operation below runs to completion without yielding to the event loop, so
 * each one is atomic with respect to the other workers.
 */

import type { Page, Site } from '../types/crawl.types';
import { normalizePath } from './urlNormalizer';

/**
 * Empty record that claims a path until its fetch completes
 */
const PLACEHOLDER: Page = Object.freeze({ url: '', links: [], assets: [] });

export class Sitemap {
  private readonly pages = new Map<string, Page>();
  private sealed = false;

  constructor(readonly domain: URL) {}

  /**
   * Check-and-insert-placeholder
   *
   * @returns true when the path was unknown and is now claimed by the caller,
   *          false when another worker already claimed or stored it
   */
  claim(path: string): boolean {
    this.assertOpen();
    const key = normalizePath(path);
    if (this.pages.has(key)) {
      return false;
    }
    this.pages.set(key, PLACEHOLDER);
    return true;
  }

  /**
   * Store a fetched page at its path, replacing any placeholder
   */
  store(path: string, page: Page): void {
    this.assertOpen();
    this.pages.set(
      normalizePath(path),
      Object.freeze({
        url: page.url,
        links: Object.freeze([...page.links]),
        assets: Object.freeze([...page.assets]),
      })
    );
  }

  /**
   * Number of claimed or stored paths
   */
  get size(): number {
    return this.pages.size;
  }

  /**
   * Seal the sitemap and hand out the finished site as a copy the workers no
   * longer reach. Placeholders whose fetch never produced a page are left out.
   */
  snapshot(): Site {
    this.sealed = true;
    const pages = new Map<string, Page>();
    for (const [path, page] of this.pages) {
      if (page !== PLACEHOLDER) {
        pages.set(path, page);
      }
    }
    return Object.freeze({ domain: new URL(this.domain.href), pages });
  }

  private assertOpen(): void {
    if (this.sealed) {
      throw new Error('Sitemap is sealed: the crawl has finished');
    }
  }
}

