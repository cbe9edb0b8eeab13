/**
 * Global constants for the crawler
 */

import type { TerminationStrategy } from '../types/crawl.types';

/**
 * Worker pool defaults
 */
export const DEFAULT_FETCH_WORKERS = 10;
export const DEFAULT_INDEX_WORKERS = 10;

/**
 * Queue capacities
 * 0 means unbounded. The request queue is unbounded by default so index workers
 * never block while fetch workers wait on a full page queue. With a bounded request
 * queue, a page linking to more URLs than both queues hold can deadlock the crawl.
 */
export const DEFAULT_REQUEST_QUEUE_CAPACITY = 0;
export const DEFAULT_PAGE_QUEUE_CAPACITY = 400;

/**
 * Termination detection
 */
export const DEFAULT_TERMINATION_STRATEGY: TerminationStrategy = 'counter';
export const DEFAULT_DEBOUNCE_MS = 2000;
export const DEFAULT_MONITOR_POLL_MS = 50;

/**
 * HTTP defaults
 */
export const DEFAULT_REQUEST_TIMEOUT_SECS = 60;
export const DEFAULT_SCHEME = 'http';

/**
 * User agent string
 */
export const USER_AGENT = 'Mozilla/5.0 (compatible; SiteMapper/1.0)';

/**
 * Elements that reference static assets, and the attribute holding the URL
 */
export const ASSET_ATTRIBUTES: Readonly<Record<string, string>> = {
  img: 'src',
  script: 'src',
  link: 'href',
};

/**
 * Content types handed to the HTML parser
 */
export const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'];
