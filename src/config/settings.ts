/**
 * Crawl configuration
 * Defaults from constants, overridden by environment variables, overridden by
 * explicit options (CLI flags or library callers)
 */

import * as dotenv from 'dotenv';
import {
  DEFAULT_DEBOUNCE_MS,
  DEFAULT_FETCH_WORKERS,
  DEFAULT_INDEX_WORKERS,
  DEFAULT_MONITOR_POLL_MS,
  DEFAULT_PAGE_QUEUE_CAPACITY,
  DEFAULT_REQUEST_QUEUE_CAPACITY,
  DEFAULT_REQUEST_TIMEOUT_SECS,
  DEFAULT_SCHEME,
  DEFAULT_TERMINATION_STRATEGY,
} from './constants';
import type { CrawlOptions, TerminationStrategy } from '../types/crawl.types';
import { ConfigError } from '../utils/errors';

dotenv.config();

const TERMINATION_STRATEGIES: readonly TerminationStrategy[] = ['counter', 'debounce'];

/**
 * Built-in defaults
 */
export const DEFAULT_CRAWL_OPTIONS: Readonly<CrawlOptions> = Object.freeze({
  fetchWorkers: DEFAULT_FETCH_WORKERS,
  indexWorkers: DEFAULT_INDEX_WORKERS,
  requestQueueCapacity: DEFAULT_REQUEST_QUEUE_CAPACITY,
  pageQueueCapacity: DEFAULT_PAGE_QUEUE_CAPACITY,
  termination: DEFAULT_TERMINATION_STRATEGY,
  debounceMs: DEFAULT_DEBOUNCE_MS,
  monitorPollMs: DEFAULT_MONITOR_POLL_MS,
  requestTimeoutSecs: DEFAULT_REQUEST_TIMEOUT_SECS,
  defaultScheme: DEFAULT_SCHEME,
});

/**
 * Parse a non-negative integer option
 *
 * @param name - Option name, used in the error message
 * @param value - Raw value
 * @param min - Smallest accepted value
 */
export function parseIntegerOption(name: string, value: string | number, min = 0): number {
  const parsed = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${value}"`);
  }
  return parsed;
}

export function parseTerminationStrategy(value: string): TerminationStrategy {
  const strategy = TERMINATION_STRATEGIES.find((candidate) => candidate === value.trim().toLowerCase());
  if (!strategy) {
    throw new ConfigError(
      `termination must be one of ${TERMINATION_STRATEGIES.join(', ')}, got "${value}"`
    );
  }
  return strategy;
}

/**
 * Read option overrides from the environment
 */
export function optionsFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<CrawlOptions> {
  const options: Partial<CrawlOptions> = {};

  if (env.CRAWL_FETCH_WORKERS) {
    options.fetchWorkers = parseIntegerOption('CRAWL_FETCH_WORKERS', env.CRAWL_FETCH_WORKERS, 1);
  }
  if (env.CRAWL_INDEX_WORKERS) {
    options.indexWorkers = parseIntegerOption('CRAWL_INDEX_WORKERS', env.CRAWL_INDEX_WORKERS, 1);
  }
  if (env.CRAWL_REQUEST_QUEUE) {
    options.requestQueueCapacity = parseIntegerOption('CRAWL_REQUEST_QUEUE', env.CRAWL_REQUEST_QUEUE);
  }
  if (env.CRAWL_PAGE_QUEUE) {
    options.pageQueueCapacity = parseIntegerOption('CRAWL_PAGE_QUEUE', env.CRAWL_PAGE_QUEUE);
  }
  if (env.CRAWL_TERMINATION) {
    options.termination = parseTerminationStrategy(env.CRAWL_TERMINATION);
  }
  if (env.CRAWL_DEBOUNCE_MS) {
    options.debounceMs = parseIntegerOption('CRAWL_DEBOUNCE_MS', env.CRAWL_DEBOUNCE_MS);
  }
  if (env.CRAWL_TIMEOUT_SECS) {
    options.requestTimeoutSecs = parseIntegerOption('CRAWL_TIMEOUT_SECS', env.CRAWL_TIMEOUT_SECS, 1);
  }
  if (env.CRAWL_DEFAULT_SCHEME) {
    options.defaultScheme = env.CRAWL_DEFAULT_SCHEME.trim().toLowerCase();
  }

  return options;
}

/**
 * Merge defaults, environment and explicit overrides, then validate the result
 */
export function resolveCrawlOptions(
  overrides: Partial<CrawlOptions> = {},
  env: NodeJS.ProcessEnv = process.env
): CrawlOptions {
  const fromEnv = optionsFromEnv(env);
  const pick = <K extends keyof CrawlOptions>(key: K): CrawlOptions[K] =>
    overrides[key] ?? fromEnv[key] ?? DEFAULT_CRAWL_OPTIONS[key];

  const options: CrawlOptions = {
    fetchWorkers: pick('fetchWorkers'),
    indexWorkers: pick('indexWorkers'),
    requestQueueCapacity: pick('requestQueueCapacity'),
    pageQueueCapacity: pick('pageQueueCapacity'),
    termination: pick('termination'),
    debounceMs: pick('debounceMs'),
    monitorPollMs: pick('monitorPollMs'),
    requestTimeoutSecs: pick('requestTimeoutSecs'),
    defaultScheme: pick('defaultScheme'),
    runId: overrides.runId,
  };

  parseIntegerOption('fetchWorkers', options.fetchWorkers, 1);
  parseIntegerOption('indexWorkers', options.indexWorkers, 1);
  parseIntegerOption('requestQueueCapacity', options.requestQueueCapacity);
  parseIntegerOption('pageQueueCapacity', options.pageQueueCapacity);
  parseIntegerOption('debounceMs', options.debounceMs);
  parseIntegerOption('monitorPollMs', options.monitorPollMs, 1);
  parseIntegerOption('requestTimeoutSecs', options.requestTimeoutSecs, 1);
  parseTerminationStrategy(options.termination);
  if (!/^https?$/.test(options.defaultScheme)) {
    throw new ConfigError(`defaultScheme must be http or https, got "${options.defaultScheme}"`);
  }

  return options;
}
