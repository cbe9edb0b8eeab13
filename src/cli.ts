/**
 * Command-line interface
 */

import { Command, InvalidArgumentError } from 'commander';
import { runCrawl, type CrawlDeps } from './core/crawler';
import { parseIntegerOption, parseTerminationStrategy } from './config/settings';
import { formatSitemapText, formatSummary, toSitemapJson } from './output/sitemapPrinter';
import type { CrawlOptions, TerminationStrategy } from './types/crawl.types';
import { ConfigError, InvalidSeedUrlError, errorMessage } from './utils/errors';
import { logger } from './utils/logger';

interface CliOptions {
  fetchWorkers?: number;
  indexWorkers?: number;
  termination?: TerminationStrategy;
  debounceMs?: number;
  requestQueue?: number;
  pageQueue?: number;
  timeoutSecs?: number;
  json?: boolean;
  summary?: boolean;
  debug?: boolean;
}

/**
 * Wrap a config parser for commander, which expects InvalidArgumentError
 */
function cliParser<T>(parse: (value: string) => T): (value: string) => T {
  return (value: string) => {
    try {
      return parse(value);
    } catch (error) {
      throw new InvalidArgumentError(errorMessage(error));
    }
  };
}

const positive = (name: string) => cliParser((value) => parseIntegerOption(name, value, 1));
const nonNegative = (name: string) => cliParser((value) => parseIntegerOption(name, value));

/**
 * Build the CLI program
 *
 * @param deps - Crawl capabilities, real HTTP by default
 * @param write - Output sink for the rendered sitemap
 */
export function buildProgram(
  deps: CrawlDeps = {},
  write: (text: string) => void = (text) => console.log(text)
): Command {
  const program = new Command();

  program
    .name('site-mapper')
    .description('Map every same-host page, link and static asset reachable from a URL')
    .version('1.0.0')
    .argument('<url>', 'Seed URL (http:// is assumed when no scheme is given)')
    .option('--fetch-workers <number>', 'Number of fetch workers', positive('fetch-workers'))
    .option('--index-workers <number>', 'Number of index workers', positive('index-workers'))
    .option(
      '--termination <strategy>',
      'Termination detection (counter|debounce)',
      cliParser(parseTerminationStrategy)
    )
    .option('--debounce-ms <number>', 'Quiet period before the debounce monitor stops the crawl', nonNegative('debounce-ms'))
    .option(
      '--request-queue <number>',
      'Request queue capacity, 0 for unbounded (a bounded queue can deadlock on pages with many links)',
      nonNegative('request-queue')
    )
    .option('--page-queue <number>', 'Page queue capacity, 0 for unbounded', nonNegative('page-queue'))
    .option('--timeout-secs <number>', 'Per-request timeout in seconds', positive('timeout-secs'))
    .option('--json', 'Print the sitemap as JSON')
    .option('--no-summary', 'Do not print the crawl summary')
    .option('-d, --debug', 'Enable debug logging')
    .action(async (url: string, cliOptions: CliOptions) => {
      try {
        await main(url, cliOptions, deps, write);
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Crawl failed');
        process.exitCode = error instanceof InvalidSeedUrlError || error instanceof ConfigError ? 2 : 1;
      }
    });

  return program;
}

/**
 * Main crawl execution
 */
async function main(
  url: string,
  cliOptions: CliOptions,
  deps: CrawlDeps,
  write: (text: string) => void
): Promise<void> {
  if (cliOptions.debug) {
    logger.level = 'debug';
  }

  const overrides: Partial<CrawlOptions> = {
    fetchWorkers: cliOptions.fetchWorkers,
    indexWorkers: cliOptions.indexWorkers,
    termination: cliOptions.termination,
    debounceMs: cliOptions.debounceMs,
    requestQueueCapacity: cliOptions.requestQueue,
    pageQueueCapacity: cliOptions.pageQueue,
    requestTimeoutSecs: cliOptions.timeoutSecs,
  };

  const { site, stats } = await runCrawl(url, overrides, deps);

  if (cliOptions.json) {
    write(JSON.stringify(toSitemapJson(site), null, 2));
  } else {
    write(formatSitemapText(site));
  }

  if (cliOptions.summary !== false && !cliOptions.json) {
    write(formatSummary(stats, site.pages.size));
  }
}
