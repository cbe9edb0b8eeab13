import { describe, expect, it } from 'vitest';
import { formatSitemapText, formatSummary, toSitemapJson } from '../sitemapPrinter';
import type { CrawlStats, Page, Site } from '../../types/crawl.types';

const site: Site = {
  domain: new URL('http://site.test/'),
  pages: new Map<string, Page>([
    [
      '/a',
      { url: 'http://site.test/a', links: [], assets: ['http://site.test/x.css'] },
    ],
    ['/', { url: 'http://site.test/', links: ['http://site.test/a'], assets: [] }],
  ]),
};

describe('sitemapPrinter', () => {
  it('renders the sitemap as text, sorted by path', () => {
    expect(formatSitemapText(site)).toBe(
      [
        'http://site.test/:',
        '\t/',
        '\tLINKS',
        '\t\thttp://site.test/a',
        '\tASSETS',
        '\t\tN/A (assets may be inlined)',
        '',
        '\t/a',
        '\tLINKS',
        '\t\tN/A (no links found)',
        '\tASSETS',
        '\t\thttp://site.test/x.css',
        '',
      ].join('\n')
    );
  });

  it('renders the sitemap as plain JSON', () => {
    expect(toSitemapJson(site)).toEqual({
      domain: 'http://site.test/',
      pages: {
        '/': { url: 'http://site.test/', links: ['http://site.test/a'], assets: [] },
        '/a': { url: 'http://site.test/a', links: [], assets: ['http://site.test/x.css'] },
      },
    });
  });

  it('summarizes the crawl', () => {
    const stats: CrawlStats = {
      runId: 'run-1',
      pagesIndexed: 2,
      linksDiscovered: 1,
      fetchFailures: 3,
      parseFailures: 0,
      workerFailures: 0,
      startTime: new Date(0),
      durationMs: 65_000,
    };

    const lines = formatSummary(stats, 2).split('\n');

    expect(lines).toContain('Run ID: run-1');
    expect(lines).toContain('  • Pages in sitemap:   2');
    expect(lines).toContain('  • Fetch failures:     3');
    expect(lines).toContain('Duration: 1m 5s');
  });
});
