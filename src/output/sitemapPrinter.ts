/**
 * Sitemap output formatting
 */

import type { CrawlStats, Site } from '../types/crawl.types';

/**
 * Render a site as indented text: the domain, then every path with its links and
 * static assets. Paths are sorted.
 */
export function formatSitemapText(site: Site): string {
  const lines: string[] = [`${site.domain.href}:`];

  for (const path of [...site.pages.keys()].sort()) {
    const page = site.pages.get(path);
    if (!page) continue;

    lines.push(`\t${path}`);

    lines.push('\tLINKS');
    if (page.links.length > 0) {
      page.links.forEach((link) => lines.push(`\t\t${link}`));
    } else {
      lines.push('\t\tN/A (no links found)');
    }

    lines.push('\tASSETS');
    if (page.assets.length > 0) {
      page.assets.forEach((asset) => lines.push(`\t\t${asset}`));
    } else {
      lines.push('\t\tN/A (assets may be inlined)');
    }
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Plain JSON shape of a site
 */
export interface SitemapJson {
  domain: string;
  pages: Record<string, { url: string; links: string[]; assets: string[] }>;
}

export function toSitemapJson(site: Site): SitemapJson {
  const pages: SitemapJson['pages'] = {};
  for (const path of [...site.pages.keys()].sort()) {
    const page = site.pages.get(path);
    if (!page) continue;
    pages[path] = { url: page.url, links: [...page.links], assets: [...page.assets] };
  }
  return { domain: site.domain.href, pages };
}

/**
 * Crawl summary shown after the sitemap
 */
export function formatSummary(stats: CrawlStats, pageCount: number): string {
  const durationSec = Math.round((stats.durationMs ?? 0) / 1000);
  const minutes = Math.floor(durationSec / 60);
  const seconds = durationSec % 60;

  return [
    '='.repeat(60),
    'Crawl Complete',
    '='.repeat(60),
    `Run ID: ${stats.runId}`,
    `  • Pages in sitemap:   ${pageCount.toLocaleString()}`,
    `  • Links discovered:   ${stats.linksDiscovered.toLocaleString()}`,
    `  • Fetch failures:     ${stats.fetchFailures.toLocaleString()}`,
    `  • Parse failures:     ${stats.parseFailures.toLocaleString()}`,
    `Duration: ${minutes}m ${seconds}s`,
    '='.repeat(60),
  ].join('\n');
}
