/**
 * Page parser
 * Extracts same-host links and static assets from an HTML document
 */

import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import { ASSET_ATTRIBUTES, HTML_CONTENT_TYPES } from '../config/constants';
import { isHttpUrl, isSameHost, parseUrl, resolveUrl } from '../core/urlNormalizer';
import type { FetchedDocument, ParsedPage } from '../types/crawl.types';

/**
 * Check whether a content type names HTML.
 * A missing content type is treated as HTML.
 */
export function isHtmlContentType(contentType: string | null): boolean {
  if (!contentType) {
    return true;
  }
  const lowered = contentType.toLowerCase();
  return HTML_CONTENT_TYPES.some((type) => lowered.includes(type));
}

export function isHtmlDocument(document: FetchedDocument): boolean {
  return isHtmlContentType(document.contentType);
}

/**
 * Parse links and static assets out of a fetched document
 *
 * Links come from <a href>, assets from <img src>, <script src> and <link href>.
 * Relative URLs are resolved against the document URL (a <base href> takes
 * precedence), and anything on another host is dropped. Order follows the document;
 * a URL referenced several times is listed once, at its first occurrence.
 *
 * @param document - Fetched response
 * @returns Same-host links and assets
 */
export function parseDocument(document: FetchedDocument): ParsedPage {
  if (!isHtmlDocument(document) || !document.body) {
    return { links: [], assets: [] };
  }

  const host = new URL(document.url);
  const $ = cheerio.load(document.body);

  const baseHref = $('base[href]').first().attr('href');
  const base = (baseHref && parseUrl(baseHref, host)) || host;

  const links = new Set<string>();
  const assets = new Set<string>();

  const add = (value: string | undefined, into: Set<string>) => {
    if (!value || !value.trim()) return;

    const resolved = resolveUrl(value, base);
    if (resolved && isHttpUrl(resolved) && isSameHost(resolved, host)) {
      into.add(resolved.href);
    }
  };

  $('a[href]').each((_, el) => add($(el).attr('href'), links));

  const assetSelector = Object.entries(ASSET_ATTRIBUTES)
    .map(([tag, attribute]) => `${tag}[${attribute}]`)
    .join(', ');
  $<Element, string>(assetSelector).each((_, el) => {
    const attribute = ASSET_ATTRIBUTES[el.tagName.toLowerCase()];
    if (attribute) {
      add($(el).attr(attribute), assets);
    }
  });

  return { links: [...links], assets: [...assets] };
}
