/**
 * URL Normalizer
 * Sitemap keys and same-host checks depend on consistent normalization
 *
 * The identity of a page = normalized path of its URL
 */

import { DEFAULT_SCHEME } from '../config/constants';

/**
 * Apply the default scheme to a URL written without one
 *
 * @param url - Raw URL string (e.g., "example.com/about")
 * @param scheme - Scheme to apply, without "://"
 */
export function applyDefaultScheme(url: string, scheme: string = DEFAULT_SCHEME): string {
  const trimmed = url.trim();
  if (/^[a-z][a-z\d+.-]*:\/\//i.test(trimmed)) {
    return trimmed;
  }
  return `${scheme}://${trimmed.replace(/^\/\//, '')}`;
}

/**
 * Normalize a URL for consistent comparison
 *
 * Rules (applied in order):
 * 1. Parse with URL API (lowercases scheme and hostname)
 * 2. Remove fragment (#)
 * 3. Remove trailing slash (except root /)
 *
 * @param url - Absolute URL
 * @returns Normalized URL, or null when it cannot be parsed
 */
export function normalizeUrl(url: string | URL): URL | null {
  let urlObj: URL;
  try {
    urlObj = new URL(url.toString());
  } catch {
    return null;
  }

  urlObj.hash = '';
  urlObj.pathname = normalizePath(urlObj.pathname);
  return urlObj;
}

/**
 * Normalize a URL path into a sitemap key
 *
 * @param pathname - Path (e.g., "/about/team/")
 * @returns Path without trailing slash, "/" for the root
 */
export function normalizePath(pathname: string): string {
  let path = pathname || '/';
  if (!path.startsWith('/')) {
    path = `/${path}`;
  }
  while (path.length > 1 && path.endsWith('/')) {
    path = path.slice(0, -1);
  }
  return path;
}

/**
 * Resolve a relative URL against a base URL
 *
 * @param relativeUrl - Relative URL (e.g., "/about", "../contact")
 * @param baseUrl - Base URL to resolve against
 * @returns Absolute normalized URL, or null when either side is malformed
 */
export function resolveUrl(relativeUrl: string, baseUrl: string | URL): URL | null {
  const resolved = parseUrl(relativeUrl, baseUrl);
  return resolved ? normalizeUrl(resolved) : null;
}

/**
 * Parse a URL as-is, optionally against a base
 *
 * @returns The parsed URL, or null when it is malformed
 */
export function parseUrl(url: string, baseUrl?: string | URL): URL | null {
  try {
    return new URL(url.trim(), baseUrl);
  } catch {
    return null;
  }
}

/**
 * Check whether a URL is served over http(s)
 */
export function isHttpUrl(url: URL): boolean {
  return url.protocol === 'http:' || url.protocol === 'https:';
}

/**
 * Determine if two URLs share the same host (hostname and port)
 */
export function isSameHost(url: URL, domain: URL): boolean {
  return url.host === domain.host;
}

/**
 * Get the sitemap key of a URL
 *
 * @param url - Full URL
 * @returns Path (e.g., "/about/team")
 */
export function getPageKey(url: string | URL): string | null {
  const normalized = normalizeUrl(url);
  return normalized ? normalizePath(normalized.pathname) : null;
}
