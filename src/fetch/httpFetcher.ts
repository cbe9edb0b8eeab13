/**
 * HTTP fetch capability
 * Thin wrapper around the global fetch API
 */

import { DEFAULT_REQUEST_TIMEOUT_SECS, USER_AGENT } from '../config/constants';
import { isHtmlContentType } from '../parsers/pageParser';
import type { FetchedDocument, PageFetcher } from '../types/crawl.types';
import { FetchError, errorMessage } from '../utils/errors';

export interface HttpFetcherOptions {
  timeoutSecs?: number;
  userAgent?: string;
}

/**
 * Create a fetcher that rejects with a FetchError on network failure, timeout or an
 * HTTP status >= 400. Bodies that are not HTML are not downloaded.
 *
 * @param options - Request timeout and User-Agent
 */
export function createHttpFetcher(options: HttpFetcherOptions = {}): PageFetcher {
  const timeoutMs = (options.timeoutSecs ?? DEFAULT_REQUEST_TIMEOUT_SECS) * 1000;
  const userAgent = options.userAgent ?? USER_AGENT;

  return async (url: URL, signal: AbortSignal): Promise<FetchedDocument> => {
    let response: Response;
    try {
      response = await fetch(url, {
        headers: { 'User-Agent': userAgent },
        redirect: 'follow',
        signal: AbortSignal.any([signal, AbortSignal.timeout(timeoutMs)]),
      });
    } catch (error) {
      throw new FetchError(url.href, `Request failed: ${errorMessage(error)}`, undefined, {
        cause: error,
      });
    }

    if (response.status >= 400) {
      // Release the connection
      await response.body?.cancel();
      throw new FetchError(url.href, `HTTP ${response.status}`, response.status);
    }

    const contentType = response.headers.get('content-type');
    const document = { url: response.url || url.href, status: response.status, contentType };

    // Non-HTML bodies hold no links
    if (!isHtmlContentType(contentType)) {
      await response.body?.cancel();
      return { ...document, body: '' };
    }

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      throw new FetchError(url.href, `Failed to read body: ${errorMessage(error)}`, response.status, {
        cause: error,
      });
    }

    return { ...document, body };
  };
}
