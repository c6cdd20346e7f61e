import { createChildLogger } from '../../utils/logger.js';
import { Config, ExtractionFailure, errorMessage } from '../../types/index.js';
import type { ContentFetcher, SourceRef } from '../types.js';

const logger = createChildLogger('http-fetcher');

/**
 * Configuration options for the HTTP fetcher
 */
export interface HttpFetcherOptions {
  /** Request timeout in milliseconds */
  timeout?: number;
  /** User agent string */
  userAgent?: string;
  /** Attempts before giving up */
  retries?: number;
  /** Delay between retries in milliseconds, multiplied by the attempt number */
  retryDelay?: number;
}

const DEFAULT_OPTIONS: Required<HttpFetcherOptions> = {
  timeout: 30000,
  userAgent: 'content-change-monitor/1.0',
  retries: 3,
  retryDelay: 1000,
};

/**
 * Fetches source content over HTTP with a timeout and retries
 */
export class HttpContentFetcher implements ContentFetcher {
  private options: Required<HttpFetcherOptions>;

  constructor(options: HttpFetcherOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async fetch(source: SourceRef, signal?: AbortSignal): Promise<string> {
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.options.retries; attempt++) {
      signal?.throwIfAborted();

      try {
        logger.debug({ url: source.url, guid: source.guid, attempt }, 'Fetching URL');
        const content = await this.fetchOnce(source.url, signal);
        logger.debug({ url: source.url, contentLength: content.length }, 'Fetch successful');
        return content;
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        lastError = error;
        logger.warn({ url: source.url, attempt, error: errorMessage(error) }, 'Fetch attempt failed');

        if (attempt < this.options.retries) {
          await this.sleep(this.options.retryDelay * attempt);
        }
      }
    }

    throw new ExtractionFailure(
      `Failed to fetch ${source.url} after ${this.options.retries} attempts: ${errorMessage(lastError)}`,
      source.monitorId,
      { url: source.url }
    );
  }

  private async fetchOnce(url: string, signal?: AbortSignal): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeout);
    const forwardAbort = (): void => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      const response = await fetch(url, {
        headers: {
          'User-Agent': this.options.userAgent,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new Error(`HTTP ${response.status}: ${response.statusText}`);
      }

      return await response.text();
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

export function createHttpFetcher(config: Config['fetcher']): HttpContentFetcher {
  return new HttpContentFetcher({
    timeout: config.timeoutMs,
    userAgent: config.userAgent,
    retries: config.retries,
    retryDelay: config.retryDelayMs,
  });
}
