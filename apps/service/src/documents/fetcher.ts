import { load, type CheerioAPI } from 'cheerio';

import { describeError, type Logger } from '@scrapeyard/core';

export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;

/** Pages shorter than this almost always failed to render. */
export const MIN_DOCUMENT_LENGTH = 100;

export interface LoadedDocument {
  readonly url: string;
  readonly finalUrl: string;
  readonly status: number;
  readonly html: string;
  readonly $: CheerioAPI;
}

export type FetchOutcome =
  | { readonly document: LoadedDocument; readonly error: null }
  | { readonly document: null; readonly error: string };

/**
 * Retrieves pages for tooling that inspects live sites. Whoever acquires a fetcher
 * must close it on every exit path; {@link withDocumentFetcher} does that.
 */
export interface DocumentFetcher {
  fetch(url: string): Promise<FetchOutcome>;
  close(): Promise<void>;
}

export interface HttpDocumentFetcherOptions {
  readonly logger: Logger;
  readonly timeoutMs?: number;
}

const failure = (error: string): FetchOutcome => ({ document: null, error });

export class HttpDocumentFetcher implements DocumentFetcher {
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly pending = new Set<AbortController>();
  private closed = false;

  constructor(options: HttpDocumentFetcherOptions) {
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
  }

  async fetch(url: string): Promise<FetchOutcome> {
    if (this.closed) {
      return failure('Error fetching page: fetcher is closed');
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    this.pending.add(controller);

    try {
      const response = await fetch(url, {
        signal: controller.signal,
        redirect: 'follow',
        headers: { accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.1' }
      });
      if (!response.ok) {
        return failure(`Error fetching page: ${`${response.status} ${response.statusText}`.trim()}`);
      }

      const html = await response.text();
      if (html.length < MIN_DOCUMENT_LENGTH) {
        return failure(`Retrieved HTML is too short (${html.length} chars). Page may have failed to load.`);
      }

      this.logger.debug('Fetched document', { url, status: response.status, length: html.length });
      return {
        document: { url, finalUrl: response.url || url, status: response.status, html, $: load(html) },
        error: null
      };
    } catch (error) {
      if (timedOut) {
        this.logger.warn('Document fetch timed out', { url, timeoutMs: this.timeoutMs });
        return failure(`Timeout: page took longer than ${this.timeoutMs}ms to load`);
      }
      this.logger.warn('Document fetch failed', { url, error: describeError(error) });
      return failure(`Error fetching page: ${describeError(error)}`);
    } finally {
      clearTimeout(timer);
      this.pending.delete(controller);
    }
  }

  /** Aborts in-flight requests; later fetches fail fast. */
  close(): Promise<void> {
    this.closed = true;
    for (const controller of this.pending) {
      controller.abort();
    }
    this.pending.clear();
    return Promise.resolve();
  }
}

export const withDocumentFetcher = async <T>(
  fetcher: DocumentFetcher,
  run: (fetcher: DocumentFetcher) => Promise<T>
): Promise<T> => {
  try {
    return await run(fetcher);
  } finally {
    await fetcher.close();
  }
};
