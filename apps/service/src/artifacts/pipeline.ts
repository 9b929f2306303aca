import { ListScrapeResultSchema, describeError, type Logger, type ScrapedFields } from '@scrapeyard/core';

import type { ResolvedPipeline } from './resolver.js';

export interface PipelineRecord {
  readonly url: string;
  readonly fields: ScrapedFields;
}

export interface PipelineFailure {
  readonly url: string;
  readonly error: string;
}

export interface PipelineRun {
  readonly domain: string;
  readonly listingUrl: string;
  readonly urls: readonly string[];
  readonly records: readonly PipelineRecord[];
  readonly failures: readonly PipelineFailure[];
}

export interface RunPipelineOptions {
  /** Maximum number of listed URLs handed to the content scraper. */
  readonly limit?: number;
  readonly logger?: Logger;
}

/**
 * Two-step extraction: the list scraper yields item URLs from a listing page, then the
 * content scraper runs once per URL. Content failures are collected, not thrown.
 */
export const runPipeline = async (
  pipeline: ResolvedPipeline,
  listingUrl: string,
  options: RunPipelineOptions = {}
): Promise<PipelineRun> => {
  const listed = ListScrapeResultSchema.safeParse(await pipeline.list.scrape(listingUrl));
  if (!listed.success) {
    throw new Error(`List scraper ${pipeline.list.key} must return { urls: string[] }`);
  }

  const urls = options.limit === undefined ? listed.data.urls : listed.data.urls.slice(0, options.limit);
  const records: PipelineRecord[] = [];
  const failures: PipelineFailure[] = [];

  for (const url of urls) {
    try {
      records.push({ url, fields: await pipeline.content.scrape(url) });
    } catch (error) {
      const message = describeError(error);
      options.logger?.warn('Content scraper failed', { domain: pipeline.domain, url, error: message });
      failures.push({ url, error: message });
    }
  }

  options.logger?.info('Pipeline run finished', {
    domain: pipeline.domain,
    listingUrl,
    scraped: records.length,
    failed: failures.length
  });

  return { domain: pipeline.domain, listingUrl, urls, records, failures };
};
