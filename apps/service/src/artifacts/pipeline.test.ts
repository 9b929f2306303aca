import { describe, expect, it, vi } from 'vitest';

import type { ScrapedFields } from '@scrapeyard/core';

import { runPipeline } from './pipeline.js';
import type { LoadedScraper, ResolvedPipeline } from './resolver.js';

const scraper = (key: string, scrape: (url: string) => Promise<ScrapedFields>): LoadedScraper => ({
  key,
  path: `scrapers/${key}.js`,
  source: '',
  scrape
});

const createPipeline = (
  listScrape: (url: string) => Promise<ScrapedFields>,
  contentScrape: (url: string) => Promise<ScrapedFields>
): ResolvedPipeline => ({
  domain: 'example.org',
  list: scraper('example_org_list', listScrape),
  content: scraper('example_org_content', contentScrape)
});

describe('runPipeline', () => {
  it('scrapes every listed URL and collects failures', async () => {
    const content = vi.fn(async (url: string) => {
      if (url.endsWith('/2')) {
        throw new Error('missing headline');
      }
      return { headline: `Story ${url.slice(-1)}` };
    });
    const pipeline = createPipeline(
      async () => ({ urls: ['https://example.org/1', 'https://example.org/2', 'https://example.org/3'] }),
      content
    );

    const run = await runPipeline(pipeline, 'https://example.org/');

    expect(run).toEqual({
      domain: 'example.org',
      listingUrl: 'https://example.org/',
      urls: ['https://example.org/1', 'https://example.org/2', 'https://example.org/3'],
      records: [
        { url: 'https://example.org/1', fields: { headline: 'Story 1' } },
        { url: 'https://example.org/3', fields: { headline: 'Story 3' } }
      ],
      failures: [{ url: 'https://example.org/2', error: 'missing headline' }]
    });
  });

  it('stops after the limit', async () => {
    const content = vi.fn(async (url: string) => ({ url }));
    const pipeline = createPipeline(async () => ({ urls: ['https://a.test/1', 'https://a.test/2'] }), content);

    const run = await runPipeline(pipeline, 'https://a.test/', { limit: 1 });

    expect(run.urls).toEqual(['https://a.test/1']);
    expect(content).toHaveBeenCalledTimes(1);
  });

  it('rejects list results without a urls array', async () => {
    const content = vi.fn(async () => ({}));
    const pipeline = createPipeline(async () => ({ urls: 'https://a.test/1' }), content);

    await expect(runPipeline(pipeline, 'https://a.test/')).rejects.toThrow(
      'List scraper example_org_list must return { urls: string[] }'
    );
    expect(content).not.toHaveBeenCalled();
  });
});
