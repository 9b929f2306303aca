import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';

import { MemoryStorageBackend, TieredStorage } from '@scrapeyard/artifact-store';
import { createNoopLogger, type ExecutionVerdict } from '@scrapeyard/core';

import { ScraperRepository } from '../artifacts/repository.js';
import { createServer } from './server.js';

const CODE = "function scrape(url) {\n  return { title: 'Example', url };\n}\n";

const SUCCESS: ExecutionVerdict = {
  success: true,
  stdout: '{\n  "title": "Example"\n}\n',
  stderr: '',
  errorKind: 'none',
  exitCode: 0,
  durationMs: 12
};

describe('HTTP API', () => {
  let execute: Mock<(code: string, testUrl: string) => Promise<ExecutionVerdict>>;
  let server: ReturnType<typeof createServer>;

  beforeEach(() => {
    execute = vi.fn(async (_code: string, _testUrl: string) => SUCCESS);
    const repository = new ScraperRepository({
      storage: new TieredStorage({ local: new MemoryStorageBackend(), logger: createNoopLogger() }),
      sandbox: { execute },
      logger: createNoopLogger(),
      now: () => new Date('2026-05-01T08:00:00.000Z')
    });
    server = createServer({ repository });
  });

  afterEach(async () => {
    await server.close();
  });

  const saveArtifact = (payload: Record<string, unknown>) =>
    server.inject({ method: 'POST', url: '/artifacts', payload });

  it('stores an artifact and serves it back', async () => {
    const created = await saveArtifact({ code: CODE, url: 'https://example.org/a', selectors: { title: 'h1' } });
    expect(created.statusCode).toBe(201);
    expect(created.json()).toEqual({
      domain: 'example.org',
      key: 'example_org',
      scraperType: 'single',
      artifactPath: 'scrapers/example_org.js',
      metadataPath: 'metadata/example_org.json'
    });

    const shown = await server.inject({ method: 'GET', url: '/artifacts/example.org' });
    expect(shown.statusCode).toBe(200);
    expect(shown.json()).toMatchObject({
      path: 'scrapers/example_org.js',
      source: CODE,
      metadata: { domain: 'example.org', fields: ['title'], createdAt: '2026-05-01T08:00:00.000Z' }
    });

    const listed = await server.inject({ method: 'GET', url: '/artifacts' });
    expect(listed.json()).toMatchObject({ artifacts: [{ domain: 'example.org' }] });
  });

  it('rejects invalid bodies with 400', async () => {
    const response = await saveArtifact({ code: CODE, url: 'not-a-url', selectors: {} });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'Invalid url' });
  });

  it('answers 404 with the error code for unknown domains', async () => {
    const response = await server.inject({ method: 'GET', url: '/artifacts/missing.org' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: 'No scraper found for domain: missing.org', code: 'NOT_FOUND' });
  });

  it('answers 409 for incomplete pipelines', async () => {
    await saveArtifact({ code: CODE, url: 'https://example.org/news', selectors: {}, scraperType: 'list' });

    const response = await server.inject({ method: 'GET', url: '/pipelines/example.org' });

    expect(response.statusCode).toBe(409);
    expect(response.json()).toEqual({
      error: 'Incomplete pipeline for domain: example.org (missing content scraper)',
      code: 'INCOMPLETE_PIPELINE'
    });
  });

  it('describes complete pipelines', async () => {
    await saveArtifact({ code: CODE, url: 'https://example.org/news', selectors: {}, scraperType: 'list' });
    await saveArtifact({ code: CODE, url: 'https://example.org/news/1', selectors: {}, scraperType: 'content' });

    const pipeline = await server.inject({ method: 'GET', url: '/pipelines/example.org' });
    const pipelines = await server.inject({ method: 'GET', url: '/pipelines' });

    expect(pipeline.json()).toEqual({
      domain: 'example.org',
      list: { key: 'example_org_list', path: 'scrapers/example_org_list.js' },
      content: { key: 'example_org_content', path: 'scrapers/example_org_content.js' }
    });
    expect(pipelines.json()).toMatchObject({ pipelines: [{ domain: 'example.org' }] });
  });

  it('executes code in the sandbox', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/execute',
      payload: { code: CODE, url: 'https://example.org/a' }
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual(SUCCESS);
    expect(execute).toHaveBeenCalledWith(CODE, 'https://example.org/a');
  });

  it('validates stored artifacts', async () => {
    await saveArtifact({ code: CODE, url: 'https://example.org/a', selectors: {} });

    const response = await server.inject({
      method: 'POST',
      url: '/artifacts/example.org/validate',
      payload: { url: 'https://example.org/b' }
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ key: 'example_org', testUrl: 'https://example.org/b', verdict: SUCCESS });
  });
});
