import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { MemoryStorageBackend } from '@scrapeyard/artifact-store';
import type { Logger } from '@scrapeyard/core';

import type { ServiceConfig } from './config.js';
import { createScraperRepository } from './setup.js';

const CODE = "function scrape() {\n  return { title: 'Example' };\n}\n";

const createLogger = (): Logger => {
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger
  };
  return logger;
};

describe('createScraperRepository', () => {
  let directory: string;
  let config: ServiceConfig;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'scrapeyard-setup-'));
    config = {
      repositoryDirectory: directory,
      sandboxTimeoutMs: 5_000,
      fetchTimeoutMs: 5_000,
      logLevel: 'info'
    };
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('runs local-only without a bucket', async () => {
    const logger = createLogger();
    const createRemote = vi.fn(() => new MemoryStorageBackend());
    const repository = createScraperRepository({ config, logger, createRemote });

    await repository.saveArtifact({ code: CODE, url: 'https://example.org/', selectors: {} });

    expect(createRemote).not.toHaveBeenCalled();
    await expect(readFile(join(directory, 'scrapers', 'example_org.js'), 'utf-8')).resolves.toBe(CODE);
    expect(logger.info).toHaveBeenCalledWith('No durable store configured, using the local cache only', {
      directory
    });
  });

  it('writes through to the durable store when a bucket is configured', async () => {
    const remote = new MemoryStorageBackend({ name: 'remote' });
    const repository = createScraperRepository({
      config: { ...config, bucketName: 'scraper-artifacts' },
      logger: createLogger(),
      createRemote: () => remote
    });

    await repository.saveArtifact({ code: CODE, url: 'https://example.org/', selectors: {} });

    expect(remote.snapshot().map(({ path }) => path)).toEqual(['scrapers/example_org.js', 'metadata/example_org.json']);
  });

  it('degrades to local-only when the durable client cannot be built', async () => {
    const logger = createLogger();
    const repository = createScraperRepository({
      config: { ...config, bucketName: 'scraper-artifacts' },
      logger,
      createRemote: () => {
        throw new Error('no credentials');
      }
    });

    await repository.saveArtifact({ code: CODE, url: 'https://example.org/', selectors: {} });

    expect(logger.error).toHaveBeenCalledWith('Failed to initialize durable store, using the local cache only', {
      bucket: 'scraper-artifacts',
      error: 'no credentials'
    });
    await expect(repository.getArtifact('example.org')).resolves.toMatchObject({ source: CODE });
  });
});
