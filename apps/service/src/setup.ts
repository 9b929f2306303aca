import {
  GoogleCloudStorageBackend,
  LocalFileSystemBackend,
  TieredStorage,
  type StorageBackend
} from '@scrapeyard/artifact-store';
import { createLogger, describeError, type Logger } from '@scrapeyard/core';
import { ExecutionSandbox } from '@scrapeyard/sandbox';

import { ScraperRepository } from './artifacts/repository.js';
import type { ServiceConfig } from './config.js';
import { HttpDocumentFetcher, type DocumentFetcher } from './documents/index.js';

export interface CreateScraperRepositoryOptions {
  readonly config: ServiceConfig;
  readonly logger?: Logger;
  /** Builds the durable backend for a bucket. Defaults to Google Cloud Storage. */
  readonly createRemote?: (bucketName: string) => StorageBackend;
  readonly now?: () => Date;
}

const createRemoteBackend = (
  config: ServiceConfig,
  logger: Logger,
  factory: (bucketName: string) => StorageBackend
): StorageBackend | undefined => {
  if (!config.bucketName) {
    logger.info('No durable store configured, using the local cache only', {
      directory: config.repositoryDirectory
    });
    return undefined;
  }

  try {
    const remote = factory(config.bucketName);
    logger.info('Durable store configured', { backend: remote.name, bucket: config.bucketName });
    return remote;
  } catch (error) {
    logger.error('Failed to initialize durable store, using the local cache only', {
      bucket: config.bucketName,
      error: describeError(error)
    });
    return undefined;
  }
};

export const createScraperRepository = (options: CreateScraperRepositoryOptions): ScraperRepository => {
  const { config } = options;
  const logger = options.logger ?? createLogger({ level: config.logLevel });
  const remote = createRemoteBackend(
    config,
    logger,
    options.createRemote ?? ((bucketName) => new GoogleCloudStorageBackend({ bucketName }))
  );

  const storage = new TieredStorage({
    local: new LocalFileSystemBackend({ directory: config.repositoryDirectory }),
    remote,
    logger: logger.child({ component: 'storage' })
  });
  const sandbox = new ExecutionSandbox({
    logger: logger.child({ component: 'sandbox' }),
    timeoutMs: config.sandboxTimeoutMs
  });

  return new ScraperRepository({ storage, sandbox, logger, now: options.now });
};

export const createDocumentFetcher = (config: ServiceConfig, logger: Logger): DocumentFetcher =>
  new HttpDocumentFetcher({ logger: logger.child({ component: 'fetcher' }), timeoutMs: config.fetchTimeoutMs });
