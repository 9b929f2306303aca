import { describeError, type Logger } from '@scrapeyard/core';

import type { ObjectStorage, StorageBackend } from './types.js';

export interface TieredStorageOptions {
  readonly local: StorageBackend;
  readonly remote?: StorageBackend;
  readonly logger: Logger;
}

/**
 * Read-through/write-through policy over an optional durable backend and the local
 * cache. Backend failures never leave this class: reads, listings and existence checks
 * fall back to the local cache and saves log the failure.
 *
 * Nothing is locked. Two writers racing on one path leave whichever write landed last.
 */
export class TieredStorage implements ObjectStorage {
  readonly local: StorageBackend;
  readonly remote?: StorageBackend;
  private readonly logger: Logger;

  constructor(options: TieredStorageOptions) {
    this.local = options.local;
    this.remote = options.remote;
    this.logger = options.logger;
  }

  async save(path: string, content: string): Promise<boolean> {
    let savedLocally = true;
    try {
      await this.local.write(path, content);
    } catch (error) {
      savedLocally = false;
      this.logger.error('Failed to save to local cache', { path, error: describeError(error) });
    }

    if (!this.remote) {
      return savedLocally;
    }

    try {
      await this.remote.write(path, content);
      this.logger.info('Saved object to durable store', { path, backend: this.remote.name });
      return true;
    } catch (error) {
      this.logger.error('Failed to save to durable store', {
        path,
        backend: this.remote.name,
        error: describeError(error)
      });
      return savedLocally;
    }
  }

  async read(path: string): Promise<string | undefined> {
    if (this.remote) {
      try {
        const content = await this.remote.read(path);
        if (content !== undefined) {
          await this.refreshLocalCache(path, content);
          return content;
        }
      } catch (error) {
        this.logger.warn('Failed to read from durable store', {
          path,
          backend: this.remote.name,
          error: describeError(error)
        });
      }
    }

    try {
      return await this.local.read(path);
    } catch (error) {
      this.logger.error('Failed to read local cache', { path, error: describeError(error) });
      return undefined;
    }
  }

  async exists(path: string): Promise<boolean> {
    if (this.remote) {
      try {
        if (await this.remote.exists(path)) {
          return true;
        }
      } catch (error) {
        this.logger.debug('Durable store existence check failed', {
          path,
          backend: this.remote.name,
          error: describeError(error)
        });
      }
    }

    try {
      return await this.local.exists(path);
    } catch (error) {
      this.logger.error('Failed to check local cache', { path, error: describeError(error) });
      return false;
    }
  }

  async list(prefix: string): Promise<readonly string[]> {
    const paths = new Set<string>();

    if (this.remote) {
      try {
        for (const path of await this.remote.list(prefix)) {
          paths.add(path);
        }
      } catch (error) {
        this.logger.error('Failed to list durable store', {
          prefix,
          backend: this.remote.name,
          error: describeError(error)
        });
      }
    }

    try {
      for (const path of await this.local.list(prefix)) {
        paths.add(path);
      }
    } catch (error) {
      this.logger.error('Failed to list local cache', { prefix, error: describeError(error) });
    }

    return [...paths].sort();
  }

  private async refreshLocalCache(path: string, content: string): Promise<void> {
    try {
      await this.local.write(path, content);
    } catch (error) {
      this.logger.warn('Failed to update local cache', { path, error: describeError(error) });
    }
  }
}
