import { describe, expect, it, vi } from 'vitest';

import type { Logger } from '@scrapeyard/core';

import { MemoryStorageBackend } from './memory.js';
import { TieredStorage } from './tiered.js';
import type { StorageBackend } from './types.js';

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

class FailingBackend implements StorageBackend {
  readonly name = 'failing';

  write(): Promise<void> {
    return Promise.reject(new Error('backend unavailable'));
  }

  read(): Promise<string | undefined> {
    return Promise.reject(new Error('backend unavailable'));
  }

  exists(): Promise<boolean> {
    return Promise.reject(new Error('backend unavailable'));
  }

  list(): Promise<readonly string[]> {
    return Promise.reject(new Error('backend unavailable'));
  }
}

describe('TieredStorage without a durable store', () => {
  it('saves and reads through the local cache only', async () => {
    const local = new MemoryStorageBackend({ name: 'local' });
    const storage = new TieredStorage({ local, logger: createLogger() });

    expect(await storage.save('scrapers/a.js', 'code')).toBe(true);
    expect(await storage.read('scrapers/a.js')).toBe('code');
    expect(await storage.exists('scrapers/a.js')).toBe(true);
    expect(await storage.list('scrapers/')).toEqual(['scrapers/a.js']);
  });

  it('fails the save when the local write fails', async () => {
    const logger = createLogger();
    const storage = new TieredStorage({ local: new FailingBackend(), logger });

    expect(await storage.save('scrapers/a.js', 'code')).toBe(false);
    expect(logger.error).toHaveBeenCalledWith(
      'Failed to save to local cache',
      expect.objectContaining({ path: 'scrapers/a.js', error: 'backend unavailable' })
    );
  });
});

describe('TieredStorage with a durable store', () => {
  it('writes to both tiers', async () => {
    const local = new MemoryStorageBackend({ name: 'local' });
    const remote = new MemoryStorageBackend({ name: 'remote' });
    const storage = new TieredStorage({ local, remote, logger: createLogger() });

    expect(await storage.save('metadata/a.json', '{}')).toBe(true);

    expect(await local.read('metadata/a.json')).toBe('{}');
    expect(await remote.read('metadata/a.json')).toBe('{}');
  });

  it('reports success when only the durable write fails', async () => {
    const local = new MemoryStorageBackend({ name: 'local' });
    const logger = createLogger();
    const storage = new TieredStorage({ local, remote: new FailingBackend(), logger });

    expect(await storage.save('metadata/a.json', '{}')).toBe(true);
    expect(await local.read('metadata/a.json')).toBe('{}');
    expect(logger.error).toHaveBeenCalledWith(
      'Failed to save to durable store',
      expect.objectContaining({ backend: 'failing' })
    );
  });

  it('reports success when only the local write fails', async () => {
    const remote = new MemoryStorageBackend({ name: 'remote' });
    const storage = new TieredStorage({ local: new FailingBackend(), remote, logger: createLogger() });

    expect(await storage.save('metadata/a.json', '{}')).toBe(true);
    expect(await remote.read('metadata/a.json')).toBe('{}');
  });

  it('fails the save when both tiers fail', async () => {
    const storage = new TieredStorage({
      local: new FailingBackend(),
      remote: new FailingBackend(),
      logger: createLogger()
    });

    expect(await storage.save('metadata/a.json', '{}')).toBe(false);
  });

  it('prefers the durable copy and refreshes the local cache on read', async () => {
    const local = new MemoryStorageBackend({
      name: 'local',
      objects: [{ path: 'scrapers/a.js', content: 'stale' }]
    });
    const remote = new MemoryStorageBackend({
      name: 'remote',
      objects: [{ path: 'scrapers/a.js', content: 'fresh' }]
    });
    const storage = new TieredStorage({ local, remote, logger: createLogger() });

    expect(await storage.read('scrapers/a.js')).toBe('fresh');
    expect(await local.read('scrapers/a.js')).toBe('fresh');
  });

  it('caches remote-only objects locally after the first read', async () => {
    const local = new MemoryStorageBackend({ name: 'local' });
    const remote = new MemoryStorageBackend({
      name: 'remote',
      objects: [{ path: 'scrapers/b.js', content: 'remote only' }]
    });
    const storage = new TieredStorage({ local, remote, logger: createLogger() });

    expect(await local.exists('scrapers/b.js')).toBe(false);
    await storage.read('scrapers/b.js');
    expect(await local.read('scrapers/b.js')).toBe('remote only');
  });

  it('falls back to the local cache when the durable store misses or throws', async () => {
    const local = new MemoryStorageBackend({
      name: 'local',
      objects: [{ path: 'scrapers/a.js', content: 'local copy' }]
    });
    const logger = createLogger();
    const missing = new TieredStorage({ local, remote: new MemoryStorageBackend(), logger });
    const failing = new TieredStorage({ local, remote: new FailingBackend(), logger });

    expect(await missing.read('scrapers/a.js')).toBe('local copy');
    expect(await failing.read('scrapers/a.js')).toBe('local copy');
    expect(await failing.read('scrapers/none.js')).toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith(
      'Failed to read from durable store',
      expect.objectContaining({ path: 'scrapers/a.js' })
    );
  });

  it('checks existence remotely first and falls back to the local cache', async () => {
    const local = new MemoryStorageBackend({
      name: 'local',
      objects: [{ path: 'scrapers/local.js', content: '' }]
    });
    const remote = new MemoryStorageBackend({
      name: 'remote',
      objects: [{ path: 'scrapers/remote.js', content: '' }]
    });
    const storage = new TieredStorage({ local, remote, logger: createLogger() });
    const degraded = new TieredStorage({ local, remote: new FailingBackend(), logger: createLogger() });

    expect(await storage.exists('scrapers/remote.js')).toBe(true);
    expect(await storage.exists('scrapers/local.js')).toBe(true);
    expect(await storage.exists('scrapers/none.js')).toBe(false);
    expect(await degraded.exists('scrapers/local.js')).toBe(true);
    expect(await degraded.exists('scrapers/remote.js')).toBe(false);
  });

  it('lists the sorted union of both tiers without duplicates', async () => {
    const local = new MemoryStorageBackend({
      name: 'local',
      objects: [
        { path: 'metadata/c.json', content: '' },
        { path: 'metadata/a.json', content: '' },
        { path: 'scrapers/a.js', content: '' }
      ]
    });
    const remote = new MemoryStorageBackend({
      name: 'remote',
      objects: [
        { path: 'metadata/b.json', content: '' },
        { path: 'metadata/a.json', content: '' }
      ]
    });
    const storage = new TieredStorage({ local, remote, logger: createLogger() });
    const degraded = new TieredStorage({ local, remote: new FailingBackend(), logger: createLogger() });

    expect(await storage.list('metadata/')).toEqual(['metadata/a.json', 'metadata/b.json', 'metadata/c.json']);
    expect(await degraded.list('metadata/')).toEqual(['metadata/a.json', 'metadata/c.json']);
  });
});
