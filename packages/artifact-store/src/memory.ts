import type { StorageBackend, StorageObject } from './types.js';

/**
 * In-process backend. Stands in for the durable store in tests and embedded setups.
 */
export class MemoryStorageBackend implements StorageBackend {
  readonly name: string;
  private readonly objects = new Map<string, string>();

  constructor(options: { name?: string; objects?: readonly StorageObject[] } = {}) {
    this.name = options.name ?? 'memory';
    for (const object of options.objects ?? []) {
      this.objects.set(object.path, object.content);
    }
  }

  write(path: string, content: string): Promise<void> {
    this.objects.set(path, content);
    return Promise.resolve();
  }

  read(path: string): Promise<string | undefined> {
    return Promise.resolve(this.objects.get(path));
  }

  exists(path: string): Promise<boolean> {
    return Promise.resolve(this.objects.has(path));
  }

  list(prefix: string): Promise<readonly string[]> {
    return Promise.resolve([...this.objects.keys()].filter((path) => path.startsWith(prefix)));
  }

  snapshot(): readonly StorageObject[] {
    return [...this.objects.entries()].map(([path, content]) => ({ path, content }));
  }
}
