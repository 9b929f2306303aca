/**
 * A single place objects can be stored under slash-separated logical paths such as
 * `scrapers/example_org.js`. Backends throw on failure; the tiered storage decides what
 * a failure means.
 */
export interface StorageBackend {
  readonly name: string;
  write(path: string, content: string): Promise<void>;
  /** Resolves `undefined` when nothing is stored at `path`. */
  read(path: string): Promise<string | undefined>;
  exists(path: string): Promise<boolean>;
  list(prefix: string): Promise<readonly string[]>;
}

/**
 * The storage contract the rest of the repository builds on. Implementations absorb
 * backend failures instead of throwing them.
 */
export interface ObjectStorage {
  save(path: string, content: string): Promise<boolean>;
  read(path: string): Promise<string | undefined>;
  exists(path: string): Promise<boolean>;
  list(prefix: string): Promise<readonly string[]>;
}

export interface StorageObject {
  readonly path: string;
  readonly content: string;
}
