import { Storage, type Bucket } from '@google-cloud/storage';

import type { StorageBackend } from './types.js';

export interface GoogleCloudStorageBackendOptions {
  readonly bucketName: string;
  /** Defaults to a client built from ambient application-default credentials. */
  readonly storage?: Storage;
}

const contentTypeFor = (path: string): string => {
  if (path.endsWith('.json')) {
    return 'application/json; charset=utf-8';
  }
  if (path.endsWith('.js')) {
    return 'text/javascript; charset=utf-8';
  }
  return 'text/plain; charset=utf-8';
};

/**
 * Durable tier backed by a Google Cloud Storage bucket.
 */
export class GoogleCloudStorageBackend implements StorageBackend {
  readonly name = 'gcs';
  readonly bucketName: string;
  private readonly bucket: Bucket;

  constructor(options: GoogleCloudStorageBackendOptions) {
    this.bucketName = options.bucketName;
    const storage = options.storage ?? new Storage();
    this.bucket = storage.bucket(options.bucketName);
  }

  async write(path: string, content: string): Promise<void> {
    await this.bucket.file(path).save(content, {
      resumable: false,
      contentType: contentTypeFor(path)
    });
  }

  async read(path: string): Promise<string | undefined> {
    const file = this.bucket.file(path);
    const [found] = await file.exists();
    if (!found) {
      return undefined;
    }
    const [buffer] = await file.download();
    return buffer.toString('utf-8');
  }

  async exists(path: string): Promise<boolean> {
    const [found] = await this.bucket.file(path).exists();
    return found;
  }

  async list(prefix: string): Promise<readonly string[]> {
    const [files] = await this.bucket.getFiles({ prefix });
    return files.map((file) => file.name);
  }
}
