export { GoogleCloudStorageBackend } from './google-cloud-storage.js';
export type { GoogleCloudStorageBackendOptions } from './google-cloud-storage.js';
export { LocalFileSystemBackend, normalizeLogicalPath } from './local-file-system.js';
export type { LocalFileSystemBackendOptions } from './local-file-system.js';
export { MemoryStorageBackend } from './memory.js';
export { TieredStorage } from './tiered.js';
export type { TieredStorageOptions } from './tiered.js';
export type { ObjectStorage, StorageBackend, StorageObject } from './types.js';
