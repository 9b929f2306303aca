import { access, mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { dirname, join, posix, relative, sep } from 'node:path';

import type { StorageBackend } from './types.js';

export interface LocalFileSystemBackendOptions {
  readonly directory: string;
}

const isMissing = (error: unknown): boolean => {
  const code = (error as NodeJS.ErrnoException | undefined)?.code;
  return code === 'ENOENT' || code === 'ENOTDIR';
};

export const normalizeLogicalPath = (path: string): string => {
  const normalized = posix.normalize(path.replace(/\\/g, '/'));
  if (
    normalized === '.' ||
    normalized.startsWith('/') ||
    normalized === '..' ||
    normalized.startsWith('../')
  ) {
    throw new Error(`Storage path escapes the repository: ${path}`);
  }
  return normalized;
};

/**
 * Local cache tier. Always present; objects live as plain files under `directory`.
 */
export class LocalFileSystemBackend implements StorageBackend {
  readonly name = 'local';
  readonly directory: string;
  private readonly ready: Promise<unknown>;

  constructor(options: LocalFileSystemBackendOptions) {
    this.directory = options.directory;
    this.ready = mkdir(this.directory, { recursive: true });
  }

  resolvePath(path: string): string {
    return join(this.directory, normalizeLogicalPath(path));
  }

  async write(path: string, content: string): Promise<void> {
    await this.ready;
    const filePath = this.resolvePath(path);
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, content, 'utf-8');
  }

  async read(path: string): Promise<string | undefined> {
    await this.ready;
    try {
      return await readFile(this.resolvePath(path), 'utf-8');
    } catch (error) {
      if (isMissing(error)) {
        return undefined;
      }
      throw error;
    }
  }

  async exists(path: string): Promise<boolean> {
    await this.ready;
    try {
      await access(this.resolvePath(path));
      return true;
    } catch (error) {
      if (isMissing(error)) {
        return false;
      }
      throw error;
    }
  }

  async list(prefix: string): Promise<readonly string[]> {
    await this.ready;
    const slash = prefix.lastIndexOf('/');
    const directoryPart = slash >= 0 ? prefix.slice(0, slash) : '';
    const root = directoryPart ? this.resolvePath(directoryPart) : this.directory;

    const files = await this.walk(root);
    return files
      .map((filePath) => relative(this.directory, filePath).split(sep).join('/'))
      .filter((relativePath) => relativePath.startsWith(prefix))
      .sort();
  }

  private async walk(directory: string): Promise<string[]> {
    const entries = await readdir(directory, { withFileTypes: true }).catch((error: unknown) => {
      if (isMissing(error)) {
        return [];
      }
      throw error;
    });

    const files: string[] = [];
    for (const entry of entries) {
      const entryPath = join(directory, entry.name);
      if (entry.isDirectory()) {
        files.push(...(await this.walk(entryPath)));
      } else if (entry.isFile()) {
        files.push(entryPath);
      }
    }
    return files;
  }
}
