export type ScrapeyardErrorCode =
  | 'NOT_FOUND'
  | 'INCOMPLETE_PIPELINE'
  | 'CORRUPT_METADATA'
  | 'LOAD_FAILED'
  | 'PERSISTENCE_FAILED'
  | 'INVALID_URL';

export abstract class ScrapeyardError extends Error {
  abstract readonly code: ScrapeyardErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ArtifactNotFoundError extends ScrapeyardError {
  readonly code = 'NOT_FOUND' as const;

  constructor(
    readonly target: { readonly domain: string } | { readonly url: string },
    options?: { cause?: unknown }
  ) {
    super(
      'url' in target
        ? `No scraper found for URL: ${target.url}`
        : `No scraper found for domain: ${target.domain}`,
      options
    );
  }
}

export type PipelineHalf = 'list' | 'content';

export class IncompletePipelineError extends ScrapeyardError {
  readonly code = 'INCOMPLETE_PIPELINE' as const;

  constructor(
    readonly domain: string,
    readonly missing: readonly PipelineHalf[]
  ) {
    super(`Incomplete pipeline for domain: ${domain} (missing ${missing.join(' and ')} scraper)`);
  }
}

export class CorruptMetadataError extends ScrapeyardError {
  readonly code = 'CORRUPT_METADATA' as const;

  constructor(
    readonly path: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Corrupt metadata file ${path}: ${reason}`, options);
  }
}

export class ArtifactLoadError extends ScrapeyardError {
  readonly code = 'LOAD_FAILED' as const;

  constructor(
    readonly filename: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to load scraper ${filename}: ${reason}`, options);
  }
}

export class ArtifactPersistenceError extends ScrapeyardError {
  readonly code = 'PERSISTENCE_FAILED' as const;

  constructor(
    readonly path: string,
    readonly persisted: readonly string[]
  ) {
    const suffix = persisted.length > 0 ? ` (already persisted: ${persisted.join(', ')})` : '';
    super(`Failed to persist ${path}${suffix}`);
  }
}

export class InvalidArtifactUrlError extends ScrapeyardError {
  readonly code = 'INVALID_URL' as const;

  constructor(
    readonly url: string,
    reason: string
  ) {
    super(`Invalid scraper URL "${url}": ${reason}`);
  }
}

export const isScrapeyardError = (error: unknown): error is ScrapeyardError => error instanceof ScrapeyardError;

/** Errors raised inside a `node:vm` context fail `instanceof Error` here, so match on shape too. */
export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
};
