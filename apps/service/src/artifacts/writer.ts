import {
  ArtifactPersistenceError,
  METADATA_SCHEMA_VERSION,
  SelectorMapSchema,
  artifactKey,
  artifactPath,
  buildUrlPattern,
  describeError,
  extractDomain,
  metadataPath,
  parseMetadata,
  serializeMetadata,
  type Logger,
  type ScraperMetadata,
  type ScraperType,
  type SelectorMap
} from '@scrapeyard/core';
import type { ObjectStorage } from '@scrapeyard/artifact-store';

export interface SaveArtifactInput {
  readonly code: string;
  /** Example page the scraper was built against. Its host becomes the domain. */
  readonly url: string;
  readonly selectors: SelectorMap;
  readonly siteName?: string;
  readonly scraperType?: ScraperType;
}

export interface SavedArtifact {
  readonly domain: string;
  readonly key: string;
  readonly scraperType: ScraperType;
  readonly artifactPath: string;
  readonly metadataPath: string;
}

export interface ArtifactWriterOptions {
  readonly storage: ObjectStorage;
  readonly logger: Logger;
  readonly now?: () => Date;
}

/**
 * Persists scraper code and its metadata. The two writes are independent: code lands
 * first and metadata last, so a failure in between leaves code without an index entry
 * rather than an index entry without code.
 */
export class ArtifactWriter {
  private readonly storage: ObjectStorage;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: ArtifactWriterOptions) {
    this.storage = options.storage;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  async saveArtifact(input: SaveArtifactInput): Promise<SavedArtifact> {
    const selectors = SelectorMapSchema.parse(input.selectors);
    const domain = extractDomain(input.url);
    const scraperType = input.scraperType ?? 'single';
    const key = artifactKey(domain, scraperType);
    const codePath = artifactPath(key);
    const indexPath = metadataPath(key);

    if (!(await this.storage.save(codePath, input.code))) {
      throw new ArtifactPersistenceError(codePath, []);
    }
    this.logger.info('Saved scraper code', { domain, path: codePath });

    const timestamp = this.now();
    const metadata: ScraperMetadata = {
      domain,
      siteName: input.siteName?.trim() || domain,
      scraperType,
      urlPattern: buildUrlPattern(domain),
      exampleUrl: input.url,
      fields: Object.keys(selectors),
      selectors,
      createdAt: timestamp,
      lastValidatedAt: timestamp,
      schemaVersion: METADATA_SCHEMA_VERSION
    };

    if (!(await this.storage.save(indexPath, serializeMetadata(metadata)))) {
      throw new ArtifactPersistenceError(indexPath, [codePath]);
    }
    this.logger.info('Saved scraper metadata', { domain, path: indexPath });

    return { domain, key, scraperType, artifactPath: codePath, metadataPath: indexPath };
  }

  /**
   * Stamps `lastValidatedAt` on an existing metadata record. Accepts a domain or a
   * storage key. Missing or unreadable metadata is logged and yields `undefined`.
   */
  async touchValidated(domain: string, scraperType: ScraperType = 'single'): Promise<ScraperMetadata | undefined> {
    const path = metadataPath(artifactKey(domain, scraperType));
    const raw = await this.storage.read(path);
    if (raw === undefined) {
      this.logger.warn('No metadata found to mark as validated', { domain, path });
      return undefined;
    }

    let metadata: ScraperMetadata;
    try {
      metadata = parseMetadata(raw, path);
    } catch (error) {
      this.logger.error('Failed to update validation timestamp', { domain, path, error: describeError(error) });
      return undefined;
    }

    const updated: ScraperMetadata = { ...metadata, lastValidatedAt: this.now() };
    if (!(await this.storage.save(path, serializeMetadata(updated)))) {
      this.logger.error('Failed to persist validation timestamp', { domain, path });
      return undefined;
    }

    this.logger.info('Updated validation timestamp', { domain, path });
    return updated;
  }
}
