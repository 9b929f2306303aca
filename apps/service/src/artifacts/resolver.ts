import {
  ArtifactNotFoundError,
  IncompletePipelineError,
  METADATA_EXTENSION,
  METADATA_PREFIX,
  artifactKey,
  artifactPath,
  describeError,
  domainToKey,
  extractDomain,
  matchesUrlPattern,
  metadataPath,
  parseMetadata,
  type Logger,
  type PipelineHalf,
  type PipelineSummary,
  type ScrapedFields,
  type ScraperMetadata,
  type ScraperType
} from '@scrapeyard/core';
import type { ObjectStorage } from '@scrapeyard/artifact-store';
import type { UntrustedSourceLoader } from '@scrapeyard/sandbox';

export interface ArtifactSource {
  readonly key: string;
  readonly path: string;
  readonly source: string;
}

export interface LoadedScraper extends ArtifactSource {
  scrape(url: string): Promise<ScrapedFields>;
}

export interface ResolvedPipeline {
  readonly domain: string;
  readonly list: LoadedScraper;
  readonly content: LoadedScraper;
}

export interface StoredMetadata {
  readonly path: string;
  readonly metadata: ScraperMetadata;
}

export interface ArtifactResolverOptions {
  readonly storage: ObjectStorage;
  readonly loader: UntrustedSourceLoader;
  readonly logger: Logger;
}

/**
 * Locates stored scrapers by domain, storage key or URL, and pairs list and content
 * scrapers into pipelines. Every read goes through the tiered storage, so a durable
 * hit also refreshes the local cache.
 */
export class ArtifactResolver {
  private readonly storage: ObjectStorage;
  private readonly loader: UntrustedSourceLoader;
  private readonly logger: Logger;

  constructor(options: ArtifactResolverOptions) {
    this.storage = options.storage;
    this.loader = options.loader;
    this.logger = options.logger;
  }

  /** Reads stored code without evaluating it. */
  async getSource(domainOrKey: string): Promise<ArtifactSource> {
    const key = domainToKey(domainOrKey);
    const path = artifactPath(key);
    const source = await this.storage.read(path);
    if (source === undefined) {
      throw new ArtifactNotFoundError({ domain: domainOrKey });
    }
    return { key, path, source };
  }

  /**
   * `domainOrKey` is either a domain (`example.org`) or a full storage key, which is
   * how the halves of a pipeline are addressed (`example.org_list`).
   */
  async getArtifact(domainOrKey: string): Promise<LoadedScraper> {
    const artifact = await this.getSource(domainOrKey);
    const scraper = this.loader.load(artifact.source, { filename: artifact.path });
    this.logger.debug('Loaded scraper', { key: artifact.key, path: artifact.path });
    return {
      ...artifact,
      scrape: (url) => scraper.scrape(url)
    };
  }

  async getArtifactForUrl(url: string): Promise<LoadedScraper> {
    const domain = extractDomain(url);
    try {
      return await this.getArtifact(domain);
    } catch (error) {
      if (!(error instanceof ArtifactNotFoundError)) {
        throw error;
      }
    }

    for (const { path, metadata } of await this.scanMetadata()) {
      if (!matchesUrlPattern(metadata.urlPattern, url)) {
        continue;
      }
      // Pipeline halves only answer for their own key, never for a bare URL.
      try {
        const artifact = await this.getArtifact(metadata.domain);
        this.logger.info('Resolved scraper by URL pattern', { url, key: artifact.key, metadataPath: path });
        return artifact;
      } catch (error) {
        if (!(error instanceof ArtifactNotFoundError)) {
          throw error;
        }
        this.logger.warn('Metadata matched but no single scraper is stored', {
          url,
          domain: metadata.domain,
          metadataPath: path
        });
      }
    }

    throw new ArtifactNotFoundError({ url });
  }

  async getPipeline(domain: string): Promise<ResolvedPipeline> {
    const missing = await this.missingHalves(domain);
    if (missing.length > 0) {
      throw new IncompletePipelineError(domain, missing);
    }

    const [list, content] = await Promise.all([
      this.getArtifact(artifactKey(domain, 'list')),
      this.getArtifact(artifactKey(domain, 'content'))
    ]);
    return { domain, list, content };
  }

  async hasPipeline(domain: string): Promise<boolean> {
    return (await this.missingHalves(domain)).length === 0;
  }

  /** Throws `CorruptMetadataError` when the stored record cannot be parsed. */
  async getMetadata(domain: string, scraperType: ScraperType = 'single'): Promise<ScraperMetadata | undefined> {
    const path = metadataPath(artifactKey(domain, scraperType));
    const raw = await this.storage.read(path);
    return raw === undefined ? undefined : parseMetadata(raw, path);
  }

  async listArtifacts(): Promise<readonly StoredMetadata[]> {
    return this.scanMetadata();
  }

  async listPipelines(): Promise<readonly PipelineSummary[]> {
    const summaries: PipelineSummary[] = [];
    const seen = new Set<string>();

    for (const { metadata } of await this.scanMetadata()) {
      if (metadata.scraperType !== 'list' || seen.has(metadata.domain)) {
        continue;
      }
      seen.add(metadata.domain);
      if (!(await this.hasPipeline(metadata.domain))) {
        continue;
      }

      const content = await this.readContentMetadata(metadata.domain);
      summaries.push({
        domain: metadata.domain,
        siteName: metadata.siteName,
        listScraper: {
          exampleUrl: metadata.exampleUrl,
          createdAt: metadata.createdAt.toISOString()
        },
        contentScraper: {
          exampleUrl: content?.exampleUrl ?? '',
          fields: content?.fields ?? [],
          createdAt: content?.createdAt.toISOString() ?? ''
        }
      });
    }

    return summaries;
  }

  private async missingHalves(domain: string): Promise<PipelineHalf[]> {
    const halves: readonly PipelineHalf[] = ['list', 'content'];
    const present = await Promise.all(halves.map((half) => this.storage.exists(artifactPath(artifactKey(domain, half)))));
    return halves.filter((_, index) => !present[index]);
  }

  private async readContentMetadata(domain: string): Promise<ScraperMetadata | undefined> {
    try {
      return await this.getMetadata(domain, 'content');
    } catch (error) {
      this.logger.warn('Skipping corrupt content metadata', { domain, error: describeError(error) });
      return undefined;
    }
  }

  /** Parseable metadata records in path order. Corrupt records are logged and skipped. */
  private async scanMetadata(): Promise<StoredMetadata[]> {
    const records: StoredMetadata[] = [];
    for (const path of await this.storage.list(METADATA_PREFIX)) {
      if (!path.endsWith(METADATA_EXTENSION)) {
        continue;
      }
      const raw = await this.storage.read(path);
      if (raw === undefined) {
        continue;
      }
      try {
        records.push({ path, metadata: parseMetadata(raw, path) });
      } catch (error) {
        this.logger.warn('Skipping corrupt metadata', { path, error: describeError(error) });
      }
    }
    return records;
  }
}
