import type { ExecutionVerdict, Logger, PipelineSummary, ScraperMetadata, ScraperType } from '@scrapeyard/core';
import type { ObjectStorage } from '@scrapeyard/artifact-store';
import { VmSourceLoader, type ExecutionSandbox, type UntrustedSourceLoader } from '@scrapeyard/sandbox';

import { runPipeline, type PipelineRun, type RunPipelineOptions } from './pipeline.js';
import {
  ArtifactResolver,
  type LoadedScraper,
  type ResolvedPipeline,
  type StoredMetadata
} from './resolver.js';
import { validateArtifact, type ArtifactValidation } from './validation.js';
import { ArtifactWriter, type SaveArtifactInput, type SavedArtifact } from './writer.js';

export interface ScraperRepositoryOptions {
  readonly storage: ObjectStorage;
  readonly sandbox: Pick<ExecutionSandbox, 'execute'>;
  readonly logger: Logger;
  readonly loader?: UntrustedSourceLoader;
  readonly now?: () => Date;
}

/**
 * Entry point used by the CLI and the HTTP server: persistence, resolution, sandboxed
 * execution and pipeline runs over one storage tier.
 */
export class ScraperRepository {
  readonly writer: ArtifactWriter;
  readonly resolver: ArtifactResolver;
  private readonly sandbox: Pick<ExecutionSandbox, 'execute'>;
  private readonly logger: Logger;

  constructor(options: ScraperRepositoryOptions) {
    this.logger = options.logger;
    this.sandbox = options.sandbox;
    this.writer = new ArtifactWriter({
      storage: options.storage,
      logger: options.logger.child({ component: 'writer' }),
      now: options.now
    });
    this.resolver = new ArtifactResolver({
      storage: options.storage,
      loader: options.loader ?? new VmSourceLoader(),
      logger: options.logger.child({ component: 'resolver' })
    });
  }

  saveArtifact(input: SaveArtifactInput): Promise<SavedArtifact> {
    return this.writer.saveArtifact(input);
  }

  getArtifact(domainOrKey: string): Promise<LoadedScraper> {
    return this.resolver.getArtifact(domainOrKey);
  }

  getArtifactForUrl(url: string): Promise<LoadedScraper> {
    return this.resolver.getArtifactForUrl(url);
  }

  getPipeline(domain: string): Promise<ResolvedPipeline> {
    return this.resolver.getPipeline(domain);
  }

  hasPipeline(domain: string): Promise<boolean> {
    return this.resolver.hasPipeline(domain);
  }

  getMetadata(domain: string, scraperType?: ScraperType): Promise<ScraperMetadata | undefined> {
    return this.resolver.getMetadata(domain, scraperType);
  }

  listArtifacts(): Promise<readonly StoredMetadata[]> {
    return this.resolver.listArtifacts();
  }

  listPipelines(): Promise<readonly PipelineSummary[]> {
    return this.resolver.listPipelines();
  }

  execute(code: string, testUrl: string): Promise<ExecutionVerdict> {
    return this.sandbox.execute(code, testUrl);
  }

  validateArtifact(domainOrKey: string, testUrl: string): Promise<ArtifactValidation> {
    return validateArtifact(
      { resolver: this.resolver, writer: this.writer, sandbox: this.sandbox, logger: this.logger },
      domainOrKey,
      testUrl
    );
  }

  async runPipeline(
    domain: string,
    listingUrl: string,
    options: Omit<RunPipelineOptions, 'logger'> = {}
  ): Promise<PipelineRun> {
    const pipeline = await this.resolver.getPipeline(domain);
    return runPipeline(pipeline, listingUrl, { ...options, logger: this.logger });
  }
}
