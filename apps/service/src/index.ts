export { runPipeline } from './artifacts/pipeline.js';
export type { PipelineFailure, PipelineRecord, PipelineRun, RunPipelineOptions } from './artifacts/pipeline.js';
export { ScraperRepository } from './artifacts/repository.js';
export type { ScraperRepositoryOptions } from './artifacts/repository.js';
export { ArtifactResolver } from './artifacts/resolver.js';
export type {
  ArtifactResolverOptions,
  ArtifactSource,
  LoadedScraper,
  ResolvedPipeline,
  StoredMetadata
} from './artifacts/resolver.js';
export { validateArtifact } from './artifacts/validation.js';
export type { ArtifactValidation, ValidationDependencies } from './artifacts/validation.js';
export { ArtifactWriter } from './artifacts/writer.js';
export type { ArtifactWriterOptions, SaveArtifactInput, SavedArtifact } from './artifacts/writer.js';
export { createCli } from './cli/index.js';
export type { CreateCliOptions } from './cli/index.js';
export { loadConfig } from './config.js';
export type { ServiceConfig } from './config.js';
export * from './documents/index.js';
export { createServer } from './http/server.js';
export type { CreateServerOptions } from './http/server.js';
export { createDocumentFetcher, createScraperRepository } from './setup.js';
export type { CreateScraperRepositoryOptions } from './setup.js';
