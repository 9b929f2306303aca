import Fastify, { type FastifyInstance } from 'fastify';
import { z } from 'zod';

import {
  ArtifactNotFoundError,
  ScraperTypeSchema,
  SelectorMapSchema,
  artifactKey,
  isScrapeyardError,
  type ScrapeyardErrorCode
} from '@scrapeyard/core';

import type { ScraperRepository } from '../artifacts/repository.js';

export interface CreateServerOptions {
  readonly repository: ScraperRepository;
}

const STATUS_BY_CODE: Record<ScrapeyardErrorCode, number> = {
  NOT_FOUND: 404,
  INCOMPLETE_PIPELINE: 409,
  INVALID_URL: 400,
  CORRUPT_METADATA: 500,
  LOAD_FAILED: 500,
  PERSISTENCE_FAILED: 500
};

const DomainParamsSchema = z.object({ domain: z.string().min(1) }).strict();

const TypeQuerySchema = z.object({ type: ScraperTypeSchema.default('single') }).strict();

const SaveArtifactBodySchema = z
  .object({
    code: z.string().min(1),
    url: z.string().url(),
    selectors: SelectorMapSchema,
    siteName: z.string().optional(),
    scraperType: ScraperTypeSchema.optional()
  })
  .strict();

const ExecuteBodySchema = z
  .object({
    code: z.string().min(1),
    url: z.string().url()
  })
  .strict();

const ValidateBodySchema = z.object({ url: z.string().url() }).strict();

const RunPipelineBodySchema = z
  .object({
    url: z.string().url(),
    limit: z.number().int().positive().optional()
  })
  .strict();

export const createServer = (options: CreateServerOptions): FastifyInstance => {
  const app = Fastify({ logger: false });
  const repository = options.repository;

  app.get('/artifacts', async (_request, reply) => {
    const artifacts = await repository.listArtifacts();
    return reply.send({ artifacts: artifacts.map(({ metadata }) => metadata) });
  });

  app.get('/artifacts/:domain', async (request, reply) => {
    const { domain } = DomainParamsSchema.parse(request.params);
    const { type } = TypeQuerySchema.parse(request.query ?? {});
    const metadata = await repository.getMetadata(domain, type);
    if (!metadata) {
      throw new ArtifactNotFoundError({ domain });
    }
    const artifact = await repository.resolver.getSource(artifactKey(domain, type));
    return reply.send({ metadata, path: artifact.path, source: artifact.source });
  });

  app.post('/artifacts', async (request, reply) => {
    const body = SaveArtifactBodySchema.parse(request.body ?? {});
    const saved = await repository.saveArtifact(body);
    return reply.status(201).send(saved);
  });

  app.post('/artifacts/:domain/validate', async (request, reply) => {
    const { domain } = DomainParamsSchema.parse(request.params);
    const body = ValidateBodySchema.parse(request.body ?? {});
    return reply.send(await repository.validateArtifact(domain, body.url));
  });

  app.get('/pipelines', async (_request, reply) => {
    return reply.send({ pipelines: await repository.listPipelines() });
  });

  app.get('/pipelines/:domain', async (request, reply) => {
    const { domain } = DomainParamsSchema.parse(request.params);
    const pipeline = await repository.getPipeline(domain);
    return reply.send({
      domain: pipeline.domain,
      list: { key: pipeline.list.key, path: pipeline.list.path },
      content: { key: pipeline.content.key, path: pipeline.content.path }
    });
  });

  app.post('/pipelines/:domain/run', async (request, reply) => {
    const { domain } = DomainParamsSchema.parse(request.params);
    const body = RunPipelineBodySchema.parse(request.body ?? {});
    return reply.send(await repository.runPipeline(domain, body.url, { limit: body.limit }));
  });

  app.post('/execute', async (request, reply) => {
    const body = ExecuteBodySchema.parse(request.body ?? {});
    return reply.send(await repository.execute(body.code, body.url));
  });

  app.setErrorHandler((error, _request, reply) => {
    if (error instanceof z.ZodError) {
      return reply.status(400).send({ error: error.issues.map((issue) => issue.message).join('; ') });
    }
    if (isScrapeyardError(error)) {
      return reply.status(STATUS_BY_CODE[error.code]).send({ error: error.message, code: error.code });
    }
    return reply.status(error.statusCode ?? 500).send({ error: error.message });
  });

  return app;
};
