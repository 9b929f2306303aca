import { resolve } from 'node:path';

import { z } from 'zod';

import { LogLevelSchema, type LogLevel } from '@scrapeyard/core';

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional()
);

const milliseconds = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvironmentSchema = z.object({
  SCRAPEYARD_REPOSITORY_DIR: optionalString,
  SCRAPEYARD_GCS_BUCKET: optionalString,
  SCRAPEYARD_SANDBOX_TIMEOUT_MS: milliseconds(30_000),
  SCRAPEYARD_FETCH_TIMEOUT_MS: milliseconds(30_000),
  LOG_LEVEL: LogLevelSchema.default('info')
});

export interface ServiceConfig {
  /** Local cache directory. Always used. */
  readonly repositoryDirectory: string;
  /** Durable store bucket. Absent means local-only mode. */
  readonly bucketName?: string;
  readonly sandboxTimeoutMs: number;
  readonly fetchTimeoutMs: number;
  readonly logLevel: LogLevel;
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): ServiceConfig => {
  const parsed = EnvironmentSchema.parse(env);
  return {
    repositoryDirectory: resolve(cwd, parsed.SCRAPEYARD_REPOSITORY_DIR ?? '.scrapeyard'),
    bucketName: parsed.SCRAPEYARD_GCS_BUCKET,
    sandboxTimeoutMs: parsed.SCRAPEYARD_SANDBOX_TIMEOUT_MS,
    fetchTimeoutMs: parsed.SCRAPEYARD_FETCH_TIMEOUT_MS,
    logLevel: parsed.LOG_LEVEL
  };
};
