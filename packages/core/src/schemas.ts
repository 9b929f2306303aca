import { z } from 'zod';

import { CorruptMetadataError } from './errors.js';

export const METADATA_SCHEMA_VERSION = '1.0';

const nonEmptyString = z.string().trim().min(1, 'Value must not be empty');

export const ScraperTypeSchema = z.enum(['single', 'list', 'content']);

export type ScraperType = z.infer<typeof ScraperTypeSchema>;

/**
 * A selector spec is whatever the generator recorded for a field: a bare CSS selector,
 * or an object with a selector plus extraction hints.
 */
export const SelectorSpecSchema = z.union([
  z.string(),
  z.record(z.string(), z.unknown()),
  z.array(z.unknown())
]);

export type SelectorSpec = z.infer<typeof SelectorSpecSchema>;

export const SelectorMapSchema = z.record(z.string(), SelectorSpecSchema);

export type SelectorMap = z.infer<typeof SelectorMapSchema>;

export const ScraperMetadataSchema = z
  .object({
    domain: nonEmptyString,
    siteName: nonEmptyString,
    scraperType: ScraperTypeSchema,
    urlPattern: z.string(),
    exampleUrl: z.string().url(),
    fields: z.array(z.string()),
    selectors: SelectorMapSchema,
    createdAt: z.coerce.date(),
    lastValidatedAt: z.coerce.date(),
    schemaVersion: nonEmptyString
  })
  .strict();

export type ScraperMetadata = z.infer<typeof ScraperMetadataSchema>;

export interface PipelineSummary {
  readonly domain: string;
  readonly siteName: string;
  readonly listScraper: {
    readonly exampleUrl: string;
    readonly createdAt: string;
  };
  readonly contentScraper: {
    readonly exampleUrl: string;
    readonly fields: readonly string[];
    readonly createdAt: string;
  };
}

export const ExecutionErrorKindSchema = z.enum(['none', 'timeout', 'runtimeFailure', 'processFailure']);

export type ExecutionErrorKind = z.infer<typeof ExecutionErrorKindSchema>;

export const ExecutionVerdictSchema = z
  .object({
    success: z.boolean(),
    stdout: z.string(),
    stderr: z.string(),
    errorKind: ExecutionErrorKindSchema,
    exitCode: z.number().int().nullable(),
    durationMs: z.number().nonnegative()
  })
  .strict();

export type ExecutionVerdict = z.infer<typeof ExecutionVerdictSchema>;

/** Fields returned by a scraper entry point. */
export const ScrapedFieldsSchema = z.record(z.string(), z.unknown());

export type ScrapedFields = z.infer<typeof ScrapedFieldsSchema>;

export const ListScrapeResultSchema = z
  .object({
    urls: z.array(z.string())
  })
  .passthrough();

export type ListScrapeResult = z.infer<typeof ListScrapeResultSchema>;

export const serializeMetadata = (metadata: ScraperMetadata): string => {
  const serialized = JSON.stringify(
    {
      ...metadata,
      createdAt: metadata.createdAt.toISOString(),
      lastValidatedAt: metadata.lastValidatedAt.toISOString()
    },
    null,
    2
  );
  return `${serialized}\n`;
};

export const parseMetadata = (raw: string, path: string): ScraperMetadata => {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CorruptMetadataError(path, message, { cause: error });
  }

  const result = ScraperMetadataSchema.safeParse(json);
  if (!result.success) {
    const reason = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new CorruptMetadataError(path, reason, { cause: result.error });
  }

  return result.data;
};
