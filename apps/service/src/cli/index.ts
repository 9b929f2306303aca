import { readFile } from 'node:fs/promises';

import { Command, InvalidArgumentError } from 'commander';

import {
  ArtifactNotFoundError,
  ScraperTypeSchema,
  SelectorMapSchema,
  artifactKey,
  describeError,
  type ScraperType,
  type SelectorMap
} from '@scrapeyard/core';

import type { ScraperRepository } from '../artifacts/repository.js';
import { probeSelector, withDocumentFetcher, type DocumentFetcher } from '../documents/index.js';

export interface CreateCliOptions {
  readonly repository: ScraperRepository;
  /** Called once per command that inspects live pages. */
  readonly createFetcher: () => DocumentFetcher;
  /** Starts the HTTP server for `serve`. */
  readonly serve?: (options: { host: string; port: number }) => Promise<void>;
  readonly stdout?: NodeJS.WritableStream;
  readonly stderr?: NodeJS.WritableStream;
}

const parseScraperType = (value: string): ScraperType => {
  const parsed = ScraperTypeSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Expected one of ${ScraperTypeSchema.options.join(', ')}.`);
  }
  return parsed.data;
};

const parsePositiveInteger = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
};

const readSelectors = async (path: string): Promise<SelectorMap> => {
  const raw = await readFile(path, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Selector map ${path} is not valid JSON: ${describeError(error)}`, { cause: error });
  }
  return SelectorMapSchema.parse(json);
};

export const createCli = (options: CreateCliOptions): Command => {
  const program = new Command();
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const repository = options.repository;

  const writeJson = (value: unknown) => {
    const serialized = JSON.stringify(value, null, 2);
    stdout.write(`${serialized}\n`);
  };

  const handle = <T extends unknown[]>(runner: (...args: T) => Promise<void>) => {
    return async (...args: T) => {
      try {
        await runner(...args);
      } catch (error) {
        stderr.write(`${describeError(error)}\n`);
        throw error;
      }
    };
  };

  program
    .name('scrapeyard')
    .description('Store, resolve and validate generated scrapers')
    .configureOutput({
      writeOut: (text) => stdout.write(text),
      writeErr: (text) => stderr.write(text)
    });

  program
    .command('artifacts:save')
    .description('Store scraper code and its metadata')
    .requiredOption('--code <path>', 'Path to the scraper source')
    .requiredOption('--url <url>', 'Example URL the scraper was built against')
    .requiredOption('--selectors <path>', 'Path to a JSON selector map')
    .option('--site-name <name>', 'Human readable site name')
    .option('--type <type>', 'single, list or content', parseScraperType, 'single')
    .action(
      handle(async (command: { code: string; url: string; selectors: string; siteName?: string; type: ScraperType }) => {
        const saved = await repository.saveArtifact({
          code: await readFile(command.code, 'utf-8'),
          url: command.url,
          selectors: await readSelectors(command.selectors),
          siteName: command.siteName,
          scraperType: command.type
        });
        writeJson(saved);
      })
    );

  program
    .command('artifacts:list')
    .description('List every stored scraper')
    .action(
      handle(async () => {
        const artifacts = await repository.listArtifacts();
        writeJson(artifacts.map(({ metadata }) => metadata));
      })
    );

  program
    .command('artifacts:show <domain>')
    .description('Show the metadata and source of one stored scraper')
    .option('--type <type>', 'single, list or content', parseScraperType, 'single')
    .action(
      handle(async (domain: string, command: { type: ScraperType }) => {
        const metadata = await repository.getMetadata(domain, command.type);
        if (!metadata) {
          throw new ArtifactNotFoundError({ domain });
        }
        const artifact = await repository.resolver.getSource(artifactKey(domain, command.type));
        writeJson({ metadata, path: artifact.path, source: artifact.source });
      })
    );

  program
    .command('pipelines:list')
    .description('List domains with both a list and a content scraper')
    .action(
      handle(async () => {
        writeJson(await repository.listPipelines());
      })
    );

  program
    .command('pipelines:run <domain>')
    .description('Run the list scraper on a listing page, then the content scraper on each result')
    .requiredOption('--url <url>', 'Listing page URL')
    .option('--limit <count>', 'Maximum number of listed URLs to scrape', parsePositiveInteger)
    .action(
      handle(async (domain: string, command: { url: string; limit?: number }) => {
        writeJson(await repository.runPipeline(domain, command.url, { limit: command.limit }));
      })
    );

  program
    .command('validate <domain>')
    .description('Run a stored scraper in the sandbox and stamp it as validated on success')
    .requiredOption('--url <url>', 'URL passed to the scraper')
    .action(
      handle(async (domain: string, command: { url: string }) => {
        const validation = await repository.validateArtifact(domain, command.url);
        writeJson(validation);
      })
    );

  program
    .command('execute')
    .description('Run scraper code from a file in the sandbox')
    .requiredOption('--code <path>', 'Path to the scraper source')
    .requiredOption('--url <url>', 'URL passed to the scraper')
    .action(
      handle(async (command: { code: string; url: string }) => {
        const verdict = await repository.execute(await readFile(command.code, 'utf-8'), command.url);
        writeJson(verdict);
      })
    );

  program
    .command('selectors:probe <url> <selector>')
    .description('Fetch a page and report what a CSS selector matches')
    .option('--attribute <name>', 'Attribute to report instead of text')
    .action(
      handle(async (url: string, selector: string, command: { attribute?: string }) => {
        const result = await withDocumentFetcher(options.createFetcher(), (fetcher) =>
          probeSelector(fetcher, { url, selector, attribute: command.attribute })
        );
        writeJson(result);
      })
    );

  const serve = options.serve;
  if (serve) {
    program
      .command('serve')
      .description('Start the HTTP API')
      .option('--host <host>', 'Interface to bind', '127.0.0.1')
      .option('--port <port>', 'Port to listen on', parsePositiveInteger, 3000)
      .action(
        handle(async (command: { host: string; port: number }) => {
          await serve(command);
        })
      );
  }

  return program;
};
