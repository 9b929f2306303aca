#!/usr/bin/env node
import { createLogger } from '@scrapeyard/core';

import { createCli } from './cli/index.js';
import { loadConfig } from './config.js';
import { createServer } from './http/server.js';
import { createDocumentFetcher, createScraperRepository } from './setup.js';

const config = loadConfig();
// JSON results own stdout; logs go to stderr.
const logger = createLogger({ level: config.logLevel, destination: process.stderr });
const repository = createScraperRepository({ config, logger });

const cli = createCli({
  repository,
  createFetcher: () => createDocumentFetcher(config, logger),
  serve: async ({ host, port }) => {
    const address = await createServer({ repository }).listen({ host, port });
    logger.info('HTTP API listening', { address });
  }
});

cli.parseAsync(process.argv).catch(() => {
  // The command already reported the error on stderr.
  process.exitCode = 1;
});
