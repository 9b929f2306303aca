import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { createRequire } from 'node:module';
import { tmpdir } from 'node:os';
import { delimiter, join } from 'node:path';

import { describeError, type ExecutionVerdict, type Logger } from '@scrapeyard/core';

import { EXECUTION_ERROR_MARKER, wrapWithHarness } from './harness.js';
import { runProcess, type ProcessResult } from './process.js';
import { stripSelfInvocation } from './strip.js';

export const DEFAULT_SANDBOX_TIMEOUT_MS = 30_000;

const FORWARDED_ENV_KEYS = [
  'PATH',
  'HOME',
  'LANG',
  'TZ',
  'SYSTEMROOT',
  'HTTP_PROXY',
  'HTTPS_PROXY',
  'NO_PROXY',
  'http_proxy',
  'https_proxy',
  'no_proxy'
] as const;

/**
 * Lookup paths for packages installed beside the repository, so generated scrapers can
 * `require('cheerio')` from a temporary directory.
 */
export const defaultModulePaths = (): readonly string[] =>
  createRequire(import.meta.url).resolve.paths('cheerio') ?? [];

export const buildSandboxEnvironment = (
  source: NodeJS.ProcessEnv,
  modulePaths: readonly string[]
): NodeJS.ProcessEnv => {
  const env: NodeJS.ProcessEnv = {};
  for (const key of FORWARDED_ENV_KEYS) {
    const value = source[key];
    if (value !== undefined) {
      env[key] = value;
    }
  }
  if (modulePaths.length > 0) {
    env.NODE_PATH = modulePaths.join(delimiter);
  }
  return env;
};

export const classifyExecution = (result: ProcessResult): ExecutionVerdict => {
  const base = {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode,
    durationMs: result.durationMs
  };

  if (result.timedOut) {
    return { ...base, success: false, errorKind: 'timeout' };
  }

  if (result.stdout.includes(EXECUTION_ERROR_MARKER)) {
    return { ...base, success: false, errorKind: 'runtimeFailure' };
  }

  if (result.exitCode !== 0) {
    return { ...base, success: false, errorKind: 'processFailure' };
  }

  return { ...base, success: true, errorKind: 'none' };
};

export interface ExecutionSandboxOptions {
  readonly logger: Logger;
  readonly timeoutMs?: number;
  /** Node executable used for the child. Defaults to the current one. */
  readonly nodePath?: string;
  readonly env?: NodeJS.ProcessEnv;
  readonly modulePaths?: readonly string[];
}

/**
 * Runs candidate scraper code in a separate Node process with a hard deadline and
 * reports the outcome as an {@link ExecutionVerdict}. `execute` never throws.
 */
export class ExecutionSandbox {
  readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly nodePath: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: ExecutionSandboxOptions) {
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SANDBOX_TIMEOUT_MS;
    this.nodePath = options.nodePath ?? process.execPath;
    this.env = buildSandboxEnvironment(options.env ?? process.env, options.modulePaths ?? defaultModulePaths());
  }

  async execute(code: string, testUrl: string): Promise<ExecutionVerdict> {
    const startedAt = Date.now();
    let workspace: string | undefined;

    try {
      workspace = await mkdtemp(join(tmpdir(), 'scrapeyard-sandbox-'));
      const scriptPath = join(workspace, 'scraper.cjs');
      await writeFile(scriptPath, wrapWithHarness(stripSelfInvocation(code), testUrl), 'utf-8');

      const result = await runProcess({
        command: this.nodePath,
        args: [scriptPath],
        timeoutMs: this.timeoutMs,
        env: this.env,
        cwd: workspace
      });
      const verdict = classifyExecution(result);

      if (verdict.errorKind === 'timeout') {
        this.logger.warn('Scraper execution timed out', { testUrl, timeoutMs: this.timeoutMs });
      } else {
        this.logger.info('Scraper execution finished', {
          testUrl,
          success: verdict.success,
          errorKind: verdict.errorKind,
          exitCode: verdict.exitCode
        });
      }
      return verdict;
    } catch (error) {
      this.logger.error('Sandbox failed to run scraper', { testUrl, error: describeError(error) });
      return {
        success: false,
        stdout: '',
        stderr: describeError(error),
        errorKind: 'processFailure',
        exitCode: null,
        durationMs: Date.now() - startedAt
      };
    } finally {
      if (workspace) {
        await rm(workspace, { recursive: true, force: true }).catch((error: unknown) => {
          this.logger.warn('Failed to remove sandbox workspace', { workspace, error: describeError(error) });
        });
      }
    }
  }
}
