import { createRequire, isBuiltin } from 'node:module';
import { Script, createContext } from 'node:vm';

import { ArtifactLoadError, ScrapedFieldsSchema, describeError, type ScrapedFields } from '@scrapeyard/core';

import { stripSelfInvocation } from './strip.js';

/** The one capability every stored artifact provides. */
export interface Scraper {
  scrape(url: string): Promise<ScrapedFields>;
}

export interface LoadSourceOptions {
  /** Shown in stack traces and load errors. */
  readonly filename: string;
}

/**
 * Trust boundary between stored, generated source and the host process. Resolution
 * goes through this interface instead of a dynamic `import()` of stored files.
 */
export interface UntrustedSourceLoader {
  load(source: string, options: LoadSourceOptions): Scraper;
}

type EntryPoint = (url: string) => unknown;

interface CommonJsModule {
  exports: unknown;
}

type ArtifactRequire = (id: string) => unknown;

type ModuleFactory = (
  exports: unknown,
  require: ArtifactRequire,
  module: CommonJsModule,
  filename: string
) => unknown;

/** Built-in modules artifacts may load; everything else built in is refused. */
const ALLOWED_BUILTIN_MODULES: ReadonlySet<string> = new Set([
  'assert',
  'buffer',
  'crypto',
  'events',
  'path',
  'querystring',
  'string_decoder',
  'url',
  'util'
]);

const builtinName = (id: string): string => (id.startsWith('node:') ? id.slice('node:'.length) : id);

/**
 * Installed packages resolve as usual. Built-in modules outside the allow-list (for
 * example `child_process`, `fs` or `process`) are refused.
 */
const restrictRequire =
  (hostRequire: NodeJS.Require): ArtifactRequire =>
  (id) => {
    if (isBuiltin(id) && !ALLOWED_BUILTIN_MODULES.has(builtinName(id))) {
      throw new Error(`Module ${id} is not available to scrapers`);
    }
    return hostRequire(id);
  };

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null;

const isEntryPoint = (value: unknown): value is EntryPoint => typeof value === 'function';

const isModuleFactory = (value: unknown): value is ModuleFactory => typeof value === 'function';

const resolveEntryPoint = (declared: unknown, exported: unknown): EntryPoint | undefined => {
  if (isEntryPoint(declared)) {
    return declared;
  }
  if (isRecord(exported) && isEntryPoint(exported.scrape)) {
    return exported.scrape;
  }
  if (isEntryPoint(exported)) {
    return exported;
  }
  return undefined;
};

const wrapSource = (source: string): string =>
  [
    '(function (exports, require, module, __filename) {',
    source,
    ";return typeof scrape === 'function' ? scrape : undefined;",
    '})'
  ].join('\n');

export interface VmSourceLoaderOptions {
  /** Module that `require` calls inside artifacts resolve from. */
  readonly resolveFrom?: string | URL;
}

/**
 * Compiles artifact source in a fresh `node:vm` context that only sees a curated set
 * of globals plus CommonJS `module`/`exports` and a `require` limited to installed
 * packages and a few side-effect-free built-in modules.
 */
export class VmSourceLoader implements UntrustedSourceLoader {
  private readonly require: ArtifactRequire;

  constructor(options: VmSourceLoaderOptions = {}) {
    this.require = restrictRequire(createRequire(options.resolveFrom ?? import.meta.url));
  }

  load(source: string, options: LoadSourceOptions): Scraper {
    const { filename } = options;
    const module: CommonJsModule = { exports: {} };

    let declared: unknown;
    try {
      const script = new Script(wrapSource(stripSelfInvocation(source)), { filename });
      const factory: unknown = script.runInContext(createContext(this.createGlobals()));
      if (!isModuleFactory(factory)) {
        throw new Error('module wrapper did not evaluate to a function');
      }
      declared = factory(module.exports, this.require, module, filename);
    } catch (error) {
      throw new ArtifactLoadError(filename, describeError(error), { cause: error });
    }

    const entry = resolveEntryPoint(declared, module.exports);
    if (!entry) {
      throw new ArtifactLoadError(filename, 'no scrape(url) entry point is defined');
    }

    return {
      scrape: async (url: string): Promise<ScrapedFields> => {
        const result: unknown = await entry(url);
        if (!isRecord(result) || Array.isArray(result)) {
          throw new Error(`Scraper ${filename} must return an object of fields`);
        }
        // Results are built in another realm; clone them into this one.
        return ScrapedFieldsSchema.parse(structuredClone(result));
      }
    };
  }

  private createGlobals(): Record<string, unknown> {
    return {
      console,
      fetch,
      URL,
      URLSearchParams,
      AbortController,
      AbortSignal,
      TextEncoder,
      TextDecoder,
      Buffer,
      setTimeout,
      clearTimeout,
      setInterval,
      clearInterval
    };
  }
}
