export { EXECUTION_ERROR_MARKER, MISSING_ENTRY_POINT_MESSAGE, wrapWithHarness } from './harness.js';
export { VmSourceLoader } from './loader.js';
export type { LoadSourceOptions, Scraper, UntrustedSourceLoader, VmSourceLoaderOptions } from './loader.js';
export { runProcess } from './process.js';
export type { ProcessResult, RunProcessOptions } from './process.js';
export {
  DEFAULT_SANDBOX_TIMEOUT_MS,
  ExecutionSandbox,
  buildSandboxEnvironment,
  classifyExecution,
  defaultModulePaths
} from './sandbox.js';
export type { ExecutionSandboxOptions } from './sandbox.js';
export { stripSelfInvocation } from './strip.js';
