export {
  DEFAULT_FETCH_TIMEOUT_MS,
  HttpDocumentFetcher,
  MIN_DOCUMENT_LENGTH,
  withDocumentFetcher
} from './fetcher.js';
export type { DocumentFetcher, FetchOutcome, HttpDocumentFetcherOptions, LoadedDocument } from './fetcher.js';
export { probeSelector, select, selectOne } from './select.js';
export type {
  ProbeSelectorInput,
  SelectorProbeFailure,
  SelectorProbeMatch,
  SelectorProbeReport,
  SelectorProbeResult
} from './select.js';
