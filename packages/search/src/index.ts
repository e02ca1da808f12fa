export { HttpFetcher, FetchError, DEFAULT_USER_AGENT } from './fetcher.js';
export type { FetchFailureReason, FetchOptions, HttpFetcherOptions, PageFetcher } from './fetcher.js';
export { SearchEngine, DEFAULT_SEARCH_CONCURRENCY, DEFAULT_SEARCH_TIMEOUT_MS } from './engine.js';
export type { SearchEngineOptions, SearchOptions } from './engine.js';
export { dedupePage, dedupeAcrossTerms } from './dedup.js';
export { scoreListing, bestMatch } from './match.js';
export type { MatchScore, ListingMatch } from './match.js';
export { SessionStore, DEFAULT_SESSION_TTL_MS } from './session-store.js';
export type { SessionStoreOptions, CreateSessionOptions } from './session-store.js';
export { DetailFetcher } from './detail.js';
export type { DetailFetcherOptions } from './detail.js';
export { JobSearchService, normalizeTerms, MIN_RADIUS_KM, MAX_RADIUS_KM } from './service.js';
export type { JobSearchServiceOptions, SearchJobsInput } from './service.js';
export {
  JobSearchError,
  NotFoundError,
  SessionExpiredError,
  IndexOutOfRangeError,
  NoMatchError,
  MissingSelectorError,
  DetailFetchError,
  DetailParseError,
  InvalidLocationError,
  InvalidSearchTermsError,
  serializeError,
} from './errors.js';
export type { JobSearchErrorCode, ErrorDetails, SerializedError } from './errors.js';
export type {
  SearchRequest,
  TermFailure,
  TermFailureReason,
  TermResult,
  SearchOutcome,
  Session,
  SessionSummary,
  ListingSelector,
  ResolvedListing,
  SearchJobsResult,
  JobDetailsResult,
} from './types.js';
