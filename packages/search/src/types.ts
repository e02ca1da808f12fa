import type { JobDetail, JobListing, SearchLocation } from '@trawl/parser-sdk';
import type { FetchFailureReason } from './fetcher.js';

export interface SearchRequest {
  terms: string[];
  location?: SearchLocation;
}

export type TermFailureReason = FetchFailureReason | 'deadline_exceeded' | 'parse_error';

export interface TermFailure {
  reason: TermFailureReason;
  message: string;
  attempts: number;
}

export interface TermResult {
  term: string;
  url: string;
  listings: JobListing[];
  /** Listings found for this term before cross-term dedup. */
  rawCount: number;
  failure?: TermFailure;
}

export interface SearchOutcome {
  terms: TermResult[];
  combinedCount: number;
  rawCount: number;
}

export interface Session {
  id: string;
  createdAt: number;
  expiresAt: number;
  terms: TermResult[];
  location?: SearchLocation;
}

export interface SessionSummary {
  id: string;
  terms: string[];
  location?: SearchLocation;
  totalCount: number;
  createdAt: number;
  expiresAt: number;
}

export interface ListingSelector {
  sessionId?: string;
  index?: number;
  query?: string;
}

export interface ResolvedListing {
  sessionId: string;
  /** 1-based position in the session's flattened listing order. */
  position: number;
  term: string;
  listing: JobListing;
}

export interface SearchJobsResult {
  sessionId: string;
  listingsByTerm: TermResult[];
  totalCount: number;
  rawCount: number;
  failedTerms: string[];
}

export interface JobDetailsResult {
  sessionId: string;
  position: number;
  term: string;
  detail: JobDetail;
}
