import type { Logger } from 'pino';
import { z } from 'zod';
import type { PortalAdapter, SearchLocation } from '@trawl/parser-sdk';
import type { DetailFetcher } from './detail.js';
import type { SearchEngine } from './engine.js';
import { InvalidLocationError, InvalidSearchTermsError } from './errors.js';
import type { SessionStore } from './session-store.js';
import type { JobDetailsResult, ListingSelector, SearchJobsResult, SessionSummary } from './types.js';

export const MIN_RADIUS_KM = 1;
export const MAX_RADIUS_KM = 100;

const locationSchema = z.object({
  code: z.string().trim().min(1, 'Location code is required'),
  radius: z
    .number()
    .int('Radius must be a whole number')
    .min(MIN_RADIUS_KM, `Radius must be at least ${MIN_RADIUS_KM}`)
    .max(MAX_RADIUS_KM, `Radius must be at most ${MAX_RADIUS_KM}`),
});

const termsSchema = z.array(z.string(), { invalid_type_error: 'Search terms must be a list of strings' });

export interface SearchJobsInput {
  terms: readonly string[];
  location?: SearchLocation;
}

export interface JobSearchServiceOptions {
  portal: PortalAdapter;
  engine: SearchEngine;
  store: SessionStore;
  details: DetailFetcher;
  logger: Logger;
}

/**
 * Trim, drop blanks, and dedupe case-insensitively keeping the first spelling.
 */
export function normalizeTerms(terms: readonly string[]): string[] {
  const seen = new Set<string>();
  const normalized: string[] = [];

  for (const raw of terms) {
    const term = raw.trim();
    const key = term.toLowerCase();
    if (!term || seen.has(key)) continue;

    seen.add(key);
    normalized.push(term);
  }

  return normalized;
}

export class JobSearchService {
  private readonly portal: PortalAdapter;
  private readonly engine: SearchEngine;
  private readonly store: SessionStore;
  private readonly details: DetailFetcher;
  private readonly logger: Logger;

  constructor(options: JobSearchServiceOptions) {
    this.portal = options.portal;
    this.engine = options.engine;
    this.store = options.store;
    this.details = options.details;
    this.logger = options.logger;
  }

  /**
   * Runs a search and records it as a new session. Resolves even when every
   * term fails; only invalid input rejects, before any request is made.
   */
  async searchJobs(input: SearchJobsInput): Promise<SearchJobsResult> {
    const terms = this.parseTerms(input.terms);
    const location = this.parseLocation(input.location);
    const startedAt = Date.now();

    this.logger.info({ event: 'search_started', portal: this.portal.manifest.id, terms, location }, 'Search started');

    const outcome = await this.engine.search({ terms, location });
    const sessionId = this.store.create(outcome.terms, { location });
    const failedTerms = outcome.terms.filter((result) => result.failure).map((result) => result.term);

    this.logger.info(
      {
        event: 'search_completed',
        sessionId,
        totalCount: outcome.combinedCount,
        rawCount: outcome.rawCount,
        failedTerms,
        durationMs: Date.now() - startedAt,
      },
      'Search completed',
    );

    return {
      sessionId,
      listingsByTerm: outcome.terms,
      totalCount: outcome.combinedCount,
      rawCount: outcome.rawCount,
      failedTerms,
    };
  }

  async getJobDetails(selector: ListingSelector): Promise<JobDetailsResult> {
    const resolved = this.store.resolve(selector);

    this.logger.info(
      { event: 'detail_requested', sessionId: resolved.sessionId, position: resolved.position, url: resolved.listing.url },
      'Fetching job details',
    );

    const detail = await this.details.enrich(resolved.listing);

    return {
      sessionId: resolved.sessionId,
      position: resolved.position,
      term: resolved.term,
      detail,
    };
  }

  listSessions(): SessionSummary[] {
    return this.store.list();
  }

  private parseTerms(input: unknown): string[] {
    const parsed = termsSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidSearchTermsError(parsed.error.issues[0]?.message ?? 'Invalid search terms');
    }

    const terms = normalizeTerms(parsed.data);
    if (terms.length === 0) {
      throw new InvalidSearchTermsError('At least one non-blank search term is required', { terms: parsed.data });
    }

    return terms;
  }

  private parseLocation(input: unknown): SearchLocation | undefined {
    if (input === undefined) {
      return undefined;
    }

    const parsed = locationSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidLocationError(parsed.error.issues[0]?.message ?? 'Invalid location', { location: input });
    }

    if (!this.portal.isValidLocationCode(parsed.data.code)) {
      throw new InvalidLocationError(`Location code "${parsed.data.code}" is not valid for ${this.portal.manifest.name}`, {
        location: parsed.data,
      });
    }

    return parsed.data;
  }
}
