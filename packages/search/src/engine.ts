import pLimit from 'p-limit';
import type { Logger } from 'pino';
import { validateListings, type PortalAdapter } from '@trawl/parser-sdk';
import { dedupeAcrossTerms, dedupePage } from './dedup.js';
import { FetchError, type PageFetcher } from './fetcher.js';
import type { SearchOutcome, SearchRequest, TermFailure, TermResult } from './types.js';

export const DEFAULT_SEARCH_CONCURRENCY = 4;
export const DEFAULT_SEARCH_TIMEOUT_MS = 30_000;

export interface SearchEngineOptions {
  portal: PortalAdapter;
  fetcher: PageFetcher;
  logger: Logger;
  concurrency?: number;
  timeoutMs?: number;
}

export interface SearchOptions {
  timeoutMs?: number;
}

function toTermFailure(error: unknown): TermFailure {
  if (error instanceof FetchError) {
    return { reason: error.reason, message: error.message, attempts: error.attempts };
  }

  const message = error instanceof Error ? error.message : String(error);
  return { reason: 'parse_error', message, attempts: 1 };
}

/**
 * Fans search terms out to the portal under a concurrency bound and an
 * overall deadline, then merges per-term results.
 */
export class SearchEngine {
  private readonly portal: PortalAdapter;
  private readonly fetcher: PageFetcher;
  private readonly logger: Logger;
  private readonly concurrency: number;
  private readonly timeoutMs: number;

  constructor(options: SearchEngineOptions) {
    this.portal = options.portal;
    this.fetcher = options.fetcher;
    this.logger = options.logger;
    this.concurrency = Math.max(1, options.concurrency ?? DEFAULT_SEARCH_CONCURRENCY);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SEARCH_TIMEOUT_MS;
  }

  async search(request: SearchRequest, options: SearchOptions = {}): Promise<SearchOutcome> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const controller = new AbortController();
    const limit = pLimit(this.concurrency);
    const completed = new Map<number, TermResult>();
    const urls = request.terms.map((term) => this.portal.buildSearchUrl({ term, location: request.location }));

    const tasks = request.terms.map((term, index) =>
      limit(async () => {
        if (controller.signal.aborted) return;

        const result = await this.runTerm(term, urls[index] ?? '', controller.signal);
        if (!controller.signal.aborted) {
          completed.set(index, result);
        }
      }),
    );

    let deadline: NodeJS.Timeout | undefined;
    const expired = new Promise<'expired'>((resolve) => {
      deadline = setTimeout(() => resolve('expired'), timeoutMs);
    });

    const settled = await Promise.race([Promise.all(tasks).then(() => 'done' as const), expired]);
    clearTimeout(deadline);

    if (settled === 'expired') {
      controller.abort();
      limit.clearQueue();
    }

    const results = request.terms.map((term, index): TermResult => {
      const result = completed.get(index);
      if (result) return result;

      this.logger.warn({ event: 'term_deadline_exceeded', term, timeoutMs }, 'Search term did not finish before the deadline');
      return {
        term,
        url: urls[index] ?? '',
        listings: [],
        rawCount: 0,
        failure: { reason: 'deadline_exceeded', message: `Search deadline of ${timeoutMs}ms exceeded`, attempts: 0 },
      };
    });

    const merged = dedupeAcrossTerms(results);

    return {
      terms: merged,
      combinedCount: merged.reduce((sum, result) => sum + result.listings.length, 0),
      rawCount: results.reduce((sum, result) => sum + result.rawCount, 0),
    };
  }

  private async runTerm(term: string, url: string, signal: AbortSignal): Promise<TermResult> {
    const log = this.logger.child({ term });

    try {
      const body = await this.fetcher.fetch(url, { signal });
      const parsed = this.portal.parseListings(body, {
        baseUrl: url,
        onSkip: (block) => {
          log.warn({ event: 'listing_block_skipped', ...block }, 'Skipped unreadable result block');
        },
      });
      const valid = validateListings(parsed, {
        onInvalid: (issues) => {
          log.warn(
            { event: 'listing_invalid', issues: issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`) },
            'Dropped invalid listing',
          );
        },
      });
      const listings = dedupePage(valid);

      log.debug({ event: 'term_completed', url, parsed: parsed.length, kept: listings.length }, 'Search term completed');
      return { term, url, listings, rawCount: listings.length };
    } catch (error) {
      const failure = toTermFailure(error);
      log.warn({ event: 'term_failed', url, ...failure }, 'Search term failed');
      return { term, url, listings: [], rawCount: 0, failure };
    }
  }
}
