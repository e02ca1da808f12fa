import { describe, it, expect, vi } from 'vitest';
import { FetchError, HttpFetcher, SearchEngine, type FetchOptions, type PageFetcher } from '../src/index.js';
import { createLoggerMock, makeListing, searchUrl, stub, testPortal } from './test-helpers.js';

function pages(byTerm: Record<string, unknown[]>): Map<string, string> {
  return new Map(Object.entries(byTerm).map(([term, listings]) => [searchUrl(term), JSON.stringify(listings)]));
}

function createFetcher(bodies: Map<string, string>, failures: Map<string, Error> = new Map()) {
  const fetch = vi.fn(async (url: string, _options?: FetchOptions) => {
    const failure = failures.get(url);
    if (failure) throw failure;
    return bodies.get(url) ?? '';
  });

  return { fetcher: stub<PageFetcher>({ fetch }), fetch };
}

describe('SearchEngine', () => {
  it('returns per-term listings in submission order with counts', async () => {
    const shared = makeListing('shared');
    const { fetcher } = createFetcher(
      pages({
        fraud: [makeListing('f1'), shared],
        aml: [shared, makeListing('a1')],
      }),
    );
    const engine = new SearchEngine({ portal: testPortal, fetcher, logger: createLoggerMock() });

    const outcome = await engine.search({ terms: ['fraud', 'aml'] });

    expect(outcome.terms.map((result) => result.term)).toEqual(['fraud', 'aml']);
    expect(outcome.terms[0]?.listings.map((listing) => listing.url)).toEqual([
      'https://jobs.example/job/f1',
      'https://jobs.example/job/shared',
    ]);
    expect(outcome.terms[1]?.listings.map((listing) => listing.url)).toEqual(['https://jobs.example/job/a1']);
    expect(outcome.combinedCount).toBe(3);
    expect(outcome.rawCount).toBe(4);
  });

  it('records a failing term without aborting the others', async () => {
    const { fetcher } = createFetcher(
      pages({ fraud: [makeListing('f1')] }),
      new Map([[searchUrl('aml'), new FetchError('http_status', searchUrl('aml'), 1, 'status 404', { status: 404 })]]),
    );
    const logger = createLoggerMock();
    const engine = new SearchEngine({ portal: testPortal, fetcher, logger });

    const outcome = await engine.search({ terms: ['fraud', 'aml'] });

    expect(outcome.terms[0]?.listings).toHaveLength(1);
    expect(outcome.terms[1]).toEqual({
      term: 'aml',
      url: 'https://jobs.example/search?q=aml',
      listings: [],
      rawCount: 0,
      failure: { reason: 'http_status', message: 'status 404', attempts: 1 },
    });
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ event: 'term_failed', reason: 'http_status' }),
      'Search term failed',
    );
  });

  it('keeps two of three terms when one exhausts its retries on 5xx', async () => {
    const bodies = pages({ fraud: [makeListing('f1')], kyc: [makeListing('k1'), makeListing('k2')] });
    const fetchMock = vi.fn(async (input: unknown) => {
      const body = bodies.get(String(input));
      return body === undefined ? new Response('unavailable', { status: 503 }) : new Response(body, { status: 200 });
    });
    const fetcher = new HttpFetcher({
      backoffBaseMs: 0,
      maxJitterMs: 0,
      maxRetries: 2,
      fetchImpl: fetchMock as typeof fetch,
    });
    const engine = new SearchEngine({ portal: testPortal, fetcher, logger: createLoggerMock() });

    const outcome = await engine.search({ terms: ['fraud', 'aml', 'kyc'] });

    expect(outcome.terms.map((result) => result.listings.length)).toEqual([1, 0, 2]);
    expect(outcome.terms[1]?.failure).toEqual({
      reason: 'http_status',
      message: 'Request to https://jobs.example/search?q=aml failed with status 503',
      attempts: 3,
    });
    expect(outcome.terms[0]?.failure).toBeUndefined();
    expect(outcome.terms[2]?.failure).toBeUndefined();
    expect(outcome.combinedCount).toBe(3);
    expect(fetchMock.mock.calls.filter(([input]) => String(input) === searchUrl('aml'))).toHaveLength(3);
  });

  it('treats parser exceptions as a term failure', async () => {
    const bodies = new Map([[searchUrl('fraud'), '{not json']]);
    const { fetcher } = createFetcher(bodies);
    const engine = new SearchEngine({ portal: testPortal, fetcher, logger: createLoggerMock() });

    const outcome = await engine.search({ terms: ['fraud'] });

    expect(outcome.terms[0]?.failure?.reason).toBe('parse_error');
    expect(outcome.combinedCount).toBe(0);
  });

  it('drops invalid listings and collapses page duplicates', async () => {
    const { fetcher } = createFetcher(
      pages({
        fraud: [
          makeListing('1', { title: 'Analyst', company: 'Acme' }),
          makeListing('2', { title: 'analyst', company: 'ACME' }),
          makeListing('3', { title: '' }),
          makeListing('4', { url: 'javascript:void(0)' }),
        ],
      }),
    );
    const logger = createLoggerMock();
    const engine = new SearchEngine({ portal: testPortal, fetcher, logger });

    const outcome = await engine.search({ terms: ['fraud'] });

    expect(outcome.terms[0]?.listings.map((listing) => listing.url)).toEqual(['https://jobs.example/job/1']);
    expect(outcome.rawCount).toBe(1);
    expect(vi.mocked(logger.warn).mock.calls.filter(([payload]) => JSON.stringify(payload).includes('listing_invalid'))).toHaveLength(2);
  });

  it('treats an empty page as zero results', async () => {
    const { fetcher } = createFetcher(new Map());
    const engine = new SearchEngine({ portal: testPortal, fetcher, logger: createLoggerMock() });

    const outcome = await engine.search({ terms: ['nothing'] });

    expect(outcome.terms[0]).toEqual({
      term: 'nothing',
      url: 'https://jobs.example/search?q=nothing',
      listings: [],
      rawCount: 0,
    });
  });

  it('never runs more fetches at once than the concurrency bound', async () => {
    let active = 0;
    let peak = 0;
    const fetch = vi.fn(async () => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active -= 1;
      return '[]';
    });
    const engine = new SearchEngine({
      portal: testPortal,
      fetcher: stub<PageFetcher>({ fetch }),
      logger: createLoggerMock(),
      concurrency: 2,
    });

    await engine.search({ terms: ['a', 'b', 'c', 'd', 'e'] });

    expect(fetch).toHaveBeenCalledTimes(5);
    expect(peak).toBe(2);
  });

  it('marks unfinished terms as deadline_exceeded and aborts them', async () => {
    const signals: AbortSignal[] = [];
    const fetch = vi.fn((url: string, options?: FetchOptions) => {
      if (url === searchUrl('fast')) {
        return Promise.resolve(JSON.stringify([makeListing('fast')]));
      }

      return new Promise<string>((_resolve, reject) => {
        if (options?.signal) signals.push(options.signal);
        options?.signal?.addEventListener('abort', () => reject(new FetchError('aborted', url, 1, 'aborted')));
      });
    });
    const engine = new SearchEngine({
      portal: testPortal,
      fetcher: stub<PageFetcher>({ fetch }),
      logger: createLoggerMock(),
    });

    const outcome = await engine.search({ terms: ['fast', 'slow'] }, { timeoutMs: 30 });

    expect(outcome.terms[0]?.listings).toHaveLength(1);
    expect(outcome.terms[1]?.failure).toEqual({
      reason: 'deadline_exceeded',
      message: 'Search deadline of 30ms exceeded',
      attempts: 0,
    });
    expect(signals.every((signal) => signal.aborted)).toBe(true);
    expect(signals).toHaveLength(1);
  });
});
