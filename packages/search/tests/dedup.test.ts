import { describe, it, expect } from 'vitest';
import { dedupeAcrossTerms, dedupePage, type TermResult } from '../src/index.js';
import { makeListing } from './test-helpers.js';

describe('dedupePage', () => {
  it('drops repeated links and repeated title/company pairs', () => {
    const listings = [
      makeListing('a', { title: 'Fraud Analyst', company: 'Acme' }),
      makeListing('a', { title: 'Different Title', company: 'Other' }),
      makeListing('b', { title: 'fraud analyst ', company: 'ACME' }),
      makeListing('c', { title: 'Fraud Analyst', company: 'Beta' }),
    ];

    expect(dedupePage(listings).map((listing) => listing.url)).toEqual([
      'https://jobs.example/job/a',
      'https://jobs.example/job/c',
    ]);
  });

  it('does not collapse listings without a company', () => {
    const listings = [
      makeListing('a', { title: 'Fraud Analyst', company: '' }),
      makeListing('b', { title: 'Fraud Analyst', company: '' }),
    ];

    expect(dedupePage(listings)).toHaveLength(2);
  });
});

describe('dedupeAcrossTerms', () => {
  it('keeps a shared link under the first term only', () => {
    const shared = makeListing('shared');
    const results: TermResult[] = [
      { term: 'fraud', url: 'https://jobs.example/search?q=fraud', listings: [shared, makeListing('f1')], rawCount: 2 },
      { term: 'aml', url: 'https://jobs.example/search?q=aml', listings: [makeListing('a1'), shared], rawCount: 2 },
    ];

    const merged = dedupeAcrossTerms(results);

    expect(merged[0]?.listings.map((listing) => listing.url)).toEqual([
      'https://jobs.example/job/shared',
      'https://jobs.example/job/f1',
    ]);
    expect(merged[1]?.listings.map((listing) => listing.url)).toEqual(['https://jobs.example/job/a1']);
    expect(merged[1]?.rawCount).toBe(2);
  });

  it('keeps same title/company across terms when links differ', () => {
    const results: TermResult[] = [
      { term: 'fraud', url: '', listings: [makeListing('x', { title: 'Analyst', company: 'Acme' })], rawCount: 1 },
      { term: 'aml', url: '', listings: [makeListing('y', { title: 'Analyst', company: 'Acme' })], rawCount: 1 },
    ];

    expect(dedupeAcrossTerms(results).flatMap((result) => result.listings)).toHaveLength(2);
  });
});
