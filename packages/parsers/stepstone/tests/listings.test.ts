import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import type { SkippedBlock } from '@trawl/parser-sdk';
import { STEPSTONE_BASE_URL, parseListings, stepstonePortal } from '../src/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const fixture = readFileSync(resolve(__dirname, '../fixtures/search-results.html'), 'utf-8');

describe('StepStone listing parser', () => {
  it('extracts readable blocks in page order', () => {
    const listings = parseListings(fixture, { baseUrl: STEPSTONE_BASE_URL });

    expect(listings.map((listing) => listing.title)).toEqual([
      'Fraud Analyst (m/w/d)',
      'AML Specialist',
      'Betrugsermittler & Analyst',
    ]);
  });

  it('maps fields and resolves relative links', () => {
    const [first] = parseListings(fixture, { baseUrl: STEPSTONE_BASE_URL });

    expect(first).toEqual({
      title: 'Fraud Analyst (m/w/d)',
      company: 'Acme GmbH',
      location: 'Düsseldorf',
      url: 'https://www.stepstone.de/stellenangebote--Fraud-Analyst-Duesseldorf-Acme-GmbH--1001-inline.html',
      snippet: 'Sie analysieren verdächtige Transaktionen und entwickeln Präventionsregeln.',
    });
  });

  it('keeps absolute links and defaults missing fields to empty strings', () => {
    const listing = parseListings(fixture, { baseUrl: STEPSTONE_BASE_URL })[1];

    expect(listing).toEqual({
      title: 'AML Specialist',
      company: '',
      location: '',
      url: 'https://www.stepstone.de/stellenangebote--AML-Specialist-Koeln-Beta-Bank--1002-inline.html',
      snippet: '',
    });
  });

  it('reports skipped blocks', () => {
    const skipped: SkippedBlock[] = [];
    parseListings(fixture, { baseUrl: STEPSTONE_BASE_URL, onSkip: (block) => skipped.push(block) });

    expect(skipped).toEqual([
      { index: 2, reason: 'missing_link' },
      { index: 3, reason: 'missing_title' },
    ]);
  });

  it('skips a block that throws while being read and reports the error', () => {
    const skipped: SkippedBlock[] = [];
    let reads = 0;
    const context = {
      get baseUrl(): string {
        reads += 1;
        if (reads === 1) {
          throw new Error('broken block');
        }
        return STEPSTONE_BASE_URL;
      },
      onSkip: (block: SkippedBlock) => {
        skipped.push(block);
      },
    };

    const listings = parseListings(fixture, context);

    expect(listings.map((listing) => listing.title)).toEqual(['AML Specialist', 'Betrugsermittler & Analyst']);
    expect(skipped).toEqual([
      { index: 0, reason: 'parse_error', message: 'broken block' },
      { index: 2, reason: 'missing_link' },
      { index: 3, reason: 'missing_title' },
    ]);
  });

  it('falls back to any article with a heading', () => {
    const html = '<main><article><h2><a href="/job/1">Risk Analyst</a></h2></article><article><p>ad</p></article></main>';
    const listings = parseListings(html, { baseUrl: STEPSTONE_BASE_URL });

    expect(listings).toHaveLength(1);
    expect(listings[0]?.url).toBe('https://www.stepstone.de/job/1');
  });

  it('returns nothing for empty or foreign pages', () => {
    expect(parseListings('', { baseUrl: STEPSTONE_BASE_URL })).toEqual([]);
    expect(parseListings('<html><body><p>Keine Treffer</p></body></html>', { baseUrl: STEPSTONE_BASE_URL })).toEqual([]);
  });

  it('is exposed through the portal adapter', () => {
    expect(stepstonePortal.manifest.id).toBe('stepstone');
    expect(stepstonePortal.parseListings(fixture, { baseUrl: STEPSTONE_BASE_URL })).toHaveLength(3);
  });
});
