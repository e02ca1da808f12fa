import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import type { JobListing } from '@trawl/parser-sdk';
import { parseDetail } from '../src/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const fixture = readFileSync(resolve(__dirname, '../fixtures/job-detail.html'), 'utf-8');

const listing: JobListing = {
  title: 'Fraud Analyst',
  company: 'Lone Star',
  location: 'Austin',
  url: 'https://www.monster.com/job-openings/fraud-analyst-austin-tx--a1b2c3',
  snippet: '',
};

describe('Monster detail parser', () => {
  it('extracts header fields', () => {
    const detail = parseDetail(fixture, listing);

    expect(detail?.url).toBe(listing.url);
    expect(detail?.title).toBe('Senior Fraud Analyst');
    expect(detail?.company).toBe('Lone Star Payments');
    expect(detail?.location).toBe('Austin, TX');
    expect(detail?.salary).toBe('$75,000 - $90,000 Per Year');
    expect(detail?.employmentType).toBe('Full-time');
    expect(detail?.experienceLevel).toBe('Senior');
    expect(detail?.postedDate).toBe('Posted 2 days ago');
  });

  it('extracts sections and contacts from the description', () => {
    const detail = parseDetail(fixture, listing);

    expect(detail?.description.split('\n')[0]).toBe('Join our risk team.');
    expect(detail?.responsibilities).toEqual(['Review flagged transactions', 'Write case reports']);
    expect(detail?.requirements).toEqual(['3+ years in fraud operations']);
    expect(detail?.benefits).toEqual(['401(k) match']);
    expect(detail?.applicationInstructions).toBe(
      'Send your resume to careers@lonestar.example or call (512) 555-0142.',
    );
    expect(detail?.companyDetails).toEqual({});
    expect(detail?.contactInfo).toEqual({ email: 'careers@lonestar.example', phone: '(512) 555-0142' });
  });

  it('returns null without a title or description', () => {
    expect(parseDetail('   ', listing)).toBeNull();
    expect(parseDetail('<html><body><div>Job expired</div></body></html>', listing)).toBeNull();
  });
});
