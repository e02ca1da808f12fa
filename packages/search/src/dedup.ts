import type { JobListing } from '@trawl/parser-sdk';
import type { TermResult } from './types.js';

function identityKey(listing: JobListing): string | undefined {
  const title = listing.title.trim().toLowerCase();
  const company = listing.company.trim().toLowerCase();
  return title && company ? `${title}\u0000${company}` : undefined;
}

/**
 * Dedup within one results page: same link, or same title at the same
 * company. First occurrence wins.
 */
export function dedupePage(listings: readonly JobListing[]): JobListing[] {
  const seenUrls = new Set<string>();
  const seenIdentities = new Set<string>();
  const unique: JobListing[] = [];

  for (const listing of listings) {
    if (seenUrls.has(listing.url)) continue;

    const identity = identityKey(listing);
    if (identity && seenIdentities.has(identity)) continue;

    seenUrls.add(listing.url);
    if (identity) seenIdentities.add(identity);
    unique.push(listing);
  }

  return unique;
}

/**
 * Dedup across terms strictly by link. Earlier terms (submission order) keep
 * the listing; `rawCount` is left untouched.
 */
export function dedupeAcrossTerms(results: readonly TermResult[]): TermResult[] {
  const seenUrls = new Set<string>();

  return results.map((result) => {
    const listings = result.listings.filter((listing) => {
      if (seenUrls.has(listing.url)) return false;
      seenUrls.add(listing.url);
      return true;
    });

    return { ...result, listings };
  });
}
