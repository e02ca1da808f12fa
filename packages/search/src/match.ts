import { normalizeWhitespace, type JobListing } from '@trawl/parser-sdk';

/** 3: title contains query, 2: company contains query, 1: shared title word, 0: none. */
export type MatchScore = 0 | 1 | 2 | 3;

export interface ListingMatch<T extends JobListing> {
  listing: T;
  index: number;
  score: MatchScore;
}

function fold(text: string): string {
  return normalizeWhitespace(text).toLowerCase();
}

export function scoreListing(query: string, listing: JobListing): MatchScore {
  const needle = fold(query);
  if (!needle) return 0;

  const title = fold(listing.title);
  if (title.includes(needle)) return 3;
  if (fold(listing.company).includes(needle)) return 2;

  const titleWords = new Set(title.split(' '));
  return needle.split(' ').some((word) => titleWords.has(word)) ? 1 : 0;
}

/**
 * Highest-scoring listing; ties go to the earlier one. `undefined` when nothing scores.
 */
export function bestMatch<T extends JobListing>(query: string, listings: readonly T[]): ListingMatch<T> | undefined {
  let best: ListingMatch<T> | undefined;

  for (const [index, listing] of listings.entries()) {
    const score = scoreListing(query, listing);
    if (score > 0 && (!best || score > best.score)) {
      best = { listing, index, score };
    }
  }

  return best;
}
