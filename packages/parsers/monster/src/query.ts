import type { SearchQuery, SearchSort } from '@trawl/parser-sdk';

export const MONSTER_BASE_URL = 'https://www.monster.com';
export const MAX_LOCATION_LENGTH = 100;
export const MIN_RADIUS_MILES = 1;
export const MAX_RADIUS_MILES = 100;

const SEARCH_PATH = '/jobs/search';
const SEARCH_ORIGIN = 'm.h.sh';
const RECENCY_BY_SORT: Record<SearchSort, string | undefined> = {
  relevance: undefined,
  date: 'last 7 days',
};

/**
 * Monster takes free-text places ("Austin, TX", "10001").
 */
export function isValidLocation(code: string): boolean {
  const trimmed = code.trim();
  return trimmed.length > 0 && trimmed.length <= MAX_LOCATION_LENGTH;
}

export function clampRadius(radius: number): number {
  if (!Number.isFinite(radius)) {
    return MIN_RADIUS_MILES;
  }

  return Math.min(MAX_RADIUS_MILES, Math.max(MIN_RADIUS_MILES, Math.round(radius)));
}

function normalizePage(page: number | undefined): number {
  if (page === undefined || !Number.isFinite(page)) {
    return 1;
  }

  return Math.max(1, Math.floor(page));
}

export function buildSearchUrl(query: SearchQuery): string {
  const params = new URLSearchParams();
  params.set('q', query.term.trim());

  if (query.location) {
    params.set('where', query.location.code.trim());
  }

  params.set('page', String(normalizePage(query.page)));

  if (query.location) {
    params.set('rd', String(clampRadius(query.location.radius)));
  }

  params.set('so', SEARCH_ORIGIN);

  const recency = RECENCY_BY_SORT[query.sort ?? 'relevance'];
  if (recency) {
    params.set('recency', recency);
  }

  return `${MONSTER_BASE_URL}${SEARCH_PATH}?${params.toString()}`;
}
