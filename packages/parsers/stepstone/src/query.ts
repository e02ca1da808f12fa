import type { SearchQuery, SearchSort } from '@trawl/parser-sdk';

export const STEPSTONE_BASE_URL = 'https://www.stepstone.de';
export const MIN_RADIUS_KM = 1;
export const MAX_RADIUS_KM = 100;

const SEARCH_ORIGIN = 'Homepage_top-search';
const SORT_PARAMS: Record<SearchSort, string> = {
  relevance: '1',
  date: '2',
};

export function clampRadius(radius: number): number {
  if (!Number.isFinite(radius)) {
    return MIN_RADIUS_KM;
  }

  return Math.min(MAX_RADIUS_KM, Math.max(MIN_RADIUS_KM, Math.round(radius)));
}

function normalizePage(page: number | undefined): number {
  if (page === undefined || !Number.isFinite(page)) {
    return 1;
  }

  return Math.max(1, Math.floor(page));
}

/**
 * German postal codes: exactly five digits.
 */
export function isValidZipCode(code: string): boolean {
  return /^\d{5}$/.test(code.trim());
}

export function buildSearchUrl(query: SearchQuery): string {
  const term = query.term.trim();
  let path = `/jobs/${encodeURIComponent(term)}`;
  const params = new URLSearchParams();

  if (query.location) {
    path += `/in-${encodeURIComponent(query.location.code.trim())}`;
    params.set('radius', String(clampRadius(query.location.radius)));
  }

  params.set('page', String(normalizePage(query.page)));
  params.set('sort', SORT_PARAMS[query.sort ?? 'relevance']);
  params.set('searchOrigin', SEARCH_ORIGIN);
  params.set('q', `"${term}"`);

  return `${STEPSTONE_BASE_URL}${path}?${params.toString()}`;
}
