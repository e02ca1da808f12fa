import { definePortal } from '@trawl/parser-sdk';
import { parseDetail } from './detail.js';
import { parseListings } from './listings.js';
import { STEPSTONE_BASE_URL, buildSearchUrl, isValidZipCode } from './query.js';

export { parseDetail } from './detail.js';
export { parseListings } from './listings.js';
export { STEPSTONE_BASE_URL, MIN_RADIUS_KM, MAX_RADIUS_KM, buildSearchUrl, clampRadius, isValidZipCode } from './query.js';

export const stepstonePortal = definePortal({
  manifest: {
    id: 'stepstone',
    name: 'StepStone',
    version: '0.1.0',
    baseUrl: STEPSTONE_BASE_URL,
  },
  isValidLocationCode: isValidZipCode,
  buildSearchUrl,
  parseListings,
  parseDetail,
});
