import { definePortal } from '@trawl/parser-sdk';
import { parseDetail } from './detail.js';
import { parseListings } from './listings.js';
import { MONSTER_BASE_URL, buildSearchUrl, isValidLocation } from './query.js';

export { parseDetail } from './detail.js';
export { parseListings } from './listings.js';
export {
  MAX_LOCATION_LENGTH,
  MAX_RADIUS_MILES,
  MIN_RADIUS_MILES,
  MONSTER_BASE_URL,
  buildSearchUrl,
  clampRadius,
  isValidLocation,
} from './query.js';

export const monsterPortal = definePortal({
  manifest: {
    id: 'monster',
    name: 'Monster',
    version: '0.1.0',
    baseUrl: MONSTER_BASE_URL,
  },
  isValidLocationCode: isValidLocation,
  buildSearchUrl,
  parseListings,
  parseDetail,
});
