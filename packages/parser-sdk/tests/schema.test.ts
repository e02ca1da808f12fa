import { describe, it, expect, vi } from 'vitest';
import { validateListings } from '../src/schema.js';

const listing = {
  title: 'Fraud Analyst',
  company: 'Acme',
  location: 'Berlin',
  url: 'https://www.stepstone.de/stellenangebote--fraud-analyst-1.html',
  snippet: '',
};

describe('validateListings', () => {
  it('keeps valid listings', () => {
    expect(validateListings([listing])).toEqual([listing]);
  });

  it('drops listings without a title or with a non-http link', () => {
    const onInvalid = vi.fn();
    const result = validateListings(
      [listing, { ...listing, title: '' }, { ...listing, url: 'ftp://example.com/x' }, { ...listing, url: 'nope' }],
      { onInvalid },
    );

    expect(result).toEqual([listing]);
    expect(onInvalid).toHaveBeenCalledTimes(3);
  });
});
