import { describe, it, expect } from 'vitest';
import { normalizeWhitespace, resolveLink, stripHtml, truncate } from '../src/text.js';

describe('normalizeWhitespace', () => {
  it('trims and collapses spaces', () => {
    expect(normalizeWhitespace('  hello   world  ')).toBe('hello world');
  });

  it('collapses newlines and tabs', () => {
    expect(normalizeWhitespace('hello\n\n\tworld')).toBe('hello world');
  });

  it('handles empty string', () => {
    expect(normalizeWhitespace('')).toBe('');
  });
});

describe('stripHtml', () => {
  it('removes simple tags', () => {
    expect(stripHtml('<p>Hello</p>')).toBe('Hello');
  });

  it('converts br to newlines', () => {
    expect(stripHtml('line1<br/>line2')).toBe('line1\nline2');
  });

  it('decodes entities without double-decoding', () => {
    expect(stripHtml('Tom &amp; Jerry &lt;3')).toBe('Tom & Jerry <3');
    expect(stripHtml('&amp;lt;')).toBe('&lt;');
  });

  it('collapses excessive blank lines', () => {
    expect(stripHtml('<div><p>One</p><p></p><p></p><p>Two</p></div>')).toBe('One\n\nTwo');
  });

  it('drops script bodies', () => {
    expect(stripHtml('<p>Hi</p><script>alert(1)</script>')).toBe('Hi');
  });
});

describe('truncate', () => {
  it('keeps short text as is', () => {
    expect(truncate('abc', 3)).toBe('abc');
  });

  it('cuts long text with an ellipsis', () => {
    expect(truncate('abcdef', 3)).toBe('abc...');
  });
});

describe('resolveLink', () => {
  const base = 'https://www.stepstone.de/jobs/fraud';

  it('resolves root-relative links', () => {
    expect(resolveLink('/stellenangebote--analyst-1.html', base)).toBe(
      'https://www.stepstone.de/stellenangebote--analyst-1.html',
    );
  });

  it('resolves protocol-relative links', () => {
    expect(resolveLink('//www.monster.com/job-openings/abc', 'https://www.monster.com/jobs/search?q=x')).toBe(
      'https://www.monster.com/job-openings/abc',
    );
  });

  it('keeps absolute links', () => {
    expect(resolveLink(' https://example.com/jobs/1 ', base)).toBe('https://example.com/jobs/1');
  });

  it('rejects non-navigable links', () => {
    expect(resolveLink(undefined, base)).toBeUndefined();
    expect(resolveLink('', base)).toBeUndefined();
    expect(resolveLink('#top', base)).toBeUndefined();
    expect(resolveLink('javascript:void(0)', base)).toBeUndefined();
    expect(resolveLink('mailto:jobs@example.com', base)).toBeUndefined();
  });
});
