/**
 * Trim whitespace and collapse multiple spaces.
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

const MAX_CODE_POINT = 0x10ffff;

function fromCodePoint(codePoint: number, fallback: string): string {
  return codePoint > 0 && codePoint <= MAX_CODE_POINT ? String.fromCodePoint(codePoint) : fallback;
}

/**
 * Decode a small set of common HTML entities.
 */
export function decodeHtmlEntities(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#0?39;/g, "'")
    .replace(/&apos;/g, "'")
    .replace(/&nbsp;/g, ' ')
    .replace(/&#x([0-9a-f]+);/gi, (entity: string, hex: string) => fromCodePoint(Number.parseInt(hex, 16), entity))
    .replace(/&#(\d+);/g, (entity: string, dec: string) => fromCodePoint(Number.parseInt(dec, 10), entity))
    .replace(/&amp;/g, '&');
}

/**
 * Strip HTML tags from a fragment. Block-level closings become newlines so
 * paragraphs survive, remaining tags are dropped and entities decoded.
 */
export function stripHtml(html: string): string {
  let text = html;

  text = text.replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, '');
  text = text.replace(/<br\s*\/?>/gi, '\n');
  text = text.replace(/<\/(p|li|div|section|h[1-6])>/gi, '\n');
  text = text.replace(/<[^>]+>/g, '');
  text = decodeHtmlEntities(text);

  return text
    .split('\n')
    .map((line) => normalizeWhitespace(line))
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }

  return `${text.slice(0, maxLength).trimEnd()}...`;
}

/**
 * Resolve a scraped href against the page it came from.
 * Only http(s) targets survive; fragments and script links are dropped.
 */
export function resolveLink(href: string | undefined, baseUrl: string): string | undefined {
  const raw = href?.trim();
  if (!raw || raw.startsWith('#') || /^javascript:/i.test(raw)) {
    return undefined;
  }

  try {
    const url = new URL(raw, baseUrl);
    return url.protocol === 'http:' || url.protocol === 'https:' ? url.toString() : undefined;
  } catch {
    return undefined;
  }
}
