import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { AnyNode, Element } from 'domhandler';
import { normalizeWhitespace, stripHtml } from './text.js';

const HEADING_SELECTOR = 'h1, h2, h3, h4';

export interface SectionLookup {
  selectors: readonly string[];
  headings: readonly RegExp[];
}

export function loadDocument(html: string): CheerioAPI {
  const $ = cheerio.load(html);
  $('script, style, noscript, template').remove();
  return $;
}

export function textOf<T extends AnyNode>(node: Cheerio<T>): string {
  return normalizeWhitespace(node.text());
}

/**
 * Text of the first selector (in priority order) that yields a non-empty match.
 */
export function firstText<T extends AnyNode>(root: Cheerio<T>, selectors: readonly string[]): string {
  for (const selector of selectors) {
    const text = textOf(root.find(selector).first());
    if (text) {
      return text;
    }
  }

  return '';
}

/**
 * Multi-line text of a block, keeping paragraph and list breaks.
 */
export function blockText<T extends AnyNode>(node: Cheerio<T>): string {
  return stripHtml(node.html() ?? '');
}

function listItems<T extends AnyNode>($: CheerioAPI, items: Cheerio<T>): string[] {
  return items
    .toArray()
    .map((item) => textOf($(item)))
    .filter((text) => text.length > 0);
}

/**
 * Find a heading whose text matches one of the patterns.
 */
export function findHeading($: CheerioAPI, patterns: readonly RegExp[]): Cheerio<Element> | undefined {
  for (const heading of $(HEADING_SELECTOR).toArray()) {
    const node = $(heading);
    const text = textOf(node);
    if (patterns.some((pattern) => pattern.test(text))) {
      return node;
    }
  }

  return undefined;
}

/**
 * List items of a page section, located either by a dedicated container or by
 * a heading followed by lists up to the next heading.
 */
export function sectionItems($: CheerioAPI, lookup: SectionLookup): string[] {
  for (const selector of lookup.selectors) {
    const section = $(selector).first();
    if (section.length === 0) continue;

    const items = listItems($, section.find('li'));
    if (items.length > 0) {
      return items;
    }
  }

  const heading = findHeading($, lookup.headings);
  if (!heading) {
    return [];
  }

  const followers = heading.nextUntil(HEADING_SELECTOR);
  return listItems($, followers.filter('li').add(followers.find('li')));
}

/**
 * Paragraph text following a heading up to the next heading.
 */
export function sectionText($: CheerioAPI, patterns: readonly RegExp[]): string {
  const heading = findHeading($, patterns);
  if (!heading) {
    return '';
  }

  return heading
    .nextUntil(HEADING_SELECTOR)
    .toArray()
    .map((node) => blockText($(node)) || textOf($(node)))
    .filter((text) => text.length > 0)
    .join('\n');
}
