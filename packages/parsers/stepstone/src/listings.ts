import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import {
  firstText,
  loadDocument,
  resolveLink,
  textOf,
  truncate,
  type JobListing,
  type ListingParseContext,
} from '@trawl/parser-sdk';

const SNIPPET_MAX_LENGTH = 200;

const RESULT_BLOCK_SELECTOR = 'article[data-testid="job-item"], article[data-at="job-item"]';
const FALLBACK_BLOCK_SELECTOR = 'article:has(h2)';
const TITLE_SELECTOR = '[data-testid="job-item-title"], [data-at="job-item-title"], h2';
const COMPANY_SELECTORS = ['[data-testid="company-name"]', '[data-at="job-item-company-name"]', '[class*="company"]'];
const LOCATION_SELECTORS = ['[data-testid="job-location"]', '[data-at="job-item-location"]', '[class*="location"]'];
const SNIPPET_SELECTORS = [
  '[data-testid="job-item-snippet"]',
  '[data-at="jobcard-content"]',
  '[class*="description"]',
  '[class*="snippet"]',
];

type BlockOutcome = { listing: JobListing } | { skip: string; message?: string };

function findBlocks($: CheerioAPI): Cheerio<Element> {
  const blocks = $(RESULT_BLOCK_SELECTOR);
  return blocks.length > 0 ? blocks : $(FALLBACK_BLOCK_SELECTOR);
}

function readBlock(block: Cheerio<Element>, baseUrl: string): BlockOutcome {
  const titleNode = block.find(TITLE_SELECTOR).first();
  const firstAnchor = block.find('a[href]').first();
  const title = textOf(titleNode) || textOf(firstAnchor);

  if (!title) {
    return { skip: 'missing_title' };
  }

  const href =
    titleNode.closest('a[href]').attr('href') ?? titleNode.find('a[href]').first().attr('href') ?? firstAnchor.attr('href');
  const url = resolveLink(href, baseUrl);

  if (!url) {
    return { skip: 'missing_link' };
  }

  return {
    listing: {
      title,
      company: firstText(block, COMPANY_SELECTORS),
      location: firstText(block, LOCATION_SELECTORS),
      url,
      snippet: truncate(firstText(block, SNIPPET_SELECTORS), SNIPPET_MAX_LENGTH),
    },
  };
}

export function parseListings(body: string, context: ListingParseContext): JobListing[] {
  if (!body.trim()) {
    return [];
  }

  const $ = loadDocument(body);
  const listings: JobListing[] = [];

  findBlocks($).each((index, element) => {
    let outcome: BlockOutcome;
    try {
      outcome = readBlock($(element), context.baseUrl);
    } catch (error) {
      outcome = { skip: 'parse_error', message: error instanceof Error ? error.message : String(error) };
    }

    if ('skip' in outcome) {
      context.onSkip?.({ index, reason: outcome.skip, message: outcome.message });
      return;
    }

    listings.push(outcome.listing);
  });

  return listings;
}
