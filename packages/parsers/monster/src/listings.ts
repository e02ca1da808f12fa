import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import { firstText, loadDocument, resolveLink, textOf, type JobListing, type ListingParseContext } from '@trawl/parser-sdk';

const CARD_CONTAINER_SELECTOR = '#card-scroll-container';
const CARD_SELECTOR = 'article[data-testid="JobCard"]';
const TITLE_SELECTOR = 'a[data-testid="jobTitle"]';
const COMPANY_SELECTORS = ['[data-testid="company"]'];
const LOCATION_SELECTORS = ['[data-testid="jobDetailLocation"]'];
const RECENCY_SELECTORS = ['[data-testid="jobDetailDateRecency"]'];

type CardOutcome = { listing: JobListing } | { skip: string; message?: string };

function readCard(card: Cheerio<Element>, baseUrl: string): CardOutcome {
  const titleNode = card.find(TITLE_SELECTOR).first();
  const title = textOf(titleNode);

  if (!title) {
    return { skip: 'missing_title' };
  }

  // Cards link protocol-relative ("//www.monster.com/job-openings/...").
  const url = resolveLink(titleNode.attr('href'), baseUrl);
  if (!url) {
    return { skip: 'missing_link' };
  }

  const location = firstText(card, LOCATION_SELECTORS);
  const recency = firstText(card, RECENCY_SELECTORS);

  return {
    listing: {
      title,
      company: firstText(card, COMPANY_SELECTORS),
      location,
      url,
      snippet: [location, recency].filter(Boolean).join(' - '),
    },
  };
}

export function parseListings(body: string, context: ListingParseContext): JobListing[] {
  if (!body.trim()) {
    return [];
  }

  const $ = loadDocument(body);
  const container = $(CARD_CONTAINER_SELECTOR).first();
  const cards = container.length > 0 ? container.find(CARD_SELECTOR) : $(CARD_SELECTOR);
  const listings: JobListing[] = [];

  cards.each((index, element) => {
    let outcome: CardOutcome;
    try {
      outcome = readCard($(element), context.baseUrl);
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
