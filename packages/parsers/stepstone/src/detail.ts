import type { CheerioAPI } from 'cheerio';
import {
  blockText,
  firstText,
  loadDocument,
  normalizeWhitespace,
  resolveLink,
  sectionItems,
  sectionText,
  truncate,
  type CompanyDetails,
  type ContactInfo,
  type JobDetail,
  type JobListing,
} from '@trawl/parser-sdk';
import { STEPSTONE_BASE_URL } from './query.js';

const FALLBACK_DESCRIPTION_MAX_LENGTH = 2000;

const TITLE_SELECTORS = [
  'h1[data-testid="job-title"]',
  '[data-at="header-job-title"]',
  'h1[class*="job-title"]',
  'h1[class*="JobTitle"]',
  'h1',
];
const COMPANY_SELECTORS = [
  '[data-testid="company-name"]',
  '[data-at="metadata-company-name"]',
  '[class*="company-name"]',
  '[class*="CompanyName"]',
  'a[href*="/cmp/"]',
];
const LOCATION_SELECTORS = [
  '[data-testid="job-location"]',
  '[data-at="metadata-location"]',
  '[class*="job-location"]',
  '[class*="JobLocation"]',
];
const SALARY_SELECTORS = ['[data-testid="salary"]', '[data-at="metadata-salary"]', '[class*="salary"]', '[class*="Salary"]'];
const EMPLOYMENT_TYPE_SELECTORS = [
  '[data-testid="employment-type"]',
  '[data-at="metadata-contract-type"]',
  '[data-at="metadata-work-type"]',
  '[class*="employment-type"]',
];
const EXPERIENCE_SELECTORS = ['[data-testid="experience-level"]', '[class*="experience-level"]', '[class*="ExperienceLevel"]'];
const POSTED_DATE_SELECTORS = [
  '[data-testid="posted-date"]',
  '[data-at="metadata-online-date"]',
  '[class*="posted-date"]',
  '[class*="PostedDate"]',
];
const DESCRIPTION_SELECTORS = [
  '[data-testid="job-description"]',
  '[data-at="job-ad-content"]',
  '[class*="job-description"]',
  '[class*="JobDescription"]',
  'section[class*="description"]',
  'div[class*="description"]',
];
const COMPANY_DESCRIPTION_SELECTORS = [
  '[data-testid="company-description"]',
  '[class*="company-description"]',
  '[class*="CompanyDescription"]',
];
const COMPANY_WEBSITE_SELECTORS = ['a[data-testid="company-website"]', 'a[class*="company-website"]'];
const APPLICATION_SELECTORS = ['[data-testid="application-instructions"]', '[class*="application-instructions"]'];

const EMPLOYMENT_KEYWORDS = ['vollzeit', 'teilzeit', 'befristet', 'unbefristet', 'freelance', 'praktikum', 'werkstudent'];
const EXPERIENCE_KEYWORDS = ['einsteiger', 'berufserfahren', 'senior', 'leitung', 'fachkraft'];

const SALARY_PATTERN =
  /((?:\d{1,3}(?:\.\d{3})*(?:,\d{2})?\s*(?:€\s*)?[-–]\s*)?\d{1,3}(?:\.\d{3})*(?:,\d{2})?\s*€(?:\s*(?:pro\s*(?:Monat|Jahr)|p\.\s*a\.|p\.\s*m\.))?)/i;
const POSTED_DATE_PATTERNS = [
  /vor\s+\d+\s+(?:Tag|Tagen|Stunde|Stunden|Minute|Minuten)/i,
  /\b\d{1,2}\.\d{1,2}\.\d{4}\b/,
  /\b\d{2}\/\d{2}\/\d{4}\b/,
];
const COMPANY_SIZE_PATTERN = /(\d+(?:\s*[-–]\s*\d+)?\+?\s*(?:Mitarbeiter(?:innen|n)?|Mitarbeitende|employees))/i;
const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/;
const PHONE_PATTERN = /(?<!\d)(?:\+49|0)[\s\-/]?[1-9]\d{1,4}[\s\-/]?\d{3,8}(?:[\s\-/]?\d{1,7})?(?!\d)/;
const CONTACT_PERSON_PATTERN =
  /(?:Ansprechpartner(?:in)?|Kontakt|Contact)\s*:\s*(?:(?:Frau|Herr|Ms\.?|Mr\.?)\s+)?([A-ZÄÖÜ][a-zäöüß]+\s[A-ZÄÖÜ][a-zäöüß]+)/u;

const REQUIREMENT_SECTIONS = {
  selectors: ['[data-testid="requirements"]', '[class*="requirements"]', '[class*="Requirements"]'],
  headings: [/anforderungen/i, /ihr profil/i, /requirements/i, /your profile/i, /qualifi/i],
};
const RESPONSIBILITY_SECTIONS = {
  selectors: ['[data-testid="responsibilities"]', '[class*="responsibilities"]', '[class*="Responsibilities"]'],
  headings: [/aufgaben/i, /responsibilit/i, /your tasks/i],
};
const BENEFIT_SECTIONS = {
  selectors: ['[data-testid="benefits"]', '[class*="benefits"]', '[class*="Benefits"]'],
  headings: [/benefits/i, /wir bieten/i, /leistungen/i, /we offer/i],
};
const APPLICATION_HEADINGS = [/bewerbung/i, /how to apply/i];
const APPLY_BUTTON_PATTERN = /bewerben|apply/i;

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function findKeyword(text: string, keywords: readonly string[]): string | undefined {
  const keyword = keywords.find((candidate) => new RegExp(`\\b${candidate}\\b`, 'i').test(text));
  return keyword ? capitalize(keyword) : undefined;
}

function joinedTexts($: CheerioAPI, selectors: readonly string[]): string | undefined {
  const values: string[] = [];

  for (const selector of selectors) {
    const text = firstText($.root(), [selector]);
    if (text && !values.includes(text)) {
      values.push(text);
    }
  }

  return values.length > 0 ? values.join(', ') : undefined;
}

function extractSalary($: CheerioAPI, pageText: string): string | undefined {
  for (const selector of SALARY_SELECTORS) {
    const text = firstText($.root(), [selector]);
    if (text && /\d/.test(text)) {
      return text;
    }
  }

  return SALARY_PATTERN.exec(pageText)?.[1]?.trim();
}

function extractPostedDate($: CheerioAPI, pageText: string): string | undefined {
  const text = firstText($.root(), POSTED_DATE_SELECTORS);
  if (text) {
    return text;
  }

  for (const pattern of POSTED_DATE_PATTERNS) {
    const match = pattern.exec(pageText);
    if (match) {
      return match[0];
    }
  }

  return undefined;
}

function extractDescription($: CheerioAPI): string | undefined {
  for (const selector of DESCRIPTION_SELECTORS) {
    const node = $(selector).first();
    if (node.length > 0) {
      return blockText(node);
    }
  }

  return undefined;
}

function extractCompanyDetails($: CheerioAPI, pageText: string): CompanyDetails {
  const details: CompanyDetails = {};

  for (const selector of COMPANY_DESCRIPTION_SELECTORS) {
    const node = $(selector).first();
    if (node.length > 0) {
      details.description = normalizeWhitespace(blockText(node));
      break;
    }
  }

  const size = COMPANY_SIZE_PATTERN.exec(pageText)?.[1];
  if (size) {
    details.size = size;
  }

  for (const selector of COMPANY_WEBSITE_SELECTORS) {
    const website = resolveLink($(selector).first().attr('href'), STEPSTONE_BASE_URL);
    if (website) {
      details.website = website;
      break;
    }
  }

  return details;
}

function extractApplicationInstructions($: CheerioAPI): string | undefined {
  for (const selector of APPLICATION_SELECTORS) {
    const node = $(selector).first();
    if (node.length > 0) {
      return blockText(node);
    }
  }

  const section = sectionText($, APPLICATION_HEADINGS);
  if (section) {
    return section;
  }

  const hasApplyButton = $('a, button')
    .toArray()
    .some((node) => APPLY_BUTTON_PATTERN.test($(node).text()));

  return hasApplyButton ? 'Use the apply button on the posting page to submit an application.' : undefined;
}

function extractContactInfo(pageText: string): ContactInfo {
  const contact: ContactInfo = {};

  const email = EMAIL_PATTERN.exec(pageText)?.[0];
  if (email) {
    contact.email = email;
  }

  const phone = PHONE_PATTERN.exec(pageText)?.[0];
  if (phone) {
    contact.phone = phone;
  }

  const person = CONTACT_PERSON_PATTERN.exec(pageText)?.[1];
  if (person) {
    contact.person = person;
  }

  return contact;
}

export function parseDetail(body: string, listing: JobListing): JobDetail | null {
  if (!body.trim()) {
    return null;
  }

  const $ = loadDocument(body);
  const root = $.root();
  const pageTitle = firstText(root, TITLE_SELECTORS);
  const description = extractDescription($);

  if (!pageTitle && description === undefined) {
    return null;
  }

  const pageText = normalizeWhitespace(blockText($('body')));
  const fallbackDescription = () => {
    const main = $('main, article').first();
    return main.length > 0 ? truncate(blockText(main), FALLBACK_DESCRIPTION_MAX_LENGTH) : '';
  };

  return {
    url: listing.url,
    title: pageTitle || listing.title,
    company: firstText(root, COMPANY_SELECTORS) || listing.company,
    location: firstText(root, LOCATION_SELECTORS) || listing.location,
    salary: extractSalary($, pageText),
    employmentType: joinedTexts($, EMPLOYMENT_TYPE_SELECTORS) ?? findKeyword(pageText, EMPLOYMENT_KEYWORDS),
    experienceLevel: firstText(root, EXPERIENCE_SELECTORS) || findKeyword(pageText, EXPERIENCE_KEYWORDS),
    postedDate: extractPostedDate($, pageText),
    description: description ?? fallbackDescription(),
    requirements: sectionItems($, REQUIREMENT_SECTIONS),
    responsibilities: sectionItems($, RESPONSIBILITY_SECTIONS),
    benefits: sectionItems($, BENEFIT_SECTIONS),
    companyDetails: extractCompanyDetails($, pageText),
    applicationInstructions: extractApplicationInstructions($),
    contactInfo: extractContactInfo(pageText),
  };
}
