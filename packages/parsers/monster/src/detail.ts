import type { CheerioAPI } from 'cheerio';
import {
  blockText,
  firstText,
  loadDocument,
  normalizeWhitespace,
  sectionItems,
  sectionText,
  type ContactInfo,
  type JobDetail,
  type JobListing,
} from '@trawl/parser-sdk';

const TITLE_SELECTORS = ['h1[data-testid="jobTitle"]', 'h1'];
const COMPANY_SELECTORS = ['[data-testid="jobHeaderCompanyName"]', '[data-testid="company"]'];
const LOCATION_SELECTORS = ['[data-testid="jobDetailLocation"]'];
const SALARY_SELECTORS = ['[data-testid="jobDetailSalary"]', '[data-testid="salary"]'];
const EMPLOYMENT_TYPE_SELECTORS = ['[data-testid="jobDetailJobType"]', '[data-testid="employmentType"]'];
const POSTED_DATE_SELECTORS = ['[data-testid="jobDetailDateRecency"]'];
const DESCRIPTION_SELECTORS = [
  '[data-testid="svx-description-container-inner"]',
  '[data-testid="jobDescription"]',
  '#JobDescription',
  '[class*="DescriptionContainer"]',
];

const EXPERIENCE_PATTERN = /\b(entry[- ]level|mid[- ]level|senior|lead|principal|director)\b/i;
const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/;
const PHONE_PATTERN = /(?<!\d)(?:\+1[\s.-]?)?\(?\d{3}\)?[\s.-]\d{3}[\s.-]\d{4}(?!\d)/;

const REQUIREMENT_SECTIONS = {
  selectors: ['[data-testid="requirements"]'],
  headings: [/requirements/i, /qualifications/i, /what you.ll need/i, /what you bring/i],
};
const RESPONSIBILITY_SECTIONS = {
  selectors: ['[data-testid="responsibilities"]'],
  headings: [/responsibilit/i, /what you.ll do/i, /duties/i],
};
const BENEFIT_SECTIONS = {
  selectors: ['[data-testid="benefits"]'],
  headings: [/benefits/i, /perks/i, /what we offer/i],
};
const APPLICATION_HEADINGS = [/how to apply/i, /application/i];
const ABOUT_COMPANY_HEADINGS = [/about (?:us|the company)/i, /who we are/i];

function extractDescription($: CheerioAPI): string {
  for (const selector of DESCRIPTION_SELECTORS) {
    const node = $(selector).first();
    if (node.length > 0) {
      return blockText(node);
    }
  }

  return '';
}

function extractContactInfo(pageText: string): ContactInfo {
  const contact: ContactInfo = {};
  const email = EMAIL_PATTERN.exec(pageText)?.[0];
  const phone = PHONE_PATTERN.exec(pageText)?.[0];

  if (email) contact.email = email;
  if (phone) contact.phone = phone;

  return contact;
}

export function parseDetail(body: string, listing: JobListing): JobDetail | null {
  if (!body.trim()) {
    return null;
  }

  const $ = loadDocument(body);
  const root = $.root();
  const title = firstText(root, TITLE_SELECTORS);
  const description = extractDescription($);

  if (!title && !description) {
    return null;
  }

  const pageText = normalizeWhitespace(blockText($('body')));
  const aboutCompany = sectionText($, ABOUT_COMPANY_HEADINGS);

  return {
    url: listing.url,
    title: title || listing.title,
    company: firstText(root, COMPANY_SELECTORS) || listing.company,
    location: firstText(root, LOCATION_SELECTORS) || listing.location,
    salary: firstText(root, SALARY_SELECTORS) || undefined,
    employmentType: firstText(root, EMPLOYMENT_TYPE_SELECTORS) || undefined,
    experienceLevel: EXPERIENCE_PATTERN.exec(title)?.[1],
    postedDate: firstText(root, POSTED_DATE_SELECTORS) || undefined,
    description,
    requirements: sectionItems($, REQUIREMENT_SECTIONS),
    responsibilities: sectionItems($, RESPONSIBILITY_SECTIONS),
    benefits: sectionItems($, BENEFIT_SECTIONS),
    companyDetails: aboutCompany ? { description: normalizeWhitespace(aboutCompany) } : {},
    applicationInstructions: sectionText($, APPLICATION_HEADINGS) || undefined,
    contactInfo: extractContactInfo(pageText),
  };
}
