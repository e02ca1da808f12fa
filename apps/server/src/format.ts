import type { SearchLocation } from '@trawl/parser-sdk';
import type { JobDetailsResult, SearchJobsResult, SessionSummary } from '@trawl/search';
import type { MethodResult } from './handlers.js';

function describeLocation(location: SearchLocation | undefined): string {
  return location ? `${location.code} (±${location.radius}km)` : 'anywhere';
}

/**
 * Human-readable search summary. Listings are numbered by their position in
 * the session, so the numbers can be passed back as `job_index`.
 */
export function formatSearchResult(result: SearchJobsResult, terms: string[], location?: SearchLocation): string {
  const lines = [
    'Job Search Summary:',
    `Search Terms: ${terms.join(', ')}`,
    `Location: ${describeLocation(location)}`,
    `Total Jobs Found: ${result.totalCount}`,
    `Session ID: ${result.sessionId}`,
  ];

  let position = 0;
  for (const entry of result.listingsByTerm) {
    lines.push('', `--- Results for '${entry.term}' ---`);

    if (entry.failure) {
      lines.push(`Search failed: ${entry.failure.message}`);
      continue;
    }

    if (entry.listings.length === 0) {
      lines.push('No jobs found for this search term.');
      continue;
    }

    for (const listing of entry.listings) {
      position += 1;
      lines.push(`${position}. ${listing.title}`);
      if (listing.company) lines.push(`   Company: ${listing.company}`);
      if (listing.location) lines.push(`   Location: ${listing.location}`);
      if (listing.snippet) lines.push(`   Description: ${listing.snippet}`);
      lines.push(`   Link: ${listing.url}`);
    }
  }

  return lines.join('\n');
}

function pushList(lines: string[], heading: string, items: readonly string[]): void {
  if (items.length === 0) return;
  lines.push('', `${heading}:`, ...items.map((item) => `- ${item}`));
}

export function formatJobDetails({ detail, position, sessionId }: JobDetailsResult): string {
  const lines = [`Job Details: ${detail.title}`, `Company: ${detail.company || 'Unknown'}`, `Location: ${detail.location || 'Unknown'}`];

  if (detail.salary) lines.push(`Salary: ${detail.salary}`);
  if (detail.employmentType) lines.push(`Employment Type: ${detail.employmentType}`);
  if (detail.experienceLevel) lines.push(`Experience Level: ${detail.experienceLevel}`);
  if (detail.postedDate) lines.push(`Posted: ${detail.postedDate}`);

  lines.push('', 'Description:', detail.description || 'No description available.');
  pushList(lines, 'Responsibilities', detail.responsibilities);
  pushList(lines, 'Requirements', detail.requirements);
  pushList(lines, 'Benefits', detail.benefits);

  const { companyDetails, contactInfo } = detail;
  const company = [
    companyDetails.description,
    companyDetails.size && `Size: ${companyDetails.size}`,
    companyDetails.website && `Website: ${companyDetails.website}`,
  ].filter((line): line is string => Boolean(line));
  if (company.length > 0) lines.push('', 'About the Company:', ...company);

  if (detail.applicationInstructions) lines.push('', 'How to Apply:', detail.applicationInstructions);

  const contact = [
    contactInfo.person && `Contact: ${contactInfo.person}`,
    contactInfo.email && `Email: ${contactInfo.email}`,
    contactInfo.phone && `Phone: ${contactInfo.phone}`,
  ].filter((line): line is string => Boolean(line));
  if (contact.length > 0) lines.push('', ...contact);

  lines.push('', `Apply: ${detail.url}`, `(Job ${position} of session ${sessionId})`);
  return lines.join('\n');
}

export function formatSessions(sessions: readonly SessionSummary[]): string {
  if (sessions.length === 0) {
    return 'No active search sessions.';
  }

  return sessions
    .map(
      (session) =>
        `${session.id}: ${session.terms.join(', ')} @ ${describeLocation(session.location)}, ` +
        `${session.totalCount} jobs, expires ${new Date(session.expiresAt).toISOString()}`,
    )
    .join('\n');
}

export function formatResult(outcome: MethodResult): string {
  switch (outcome.method) {
    case 'search_jobs':
      return formatSearchResult(outcome.result, outcome.terms, outcome.location);
    case 'get_job_details':
      return formatJobDetails(outcome.result);
    case 'list_sessions':
      return formatSessions(outcome.result);
  }
}
