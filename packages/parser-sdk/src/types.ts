export interface JobListing {
  title: string;
  company: string;
  location: string;
  url: string;
  snippet: string;
}

export interface CompanyDetails {
  description?: string;
  size?: string;
  website?: string;
}

export interface ContactInfo {
  email?: string;
  phone?: string;
  person?: string;
}

export interface JobDetail {
  url: string;
  title: string;
  company: string;
  location: string;
  salary?: string;
  employmentType?: string;
  experienceLevel?: string;
  postedDate?: string;
  description: string;
  requirements: string[];
  responsibilities: string[];
  benefits: string[];
  companyDetails: CompanyDetails;
  applicationInstructions?: string;
  contactInfo: ContactInfo;
}

export interface SearchLocation {
  code: string;
  radius: number;
}

export type SearchSort = 'relevance' | 'date';

export interface SearchQuery {
  term: string;
  location?: SearchLocation;
  page?: number;
  sort?: SearchSort;
}

export interface SkippedBlock {
  index: number;
  reason: string;
  /** Set when reading the block threw. */
  message?: string;
}

export interface ListingParseContext {
  /** URL the page was fetched from; relative links resolve against it. */
  baseUrl: string;
  onSkip?: (skipped: SkippedBlock) => void;
}

export interface PortalManifest {
  id: string;
  name: string;
  version: string;
  baseUrl: string;
}

export interface PortalAdapter {
  manifest: PortalManifest;
  isValidLocationCode(code: string): boolean;
  buildSearchUrl(query: SearchQuery): string;
  parseListings(body: string, context: ListingParseContext): JobListing[];
  /**
   * Returns null when the page is not recognisable as a job posting.
   */
  parseDetail(body: string, listing: JobListing): JobDetail | null;
}
