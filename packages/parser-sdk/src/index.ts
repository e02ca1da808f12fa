export { definePortal } from './factory.js';
export type {
  JobListing,
  JobDetail,
  CompanyDetails,
  ContactInfo,
  SearchLocation,
  SearchQuery,
  SearchSort,
  SkippedBlock,
  ListingParseContext,
  PortalManifest,
  PortalAdapter,
} from './types.js';
export { jobListingSchema, jobDetailSchema, validateListings } from './schema.js';
export type { ValidatedJobListing, ValidateListingsOptions } from './schema.js';
export { normalizeWhitespace, decodeHtmlEntities, stripHtml, truncate, resolveLink } from './text.js';
export { loadDocument, textOf, firstText, blockText, findHeading, sectionItems, sectionText } from './dom.js';
export type { SectionLookup } from './dom.js';
