import type { Logger } from 'pino';
import { jobDetailSchema, type JobDetail, type JobListing, type PortalAdapter } from '@trawl/parser-sdk';
import { DetailFetchError, DetailParseError, serializeError } from './errors.js';
import type { PageFetcher } from './fetcher.js';

export interface DetailFetcherOptions {
  portal: PortalAdapter;
  fetcher: PageFetcher;
  logger: Logger;
}

/**
 * Loads a listing's posting page and parses it into a `JobDetail`.
 * Details are never cached.
 */
export class DetailFetcher {
  private readonly portal: PortalAdapter;
  private readonly fetcher: PageFetcher;
  private readonly logger: Logger;

  constructor(options: DetailFetcherOptions) {
    this.portal = options.portal;
    this.fetcher = options.fetcher;
    this.logger = options.logger;
  }

  async enrich(listing: JobListing): Promise<JobDetail> {
    const { url } = listing;

    let body: string;
    try {
      body = await this.fetcher.fetch(url);
    } catch (error) {
      this.logger.warn({ event: 'detail_fetch_failed', url, error: serializeError(error) }, 'Detail page fetch failed');
      throw new DetailFetchError(url, error);
    }

    if (!body.trim()) {
      throw new DetailParseError(url, `Detail page at ${url} was empty`);
    }

    let detail: JobDetail | null;
    try {
      detail = this.portal.parseDetail(body, listing);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new DetailParseError(url, `Failed to parse detail page: ${message}`, error);
    }

    if (!detail) {
      throw new DetailParseError(url, `Page at ${url} is not a job posting`);
    }

    const result = jobDetailSchema.safeParse({ ...detail, url });
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      this.logger.warn({ event: 'detail_invalid', url, issues }, 'Parsed detail failed validation');
      throw new DetailParseError(url, `Detail page produced an invalid record: ${issues.join('; ')}`);
    }

    return result.data;
  }
}
