import { z } from 'zod';
import {
  InvalidLocationError,
  type JobDetailsResult,
  type JobSearchService,
  type SearchJobsResult,
  type SessionSummary,
} from '@trawl/search';
import type { SearchLocation } from '@trawl/parser-sdk';
import { RequestError } from './errors.js';

export const DEFAULT_RADIUS_KM = 5;

const searchParamsSchema = z.object({
  search_terms: z.array(z.string()),
  location: z.string().optional(),
  radius: z.number().optional(),
});

const detailParamsSchema = z.object({
  session_id: z.string().optional(),
  job_index: z.number().optional(),
  job_query: z.string().optional(),
});

export type MethodName = 'search_jobs' | 'get_job_details' | 'list_sessions';

export type MethodResult =
  | { method: 'search_jobs'; result: SearchJobsResult; terms: string[]; location?: SearchLocation }
  | { method: 'get_job_details'; result: JobDetailsResult }
  | { method: 'list_sessions'; result: SessionSummary[] };

export type Dispatch = (method: string, params: unknown) => Promise<MethodResult>;

function parseParams<T>(schema: z.ZodType<T>, params: unknown): T {
  const parsed = schema.safeParse(params ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'params'}: ${issue.message}`);
    throw new RequestError(`Invalid parameters: ${issues.join('; ')}`, { issues });
  }

  return parsed.data;
}

function toLocation(location: string | undefined, radius: number | undefined): SearchLocation | undefined {
  if (location === undefined) {
    if (radius !== undefined) {
      throw new InvalidLocationError('A radius needs a location', { radius });
    }
    return undefined;
  }

  return { code: location, radius: radius ?? DEFAULT_RADIUS_KM };
}

/**
 * Maps transport-level method calls (snake_case params) onto the service.
 */
export function createDispatcher(service: JobSearchService): Dispatch {
  return async (method, params) => {
    switch (method) {
      case 'search_jobs': {
        const input = parseParams(searchParamsSchema, params);
        const location = toLocation(input.location, input.radius);
        const result = await service.searchJobs({ terms: input.search_terms, location });
        return { method, result, terms: result.listingsByTerm.map((entry) => entry.term), location };
      }
      case 'get_job_details': {
        const input = parseParams(detailParamsSchema, params);
        const result = await service.getJobDetails({
          sessionId: input.session_id,
          index: input.job_index,
          query: input.job_query,
        });
        return { method, result };
      }
      case 'list_sessions':
        return { method, result: service.listSessions() };
      default:
        throw new RequestError(`Unknown method: ${method}`, { method }, 'UnknownMethod');
    }
  };
}
