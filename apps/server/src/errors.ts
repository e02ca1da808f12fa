import { JobSearchError, type ErrorDetails } from '@trawl/search';

/**
 * Malformed transport input (bad JSON, wrong parameter types, unknown method).
 */
export class RequestError extends Error {
  readonly code: string;
  readonly details: ErrorDetails;

  constructor(message: string, details: ErrorDetails = {}, code = 'InvalidRequest') {
    super(message);
    this.name = 'RequestError';
    this.code = code;
    this.details = details;
  }
}

export interface ErrorPayload {
  code: string;
  message: string;
  details: ErrorDetails;
}

const HTTP_STATUS_BY_CODE: Record<string, number> = {
  InvalidRequest: 400,
  PayloadTooLarge: 413,
  UnknownMethod: 404,
  InvalidLocation: 400,
  InvalidSearchTerms: 400,
  IndexOutOfRange: 400,
  MissingSelector: 400,
  NotFound: 404,
  NoMatch: 404,
  SessionExpired: 410,
  DetailFetchError: 502,
  DetailParseError: 502,
};

export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof JobSearchError || error instanceof RequestError) {
    return { code: error.code, message: error.message, details: error.details };
  }

  return { code: 'InternalError', message: 'Internal server error', details: {} };
}

export function httpStatusFor(code: string): number {
  return HTTP_STATUS_BY_CODE[code] ?? 500;
}
