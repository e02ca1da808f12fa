export type JobSearchErrorCode =
  | 'NotFound'
  | 'SessionExpired'
  | 'IndexOutOfRange'
  | 'NoMatch'
  | 'MissingSelector'
  | 'DetailFetchError'
  | 'DetailParseError'
  | 'InvalidLocation'
  | 'InvalidSearchTerms';

export type ErrorDetails = Record<string, unknown>;

/**
 * Base of every error surfaced by the search operations. `details` records
 * what was attempted (session id, index, query, url) so callers can report it.
 */
export class JobSearchError extends Error {
  readonly code: JobSearchErrorCode;
  readonly details: ErrorDetails;

  constructor(code: JobSearchErrorCode, message: string, details: ErrorDetails = {}, options?: ErrorOptions) {
    super(message, options);
    this.name = 'JobSearchError';
    this.code = code;
    this.details = details;
  }
}

export class NotFoundError extends JobSearchError {
  constructor(message: string, details: ErrorDetails = {}) {
    super('NotFound', message, details);
    this.name = 'NotFoundError';
  }
}

export class SessionExpiredError extends JobSearchError {
  constructor(sessionId: string) {
    super('SessionExpired', `Search session ${sessionId} has expired, run a new search`, { sessionId });
    this.name = 'SessionExpiredError';
  }
}

export class IndexOutOfRangeError extends JobSearchError {
  constructor(sessionId: string, index: number, total: number) {
    super('IndexOutOfRange', `Job index ${index} is out of range (1-${total})`, { sessionId, index, total });
    this.name = 'IndexOutOfRangeError';
  }
}

export class NoMatchError extends JobSearchError {
  constructor(sessionId: string, query: string) {
    super('NoMatch', `No job in session ${sessionId} matches "${query}"`, { sessionId, query });
    this.name = 'NoMatchError';
  }
}

export class MissingSelectorError extends JobSearchError {
  constructor(sessionId: string) {
    super('MissingSelector', 'Either a job index or a query is required', { sessionId });
    this.name = 'MissingSelectorError';
  }
}

export class DetailFetchError extends JobSearchError {
  constructor(url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('DetailFetchError', `Failed to fetch job details: ${reason}`, { url }, { cause });
    this.name = 'DetailFetchError';
  }
}

export class DetailParseError extends JobSearchError {
  constructor(url: string, message: string, cause?: unknown) {
    super('DetailParseError', message, { url }, cause === undefined ? undefined : { cause });
    this.name = 'DetailParseError';
  }
}

export class InvalidLocationError extends JobSearchError {
  constructor(message: string, details: ErrorDetails = {}) {
    super('InvalidLocation', message, details);
    this.name = 'InvalidLocationError';
  }
}

export class InvalidSearchTermsError extends JobSearchError {
  constructor(message: string, details: ErrorDetails = {}) {
    super('InvalidSearchTerms', message, details);
    this.name = 'InvalidSearchTermsError';
  }
}

export interface SerializedError {
  name?: string;
  message: string;
  code?: string;
  stack?: string;
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof JobSearchError) {
    return { name: error.name, code: error.code, message: error.message, stack: error.stack };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: String(error),
  };
}
