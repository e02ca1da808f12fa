import type { Logger } from 'pino';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

export type FetchFailureReason = 'timeout' | 'network' | 'http_status' | 'invalid_url' | 'aborted';

export class FetchError extends Error {
  readonly reason: FetchFailureReason;
  readonly url: string;
  readonly attempts: number;
  readonly status?: number;

  constructor(reason: FetchFailureReason, url: string, attempts: number, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'FetchError';
    this.reason = reason;
    this.url = url;
    this.attempts = attempts;
    this.status = options?.status;
  }
}

export interface FetchOptions {
  signal?: AbortSignal;
}

/**
 * Anything that turns a URL into a response body. The engine and detail
 * fetcher depend on this rather than on `HttpFetcher` directly.
 */
export interface PageFetcher {
  fetch(url: string, options?: FetchOptions): Promise<string>;
}

export interface HttpFetcherOptions {
  userAgent?: string;
  timeoutMs?: number;
  maxRetries?: number;
  backoffBaseMs?: number;
  maxJitterMs?: number;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}

export class HttpFetcher implements PageFetcher {
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly backoffBaseMs: number;
  private readonly maxJitterMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger?: Logger;

  constructor(options: HttpFetcherOptions = {}) {
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.maxRetries = options.maxRetries ?? 3;
    this.backoffBaseMs = options.backoffBaseMs ?? 500;
    this.maxJitterMs = options.maxJitterMs ?? 250;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger;
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<string> {
    const { signal } = options;

    if (!isHttpUrl(url)) {
      throw new FetchError('invalid_url', url, 0, `Invalid URL: ${url}`);
    }

    let attempt = 0;
    while (true) {
      if (signal?.aborted) {
        throw new FetchError('aborted', url, attempt, `Request to ${url} was aborted`);
      }

      try {
        return await this.requestOnce(url, attempt + 1, signal);
      } catch (error) {
        if (!(error instanceof FetchError) || attempt >= this.maxRetries || !this.isRetryable(error)) {
          throw error;
        }

        const waitMs = this.getRetryDelayMs(attempt);
        this.logger?.warn(
          { event: 'fetch_retry', url, attempt: attempt + 1, reason: error.reason, status: error.status, waitMs },
          'Retrying request',
        );
        await sleep(waitMs, signal);
        attempt += 1;
      }
    }
  }

  private async requestOnce(url: string, attempts: number, signal?: AbortSignal): Promise<string> {
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        redirect: 'follow',
        signal: controller.signal,
        headers: this.buildHeaders(),
      });

      if (!response.ok) {
        throw new FetchError('http_status', url, attempts, `Request to ${url} failed with status ${response.status}`, {
          status: response.status,
        });
      }

      return await response.text();
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }

      if (signal?.aborted) {
        throw new FetchError('aborted', url, attempts, `Request to ${url} was aborted`, { cause: error });
      }

      if (timedOut) {
        throw new FetchError('timeout', url, attempts, `Request to ${url} timed out after ${this.timeoutMs}ms`, {
          cause: error,
        });
      }

      const message = error instanceof Error ? error.message : String(error);
      throw new FetchError('network', url, attempts, `Request to ${url} failed: ${message}`, { cause: error });
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  private buildHeaders(): Record<string, string> {
    return {
      Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
      'Accept-Language': 'de-DE,de;q=0.9,en;q=0.8',
      'User-Agent': this.userAgent,
    };
  }

  private isRetryable(error: FetchError): boolean {
    if (error.reason === 'http_status') {
      return error.status !== undefined && error.status >= 500;
    }

    return error.reason === 'timeout' || error.reason === 'network';
  }

  private getRetryDelayMs(attempt: number): number {
    const jitter = Math.floor(Math.random() * this.maxJitterMs);
    return this.backoffBaseMs * 2 ** attempt + jitter;
  }
}
