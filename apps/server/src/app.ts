import type { Logger } from 'pino';
import { DetailFetcher, HttpFetcher, JobSearchService, SearchEngine, SessionStore } from '@trawl/search';
import type { AppConfig } from './config.js';
import { getPortal } from './portals.js';

export interface App {
  service: JobSearchService;
  store: SessionStore;
}

/**
 * Wire the core components for the configured portal. One store per process.
 */
export function createApp(config: AppConfig, logger: Logger, fetchImpl?: typeof fetch): App {
  const portal = getPortal(config.portal);
  const fetcher = new HttpFetcher({
    userAgent: config.userAgent,
    timeoutMs: config.requestTimeoutMs,
    maxRetries: config.maxRetries,
    backoffBaseMs: config.retryBackoffMs,
    fetchImpl,
    logger: logger.child({ component: 'fetcher' }),
  });
  const store = new SessionStore({ ttlMs: config.sessionTtlMs, logger: logger.child({ component: 'sessions' }) });
  const service = new JobSearchService({
    portal,
    engine: new SearchEngine({
      portal,
      fetcher,
      concurrency: config.searchConcurrency,
      timeoutMs: config.searchTimeoutMs,
      logger: logger.child({ component: 'engine' }),
    }),
    store,
    details: new DetailFetcher({ portal, fetcher, logger: logger.child({ component: 'details' }) }),
    logger,
  });

  return { service, store };
}
