import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { JobListing, SearchLocation } from '@trawl/parser-sdk';
import {
  IndexOutOfRangeError,
  MissingSelectorError,
  NoMatchError,
  NotFoundError,
  SessionExpiredError,
} from './errors.js';
import { bestMatch } from './match.js';
import type { ListingSelector, ResolvedListing, Session, SessionSummary, TermResult } from './types.js';

export const DEFAULT_SESSION_TTL_MS = 60 * 60 * 1000;
const DEFAULT_MAX_TOMBSTONES = 1000;

export interface SessionStoreOptions {
  logger: Logger;
  ttlMs?: number;
  maxTombstones?: number;
  now?: () => number;
  generateId?: () => string;
}

export interface CreateSessionOptions {
  location?: SearchLocation;
}

interface FlatEntry {
  term: string;
  listing: JobListing;
}

function flatten(session: Session): FlatEntry[] {
  return session.terms.flatMap((result) =>
    result.listings.map((listing) => ({ term: result.term, listing: { ...listing } })),
  );
}

/**
 * In-memory registry of recent searches. All methods are synchronous, so each
 * call runs to completion on the event loop without interleaving.
 */
export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  // Ids of sessions removed on expiry, oldest first.
  private readonly tombstones = new Set<string>();
  private readonly logger: Logger;
  private readonly ttlMs: number;
  private readonly maxTombstones: number;
  private readonly now: () => number;
  private readonly generateId: () => string;
  private sweeper?: NodeJS.Timeout;

  constructor(options: SessionStoreOptions) {
    this.logger = options.logger;
    this.ttlMs = options.ttlMs ?? DEFAULT_SESSION_TTL_MS;
    this.maxTombstones = options.maxTombstones ?? DEFAULT_MAX_TOMBSTONES;
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? randomUUID;
  }

  create(terms: TermResult[], options: CreateSessionOptions = {}): string {
    let id = this.generateId();
    while (this.sessions.has(id) || this.tombstones.has(id)) {
      id = this.generateId();
    }

    const createdAt = this.now();
    const session: Session = {
      id,
      createdAt,
      expiresAt: createdAt + this.ttlMs,
      // Callers keep the results they passed in; the session holds its own copy.
      terms: terms.map((result) => ({ ...result, listings: result.listings.map((listing) => ({ ...listing })) })),
      location: options.location,
    };
    this.sessions.set(id, session);

    this.logger.info(
      {
        event: 'session_created',
        sessionId: id,
        terms: terms.map((result) => result.term),
        totalCount: flatten(session).length,
      },
      'Search session created',
    );

    return id;
  }

  /**
   * Id of the newest active session. Later insertion wins a createdAt tie.
   */
  getLatest(): string {
    let latest: Session | undefined;

    for (const session of this.sessions.values()) {
      if (this.isExpired(session)) continue;
      if (!latest || session.createdAt >= latest.createdAt) {
        latest = session;
      }
    }

    if (!latest) {
      throw new NotFoundError('No active search session, run a search first');
    }

    return latest.id;
  }

  resolve(selector: ListingSelector): ResolvedListing {
    const requestedId = selector.sessionId?.trim();
    const session = this.requireActive(requestedId || this.getLatest());
    const entries = flatten(session);

    if (selector.index !== undefined) {
      const { index } = selector;
      const entry = Number.isInteger(index) ? entries[index - 1] : undefined;
      if (index < 1 || !entry) {
        throw new IndexOutOfRangeError(session.id, index, entries.length);
      }

      return { sessionId: session.id, position: index, term: entry.term, listing: entry.listing };
    }

    const query = selector.query?.trim();
    if (query) {
      const match = bestMatch(
        query,
        entries.map((entry) => entry.listing),
      );
      const entry = match ? entries[match.index] : undefined;
      if (!match || !entry) {
        throw new NoMatchError(session.id, query);
      }

      return { sessionId: session.id, position: match.index + 1, term: entry.term, listing: entry.listing };
    }

    throw new MissingSelectorError(session.id);
  }

  summarize(sessionId: string): SessionSummary {
    return this.toSummary(this.requireActive(sessionId));
  }

  /**
   * Summaries of active sessions, newest first.
   */
  list(): SessionSummary[] {
    return [...this.sessions.values()]
      .filter((session) => !this.isExpired(session))
      .reverse()
      .sort((a, b) => b.createdAt - a.createdAt)
      .map((session) => this.toSummary(session));
  }

  /**
   * Remove every expired session. Returns how many were removed.
   */
  sweep(): number {
    let removed = 0;

    for (const session of [...this.sessions.values()]) {
      if (this.isExpired(session)) {
        this.evict(session.id);
        removed += 1;
      }
    }

    if (removed > 0) {
      this.logger.info({ event: 'sessions_swept', removed, active: this.sessions.size }, 'Expired sessions swept');
    }

    return removed;
  }

  startSweeper(intervalMs: number): void {
    this.stop();
    this.sweeper = setInterval(() => this.sweep(), intervalMs);
    this.sweeper.unref();
  }

  stop(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = undefined;
    }
  }

  get size(): number {
    return this.sessions.size;
  }

  private requireActive(sessionId: string): Session {
    const session = this.sessions.get(sessionId);

    if (!session) {
      if (this.tombstones.has(sessionId)) {
        throw new SessionExpiredError(sessionId);
      }
      throw new NotFoundError(`Search session ${sessionId} not found`, { sessionId });
    }

    if (this.isExpired(session)) {
      this.evict(sessionId);
      throw new SessionExpiredError(sessionId);
    }

    return session;
  }

  private isExpired(session: Session): boolean {
    return this.now() > session.expiresAt;
  }

  private evict(sessionId: string): void {
    this.sessions.delete(sessionId);
    this.tombstones.add(sessionId);

    while (this.tombstones.size > this.maxTombstones) {
      const oldest = this.tombstones.values().next();
      if (oldest.done) break;
      this.tombstones.delete(oldest.value);
    }
  }

  private toSummary(session: Session): SessionSummary {
    return {
      id: session.id,
      terms: session.terms.map((result) => result.term),
      location: session.location,
      totalCount: flatten(session).length,
      createdAt: session.createdAt,
      expiresAt: session.expiresAt,
    };
  }
}
