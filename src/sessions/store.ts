/**
 * Contact Store — Process-wide Review Session Registry
 *
 * Maps a session id to its validated contacts and dispatch log. Sessions
 * live in memory only and are evicted by:
 * - idle expiry: a session untouched for `ttlMs` is dropped (0 = never)
 * - capacity: creating a session when `maxCount` are live drops the least
 *   recently used one (0 = unbounded)
 *
 * Expiry is applied lazily on lookup and on every create; there is no
 * background timer.
 *
 * Concurrency: every method here is synchronous, so on Node's single event
 * loop a session insert or dispatch-log write always completes before any
 * other request observes the store. Callers must not hold anything across
 * an await and then write based on a stale read; the Review Service records
 * each outcome with a single recordOutcome call after its gateway call
 * returns.
 */

import { randomUUID } from 'node:crypto';
import { appConfig } from '../config.js';
import type { Contact } from '../contacts/types.js';
import type { EnrollmentOutcome, TargetService } from '../enrollment/types.js';
import type { DispatchLogEntry, ReviewSession } from './types.js';

export interface ContactStoreOptions {
  ttlMs: number;
  maxCount: number;
  /** Clock override for tests */
  now?: () => number;
}

export class ContactStore {
  // Map iteration order doubles as LRU order: touched sessions are re-inserted at the end
  private readonly sessions = new Map<string, ReviewSession>();
  private readonly ttlMs: number;
  private readonly maxCount: number;
  private readonly now: () => number;

  constructor(options: ContactStoreOptions) {
    this.ttlMs = options.ttlMs;
    this.maxCount = options.maxCount;
    this.now = options.now ?? Date.now;
  }

  /** Number of live sessions (expired ones are swept first) */
  count(): number {
    this.evictExpired();
    return this.sessions.size;
  }

  create(contacts: readonly Contact[]): ReviewSession {
    if (contacts.length === 0) {
      throw new Error('Cannot create a review session without contacts');
    }

    this.evictExpired();
    while (this.maxCount > 0 && this.sessions.size >= this.maxCount) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) break;
      this.sessions.delete(oldest.value);
      console.log('[sessions] Evicted', { sessionId: oldest.value, reason: 'capacity' });
    }

    const now = this.now();
    const session: ReviewSession = {
      sessionId: randomUUID(),
      contacts: Object.freeze(contacts.map((contact) => Object.freeze({ ...contact }))),
      dispatchLog: new Map(),
      createdAt: now,
      lastAccessedAt: now,
    };

    this.sessions.set(session.sessionId, session);
    console.log('[sessions] Created', {
      sessionId: session.sessionId,
      totalContacts: session.contacts.length,
      liveSessions: this.sessions.size,
    });

    return session;
  }

  get(sessionId: string): ReviewSession | undefined {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return undefined;
    }

    const now = this.now();
    if (this.isExpired(session, now)) {
      this.sessions.delete(sessionId);
      console.log('[sessions] Evicted', { sessionId, reason: 'expired' });
      return undefined;
    }

    session.lastAccessedAt = now;
    this.sessions.delete(sessionId);
    this.sessions.set(sessionId, session);
    return session;
  }

  /** Undefined for an unknown session or an index outside [0, totalContacts) */
  getContact(sessionId: string, index: number): Contact | undefined {
    const session = this.get(sessionId);
    if (!session || !isValidIndex(index, session.contacts.length)) {
      return undefined;
    }
    return session.contacts[index];
  }

  /**
   * Records the outcome of one dispatch, replacing any earlier record for
   * the same (index, target). Other targets of the contact are untouched.
   *
   * @returns false if the session is gone or the index is out of range
   */
  recordOutcome(
    sessionId: string,
    index: number,
    target: TargetService,
    outcome: EnrollmentOutcome,
  ): boolean {
    const session = this.get(sessionId);
    if (!session || !isValidIndex(index, session.contacts.length)) {
      return false;
    }

    let perTarget = session.dispatchLog.get(index);
    if (!perTarget) {
      perTarget = new Map();
      session.dispatchLog.set(index, perTarget);
    }
    perTarget.set(target, {
      outcome,
      dispatchedAt: new Date(this.now()).toISOString(),
    });

    return true;
  }

  /** Flattened dispatch log sorted by contact index, then target name */
  listDispatchLog(sessionId: string): DispatchLogEntry[] | undefined {
    const session = this.get(sessionId);
    if (!session) {
      return undefined;
    }

    const entries: DispatchLogEntry[] = [];
    for (const [contactIndex, perTarget] of session.dispatchLog) {
      for (const [target, record] of perTarget) {
        entries.push({
          contactIndex,
          target,
          ok: record.outcome.ok,
          outcome: record.outcome,
          dispatchedAt: record.dispatchedAt,
        });
      }
    }

    return entries.sort(
      (a, b) => a.contactIndex - b.contactIndex || a.target.localeCompare(b.target),
    );
  }

  /** Drops every idle-expired session; returns how many were dropped */
  evictExpired(): number {
    if (this.ttlMs <= 0) {
      return 0;
    }

    const now = this.now();
    let evicted = 0;
    for (const [sessionId, session] of this.sessions) {
      if (this.isExpired(session, now)) {
        this.sessions.delete(sessionId);
        evicted++;
      }
    }

    if (evicted > 0) {
      console.log('[sessions] Evicted expired sessions', { count: evicted });
    }
    return evicted;
  }

  clear(): void {
    this.sessions.clear();
  }

  private isExpired(session: ReviewSession, now: number): boolean {
    return this.ttlMs > 0 && now - session.lastAccessedAt >= this.ttlMs;
  }
}

function isValidIndex(index: number, length: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < length;
}

// Lazy singleton — created on first use with the configured eviction policy
let _store: ContactStore | null = null;

/** The process-wide session registry used by the HTTP API */
export function getContactStore(): ContactStore {
  if (!_store) {
    _store = new ContactStore({
      ttlMs: appConfig.sessions.ttlMs,
      maxCount: appConfig.sessions.maxCount,
    });
  }
  return _store;
}
