/**
 * Review Session Type Definitions
 *
 * A session is one CSV upload: its validated contacts (immutable once
 * created) plus the dispatch log, which records the latest enrollment
 * outcome per (contact index, target service).
 */

import type { Contact } from '../contacts/types.js';
import type { EnrollmentOutcome, TargetService } from '../enrollment/types.js';

export interface DispatchRecord {
  outcome: EnrollmentOutcome;
  /** ISO timestamp of when the outcome was recorded */
  dispatchedAt: string;
}

/** contact index → target → latest record */
export type DispatchLog = Map<number, Map<TargetService, DispatchRecord>>;

export interface ReviewSession {
  readonly sessionId: string;
  readonly contacts: readonly Contact[];
  readonly dispatchLog: DispatchLog;
  readonly createdAt: number;
  /** Epoch ms of the last read or write; drives idle expiry */
  lastAccessedAt: number;
}

/** Flat view of one dispatch log entry, as served by the API */
export interface DispatchLogEntry {
  contactIndex: number;
  target: TargetService;
  ok: boolean;
  outcome: EnrollmentOutcome;
  dispatchedAt: string;
}
