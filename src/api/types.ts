/**
 * HTTP API Type Definitions
 *
 * Request and response bodies of the review API. Shared by the Express
 * handlers and the review bot's API client.
 */

import type { Contact, RowRejection } from '../contacts/types.js';
import type { EnrollmentOutcome, TargetService } from '../enrollment/types.js';
import type { DispatchLogEntry } from '../sessions/types.js';

/** 200 response of POST /upload-csv */
export interface UploadCsvResponse {
  sessionId: string;
  totalContacts: number;
  /** First few contacts only */
  contacts: Contact[];
  rejectedRows: RowRejection[];
}

/** Body of POST /review-contact */
export interface ReviewContactBody {
  sessionId: string;
  contactIndex: number;
  addToMailingList?: boolean;
  addToCrm?: boolean;
}

/** 200 response of POST /review-contact */
export interface ReviewContactResponse {
  contact: Contact;
  /** true = enrolled; false = failed for any reason */
  results: Partial<Record<TargetService, boolean>>;
  outcomes: Partial<Record<TargetService, EnrollmentOutcome>>;
  processed: true;
}

/** 200 response of GET /contacts/:sessionId */
export interface SessionContactsResponse {
  sessionId: string;
  totalContacts: number;
  contacts: Contact[];
}

/** 200 response of GET /sessions/:sessionId/dispatch-log */
export interface DispatchLogResponse {
  sessionId: string;
  entries: DispatchLogEntry[];
}

/** Body of every 4xx/5xx response */
export interface ErrorResponse {
  error: string;
  [detail: string]: unknown;
}
