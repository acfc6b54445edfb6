/**
 * Contact Type Definitions
 *
 * A Contact only exists once a spreadsheet row has passed validation and
 * normalization. Rows that fail are reported as a RejectionReason instead.
 */

/** One validated, normalized contact row */
export interface Contact {
  name: string;
  email: string;
  /** Always contains "linkedin.com", starts with http(s), no query string */
  linkedinUrl: string;
  firstName?: string;
  lastName?: string;
}

/** A data row keyed by header name, as produced by the CSV reader */
export type RawRow = Readonly<Record<string, string | undefined>>;

/** Why a row was dropped, in the order the checks run */
export const REJECTION_REASONS = [
  'missing-name',
  'missing-email',
  'missing-linkedin-url',
  'invalid-email',
  'not-linkedin-url',
] as const;

export type RejectionReason = typeof REJECTION_REASONS[number];

export type RowClassification =
  | { ok: true; contact: Contact }
  | { ok: false; reason: RejectionReason };

/** A dropped row, reported back to the uploader */
export interface RowRejection {
  /** 1-based data row number (header row excluded, blank lines skipped) */
  row: number;
  reason: RejectionReason;
}
