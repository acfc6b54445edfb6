/**
 * Contact Row Validator
 *
 * Pure functions that turn a raw spreadsheet row into a Contact or a
 * rejection reason. Checks run in a fixed order and the first failure is
 * the reported reason; every check is mandatory, so the order only affects
 * diagnostics.
 *
 * The LinkedIn URL is normalized before it is checked:
 *   "  linkedin.com/in/ann?trk=1 " → "https://linkedin.com/in/ann"
 */

import { readField } from './schema.js';
import type { ContactSchema } from './schema.js';
import type { Contact, RawRow, RowClassification } from './types.js';

/** Syntactic check only: local@domain.tld, TLD of two or more letters */
export const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

const LINKEDIN_HOST_MARKER = 'linkedin.com';

export function isValidEmail(email: string): boolean {
  return EMAIL_PATTERN.test(email);
}

/**
 * Normalizes a LinkedIn profile URL.
 *
 * - Surrounding whitespace is trimmed
 * - Everything from the first "?" on is dropped (tracking parameters)
 * - "https://" is prepended unless the value already starts with "http" (any case)
 *
 * An empty input (or one that is only a query string) yields "".
 * Idempotent: normalizeLinkedinUrl(normalizeLinkedinUrl(x)) === normalizeLinkedinUrl(x).
 */
export function normalizeLinkedinUrl(raw: string): string {
  let url = raw.trim();

  const queryStart = url.indexOf('?');
  if (queryStart !== -1) {
    url = url.slice(0, queryStart).trim();
  }

  if (url === '') {
    return '';
  }

  return /^http/i.test(url) ? url : `https://${url}`;
}

export function isLinkedinUrl(url: string): boolean {
  return url.toLowerCase().includes(LINKEDIN_HOST_MARKER);
}

function isParseableUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}

/**
 * Classifies one row. Deterministic and side-effect free.
 */
export function classifyRow(row: RawRow, schema: ContactSchema): RowClassification {
  const name = readField(row, schema, 'name');
  const email = readField(row, schema, 'email');
  const linkedinUrl = normalizeLinkedinUrl(readField(row, schema, 'linkedinUrl'));

  if (!name) {
    return { ok: false, reason: 'missing-name' };
  }
  if (!email) {
    return { ok: false, reason: 'missing-email' };
  }
  if (!linkedinUrl || !isParseableUrl(linkedinUrl)) {
    return { ok: false, reason: 'missing-linkedin-url' };
  }
  if (!isValidEmail(email)) {
    return { ok: false, reason: 'invalid-email' };
  }
  if (!isLinkedinUrl(linkedinUrl)) {
    return { ok: false, reason: 'not-linkedin-url' };
  }

  const firstName = readField(row, schema, 'firstName');
  const lastName = readField(row, schema, 'lastName');

  const contact: Contact = {
    name,
    email,
    linkedinUrl,
    ...(firstName ? { firstName } : {}),
    ...(lastName ? { lastName } : {}),
  };

  return { ok: true, contact };
}
