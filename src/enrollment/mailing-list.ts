// ============================================================================
// Mailing List Gateway — Mailchimp audience member enrollment
// ============================================================================

import type { Contact } from '../contacts/types.js';
import { enrollmentConfig } from './config.js';
import type { MailingListConfig } from './config.js';
import { postEnrollment } from './http.js';
import type { EnrollmentGateway, EnrollmentOutcome } from './types.js';

export interface MailingListMember {
  email_address: string;
  status: 'subscribed';
  merge_fields: {
    FNAME: string;
    LNAME: string;
    LINKEDIN: string;
  };
}

/**
 * Merge-field names for a contact. The full name is split on whitespace:
 * first token → first name, the rest → last name. Explicit first/last name
 * columns override the split, except that a single-token name always has
 * an empty last name.
 */
export function splitContactName(contact: Contact): { firstName: string; lastName: string } {
  const [first = '', ...rest] = contact.name.split(/\s+/);
  return {
    firstName: contact.firstName ?? first,
    lastName: rest.length === 0 ? '' : (contact.lastName ?? rest.join(' ')),
  };
}

export function buildMailingListMember(contact: Contact): MailingListMember {
  const { firstName, lastName } = splitContactName(contact);
  return {
    email_address: contact.email,
    status: 'subscribed',
    merge_fields: {
      FNAME: firstName,
      LNAME: lastName,
      LINKEDIN: contact.linkedinUrl,
    },
  };
}

/**
 * Adds contacts to a Mailchimp audience via
 * POST https://{serverPrefix}.api.mailchimp.com/3.0/lists/{listId}/members.
 * 200 and 201 count as success.
 */
export function createMailingListGateway(
  config: MailingListConfig = enrollmentConfig.mailingList,
): EnrollmentGateway {
  const isConfigured = () => Boolean(config.apiKey && config.listId && config.serverPrefix);

  return {
    target: 'mailingList',
    isConfigured,
    async enroll(contact: Contact): Promise<EnrollmentOutcome> {
      if (!isConfigured()) {
        console.warn('[enrollment] Mailing list credentials not configured');
        return { ok: false, reason: 'not-configured' };
      }

      return postEnrollment({
        target: 'mailingList',
        url: `https://${config.serverPrefix}.api.mailchimp.com/3.0/lists/${encodeURIComponent(config.listId)}/members`,
        headers: { Authorization: `Bearer ${config.apiKey}` },
        body: buildMailingListMember(contact),
        timeoutMs: config.timeoutMs,
        successStatuses: [200, 201],
      });
    },
  };
}
