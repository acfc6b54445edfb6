// ============================================================================
// CRM Gateway — Pipedrive person creation
// ============================================================================

import type { Contact } from '../contacts/types.js';
import { enrollmentConfig } from './config.js';
import type { CrmConfig } from './config.js';
import { postEnrollment } from './http.js';
import type { EnrollmentGateway, EnrollmentOutcome } from './types.js';

export interface CrmPerson {
  name: string;
  email: Array<{ value: string; primary: boolean; label: string }>;
  linkedin: string;
}

export function buildCrmPerson(contact: Contact): CrmPerson {
  return {
    name: contact.name,
    email: [{ value: contact.email, primary: true, label: 'work' }],
    linkedin: contact.linkedinUrl,
  };
}

/**
 * Creates a person via POST https://{domain}.pipedrive.com/api/v1/persons.
 * Only 201 Created counts as success. The API token travels as the
 * `api_token` query parameter, so the URL is never logged.
 */
export function createCrmGateway(config: CrmConfig = enrollmentConfig.crm): EnrollmentGateway {
  const isConfigured = () => Boolean(config.apiKey && config.domain);

  return {
    target: 'crm',
    isConfigured,
    async enroll(contact: Contact): Promise<EnrollmentOutcome> {
      if (!isConfigured()) {
        console.warn('[enrollment] CRM credentials not configured');
        return { ok: false, reason: 'not-configured' };
      }

      const url = new URL(`https://${config.domain}.pipedrive.com/api/v1/persons`);
      url.searchParams.set('api_token', config.apiKey);

      return postEnrollment({
        target: 'crm',
        url: url.toString(),
        body: buildCrmPerson(contact),
        timeoutMs: config.timeoutMs,
        successStatuses: [201],
      });
    },
  };
}
