/**
 * Enrollment Target Configuration
 *
 * Credentials for the two downstream services. Every value is optional:
 * a target whose credentials are incomplete is treated as unconfigured and
 * fails closed on every dispatch without making a request.
 *
 * Environment variables:
 * - MAILCHIMP_API_KEY / MAILCHIMP_LIST_ID / MAILCHIMP_SERVER_PREFIX (e.g. "us21")
 * - PIPEDRIVE_API_KEY / PIPEDRIVE_DOMAIN (company subdomain, e.g. "acme")
 * - ENROLLMENT_TIMEOUT_MS: per-request timeout for both targets (default 10000)
 */

import 'dotenv/config';
import { intEnv, optionalEnv } from '../config.js';

export interface MailingListConfig {
  apiKey: string;
  listId: string;
  serverPrefix: string;
  timeoutMs: number;
}

export interface CrmConfig {
  apiKey: string;
  domain: string;
  timeoutMs: number;
}

export interface EnrollmentConfig {
  mailingList: MailingListConfig;
  crm: CrmConfig;
}

const timeoutMs = intEnv('ENROLLMENT_TIMEOUT_MS', 10_000);

export const enrollmentConfig: EnrollmentConfig = {
  mailingList: {
    apiKey: optionalEnv('MAILCHIMP_API_KEY'),
    listId: optionalEnv('MAILCHIMP_LIST_ID'),
    serverPrefix: optionalEnv('MAILCHIMP_SERVER_PREFIX'),
    timeoutMs,
  },
  crm: {
    apiKey: optionalEnv('PIPEDRIVE_API_KEY'),
    domain: optionalEnv('PIPEDRIVE_DOMAIN'),
    timeoutMs,
  },
};

/** Startup report of which targets will actually be called. */
export function logEnrollmentTargets(config: EnrollmentConfig = enrollmentConfig): void {
  const mailingList = Boolean(config.mailingList.apiKey && config.mailingList.listId && config.mailingList.serverPrefix);
  const crm = Boolean(config.crm.apiKey && config.crm.domain);

  console.log('[enrollment] Targets', {
    mailingList: mailingList ? 'configured' : 'not configured (fails closed)',
    crm: crm ? 'configured' : 'not configured (fails closed)',
  });
}
