/**
 * Enrollment Type Definitions
 *
 * Contract between the Review Service and the per-target adapters. Adapters
 * never throw: every attempt ends in an EnrollmentOutcome, whose `ok` flag is
 * the boolean the API has always reported per target.
 */

import type { Contact } from '../contacts/types.js';

/** The downstream services a contact can be enrolled into */
export const TARGET_SERVICES = ['mailingList', 'crm'] as const;

export type TargetService = typeof TARGET_SERVICES[number];

export type EnrollmentFailureReason =
  /** Credentials absent; no request was made */
  | 'not-configured'
  /** Remote service answered with a non-success status */
  | 'rejected'
  /** Request never completed (DNS, connection reset, TLS, ...) */
  | 'network-error'
  /** No answer within the configured timeout */
  | 'timeout';

export type EnrollmentOutcome =
  | { ok: true; status: number }
  | { ok: false; reason: EnrollmentFailureReason; status?: number };

export interface EnrollmentGateway {
  readonly target: TargetService;
  isConfigured(): boolean;
  enroll(contact: Contact): Promise<EnrollmentOutcome>;
}

export type EnrollmentGateways = Readonly<Record<TargetService, EnrollmentGateway>>;
