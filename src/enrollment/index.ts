// ============================================================================
// Enrollment Module — Barrel Export
// ============================================================================

import { enrollmentConfig } from './config.js';
import type { EnrollmentConfig } from './config.js';
import { createCrmGateway } from './crm.js';
import { createMailingListGateway } from './mailing-list.js';
import type { EnrollmentGateways } from './types.js';

export type {
  TargetService,
  EnrollmentOutcome,
  EnrollmentFailureReason,
  EnrollmentGateway,
  EnrollmentGateways,
} from './types.js';
export { TARGET_SERVICES } from './types.js';

export { enrollmentConfig, logEnrollmentTargets } from './config.js';
export type { EnrollmentConfig, MailingListConfig, CrmConfig } from './config.js';

export { createMailingListGateway, buildMailingListMember, splitContactName } from './mailing-list.js';
export { createCrmGateway, buildCrmPerson } from './crm.js';

/** One gateway per target service, built from the given credentials */
export function createEnrollmentGateways(config: EnrollmentConfig = enrollmentConfig): EnrollmentGateways {
  return {
    mailingList: createMailingListGateway(config.mailingList),
    crm: createCrmGateway(config.crm),
  };
}
