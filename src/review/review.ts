/**
 * Review Service
 *
 * Dispatches one reviewed contact to the requested target services and
 * records each outcome in the session's dispatch log.
 *
 * Per (contact, target) the state moves UNSEEN → DISPATCHED_OK or
 * DISPATCHED_FAILED in a single call; there is no externally visible
 * pending state. Targets are independent: they are dispatched concurrently
 * and a failure of one does not affect the other.
 *
 * Re-reviewing a contact re-dispatches every requested target and
 * overwrites that target's record. Targets not requested keep their
 * earlier record. Nothing prevents a duplicate remote enrollment; callers
 * that care can read the dispatch log first.
 *
 * Two concurrent reviews of the same (session, index, target) both reach
 * the remote service; whichever finishes last owns the log entry.
 */

import type { Contact } from '../contacts/types.js';
import { TARGET_SERVICES } from '../enrollment/types.js';
import type { EnrollmentGateways, EnrollmentOutcome, TargetService } from '../enrollment/types.js';
import { ContactIndexError, SessionNotFoundError } from '../sessions/errors.js';
import type { ContactStore } from '../sessions/store.js';

export interface ReviewRequest {
  sessionId: string;
  contactIndex: number;
  targets: readonly TargetService[];
}

export type TargetOutcomes = Partial<Record<TargetService, EnrollmentOutcome>>;

export interface ReviewResult {
  contact: Contact;
  outcomes: TargetOutcomes;
}

/**
 * @throws SessionNotFoundError - unknown or evicted session
 * @throws ContactIndexError - index outside [0, totalContacts); nothing is dispatched
 */
export async function reviewContact(
  request: ReviewRequest,
  store: ContactStore,
  gateways: EnrollmentGateways,
): Promise<ReviewResult> {
  const session = store.get(request.sessionId);
  if (!session) {
    throw new SessionNotFoundError(request.sessionId);
  }

  const contact = store.getContact(request.sessionId, request.contactIndex);
  if (!contact) {
    throw new ContactIndexError(request.contactIndex, session.contacts.length);
  }

  const targets = TARGET_SERVICES.filter((target) => request.targets.includes(target));

  const dispatched = await Promise.all(
    targets.map(async (target) => {
      const outcome = await gateways[target].enroll(contact);

      const recorded = store.recordOutcome(request.sessionId, request.contactIndex, target, outcome);
      if (!recorded) {
        console.warn('[review] Session evicted before outcome was recorded', {
          sessionId: request.sessionId,
          contactIndex: request.contactIndex,
          target,
        });
      }

      return { target, outcome };
    }),
  );

  const outcomes: TargetOutcomes = {};
  for (const { target, outcome } of dispatched) {
    outcomes[target] = outcome;
  }

  console.log('[review] Contact reviewed', {
    sessionId: request.sessionId,
    contactIndex: request.contactIndex,
    results: toBooleanResults(outcomes),
  });

  return { contact, outcomes };
}

/** Boolean projection of structured outcomes: true only for a confirmed enrollment */
export function toBooleanResults(outcomes: TargetOutcomes): Partial<Record<TargetService, boolean>> {
  const results: Partial<Record<TargetService, boolean>> = {};
  for (const target of TARGET_SERVICES) {
    const outcome = outcomes[target];
    if (outcome) {
      results[target] = outcome.ok;
    }
  }
  return results;
}
