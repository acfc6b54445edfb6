// ============================================================================
// Session Error Types
// ============================================================================

/** Thrown when a session id is unknown, or the session has been evicted. */
export class SessionNotFoundError extends Error {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super('Review session not found');
    this.name = 'SessionNotFoundError';
    this.sessionId = sessionId;
  }
}

/** Thrown when a contact index falls outside [0, totalContacts). */
export class ContactIndexError extends Error {
  readonly contactIndex: number;
  readonly totalContacts: number;

  constructor(contactIndex: number, totalContacts: number) {
    super(`Invalid contact index ${contactIndex} (session has ${totalContacts} contacts)`);
    this.name = 'ContactIndexError';
    this.contactIndex = contactIndex;
    this.totalContacts = totalContacts;
  }
}
