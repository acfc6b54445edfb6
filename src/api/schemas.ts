/**
 * Request Body Schemas
 *
 * Zod schemas for JSON request bodies. Multipart uploads are validated in
 * the handler (multer owns that body).
 */

import { z } from 'zod';

export const ReviewContactBodySchema = z.object({
  sessionId: z.string(),
  contactIndex: z.number().int(),
  addToMailingList: z.boolean().default(false),
  addToCrm: z.boolean().default(false),
});

/** "path: message" per issue, for the 400 response body */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}
