/**
 * Ingestion Service
 *
 * Turns an uploaded CSV into a review session:
 * 1. Parse the payload (structural failure → IngestError 'malformed-file')
 * 2. Check the header row against the contact schema ('missing-columns')
 * 3. Classify every data row; rejected rows are dropped and reported
 * 4. Zero survivors → IngestError 'empty', no session is created
 * 5. Otherwise store the contacts and return the id plus a short preview
 */

import { appConfig } from '../config.js';
import { parseCsv, MalformedCsvError } from '../contacts/csv.js';
import type { ParsedCsv } from '../contacts/csv.js';
import { buildContactSchema, findMissingColumns } from '../contacts/schema.js';
import type { ContactSchema } from '../contacts/schema.js';
import { classifyRow } from '../contacts/validator.js';
import type { Contact, RejectionReason, RowRejection } from '../contacts/types.js';
import type { ContactStore } from '../sessions/store.js';
import { IngestError } from './errors.js';

/** Contacts returned inline with a successful upload */
export const PREVIEW_SIZE = 5;

export interface IngestResult {
  sessionId: string;
  totalContacts: number;
  previewContacts: Contact[];
  rejectedRows: RowRejection[];
}

export async function ingestCsv(
  bytes: Buffer,
  store: ContactStore,
  schema: ContactSchema = buildContactSchema(appConfig.csv.linkedinColumn),
): Promise<IngestResult> {
  let parsed: ParsedCsv;
  try {
    parsed = await parseCsv(bytes);
  } catch (error) {
    if (error instanceof MalformedCsvError) {
      throw new IngestError('malformed-file', error.message);
    }
    throw error;
  }

  const missingColumns = findMissingColumns(schema, parsed.headers);
  if (missingColumns.length > 0) {
    throw new IngestError(
      'missing-columns',
      `CSV is missing required columns: ${missingColumns.join(', ')}`,
      { missingColumns },
    );
  }

  const contacts: Contact[] = [];
  const rejectedRows: RowRejection[] = [];

  parsed.rows.forEach((row, index) => {
    const result = classifyRow(row, schema);
    if (result.ok) {
      contacts.push(result.contact);
    } else {
      rejectedRows.push({ row: index + 1, reason: result.reason });
    }
  });

  console.log('[ingest] Classified rows', {
    totalRows: parsed.rows.length,
    accepted: contacts.length,
    rejected: summarizeRejections(rejectedRows),
  });

  if (contacts.length === 0) {
    throw new IngestError('empty', 'No valid contacts found in CSV', { rejectedRows });
  }

  const session = store.create(contacts);

  return {
    sessionId: session.sessionId,
    totalContacts: session.contacts.length,
    previewContacts: session.contacts.slice(0, PREVIEW_SIZE),
    rejectedRows,
  };
}

function summarizeRejections(rejections: RowRejection[]): Partial<Record<RejectionReason, number>> {
  const counts: Partial<Record<RejectionReason, number>> = {};
  for (const { reason } of rejections) {
    counts[reason] = (counts[reason] ?? 0) + 1;
  }
  return counts;
}
