// ============================================================================
// Ingestion Error Types
// ============================================================================

import type { RowRejection } from '../contacts/types.js';

export type IngestErrorKind =
  /** Parsed fine, but no row survived validation */
  | 'empty'
  /** Payload could not be read as tabular data */
  | 'malformed-file'
  /** Header row lacks one or more required columns */
  | 'missing-columns';

/**
 * Raised by ingestCsv when no session can be created from an upload.
 * Carries the missing headers or the per-row rejections where relevant.
 */
export class IngestError extends Error {
  readonly kind: IngestErrorKind;
  readonly missingColumns: string[];
  readonly rejectedRows: RowRejection[];

  constructor(
    kind: IngestErrorKind,
    message: string,
    details: { missingColumns?: string[]; rejectedRows?: RowRejection[] } = {},
  ) {
    super(message);
    this.name = 'IngestError';
    this.kind = kind;
    this.missingColumns = details.missingColumns ?? [];
    this.rejectedRows = details.rejectedRows ?? [];
  }
}
