/**
 * Contact Column Schema
 *
 * Explicit list of the spreadsheet columns the ingestion pipeline reads,
 * with per-column optionality. The LinkedIn column header is a fixed,
 * exact string taken from configuration (survey exports name it after the
 * question, e.g. "What is your LinkedIn profile?").
 */

import { DEFAULT_LINKEDIN_COLUMN } from '../config.js';
import type { RawRow } from './types.js';

export type ContactField = 'name' | 'email' | 'linkedinUrl' | 'firstName' | 'lastName';

export interface ColumnSpec {
  field: ContactField;
  /** Exact header text (compared after trimming) */
  header: string;
  required: boolean;
}

export type ContactSchema = readonly ColumnSpec[];

export function buildContactSchema(linkedinColumn: string = DEFAULT_LINKEDIN_COLUMN): ContactSchema {
  return [
    { field: 'name', header: 'name', required: true },
    { field: 'email', header: 'email', required: true },
    { field: 'linkedinUrl', header: linkedinColumn.trim(), required: true },
    { field: 'firstName', header: 'first_name', required: false },
    { field: 'lastName', header: 'last_name', required: false },
  ];
}

/** Headers of required columns that the file does not have, in schema order */
export function findMissingColumns(schema: ContactSchema, headers: readonly string[]): string[] {
  const present = new Set(headers);
  return schema
    .filter((column) => column.required && !present.has(column.header))
    .map((column) => column.header);
}

/**
 * Reads one field from a row, trimmed. A column the file lacks, or a cell
 * the row lacks, reads as the empty string.
 */
export function readField(row: RawRow, schema: ContactSchema, field: ContactField): string {
  const column = schema.find((c) => c.field === field);
  if (!column) {
    return '';
  }
  return (row[column.header] ?? '').trim();
}
