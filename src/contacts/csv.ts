/**
 * CSV Reader
 *
 * Parses an uploaded payload into a header list and header-keyed rows using
 * csv-parser. Structural problems (nothing to parse, binary content, an
 * unterminated quote, duplicate headers, rows wider than the header) raise
 * MalformedCsvError; rows that are merely short read their missing cells as
 * absent.
 *
 * Blank lines are skipped, including any before the header row, and do not
 * count as data rows.
 */

import csv from 'csv-parser';
import { Readable } from 'node:stream';
import type { RawRow } from './types.js';

export interface ParsedCsv {
  headers: string[];
  rows: RawRow[];
}

export class MalformedCsvError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedCsvError';
  }
}

/** Trimmed header text; blank headers get a positional placeholder */
function cleanHeader(header: string, index: number): string {
  const cleaned = header.replace(/^\uFEFF/, '').trim();
  return cleaned === '' ? `column_${index + 1}` : cleaned;
}

/** BOM, then any run of blank or whitespace-only lines */
const LEADING_BLANK_LINES = /^\uFEFF?(?:[ \t]*\r?\n)*/;

function isBlankRow(row: Record<string, string>): boolean {
  return Object.values(row).every((value) => value.trim() === '');
}

export async function parseCsv(bytes: Buffer): Promise<ParsedCsv> {
  if (bytes.length === 0) {
    throw new MalformedCsvError('File is empty');
  }
  // NUL never appears in text CSV; spreadsheets saved as .xlsx/.xls do contain it
  if (bytes.includes(0)) {
    throw new MalformedCsvError('File is not a text CSV (binary content detected)');
  }

  const text = bytes.toString('utf-8').replace(LEADING_BLANK_LINES, '');
  if (text.trim() === '') {
    throw new MalformedCsvError('No header row found');
  }
  // Quotes come in pairs ("" escapes count twice); an odd count leaves a field open at EOF
  if ((text.match(/"/g) ?? []).length % 2 === 1) {
    throw new MalformedCsvError('Unterminated quoted field');
  }

  const { headers, records } = await readRecords(Buffer.from(text, 'utf-8'));

  if (headers.length === 0) {
    throw new MalformedCsvError('No header row found');
  }

  const duplicates = headers.filter((header, index) => headers.indexOf(header) !== index);
  if (duplicates.length > 0) {
    throw new MalformedCsvError(`Duplicate column headers: ${[...new Set(duplicates)].join(', ')}`);
  }

  const known = new Set(headers);
  const rows: RawRow[] = [];

  for (const [index, record] of records.entries()) {
    if (isBlankRow(record)) {
      continue;
    }
    // csv-parser names cells beyond the header "_<index>"
    if (Object.keys(record).some((key) => !known.has(key))) {
      throw new MalformedCsvError(
        `Data row ${index + 1} has more fields than the header row (${headers.length})`,
      );
    }
    rows.push(record);
  }

  return { headers, rows };
}

function readRecords(bytes: Buffer): Promise<{ headers: string[]; records: Record<string, string>[] }> {
  return new Promise((resolve, reject) => {
    let headers: string[] = [];
    const records: Record<string, string>[] = [];

    Readable.from([bytes])
      .pipe(csv({ mapHeaders: ({ header, index }) => cleanHeader(header, index) }))
      .on('headers', (list: string[]) => {
        headers = list;
      })
      .on('data', (record: Record<string, string>) => {
        records.push(record);
      })
      .on('end', () => {
        resolve({ headers, records });
      })
      .on('error', (error: Error) => {
        reject(new MalformedCsvError(`CSV parsing failed: ${error.message}`));
      });
  });
}
