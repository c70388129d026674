/**
 * CSV reader
 * Parses delimited text into raw rows keyed by header name
 */

import { parse } from 'csv-parse/sync';
import type { RawRow } from '@snapdelta/core';
import { SnapdeltaError } from '@snapdelta/core';
import { assertSafeHeaders, headerName } from './headers.js';

export interface CsvReadOptions {
  /** CSV delimiter (default: ',') */
  delimiter?: string;
  /** Quote character (default: '"') */
  quote?: string;
  /** Lines to skip before the header row (default: 0) */
  skipRows?: number;
  /** Whether the first row contains headers (default: true) */
  headers?: boolean;
}

function asCells(row: unknown): unknown[] {
  return Array.isArray(row) ? row : [];
}

export function readCsvRows(content: string | Buffer, options: CsvReadOptions = {}): RawRow[] {
  let parsed: unknown;
  try {
    parsed = parse(content, {
      columns: false, // Parse rows first so we can safely map headers ourselves
      delimiter: options.delimiter ?? ',',
      quote: options.quote ?? '"',
      from_line: (options.skipRows ?? 0) + 1,
      skip_empty_lines: true,
      relax_column_count: true,
      bom: true,
      trim: true,
    });
  } catch (err) {
    throw new SnapdeltaError({
      code: 'SCHEMA_MISMATCH',
      message: `Unreadable CSV payload: ${err instanceof Error ? err.message : String(err)}`,
      suggestion: 'Check the delimiter and quote settings of the source.',
      cause: err instanceof Error ? err : undefined,
    });
  }

  const rows = Array.isArray(parsed) ? parsed.map(asCells) : [];
  if (rows.length === 0) return [];

  const hasHeaders = options.headers !== false;
  let headers: string[];
  if (hasHeaders) {
    headers = asCells(rows[0]).map((h, i) => String(h ?? '') || headerName(i));
  } else {
    const width = rows.reduce((w, r) => Math.max(w, r.length), 0);
    headers = Array.from({ length: width }, (_, i) => headerName(i));
  }

  assertSafeHeaders(headers, 'CSV');

  const dataRows = hasHeaders ? rows.slice(1) : rows;
  return dataRows.map((cells) => {
    const row: RawRow = {};
    headers.forEach((header, i) => {
      row[header] = cells[i];
    });
    return row;
  });
}
