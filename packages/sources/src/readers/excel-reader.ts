/**
 * Excel reader
 * Reads the rows of one worksheet of an .xlsx workbook
 */

import { Readable } from 'stream';
import ExcelJS from 'exceljs';
import type { RawRow } from '@snapdelta/core';
import { SnapdeltaError } from '@snapdelta/core';
import { assertSafeHeaders, headerName } from './headers.js';

export interface ExcelReadOptions {
  /** Sheet name or 1-based index (default: first sheet) */
  sheet?: string | number;
  /** Row holding the headers, 1-indexed (default: 1) */
  startRow?: number;
  /** Whether the start row contains headers (default: true) */
  headers?: boolean;
}

function cellValue(value: ExcelJS.CellValue): unknown {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value;
  if (typeof value !== 'object') return value;

  // Formula results
  if ('result' in value) {
    return value.result === undefined ? null : cellValue(value.result);
  }
  if ('richText' in value) {
    return value.richText.map((part) => part.text).join('');
  }
  if ('hyperlink' in value) {
    return value.text;
  }
  // #N/A and friends
  return null;
}

export async function readExcelRows(
  content: Buffer,
  options: ExcelReadOptions = {}
): Promise<RawRow[]> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.read(Readable.from([content]));
  } catch (err) {
    throw new SnapdeltaError({
      code: 'SCHEMA_MISMATCH',
      message: `Unreadable Excel payload: ${err instanceof Error ? err.message : String(err)}`,
      suggestion: 'Check that the source still serves an .xlsx workbook.',
      cause: err instanceof Error ? err : undefined,
    });
  }

  const sheet =
    options.sheet === undefined ? workbook.worksheets[0] : workbook.getWorksheet(options.sheet);
  if (!sheet) {
    throw new SnapdeltaError({
      code: 'SCHEMA_MISMATCH',
      message: `Sheet not found: ${options.sheet ?? 'first sheet'}`,
      suggestion: 'Check that the sheet name/index is correct.',
      context: { sheets: workbook.worksheets.map((ws) => ws.name) },
    });
  }

  const startRow = options.startRow ?? 1;
  const hasHeaders = options.headers !== false;

  const headers: string[] = [];
  if (hasHeaders) {
    sheet.getRow(startRow).eachCell({ includeEmpty: false }, (cell, colNumber) => {
      headers[colNumber - 1] = String(cellValue(cell.value) ?? '').trim() || headerName(colNumber - 1);
    });
  } else {
    for (let i = 0; i < sheet.columnCount; i++) {
      headers[i] = headerName(i);
    }
  }
  assertSafeHeaders(headers.filter((h) => h !== undefined), 'Excel');

  const rows: RawRow[] = [];
  const dataStartRow = hasHeaders ? startRow + 1 : startRow;

  sheet.eachRow({ includeEmpty: false }, (excelRow, rowNumber) => {
    if (rowNumber < dataStartRow) return;

    const row: RawRow = {};
    let hasData = false;

    excelRow.eachCell({ includeEmpty: true }, (cell, colNumber) => {
      const header = headers[colNumber - 1];
      if (!header) return;

      const value = cellValue(cell.value);
      if (value !== null && value !== '') {
        hasData = true;
      }
      row[header] = value;
    });

    // Only add row if it has some data
    if (hasData) {
      rows.push(row);
    }
  });

  return rows;
}
