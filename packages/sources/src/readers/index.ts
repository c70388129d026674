import type { RawRow } from '@snapdelta/core';
import { readCsvRows } from './csv-reader.js';
import type { CsvReadOptions } from './csv-reader.js';
import { readExcelRows } from './excel-reader.js';
import type { ExcelReadOptions } from './excel-reader.js';
import { readJsonRows } from './json-reader.js';
import type { JsonReadOptions } from './json-reader.js';

export { readCsvRows, readExcelRows, readJsonRows };
export type { CsvReadOptions, ExcelReadOptions, JsonReadOptions };

export type SourceFormat = 'csv' | 'excel' | 'json';

export interface ReadOptions {
  csv?: CsvReadOptions;
  excel?: ExcelReadOptions;
  json?: JsonReadOptions;
  /** Text encoding of csv and json payloads (default: utf-8) */
  encoding?: BufferEncoding;
}

/**
 * Parse a fetched payload with the reader for its format
 */
export async function readRows(
  format: SourceFormat,
  payload: Buffer,
  options: ReadOptions = {}
): Promise<RawRow[]> {
  const encoding = options.encoding ?? 'utf-8';
  switch (format) {
    case 'csv':
      return readCsvRows(payload.toString(encoding), options.csv);
    case 'excel':
      return readExcelRows(payload, options.excel);
    case 'json':
      return readJsonRows(payload.toString(encoding), options.json);
  }
}
