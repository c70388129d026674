/**
 * @snapdelta/sources
 *
 * Generic tabular readers and snapshot fetchers
 */

// Readers
export { readCsvRows, readExcelRows, readJsonRows, readRows } from './readers/index.js';
export type {
  CsvReadOptions,
  ExcelReadOptions,
  JsonReadOptions,
  ReadOptions,
  SourceFormat,
} from './readers/index.js';

// Fetchers
export { FileSnapshotFetcher } from './fetchers/file-snapshot-fetcher.js';
export type { FileSnapshotFetcherConfig } from './fetchers/file-snapshot-fetcher.js';
export { HttpSnapshotFetcher } from './fetchers/http-snapshot-fetcher.js';
export type {
  HttpSnapshotFetcherConfig,
  HttpSnapshotFetcherDeps,
} from './fetchers/http-snapshot-fetcher.js';
export { httpRequest, isTransientStatus } from './fetchers/http-client.js';
export type { FetchFn, HttpRequestOptions, HttpResult } from './fetchers/http-client.js';
export { resolveMarker, parseMarkerDate } from './fetchers/marker-strategies.js';
export type { MarkerStrategy, MarkerContext } from './fetchers/marker-strategies.js';
