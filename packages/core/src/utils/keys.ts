/**
 * Utility functions for entity keys
 */

import type { EntityKey, RawRow, TimeRange } from '../types/index.js';

/**
 * Encode a key tuple as a single canonical string.
 * JSON array encoding keeps tuples with separator characters distinct.
 */
export function encodeKey(key: EntityKey): string {
  return JSON.stringify(key);
}

/**
 * Format a key tuple for display
 */
export function formatKey(key: EntityKey, separator = ' / '): string {
  return key.join(separator);
}

/**
 * Check whether a timestamp falls inside an inclusive range
 */
export function inRange(at: Date, range?: TimeRange): boolean {
  if (!range) return true;
  const t = at.getTime();
  if (range.since && t < range.since.getTime()) return false;
  if (range.until && t > range.until.getTime()) return false;
  return true;
}

/**
 * Extract all unique column names from an array of raw rows
 */
export function extractColumnNames(rows: readonly RawRow[]): string[] {
  const columns = new Set<string>();
  for (const row of rows) {
    for (const column of Object.keys(row)) {
      columns.add(column);
    }
  }
  return Array.from(columns);
}
