/**
 * JSON reader
 * Reads an array of objects, optionally nested under a dot path
 */

import type { RawRow } from '@snapdelta/core';
import { SnapdeltaError } from '@snapdelta/core';

export interface JsonReadOptions {
  /** Dot path to the records array (e.g. 'data.items') */
  recordsPath?: string;
}

const FORBIDDEN_PATH_SEGMENTS = new Set(['__proto__', 'prototype', 'constructor']);

function parseSafePath(path: string): string[] {
  const parts = path.split('.');
  if (parts.some((p) => p.length === 0)) {
    throw new SnapdeltaError({
      code: 'CONFIGURATION_ERROR',
      message: `Invalid recordsPath: "${path}"`,
      suggestion: 'Use dot notation with non-empty segments (e.g., "data.items").',
    });
  }

  for (const part of parts) {
    if (FORBIDDEN_PATH_SEGMENTS.has(part)) {
      throw new SnapdeltaError({
        code: 'CONFIGURATION_ERROR',
        message: `Unsafe recordsPath segment: "${part}"`,
        suggestion: 'Avoid __proto__/prototype/constructor in recordsPath.',
      });
    }
  }

  return parts;
}

function isObject(value: unknown): value is { [key: string]: unknown } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Get nested value from object using dot notation path
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current = obj;
  for (const part of parseSafePath(path)) {
    if (!isObject(current) || !Object.prototype.hasOwnProperty.call(current, part)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

export function readJsonRows(content: string | Buffer, options: JsonReadOptions = {}): RawRow[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content.toString());
  } catch (err) {
    throw new SnapdeltaError({
      code: 'SCHEMA_MISMATCH',
      message: `Unreadable JSON payload: ${err instanceof Error ? err.message : String(err)}`,
      cause: err instanceof Error ? err : undefined,
    });
  }

  const records = options.recordsPath ? getNestedValue(parsed, options.recordsPath) : parsed;
  if (!Array.isArray(records)) {
    throw new SnapdeltaError({
      code: 'SCHEMA_MISMATCH',
      message: options.recordsPath
        ? `No array found at recordsPath "${options.recordsPath}"`
        : 'JSON payload is not an array of records',
      suggestion: 'Set recordsPath to the location of the records array.',
    });
  }

  return records.map((record, index) => {
    if (!isObject(record)) {
      throw new SnapdeltaError({
        code: 'SCHEMA_MISMATCH',
        message: `Record ${index} is not an object`,
      });
    }
    const row: RawRow = {};
    for (const [column, value] of Object.entries(record)) {
      if (!FORBIDDEN_PATH_SEGMENTS.has(column)) row[column] = value;
    }
    return row;
  });
}
