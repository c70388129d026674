/**
 * Snapshot Normalizer
 *
 * Converts fetched tabular rows into canonical entity records according to
 * a dataset schema.
 */

import type {
  DatasetSchema,
  EntityRecord,
  FieldSpec,
  FieldValue,
  RawRow,
} from '@snapdelta/core';
import { SnapdeltaError, encodeKey, extractColumnNames } from '@snapdelta/core';
import { coerceField } from './coerce.js';

/** A raw row that was discarded during normalization */
export interface RowDrop {
  /** Index of the row in the fetched snapshot */
  index: number;
  /** Canonical name of the first required field that failed */
  field: string;
  reason: string;
}

export interface NormalizeResult {
  /** One record per key, in natural input order */
  records: EntityRecord[];
  /** Rows discarded for failed required fields */
  dropped: RowDrop[];
  /** Rows replaced by a later row with the same key */
  duplicateKeys: number;
}

function sourceColumn(field: FieldSpec): string {
  return field.source ?? field.name;
}

/**
 * Throw SCHEMA_MISMATCH when a required column is absent from every row.
 * A column missing from some rows only is a per-row problem.
 */
function assertColumnsPresent(rows: readonly RawRow[], schema: DatasetSchema): void {
  const missing = schema.fields
    .filter((field) => field.required || schema.keyFields.includes(field.name))
    .map(sourceColumn)
    .filter((column) => !rows.some((row) => Object.prototype.hasOwnProperty.call(row, column)));

  if (missing.length > 0) {
    const seen = extractColumnNames(rows).slice(0, 20);
    throw new SnapdeltaError({
      code: 'SCHEMA_MISMATCH',
      message: `Required column(s) absent from every row: ${missing.join(', ')}`,
      dataset: schema.dataset,
      suggestion: `Update the field sources in the dataset schema. Columns seen: ${seen.join(', ') || 'none'}`,
      context: { missing, seen },
    });
  }
}

/**
 * Normalize a fetched snapshot.
 *
 * @param rows - Raw rows from the fetcher
 * @param schema - Dataset schema
 * @param observedAt - Marker time of this cycle; stamped on every record
 * @throws SnapdeltaError SCHEMA_MISMATCH or EMPTY_SNAPSHOT
 */
export function normalizeSnapshot(
  rows: readonly RawRow[],
  schema: DatasetSchema,
  observedAt: Date
): NormalizeResult {
  if (rows.length === 0) {
    if (schema.allowEmpty) {
      return { records: [], dropped: [], duplicateKeys: 0 };
    }
    throw new SnapdeltaError({
      code: 'EMPTY_SNAPSHOT',
      message: 'Fetched snapshot contains no rows',
      dataset: schema.dataset,
      suggestion: 'Check the source, or set allowEmpty on the schema if an empty listing is legitimate.',
    });
  }

  assertColumnsPresent(rows, schema);

  const keyFields = new Set(schema.keyFields);
  const byKey = new Map<string, EntityRecord>();
  const dropped: RowDrop[] = [];
  let duplicateKeys = 0;

  rows.forEach((row, index) => {
    const values: Record<string, FieldValue> = {};

    for (const field of schema.fields) {
      const result = coerceField(row[sourceColumn(field)], field.kind);
      if (result.ok) {
        values[field.name] = result.value;
        continue;
      }
      if (field.required || keyFields.has(field.name)) {
        dropped.push({ index, field: field.name, reason: result.reason });
        return;
      }
      values[field.name] = null;
    }

    const key = schema.keyFields.map((name) => String(values[name]));
    const encoded = encodeKey(key);
    if (byKey.has(encoded)) duplicateKeys++;
    // Map.set on an existing key keeps the original insertion position
    byKey.set(encoded, { key, values, observedAt });
  });

  return { records: Array.from(byKey.values()), dropped, duplicateKeys };
}
