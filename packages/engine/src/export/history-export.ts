/**
 * History CSV export
 *
 * Writes a dataset's change rows over a time range as CSV, one column per
 * key field and schema field plus change_kind and observed_at.
 */

import { stringify } from 'csv-stringify/sync';
import type { DatasetSchema, IHistoryStore, TimeRange } from '@snapdelta/core';

export interface ExportOptions {
  range?: TimeRange;
  /** Field delimiter (default: ",") */
  delimiter?: string;
}

export async function exportHistoryCsv(
  store: IHistoryStore,
  schema: DatasetSchema,
  options: ExportOptions = {}
): Promise<string> {
  const rows = await store.scan(schema.dataset, options.range);
  const keyFields = new Set(schema.keyFields);
  const valueFields = schema.fields.map((field) => field.name).filter((name) => !keyFields.has(name));
  const columns = [...schema.keyFields, ...valueFields, 'change_kind', 'observed_at'];

  const records = rows.map((row) => [
    ...row.key,
    ...valueFields.map((name) => row.values[name] ?? ''),
    row.changeKind,
    row.observedAt.toISOString(),
  ]);

  return stringify(records, {
    header: true,
    columns,
    delimiter: options.delimiter ?? ',',
  });
}
