/**
 * Dataset schema types
 *
 * A dataset schema declares which raw columns become canonical fields, how
 * they are coerced, and which of them compose the entity key.
 */

export type FieldKind = 'string' | 'number' | 'integer' | 'date' | 'datetime';

export interface FieldSpec {
  /** Canonical field name */
  name: string;
  kind: FieldKind;
  /** Rows failing coercion of a required field are dropped */
  required: boolean;
  /** Raw column name (default: name) */
  source?: string;
  /** Compare case-insensitively when diffing */
  caseFold?: boolean;
}

export type DropPolicy = 'record-absence' | 'ignore';

export interface DatasetSchema {
  /** Dataset name; scopes every store operation */
  dataset: string;
  /** Canonical names of the fields composing the key, in key order */
  keyFields: string[];
  fields: FieldSpec[];
  /** Absolute tolerance for numeric equality (default: 1e-6) */
  tolerance?: number;
  /** What happens to keys that disappear from a snapshot (default: record-absence) */
  dropPolicy?: DropPolicy;
  /** Value written to numeric fields of a dropped key (default: 0) */
  absenceValue?: number;
  /** Accept snapshots with zero rows (default: false) */
  allowEmpty?: boolean;
}

export const DEFAULT_TOLERANCE = 1e-6;
export const DEFAULT_ABSENCE_VALUE = 0;

export function isNumericKind(kind: FieldKind): boolean {
  return kind === 'number' || kind === 'integer';
}
