/**
 * Canonical Entity Model
 *
 * Row shapes shared by every dataset: the fetched raw row, the normalized
 * entity record, and the change record produced by the diff engine.
 */

/** A row as produced by a source fetcher, before normalization */
export type RawRow = {
  [column: string]: unknown;
};

/** Normalized field value. Dates are carried as ISO strings. */
export type FieldValue = number | string | null;

/** Ordered key tuple identifying a subject within one dataset */
export type EntityKey = readonly string[];

export interface EntityRecord {
  /** Key tuple, in the order of the schema's keyFields */
  key: EntityKey;
  /** Value fields (key fields included, by canonical field name) */
  values: Record<string, FieldValue>;
  /** Marker time of the snapshot that produced this record */
  observedAt: Date;
}

export type ChangeKind = 'new' | 'changed' | 'dropped';

export interface ChangeRecord extends EntityRecord {
  changeKind: ChangeKind;
}

/**
 * Source-reported last-modification indicator.
 *
 * `token` is compared for equality by the change gate; `observedAt` is the
 * timestamp stamped onto every record produced from the snapshot.
 */
export interface Marker {
  token: string;
  observedAt: Date;
}

/** Inclusive time range for history queries */
export interface TimeRange {
  since?: Date;
  until?: Date;
}
