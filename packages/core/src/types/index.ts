export type {
  RawRow,
  FieldValue,
  EntityKey,
  EntityRecord,
  ChangeKind,
  ChangeRecord,
  Marker,
  TimeRange,
} from './entity.js';

export type { FieldKind, FieldSpec, DropPolicy, DatasetSchema } from './schema.js';
export { DEFAULT_TOLERANCE, DEFAULT_ABSENCE_VALUE, isNumericKind } from './schema.js';
