export {
  datasetNameSchema,
  fieldKindSchema,
  fieldSpecSchema,
  dropPolicySchema,
  datasetSchemaSchema,
} from './schemas.js';
export type { FieldSpecInput, DatasetSchemaInput } from './schemas.js';
