export {
  SnapdeltaError,
  wrapError,
  classifyError,
  isTransientError,
  isSchemaError,
} from './snapdelta-error.js';
export type { ErrorCode, ErrorClass, SnapdeltaErrorDetails } from './snapdelta-error.js';
