/**
 * Error types shared by every snapdelta package.
 *
 * The scheduler decides between backoff, abort-and-alert and drop based on
 * the error class, so every failure that crosses a package boundary should
 * carry one of these codes.
 */

export type ErrorCode =
  | 'FETCH_TRANSIENT'
  | 'FETCH_FAILED'
  | 'TIMEOUT'
  | 'SCHEMA_MISMATCH'
  | 'EMPTY_SNAPSHOT'
  | 'STORE_UNAVAILABLE'
  | 'STORE_WRITE_FAILED'
  | 'STORE_READ_FAILED'
  | 'DELIVERY_FAILED'
  | 'CONFIGURATION_ERROR'
  | 'INVALID_OPTIONS'
  | 'UNKNOWN';

export type ErrorClass = 'transient' | 'schema' | 'permanent' | 'delivery';

const ERROR_CLASSES: Record<ErrorCode, ErrorClass> = {
  FETCH_TRANSIENT: 'transient',
  TIMEOUT: 'transient',
  STORE_UNAVAILABLE: 'transient',
  SCHEMA_MISMATCH: 'schema',
  EMPTY_SNAPSHOT: 'schema',
  FETCH_FAILED: 'permanent',
  STORE_WRITE_FAILED: 'permanent',
  STORE_READ_FAILED: 'permanent',
  CONFIGURATION_ERROR: 'permanent',
  INVALID_OPTIONS: 'permanent',
  UNKNOWN: 'permanent',
  DELIVERY_FAILED: 'delivery',
};

/** Node socket/DNS error codes that indicate a retryable network condition */
const TRANSIENT_SYSTEM_CODES = new Set([
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'EAI_AGAIN',
  'EPIPE',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

export interface SnapdeltaErrorDetails {
  /** Error code for programmatic handling */
  code: ErrorCode;
  /** Human-readable message */
  message: string;
  /** Dataset the error belongs to */
  dataset?: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class SnapdeltaError extends Error {
  readonly code: ErrorCode;
  readonly dataset?: string;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: SnapdeltaErrorDetails) {
    super(details.message);
    this.name = 'SnapdeltaError';
    this.code = details.code;
    this.dataset = details.dataset;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    Error.captureStackTrace(this, SnapdeltaError);
  }

  get errorClass(): ErrorClass {
    return ERROR_CLASSES[this.code];
  }

  /**
   * Format error for operator-facing channels
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    if (this.dataset) {
      parts.push(`Dataset: ${this.dataset}`);
    }

    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }

    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      dataset: this.dataset,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/**
 * Helper to wrap unknown errors as SnapdeltaError
 */
export function wrapError(
  error: unknown,
  dataset?: string,
  defaultCode: ErrorCode = 'UNKNOWN'
): SnapdeltaError {
  if (error instanceof SnapdeltaError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;
  const code = isTransientSystemError(error) ? 'FETCH_TRANSIENT' : defaultCode;

  return new SnapdeltaError({ code, message, dataset, cause });
}

function isTransientSystemError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;
  const code = 'code' in error ? error.code : undefined;
  if (typeof code === 'string' && TRANSIENT_SYSTEM_CODES.has(code)) return true;
  // fetch() wraps socket errors in a TypeError with the system error as cause
  const cause = 'cause' in error ? error.cause : undefined;
  return cause !== undefined && cause !== error && isTransientSystemError(cause);
}

export function classifyError(error: unknown): ErrorClass {
  if (error instanceof SnapdeltaError) return error.errorClass;
  return isTransientSystemError(error) ? 'transient' : 'permanent';
}

export function isTransientError(error: unknown): boolean {
  return classifyError(error) === 'transient';
}

export function isSchemaError(error: unknown): boolean {
  return classifyError(error) === 'schema';
}
