import { SnapdeltaError } from '@snapdelta/core';

const FORBIDDEN_RECORD_KEYS = new Set(['__proto__', 'prototype', 'constructor']);

/**
 * Generated name for an unnamed column: Column1, Column2, ...
 */
export function headerName(index: number): string {
  return `Column${index + 1}`;
}

export function assertSafeHeaders(headers: readonly string[], format: string): void {
  for (const header of headers) {
    if (FORBIDDEN_RECORD_KEYS.has(header)) {
      throw new SnapdeltaError({
        code: 'SCHEMA_MISMATCH',
        message: `Unsafe ${format} header name: ${header}`,
        suggestion: 'Rename the column at the source or skip the row holding it.',
      });
    }
  }
}
