/**
 * ValueComparator
 *
 * Field-level equality used by the diff engine.
 */

import type { DatasetSchema, FieldSpec, FieldValue } from '@snapdelta/core';
import { DEFAULT_TOLERANCE, isNumericKind } from '@snapdelta/core';

function normalizeText(value: string, fold: boolean): string {
  const trimmed = value.trim();
  return fold ? trimmed.toLowerCase() : trimmed;
}

export class ValueComparator {
  private readonly tolerance: number;
  private readonly fields: FieldSpec[];

  constructor(schema: DatasetSchema) {
    this.tolerance = schema.tolerance ?? DEFAULT_TOLERANCE;
    const keyFields = new Set(schema.keyFields);
    this.fields = schema.fields.filter((field) => !keyFields.has(field.name));
  }

  /**
   * Compare two field values
   */
  valuesEqual(field: FieldSpec, a: FieldValue | undefined, b: FieldValue | undefined): boolean {
    const left = a ?? null;
    const right = b ?? null;
    if (left === null || right === null) return left === right;

    if (isNumericKind(field.kind) && typeof left === 'number' && typeof right === 'number') {
      return Math.abs(left - right) <= this.tolerance;
    }

    const fold =
      field.caseFold === true || field.kind === 'date' || field.kind === 'datetime';
    return normalizeText(String(left), fold) === normalizeText(String(right), fold);
  }

  /**
   * Names of the non-key fields whose values differ
   */
  changedFields(
    previous: Record<string, FieldValue>,
    current: Record<string, FieldValue>
  ): string[] {
    return this.fields
      .filter((field) => !this.valuesEqual(field, previous[field.name], current[field.name]))
      .map((field) => field.name);
  }
}
