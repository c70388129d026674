/**
 * Field coercion
 *
 * Converts heterogeneous raw cell values into canonical field values.
 * Every coercer returns a tagged result instead of throwing so the
 * normalizer can drop a row and record why.
 */

import type { FieldKind, FieldValue } from '@snapdelta/core';

export type CoerceResult =
  | { ok: true; value: FieldValue }
  | { ok: false; reason: string };

const MISSING: CoerceResult = { ok: false, reason: 'missing' };

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

function isoDate(year: number, month: number, day: number): string | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

/**
 * Parse a localized number string.
 * Accepts "1 234,5", "1,234.5", "0,52" and "12.5 %". A single comma is a
 * decimal separator.
 */
export function parseLocaleNumber(input: string): number | null {
  let text = input.replace(/[\s%]/g, '');
  if (text === '') return null;

  const lastComma = text.lastIndexOf(',');
  const lastDot = text.lastIndexOf('.');
  if (lastComma !== -1 && lastDot !== -1) {
    // The later separator is the decimal one
    text = lastComma > lastDot
      ? text.replace(/\./g, '').replace(',', '.')
      : text.replace(/,/g, '');
  } else if (lastComma !== -1) {
    const commas = text.split(',').length - 1;
    text = commas === 1 ? text.replace(',', '.') : text.replace(/,/g, '');
  }

  if (!/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/.test(text)) return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

function coerceString(raw: unknown): CoerceResult {
  if (typeof raw === 'number' && Number.isFinite(raw)) return { ok: true, value: String(raw) };
  if (typeof raw === 'boolean') return { ok: true, value: String(raw) };
  if (typeof raw !== 'string') return { ok: false, reason: `expected text, got ${typeof raw}` };
  const trimmed = raw.trim();
  return trimmed === '' ? MISSING : { ok: true, value: trimmed };
}

function coerceNumber(raw: unknown): CoerceResult {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? { ok: true, value: raw } : { ok: false, reason: 'not a finite number' };
  }
  if (typeof raw === 'string') {
    const parsed = parseLocaleNumber(raw);
    return parsed === null ? { ok: false, reason: `not a number: "${raw}"` } : { ok: true, value: parsed };
  }
  return { ok: false, reason: `expected number, got ${typeof raw}` };
}

function coerceInteger(raw: unknown): CoerceResult {
  const result = coerceNumber(raw);
  if (!result.ok) return result;
  return typeof result.value === 'number' && Number.isInteger(result.value)
    ? result
    : { ok: false, reason: `not an integer: ${String(result.value)}` };
}

function coerceDate(raw: unknown): CoerceResult {
  if (raw instanceof Date) {
    return Number.isNaN(raw.getTime())
      ? { ok: false, reason: 'invalid date' }
      : { ok: true, value: raw.toISOString().slice(0, 10) };
  }
  if (typeof raw !== 'string') return { ok: false, reason: `expected date, got ${typeof raw}` };

  const text = raw.trim();
  const iso = /^(\d{4})-(\d{2})-(\d{2})(?:$|[T\s])/.exec(text);
  const dmy = /^(\d{1,2})[./](\d{1,2})[./](\d{4})$/.exec(text);

  let value: string | null = null;
  if (iso) {
    value = isoDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  } else if (dmy) {
    value = isoDate(Number(dmy[3]), Number(dmy[2]), Number(dmy[1]));
  }

  return value === null ? { ok: false, reason: `not a date: "${text}"` } : { ok: true, value };
}

function coerceDatetime(raw: unknown): CoerceResult {
  const date = raw instanceof Date ? raw : typeof raw === 'string' ? new Date(raw.trim()) : null;
  if (!date || Number.isNaN(date.getTime())) {
    return { ok: false, reason: `not a timestamp: "${String(raw)}"` };
  }
  return { ok: true, value: date.toISOString() };
}

/**
 * Coerce a raw cell to the target field kind
 */
export function coerceField(raw: unknown, kind: FieldKind): CoerceResult {
  if (isBlank(raw)) return MISSING;

  switch (kind) {
    case 'string':
      return coerceString(raw);
    case 'number':
      return coerceNumber(raw);
    case 'integer':
      return coerceInteger(raw);
    case 'date':
      return coerceDate(raw);
    case 'datetime':
      return coerceDatetime(raw);
  }
}
