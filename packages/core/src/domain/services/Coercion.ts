import type { ColumnData } from '../ports/Table.js';
import type { SemanticType } from '../model/FieldDefinition.js';
import type { FieldSpec } from '../model/SchemaModel.js';
import type { FailureCase } from '../model/ValidationResult.js';
import { isMissing } from '../model/Values.js';

/** Result of casting a single cell. */
export type CastResult = { readonly ok: true; readonly value: unknown } | { readonly ok: false };

/** Result of casting a whole column. On failure, `failureCases` holds the first offenders in row order. */
export type ColumnCoercion =
  | { readonly ok: true; readonly column: ColumnData }
  | { readonly ok: false; readonly failureCount: number; readonly failureCases: readonly FailureCase[] };

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const ISO_DATE_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?)(Z|[+-]\d{2}:?\d{2})?)?$/;
const TRUE_STRINGS: ReadonlySet<string> = new Set(['true', '1', 'yes']);
const FALSE_STRINGS: ReadonlySet<string> = new Set(['false', '0', 'no']);

const FAILED: CastResult = { ok: false };

function cast(value: unknown): CastResult {
  return { ok: true, value };
}

/**
 * Cast one non-missing cell to `type`.
 *
 * Only lossless, unambiguous conversions succeed: `1.5` never becomes an
 * integer, `'abc'` never becomes a number, and a number is never read as a
 * timestamp.
 */
export function coerceValue(value: unknown, type: SemanticType, categories?: readonly string[]): CastResult {
  switch (type) {
    case 'integer':
      return toInteger(value);
    case 'float':
      return toFloat(value);
    case 'string':
      return toText(value);
    case 'boolean':
      return toBoolean(value);
    case 'datetime':
      return toDatetime(value);
    case 'categorical': {
      const text = toText(value);
      if (!text.ok || typeof text.value !== 'string') return FAILED;
      if (categories && !categories.includes(text.value)) return FAILED;
      return text;
    }
  }
}

function toInteger(value: unknown): CastResult {
  if (typeof value === 'number') return Number.isSafeInteger(value) ? cast(value) : FAILED;
  if (typeof value === 'boolean') return cast(value ? 1 : 0);
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!INTEGER_PATTERN.test(trimmed)) return FAILED;
    const parsed = Number(trimmed);
    return Number.isSafeInteger(parsed) ? cast(parsed) : FAILED;
  }
  return FAILED;
}

function toFloat(value: unknown): CastResult {
  if (typeof value === 'number') return cast(value);
  if (typeof value === 'boolean') return cast(value ? 1 : 0);
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!DECIMAL_PATTERN.test(trimmed)) return FAILED;
    const parsed = Number(trimmed);
    if (!Number.isFinite(parsed)) return FAILED;
    // Whole numbers past 2^53 cannot be held exactly.
    if (INTEGER_PATTERN.test(trimmed) && !Number.isSafeInteger(parsed)) return FAILED;
    return cast(parsed);
  }
  return FAILED;
}

function toText(value: unknown): CastResult {
  if (typeof value === 'string') return cast(value);
  if (typeof value === 'number' || typeof value === 'boolean') return cast(String(value));
  if (value instanceof Date && !Number.isNaN(value.getTime())) return cast(value.toISOString());
  return FAILED;
}

function toBoolean(value: unknown): CastResult {
  if (typeof value === 'boolean') return cast(value);
  if (value === 1 || value === 0) return cast(value === 1);
  if (typeof value === 'string') {
    const lower = value.trim().toLowerCase();
    if (TRUE_STRINGS.has(lower)) return cast(true);
    if (FALSE_STRINGS.has(lower)) return cast(false);
  }
  return FAILED;
}

function toDatetime(value: unknown): CastResult {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? FAILED : cast(value);
  if (typeof value === 'string') {
    const match = ISO_DATE_PATTERN.exec(value.trim());
    if (!match) return FAILED;
    const [, year = '', month = '', day = '', time, zone] = match;
    if (!isCalendarDate(Number(year), Number(month), Number(day))) return FAILED;
    // Zone-less timestamps are read as UTC.
    const date = `${year}-${month}-${day}`;
    const parsed = new Date(time === undefined ? date : `${date}T${time}${normalizeZone(zone)}`);
    return Number.isNaN(parsed.getTime()) ? FAILED : cast(parsed);
  }
  return FAILED;
}

function normalizeZone(zone: string | undefined): string {
  if (zone === undefined) return 'Z';
  return zone.length === 5 ? `${zone.slice(0, 3)}:${zone.slice(3)}` : zone;
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

/** Check whether a column already carries the physical type a field requires. */
export function dtypeMatches(column: ColumnData, field: FieldSpec): boolean {
  if (column.dtype !== field.dtype) return false;
  if (field.type !== 'categorical' || !field.categories) return true;
  return sameCategories(column.categories ?? [], field.categories);
}

function sameCategories(actual: readonly string[], expected: readonly string[]): boolean {
  const expectedSet = new Set(expected);
  const actualSet = new Set(actual);
  return actualSet.size === expectedSet.size && [...actualSet].every((c) => expectedSet.has(c));
}

/**
 * Cast a column to the field's declared type.
 *
 * A column that already matches is returned as-is, so coercing correctly typed
 * data is a no-op. Missing cells stay missing (normalized to `null`).
 */
export function coerceColumn(column: ColumnData, field: FieldSpec, sampleSize: number): ColumnCoercion {
  if (dtypeMatches(column, field)) return { ok: true, column };

  const values: unknown[] = [];
  const failureCases: FailureCase[] = [];
  let failureCount = 0;

  column.values.forEach((value, row) => {
    if (isMissing(value)) {
      values.push(null);
      return;
    }
    const result = coerceValue(value, field.type, field.categories);
    if (result.ok) {
      values.push(result.value);
      return;
    }
    failureCount++;
    if (failureCases.length < sampleSize) failureCases.push({ row, value });
  });

  if (failureCount > 0) return { ok: false, failureCount, failureCases };

  if (field.type !== 'categorical') {
    return { ok: true, column: { name: column.name, dtype: field.dtype, values } };
  }

  const categories =
    field.categories ?? [...new Set(values.filter((v): v is string => typeof v === 'string'))].sort();
  return { ok: true, column: { name: column.name, dtype: field.dtype, values, categories } };
}
