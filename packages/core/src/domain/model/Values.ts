/** A literal allowed in `isin` / `notin` lists. */
export type FieldValue = string | number | boolean | Date;

/** Check whether a cell holds a missing value (`null`, `undefined` or `NaN`). */
export function isMissing(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'number' && Number.isNaN(value));
}

/** Key used for equality between cells: dates compare by timestamp, everything else by identity. */
export function valueKey(value: unknown): unknown {
  return value instanceof Date ? value.getTime() : value;
}

/** Render a cell for an error message. */
export function formatValue(value: unknown): string {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }
  if (typeof value === 'string') return `'${value}'`;
  return String(value);
}

/** Short description of a value's runtime shape, for messages about unexpected arguments. */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (Array.isArray(value)) return 'an array';
  if (value instanceof Map) return 'a Map';
  if (value instanceof Date) return 'a Date';
  if (typeof value === 'object') return 'an object';
  return `a ${typeof value}`;
}
