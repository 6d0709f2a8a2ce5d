import type { ColumnData, DType, IndexLevel } from '../../domain/ports/Table.js';
import { formatValue, isMissing } from '../../domain/model/Values.js';

/** Index level as supplied by a caller. `dtype` is inferred from the values when omitted. */
export interface IndexLevelInput {
  readonly name: string | null;
  readonly values: readonly unknown[];
  readonly dtype?: DType;
}

const FITS: Readonly<Record<DType, (value: unknown) => boolean>> = {
  int64: (v) => typeof v === 'number' && Number.isInteger(v),
  float64: (v) => typeof v === 'number',
  string: (v) => typeof v === 'string',
  bool: (v) => typeof v === 'boolean',
  datetime: (v) => v instanceof Date,
  category: (v) => typeof v === 'string',
  object: () => true,
};

/**
 * Infer the dtype of a list of JS values from its non-missing entries.
 *
 * Integers give `int64` (missing entries allowed), integers mixed with
 * fractional numbers give `float64`, uniform strings, booleans or dates give
 * `string`, `bool` or `datetime`. Anything else, including a list with no
 * present value, is `object`.
 */
export function inferDType(values: readonly unknown[]): DType {
  const present = values.filter((value) => !isMissing(value));
  if (present.length === 0) return 'object';

  const candidates: readonly DType[] = ['int64', 'float64', 'string', 'bool', 'datetime'];
  return candidates.find((dtype) => present.every(FITS[dtype])) ?? 'object';
}

function assertFits(owner: string, dtype: DType, values: readonly unknown[], categories?: readonly string[]): void {
  values.forEach((value, row) => {
    if (isMissing(value)) return;
    if (!FITS[dtype](value)) {
      throw new TypeError(`${owner} value ${formatValue(value)} at row ${row} does not fit dtype ${dtype}`);
    }
    if (categories && typeof value === 'string' && !categories.includes(value)) {
      throw new TypeError(`${owner} value ${formatValue(value)} at row ${row} is not one of its categories`);
    }
  });
}

/** Build a column, inferring the dtype unless given. Throws `TypeError` when a value does not fit the dtype. */
export function createColumn(
  name: string,
  values: readonly unknown[],
  dtype?: DType,
  categories?: readonly string[],
): ColumnData {
  const resolved = dtype ?? (categories ? 'category' : inferDType(values));
  if (categories && resolved !== 'category') {
    throw new TypeError(`Column '${name}' has categories but dtype ${resolved}`);
  }
  assertFits(`Column '${name}'`, resolved, values, categories);

  const copy = Object.freeze([...values]);
  if (resolved !== 'category') return Object.freeze({ name, dtype: resolved, values: copy });

  const declared =
    categories ?? [...new Set(copy.filter((v): v is string => typeof v === 'string'))].sort();
  return Object.freeze({ name, dtype: resolved, values: copy, categories: Object.freeze([...declared]) });
}

/** Build one index level from caller input. */
export function createIndexLevel(input: IndexLevelInput): IndexLevel {
  const dtype = input.dtype ?? inferDType(input.values);
  assertFits(input.name === null ? 'Unnamed index level' : `Index level '${input.name}'`, dtype, input.values);
  return Object.freeze({ name: input.name, dtype, values: Object.freeze([...input.values]) });
}

/** The default index: one unnamed `int64` level counting rows from zero. */
export function rangeIndex(rowCount: number): readonly IndexLevel[] {
  const values = Array.from({ length: rowCount }, (_, row) => row);
  return Object.freeze([Object.freeze({ name: null, dtype: 'int64' as const, values: Object.freeze(values) })]);
}
