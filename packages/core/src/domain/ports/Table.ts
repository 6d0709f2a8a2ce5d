/** Physical element type of a column, series or index level. */
export type DType = 'int64' | 'float64' | 'string' | 'bool' | 'datetime' | 'category' | 'object';

/** A named column as stored by a table. Missing entries are `null`, `undefined` or `NaN`. */
export interface ColumnData {
  readonly name: string;
  readonly dtype: DType;
  readonly values: readonly unknown[];
  /** Category set of a `'category'` column, in declared order. */
  readonly categories?: readonly string[];
}

/** One level of a table's row index. Unnamed levels have `name: null`. */
export interface IndexLevel {
  readonly name: string | null;
  readonly dtype: DType;
  readonly values: readonly unknown[];
}

/**
 * Port for the tabular value being validated.
 *
 * The validation engine only reads through this interface and never mutates
 * a table: coercion and filtering produce a new table via `withColumns()`.
 * `InMemoryTable` is the built-in adapter; wrap any other columnar structure
 * by implementing these members.
 */
export interface Table {
  /** Column names in table order. */
  readonly columnNames: readonly string[];
  /** Number of rows. Every column and index level has exactly this many values. */
  readonly rowCount: number;
  /** Index levels, outermost first. A table without an explicit index has one unnamed `int64` level. */
  readonly index: readonly IndexLevel[];
  /** Look up a column by exact name. */
  column(name: string): ColumnData | undefined;
  /** Return a new table with the same index and exactly the given columns, in the given order. */
  withColumns(columns: readonly ColumnData[]): Table;
}

/** Element data of a series, used when a coerced copy is built. */
export interface SeriesData {
  readonly dtype: DType;
  readonly values: readonly unknown[];
  readonly categories?: readonly string[];
}

/** Port for a single labelled column that travels on its own, outside a table. */
export interface Series extends SeriesData {
  readonly name: string | null;
  readonly index: readonly IndexLevel[];
  /** Return a new series with the same name and index and the given element data. */
  withData(data: SeriesData): Series;
}

/** Structural guard for the `Table` port. */
export function isTable(value: unknown): value is Table {
  return (
    typeof value === 'object' &&
    value !== null &&
    'columnNames' in value &&
    Array.isArray(value.columnNames) &&
    'index' in value &&
    Array.isArray(value.index) &&
    'column' in value &&
    typeof value.column === 'function' &&
    'withColumns' in value &&
    typeof value.withColumns === 'function'
  );
}

/** Structural guard for the `Series` port. */
export function isSeries(value: unknown): value is Series {
  return (
    typeof value === 'object' &&
    value !== null &&
    'values' in value &&
    Array.isArray(value.values) &&
    'dtype' in value &&
    typeof value.dtype === 'string' &&
    'index' in value &&
    Array.isArray(value.index) &&
    'withData' in value &&
    typeof value.withData === 'function'
  );
}
