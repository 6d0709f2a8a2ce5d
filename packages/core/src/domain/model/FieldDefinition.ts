import type { ColumnData, DType } from '../ports/Table.js';
import type { FieldValue } from './Values.js';

/** Declared element type of a column or index level. */
export type SemanticType = 'integer' | 'float' | 'string' | 'boolean' | 'datetime' | 'categorical';

/** Physical dtype a column must carry to satisfy each semantic type. */
export const DTYPE_FOR_TYPE: Readonly<Record<SemanticType, DType>> = Object.freeze({
  integer: 'int64',
  float: 'float64',
  string: 'string',
  boolean: 'bool',
  datetime: 'datetime',
  categorical: 'category',
});

/**
 * Outcome of a custom column check.
 *
 * `column` is a single verdict for the whole column; `rows` holds one verdict
 * per row, in row order.
 */
export type CheckVerdict =
  | { readonly kind: 'column'; readonly passed: boolean }
  | { readonly kind: 'rows'; readonly passed: readonly boolean[] };

/** Custom predicate over one column. May return a plain boolean, a per-row boolean list, or a `CheckVerdict`. */
export type ColumnCheck = (
  values: readonly unknown[],
  column: ColumnData,
) => boolean | readonly boolean[] | CheckVerdict;

/** Normalize whatever a `ColumnCheck` returned into a tagged `CheckVerdict`. */
export function toVerdict(result: boolean | readonly boolean[] | CheckVerdict): CheckVerdict {
  if (typeof result === 'boolean') return { kind: 'column', passed: result };
  if ('kind' in result) return result;
  return { kind: 'rows', passed: result };
}

/** Declares one column (or one index level) of a schema. */
export interface FieldDefinition {
  /** Field name. Also the column name unless `alias` is set. */
  readonly name: string;
  /** Element type the column must have (or be coerced to). */
  readonly type: SemanticType;
  /** When `true`, missing values are allowed. Default: `false`. */
  readonly nullable?: boolean;
  /** When `true`, the column may be absent from the table. Default: `false`. */
  readonly optional?: boolean;
  /** When `true`, non-missing values must not repeat. Default: `false`. */
  readonly unique?: boolean;
  /** Cast the column to `type` before checking. Defaults to the schema-wide `coerce` flag. */
  readonly coerce?: boolean;
  /** Every value must be strictly greater than this bound. Numeric types only. */
  readonly gt?: number;
  /** Every value must be greater than or equal to this bound. Numeric types only. */
  readonly ge?: number;
  /** Every value must be strictly less than this bound. Numeric types only. */
  readonly lt?: number;
  /** Every value must be less than or equal to this bound. Numeric types only. */
  readonly le?: number;
  /** Allowed values. Must match the declared type. */
  readonly isin?: readonly FieldValue[];
  /** Forbidden values. Must match the declared type. */
  readonly notin?: readonly FieldValue[];
  /** Substring every value must contain. String and categorical types only. */
  readonly strContains?: string;
  /** Prefix every value must start with. String and categorical types only. */
  readonly strStartswith?: string;
  /** Suffix every value must end with. String and categorical types only. */
  readonly strEndswith?: string;
  /** Category set of a categorical field. When set, the column's categories must match it. */
  readonly categories?: readonly string[];
  /** Custom predicate evaluated once on the column. */
  readonly check?: ColumnCheck;
  /** Name reported when `check` fails. Defaults to the predicate's function name. */
  readonly checkName?: string;
  /** Column name to read instead of `name`. */
  readonly alias?: string;
  /** Treat `alias` as a regular expression; the field applies to every matching column. */
  readonly regex?: boolean;
}
