import type { DType } from '../ports/Table.js';
import type { ColumnCheck, SemanticType } from './FieldDefinition.js';
import type { TableCheck } from './Schema.js';
import type { FieldValue } from './Values.js';

/** How a compiled field finds its column(s) in a table. */
export type ColumnSelector =
  | { readonly kind: 'name'; readonly column: string }
  | { readonly kind: 'pattern'; readonly pattern: RegExp };

/** Compiled, immutable descriptor of one column or index level. */
export interface FieldSpec {
  readonly name: string;
  readonly type: SemanticType;
  /** Physical dtype a matching column must carry. */
  readonly dtype: DType;
  readonly nullable: boolean;
  readonly optional: boolean;
  readonly unique: boolean;
  /** Resolved coercion flag (field value, else schema default). */
  readonly coerce: boolean;
  readonly gt?: number;
  readonly ge?: number;
  readonly lt?: number;
  readonly le?: number;
  readonly isin?: readonly FieldValue[];
  readonly notin?: readonly FieldValue[];
  readonly strContains?: string;
  readonly strStartswith?: string;
  readonly strEndswith?: string;
  readonly categories?: readonly string[];
  readonly check?: { readonly name: string; readonly fn: ColumnCheck };
  readonly selector: ColumnSelector;
}

/** Compiled index declaration. Zero levels means no index constraints. */
export interface IndexSpec {
  readonly levels: readonly FieldSpec[];
  readonly checkIndexName: boolean;
  readonly sorted: boolean;
  readonly unique: boolean;
}

/** Resolved schema-level flags. */
export interface SchemaConfig {
  readonly strict: boolean;
  readonly filter: boolean;
  readonly coerce: boolean;
  readonly checkIndexName: boolean;
}

/**
 * Compiled table schema. Deeply frozen by `defineSchema()` and safe to share
 * between any number of concurrent validations.
 */
export interface SchemaModel {
  readonly kind: 'table';
  readonly name: string;
  /** Column fields in declaration order. */
  readonly fields: readonly FieldSpec[];
  readonly index: IndexSpec;
  readonly config: SchemaConfig;
  readonly checks: readonly TableCheck[];
}

/** Compiled single-series schema. */
export interface SeriesSchemaModel {
  readonly kind: 'series';
  readonly name: string;
  readonly field: FieldSpec;
  readonly index: IndexSpec;
}
