import type { Table } from '../ports/Table.js';
import type { FieldDefinition } from './FieldDefinition.js';

/** Declares the row index of a table: one field per level, outermost first. */
export interface IndexDefinition {
  readonly levels: readonly FieldDefinition[];
  /** When `true`, index tuples must be monotonically non-decreasing or non-increasing. */
  readonly sorted?: boolean;
  /** When `true`, index tuples must not repeat. */
  readonly unique?: boolean;
}

/** Predicate over the whole table, evaluated after every field check. */
export interface TableCheck {
  /** Name reported when the check fails. */
  readonly name: string;
  readonly check: (table: Table) => boolean;
}

/** Declarative description of a table shape, compiled once by `defineSchema()`. */
export interface SchemaDefinition {
  /** Schema name used in error messages and events. */
  readonly name: string;
  /** Ordered column declarations. Under `strict`, this is also the expected column order. */
  readonly fields: readonly FieldDefinition[];
  /** Row index declaration. Omit for no index constraints. */
  readonly index?: IndexDefinition;
  /** Reject columns not declared in `fields` and require declaration order. Default: `false`. */
  readonly strict?: boolean;
  /** Drop columns not declared in `fields` from the validated copy. Default: `false`. */
  readonly filter?: boolean;
  /** Default `coerce` flag for every field. Default: `false`. */
  readonly coerce?: boolean;
  /** Require each index level's name to equal its declared field name. Default: `false`. */
  readonly checkIndexName?: boolean;
  /** Table-level predicates. */
  readonly checks?: readonly TableCheck[];
}

/** Declarative description of a standalone series, compiled once by `defineSeriesSchema()`. */
export interface SeriesSchemaDefinition {
  readonly name: string;
  readonly field: FieldDefinition;
  readonly index?: IndexDefinition;
  /** Default `coerce` flag for the field. Default: `false`. */
  readonly coerce?: boolean;
  readonly checkIndexName?: boolean;
}
