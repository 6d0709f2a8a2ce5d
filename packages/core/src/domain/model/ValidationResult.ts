import type { SemanticType } from './FieldDefinition.js';

/** Codes for problems with the shape of a table or of a value being inspected. */
export type StructuralErrorCode =
  | 'MISSING_COLUMN'
  | 'UNEXPECTED_COLUMN'
  | 'COLUMN_ORDER'
  | 'INDEX_LEVEL_COUNT'
  | 'INDEX_NAME_MISMATCH'
  | 'NOT_A_TABLE'
  | 'NOT_A_SERIES'
  | 'NOT_A_SEQUENCE'
  | 'NOT_A_MAPPING'
  | 'LENGTH_MISMATCH'
  | 'MAX_DEPTH_EXCEEDED'
  | 'CIRCULAR_REFERENCE';

/** Codes for constraint failures on a present column or index level. */
export type ConstraintViolationCode =
  | 'TYPE_MISMATCH'
  | 'NOT_NULLABLE'
  | 'GREATER_THAN'
  | 'GREATER_THAN_OR_EQUAL'
  | 'LESS_THAN'
  | 'LESS_THAN_OR_EQUAL'
  | 'ISIN'
  | 'NOTIN'
  | 'STR_CONTAINS'
  | 'STR_STARTSWITH'
  | 'STR_ENDSWITH'
  | 'DUPLICATE_VALUE'
  | 'CUSTOM_CHECK'
  | 'TABLE_CHECK'
  | 'INDEX_NOT_SORTED'
  | 'INDEX_NOT_UNIQUE';

/** What part of the value an issue refers to. */
export type IssueScope = 'column' | 'index' | 'table' | 'value';

/** One offending row: its zero-based position and the value found there. */
export interface FailureCase {
  readonly row: number;
  readonly value: unknown;
}

interface IssueBase {
  /** Column name, index level name, `<table>` or `<value>`. */
  readonly field: string;
  readonly scope: IssueScope;
  /** Human-readable path to the value inside the call (e.g. ``argument `frames`[1]``). */
  readonly location: string;
  /** Name of the schema being checked, when the issue comes from one. */
  readonly schema?: string;
  /** Human-readable error message. */
  readonly message: string;
}

/** Missing or unexpected column, index mismatch, wrong container shape, depth or cycle limit. */
export interface StructuralError extends IssueBase {
  readonly kind: 'structural';
  readonly code: StructuralErrorCode;
}

/** A column could not be cast to its declared type. */
export interface CoercionError extends IssueBase {
  readonly kind: 'coercion';
  readonly code: 'COERCION_FAILED';
  readonly targetType: SemanticType;
  readonly failureCount: number;
  /** Bounded sample of values that could not be cast, first offender first. */
  readonly failureCases: readonly FailureCase[];
}

/** Type, nullability, bound, membership, uniqueness or custom-check failure. */
export interface ConstraintViolationError extends IssueBase {
  readonly kind: 'constraint';
  readonly code: ConstraintViolationCode;
  /** The violated constraint as declared, e.g. `gt=0` or the custom check's name. */
  readonly constraint: string;
  readonly failureCount: number;
  /** Bounded sample of offending rows. */
  readonly failureCases: readonly FailureCase[];
}

/** Any issue found while validating a value. */
export type ValidationError = StructuralError | CoercionError | ConstraintViolationError;

/** Result of validating one table or series. `value` is the coerced / filtered working copy. */
export interface ValidationReport<T> {
  readonly isValid: boolean;
  readonly errors: readonly ValidationError[];
  readonly value: T;
}

/** Build a report from the collected errors. */
export function toReport<T>(value: T, errors: readonly ValidationError[]): ValidationReport<T> {
  return { isValid: errors.length === 0, errors, value };
}

/** Return `true` if the list holds at least one issue. */
export function hasErrors(errors: readonly ValidationError[]): boolean {
  return errors.length > 0;
}

/** Filter issues down to one kind. */
export function errorsOfKind<K extends ValidationError['kind']>(
  errors: readonly ValidationError[],
  kind: K,
): readonly Extract<ValidationError, { kind: K }>[] {
  return errors.filter((e): e is Extract<ValidationError, { kind: K }> => e.kind === kind);
}

/** One-line rendering of an issue: location, field and message. */
export function formatError(error: ValidationError): string {
  return `${error.location}: ${error.message}`;
}
