import type { ColumnData, IndexLevel, Series, Table } from '../ports/Table.js';
import type { EventPublisher } from '../events/DomainEvents.js';
import type { FieldSpec, IndexSpec, SchemaModel, SeriesSchemaModel } from '../model/SchemaModel.js';
import type {
  ConstraintViolationCode,
  FailureCase,
  IssueScope,
  StructuralErrorCode,
  ValidationError,
  ValidationReport,
} from '../model/ValidationResult.js';
import { toReport } from '../model/ValidationResult.js';
import { ValidationContext } from '../model/ValidationContext.js';
import type { CheckVerdict, SemanticType } from '../model/FieldDefinition.js';
import { toVerdict } from '../model/FieldDefinition.js';
import { formatValue, isMissing, valueKey } from '../model/Values.js';
import { coerceColumn, dtypeMatches } from './Coercion.js';
import { valueConstraints } from './ColumnChecks.js';

/** Configuration for `ValidationEngine`. */
export interface ValidationEngineConfig {
  /** Maximum number of offending rows kept on each issue. Default: `5`. */
  readonly sampleSize?: number;
  /** Receives `table:validated` and `series:validated` events. */
  readonly events?: EventPublisher;
}

const TABLE_FIELD = '<table>';
const INDEX_FIELD = '<index>';

interface Failures {
  count: number;
  readonly cases: FailureCase[];
}

/** Collects the issues of one validation pass, tagging each with schema name and location. */
class IssueCollector {
  readonly errors: ValidationError[] = [];

  constructor(
    private readonly schema: string,
    private readonly location: string,
    readonly sampleSize: number,
  ) {}

  structural(code: StructuralErrorCode, field: string, scope: IssueScope, message: string): void {
    this.errors.push({ kind: 'structural', code, field, scope, location: this.location, schema: this.schema, message });
  }

  constraint(
    code: ConstraintViolationCode,
    field: string,
    scope: IssueScope,
    constraint: string,
    failures: Failures,
    message: string,
  ): void {
    this.errors.push({
      kind: 'constraint',
      code,
      field,
      scope,
      constraint,
      failureCount: failures.count,
      failureCases: failures.cases,
      location: this.location,
      schema: this.schema,
      message,
    });
  }

  coercion(field: string, scope: IssueScope, targetType: SemanticType, failures: Failures, message: string): void {
    this.errors.push({
      kind: 'coercion',
      code: 'COERCION_FAILED',
      field,
      scope,
      targetType,
      failureCount: failures.count,
      failureCases: failures.cases,
      location: this.location,
      schema: this.schema,
      message,
    });
  }

  hasStructuralErrors(): boolean {
    return this.errors.some((e) => e.kind === 'structural');
  }

  newFailures(): Failures {
    return { count: 0, cases: [] };
  }

  record(failures: Failures, row: number, value: unknown): void {
    failures.count++;
    if (failures.cases.length < this.sampleSize) failures.cases.push({ row, value });
  }
}

function describeRows(failures: Failures): string {
  const shown = failures.cases.map((c) => `row ${c.row} (${formatValue(c.value)})`).join(', ');
  const more = failures.count > failures.cases.length ? `, and ${failures.count - failures.cases.length} more` : '';
  return `${shown}${more}`;
}

function describeName(name: string | null): string {
  return name === null ? 'unnamed' : `'${name}'`;
}

function compareCells(a: unknown, b: unknown): number {
  const ka = valueKey(a);
  const kb = valueKey(b);
  if (typeof ka === 'number' && typeof kb === 'number') return ka - kb;
  const sa = String(ka);
  const sb = String(kb);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

function compareRows(levels: readonly IndexLevel[], a: number, b: number): number {
  for (const level of levels) {
    const order = compareCells(level.values[a], level.values[b]);
    if (order !== 0) return order;
  }
  return 0;
}

function rowLabel(levels: readonly IndexLevel[], row: number): unknown {
  const [only] = levels;
  if (levels.length === 1 && only) return only.values[row];
  return levels.map((level) => level.values[row]);
}

function isDefined<T>(value: T | undefined): value is T {
  return value !== undefined;
}

/**
 * Domain service that validates tables and series against compiled schemas.
 *
 * Runs a structural pass, an index pass and a per-field pass (coercion, type,
 * nullability, bounds and membership, uniqueness, custom check), then
 * table-level checks. Never stops at the first failure: every issue found is
 * returned, in declaration order of fields and in that fixed order of checks
 * within a field. Holds no per-call state, so one engine can serve any number
 * of concurrent validations.
 */
export class ValidationEngine {
  private readonly sampleSize: number;
  private readonly events: EventPublisher | null;

  constructor(config?: ValidationEngineConfig) {
    this.sampleSize = config?.sampleSize ?? 5;
    this.events = config?.events ?? null;
  }

  /** Validate a table. The report's `value` is the coerced / filtered copy, or the input itself when unchanged. */
  validate(
    schema: SchemaModel,
    table: Table,
    context: ValidationContext = ValidationContext.root(),
  ): ValidationReport<Table> {
    const issues = new IssueCollector(schema.name, context.location, this.sampleSize);
    const matches = this.checkColumns(schema, table, issues);

    this.checkIndex(schema.index, table.index, issues);

    const replaced = new Map<string, ColumnData>();
    for (const { field, columns } of matches) {
      for (const name of columns) {
        const column = replaced.get(name) ?? table.column(name);
        if (!column) continue;
        const working = this.checkField(field, column, name, 'column', issues);
        if (working !== column) replaced.set(name, working);
      }
    }

    const output = this.buildWorkingCopy(schema, table, matches, replaced);

    if (schema.checks.length > 0 && !issues.hasStructuralErrors()) {
      this.checkTable(schema, output, issues);
    }

    this.events?.emit({
      type: 'table:validated',
      schema: schema.name,
      location: context.location,
      rowCount: table.rowCount,
      errorCount: issues.errors.length,
      timestamp: Date.now(),
    });

    return toReport(output, issues.errors);
  }

  /** Validate a standalone series: its index, then its values against the schema's single field. */
  validateSeries(
    schema: SeriesSchemaModel,
    series: Series,
    context: ValidationContext = ValidationContext.root(),
  ): ValidationReport<Series> {
    const issues = new IssueCollector(schema.name, context.location, this.sampleSize);
    const label = series.name ?? schema.field.name;

    this.checkIndex(schema.index, series.index, issues);

    const column: ColumnData = {
      name: label,
      dtype: series.dtype,
      values: series.values,
      categories: series.categories,
    };
    const working = this.checkField(schema.field, column, label, 'column', issues);
    const output =
      working === column
        ? series
        : series.withData({ dtype: working.dtype, values: working.values, categories: working.categories });

    this.events?.emit({
      type: 'series:validated',
      schema: schema.name,
      location: context.location,
      length: series.values.length,
      errorCount: issues.errors.length,
      timestamp: Date.now(),
    });

    return toReport(output, issues.errors);
  }

  private checkColumns(
    schema: SchemaModel,
    table: Table,
    issues: IssueCollector,
  ): readonly { field: FieldSpec; columns: readonly string[] }[] {
    const claimed = new Set<string>();
    const matches = schema.fields.map((field) => {
      const { selector } = field;
      const columns =
        selector.kind === 'name'
          ? table.columnNames.filter((name) => name === selector.column)
          : table.columnNames.filter((name) => selector.pattern.test(name));

      if (columns.length === 0 && !field.optional) {
        if (selector.kind === 'name') {
          issues.structural(
            'MISSING_COLUMN',
            selector.column,
            'column',
            `Column '${selector.column}' declared in schema '${schema.name}' was not found`,
          );
        } else {
          issues.structural(
            'MISSING_COLUMN',
            field.name,
            'column',
            `No column matches pattern ${String(selector.pattern)} of field '${field.name}'`,
          );
        }
      }
      for (const name of columns) claimed.add(name);
      return { field, columns };
    });

    const { strict, filter } = schema.config;
    if (strict && !filter) {
      for (const name of table.columnNames) {
        if (!claimed.has(name)) {
          issues.structural(
            'UNEXPECTED_COLUMN',
            name,
            'column',
            `Column '${name}' is not declared in schema '${schema.name}'`,
          );
        }
      }

      const expected = [...new Set(matches.flatMap((m) => m.columns))];
      const actual = table.columnNames.filter((name) => claimed.has(name));
      if (expected.some((name, position) => actual[position] !== name)) {
        issues.structural(
          'COLUMN_ORDER',
          TABLE_FIELD,
          'table',
          `Columns are not in schema order: expected [${expected.join(', ')}], found [${actual.join(', ')}]`,
        );
      }
    }

    return matches;
  }

  private checkIndex(spec: IndexSpec, index: readonly IndexLevel[], issues: IssueCollector): void {
    if (spec.levels.length === 0) return;

    if (index.length !== spec.levels.length) {
      const expected = spec.levels.map((level) => level.name).join(', ');
      issues.structural(
        'INDEX_LEVEL_COUNT',
        INDEX_FIELD,
        'index',
        `Expected ${spec.levels.length} index level(s) [${expected}] but found ${index.length}`,
      );
      return;
    }

    spec.levels.forEach((field, position) => {
      const level = index[position];
      if (!level) return;

      if (spec.checkIndexName && level.name !== field.name) {
        issues.structural(
          'INDEX_NAME_MISMATCH',
          field.name,
          'index',
          `Index level ${position} is ${describeName(level.name)} but schema expects '${field.name}'`,
        );
      }
      const column: ColumnData = { name: level.name ?? field.name, dtype: level.dtype, values: level.values };
      this.checkField(field, column, field.name, 'index', issues);
    });

    const rowCount = index[0]?.values.length ?? 0;

    if (spec.sorted && rowCount > 1) {
      let ascendingBreak = -1;
      let descendingBreak = -1;
      for (let row = 1; row < rowCount; row++) {
        const order = compareRows(index, row - 1, row);
        if (order > 0 && ascendingBreak < 0) ascendingBreak = row;
        if (order < 0 && descendingBreak < 0) descendingBreak = row;
      }
      if (ascendingBreak >= 0 && descendingBreak >= 0) {
        const failures = issues.newFailures();
        issues.record(failures, ascendingBreak, rowLabel(index, ascendingBreak));
        issues.constraint(
          'INDEX_NOT_SORTED',
          INDEX_FIELD,
          'index',
          'sorted',
          failures,
          `Index is not sorted: order breaks at ${describeRows(failures)}`,
        );
      }
    }

    if (spec.unique) {
      const seen = new Set<string>();
      const failures = issues.newFailures();
      for (let row = 0; row < rowCount; row++) {
        const key = JSON.stringify(index.map((level) => valueKey(level.values[row]) ?? null));
        if (seen.has(key)) {
          issues.record(failures, row, rowLabel(index, row));
        } else {
          seen.add(key);
        }
      }
      if (failures.count > 0) {
        issues.constraint(
          'INDEX_NOT_UNIQUE',
          INDEX_FIELD,
          'index',
          'unique',
          failures,
          `Index has ${failures.count} repeated label(s): ${describeRows(failures)}`,
        );
      }
    }
  }

  /**
   * Per-field pass on one column or index level. Returns the column to keep in
   * the working copy: the coerced column, or the input when nothing changed.
   * A failed coercion or type check skips the remaining checks of this field.
   */
  private checkField(
    field: FieldSpec,
    column: ColumnData,
    label: string,
    scope: IssueScope,
    issues: IssueCollector,
  ): ColumnData {
    const subject = scope === 'index' ? `Index level '${label}'` : `Column '${label}'`;
    let working = column;

    if (field.coerce) {
      const coerced = coerceColumn(column, field, issues.sampleSize);
      if (!coerced.ok) {
        const failures = { count: coerced.failureCount, cases: [...coerced.failureCases] };
        issues.coercion(
          label,
          scope,
          field.type,
          failures,
          `${subject} cannot be coerced to ${field.type}: ${failures.count} value(s) fail, ${describeRows(failures)}`,
        );
        return column;
      }
      working = coerced.column;
    } else if (!dtypeMatches(column, field)) {
      const expected =
        field.type === 'categorical' && field.categories
          ? `category with categories [${field.categories.join(', ')}]`
          : field.dtype;
      const found =
        column.dtype === 'category' && field.categories
          ? `category with categories [${(column.categories ?? []).join(', ')}]`
          : column.dtype;
      issues.constraint(
        'TYPE_MISMATCH',
        label,
        scope,
        `dtype=${field.dtype}`,
        issues.newFailures(),
        `${subject} should have dtype ${expected} but has ${found}`,
      );
      return column;
    }

    const values = working.values;

    if (!field.nullable) {
      const failures = issues.newFailures();
      values.forEach((value, row) => {
        if (isMissing(value)) issues.record(failures, row, value);
      });
      if (failures.count > 0) {
        issues.constraint(
          'NOT_NULLABLE',
          label,
          scope,
          'nullable=false',
          failures,
          `${subject} is not nullable but has ${failures.count} missing value(s) at rows ${failures.cases
            .map((c) => c.row)
            .join(', ')}`,
        );
      }
    }

    for (const constraint of valueConstraints(field)) {
      const failures = issues.newFailures();
      values.forEach((value, row) => {
        if (!isMissing(value) && !constraint.test(value)) issues.record(failures, row, value);
      });
      if (failures.count > 0) {
        issues.constraint(
          constraint.code,
          label,
          scope,
          constraint.label,
          failures,
          `${subject} failed ${constraint.label} for ${failures.count} row(s): ${describeRows(failures)}`,
        );
      }
    }

    if (field.unique) {
      const seen = new Set<unknown>();
      const failures = issues.newFailures();
      values.forEach((value, row) => {
        if (isMissing(value)) return;
        const key = valueKey(value);
        if (seen.has(key)) {
          issues.record(failures, row, value);
        } else {
          seen.add(key);
        }
      });
      if (failures.count > 0) {
        issues.constraint(
          'DUPLICATE_VALUE',
          label,
          scope,
          'unique',
          failures,
          `${subject} must be unique but has ${failures.count} duplicate(s): ${describeRows(failures)}`,
        );
      }
    }

    if (field.check) {
      this.runCustomCheck(field.check, working, label, scope, subject, issues);
    }

    return working;
  }

  private runCustomCheck(
    check: NonNullable<FieldSpec['check']>,
    column: ColumnData,
    label: string,
    scope: IssueScope,
    subject: string,
    issues: IssueCollector,
  ): void {
    const failures = issues.newFailures();
    const values = column.values;
    let outcome: CheckVerdict;
    try {
      outcome = toVerdict(check.fn(values, column));
    } catch (error) {
      failures.count = values.length;
      const reason = error instanceof Error ? error.message : String(error);
      const message = `${subject} check '${check.name}' raised: ${reason}`;
      issues.constraint('CUSTOM_CHECK', label, scope, check.name, failures, message);
      return;
    }

    if (outcome.kind === 'column') {
      if (!outcome.passed) {
        failures.count = values.length;
        const message = `${subject} failed check '${check.name}'`;
        issues.constraint('CUSTOM_CHECK', label, scope, check.name, failures, message);
      }
      return;
    }

    if (outcome.passed.length !== values.length) {
      failures.count = values.length;
      issues.constraint(
        'CUSTOM_CHECK',
        label,
        scope,
        check.name,
        failures,
        `${subject} check '${check.name}' returned ${outcome.passed.length} result(s) for ${values.length} row(s)`,
      );
      return;
    }

    outcome.passed.forEach((passed, row) => {
      if (!passed) issues.record(failures, row, values[row]);
    });
    if (failures.count > 0) {
      issues.constraint(
        'CUSTOM_CHECK',
        label,
        scope,
        check.name,
        failures,
        `${subject} failed check '${check.name}' for ${failures.count} row(s): ${describeRows(failures)}`,
      );
    }
  }

  private checkTable(schema: SchemaModel, table: Table, issues: IssueCollector): void {
    for (const { name, check } of schema.checks) {
      let passed: boolean;
      let reason = '';
      try {
        passed = check(table);
      } catch (error) {
        passed = false;
        reason = `: ${error instanceof Error ? error.message : String(error)}`;
      }
      if (!passed) {
        issues.constraint(
          'TABLE_CHECK',
          TABLE_FIELD,
          'table',
          name,
          { count: table.rowCount, cases: [] },
          `Table failed check '${name}'${reason ? ` (raised${reason})` : ''}`,
        );
      }
    }
  }

  /**
   * Assemble the validated copy. Under `filter`, undeclared columns are dropped
   * and the rest follow declaration order; otherwise table order is kept and
   * only coerced columns are swapped in. Returns the input table when neither
   * applies.
   */
  private buildWorkingCopy(
    schema: SchemaModel,
    table: Table,
    matches: readonly { field: FieldSpec; columns: readonly string[] }[],
    replaced: ReadonlyMap<string, ColumnData>,
  ): Table {
    if (schema.config.filter) {
      const ordered = [...new Set(matches.flatMap((m) => m.columns))];
      const unchanged =
        replaced.size === 0 &&
        ordered.length === table.columnNames.length &&
        ordered.every((name, position) => table.columnNames[position] === name);
      if (unchanged) return table;
      return table.withColumns(ordered.map((name) => replaced.get(name) ?? table.column(name)).filter(isDefined));
    }

    if (replaced.size === 0) return table;
    const columns = table.columnNames.map((name) => replaced.get(name) ?? table.column(name));
    return table.withColumns(columns.filter(isDefined));
  }
}
