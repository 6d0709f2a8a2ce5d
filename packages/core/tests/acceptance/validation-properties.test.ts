import { describe, it, expect } from 'vitest';
import {
  AggregateValidationError,
  InMemoryTable,
  ValidationEngine,
  checkSchemas,
  defineSchema,
  errorsOfKind,
  sequenceOf,
  tableOf,
} from '../../src/index.js';
import type { Table } from '../../src/index.js';

// --- Schemas ---

const Readings = defineSchema({
  name: 'Readings',
  fields: [
    { name: 'sensor', type: 'string', unique: true },
    { name: 'value', type: 'float', gt: 0 },
    { name: 'note', type: 'string', nullable: true, optional: true },
  ],
});

function readings(values: number[], sensors?: string[]): InMemoryTable {
  return InMemoryTable.fromColumns(
    {
      sensor: sensors ?? values.map((_, i) => `s${i}`),
      value: values,
      note: values.map(() => null),
    },
    { dtypes: { value: 'float64', note: 'string' } },
  );
}

function caught(action: () => unknown): AggregateValidationError {
  try {
    action();
  } catch (error) {
    if (error instanceof AggregateValidationError) return error;
    throw error;
  }
  throw new Error('expected an AggregateValidationError');
}

const engine = new ValidationEngine();

// ============================================================
// Direct validation
// ============================================================

describe('Direct validation', () => {
  it('should find no errors in a conforming table', () => {
    expect(engine.validate(Readings, readings([0.5, 1.5])).errors).toEqual([]);
  });

  it('should report exactly one structural error for a removed required column', () => {
    const table = InMemoryTable.fromColumns({ sensor: ['s0'], note: ['ok'] });

    const errors = engine.validate(Readings, table).errors;

    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ kind: 'structural', code: 'MISSING_COLUMN', field: 'value' });
  });

  it('should accept a table without an optional column', () => {
    const table = InMemoryTable.fromColumns({ sensor: ['s0'], value: [2.5] });

    expect(engine.validate(Readings, table).errors).toEqual([]);
  });

  it('should identify duplicated values of a unique column', () => {
    const errors = engine.validate(Readings, readings([1.5, 2.5, 3.5], ['a', 'b', 'a'])).errors;

    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({
      code: 'DUPLICATE_VALUE',
      field: 'sensor',
      failureCases: [{ row: 2, value: 'a' }],
      message: "Column 'sensor' must be unique but has 1 duplicate(s): row 2 ('a')",
    });
  });

  it('should give the same result with and without coercion on correctly typed columns', () => {
    const Coerced = defineSchema({
      name: 'Readings',
      coerce: true,
      fields: [
        { name: 'sensor', type: 'string', unique: true },
        { name: 'value', type: 'float', gt: 0 },
        { name: 'note', type: 'string', nullable: true, optional: true },
      ],
    });
    const table = readings([1.5, -2.5]);

    const plain = engine.validate(Readings, table);
    const coerced = engine.validate(Coerced, table);

    expect(coerced.errors).toEqual(plain.errors);
    expect(coerced.value).toBe(table);
  });

  it('should report only col3 when it holds a non-positive value', () => {
    const Frame = defineSchema({
      name: 'Frame',
      fields: [
        { name: 'col1', type: 'integer' },
        { name: 'col3', type: 'float', gt: 0 },
      ],
    });
    const table = InMemoryTable.fromColumns({ col1: [1, 2], col3: [-1.0, 2.0] }, { dtypes: { col3: 'float64' } });

    const errors = engine.validate(Frame, table).errors;

    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({
      kind: 'constraint',
      field: 'col3',
      constraint: 'gt=0',
      failureCount: 1,
      failureCases: [{ row: 0, value: -1 }],
    });
  });

  it('should report a misnamed index level once', () => {
    const Keyed = defineSchema({
      name: 'Keyed',
      checkIndexName: true,
      fields: [{ name: 'amount', type: 'float' }],
      index: { levels: [{ name: 'id', type: 'integer' }] },
    });
    const table = InMemoryTable.fromColumns(
      { amount: [1.5, 2.5] },
      { index: [{ name: 'identifier', values: [7, 8] }] },
    );

    const errors = errorsOfKind(engine.validate(Keyed, table).errors, 'structural');

    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ code: 'INDEX_NAME_MISMATCH', field: 'id', scope: 'index' });
  });

  it('should reorder a filtered and coerced table to declaration order', () => {
    const Narrow = defineSchema({
      name: 'Narrow',
      filter: true,
      coerce: true,
      fields: [
        { name: 'b', type: 'integer' },
        { name: 'a', type: 'float' },
      ],
    });
    const table = InMemoryTable.fromColumns({ a: ['1.5'], extra: [true], b: ['2'] });

    const report = engine.validate(Narrow, table);

    expect(report.errors).toEqual([]);
    expect(report.value.columnNames).toEqual(['b', 'a']);
    expect(report.value.column('b')?.values).toEqual([2]);
    expect(report.value.column('a')?.values).toEqual([1.5]);
  });
});

// ============================================================
// Wrapped functions
// ============================================================

describe('Wrapped functions', () => {
  it('should report every violating field in one error', () => {
    const mean = checkSchemas(
      (table: Table) => table.rowCount,
      { parameters: [{ name: 'readings', type: tableOf(Readings) }] },
      { name: 'mean' },
    );

    const error = caught(() => mean(readings([-1.5, 2.5], ['x', 'x'])));

    expect(error.phase).toBe('input');
    expect(error.errors.map((e) => [e.field, e.code])).toEqual([
      ['sensor', 'DUPLICATE_VALUE'],
      ['value', 'GREATER_THAN'],
    ]);
  });

  it('should report a table nested in a sequence the same way as a top-level one', () => {
    const single = checkSchemas((table: Table) => table.rowCount, {
      parameters: [{ name: 'frames', type: tableOf(Readings) }],
    });
    const many = checkSchemas((tables: Table[]) => tables.length, {
      parameters: [{ name: 'frames', type: sequenceOf(tableOf(Readings)) }],
    });
    const bad = readings([-1.5]);

    const topLevel = caught(() => single(bad)).errors;
    const nested = caught(() => many([readings([1.5]), bad])).errors;

    expect(nested).toHaveLength(topLevel.length);
    expect(nested[0]!.location).toBe('argument `frames`[1]');
    expect({ ...nested[0], location: topLevel[0]!.location }).toEqual(topLevel[0]);
  });

  it('should pass output validation for an input returned unchanged under the same schema', () => {
    const identity = checkSchemas((table: Table) => table, {
      parameters: [{ name: 'table', type: tableOf(Readings) }],
      returns: tableOf(Readings),
    });
    const table = readings([0.5, 4.5]);

    expect(identity(table)).toBe(table);
  });
});
