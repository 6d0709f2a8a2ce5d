import { describe, it, expect, vi } from 'vitest';
import { checkSchemas, checkSchemasAsync } from '../../src/checkSchemas.js';
import { defineSchema } from '../../src/domain/services/SchemaCompiler.js';
import { AggregateValidationError } from '../../src/domain/model/Errors.js';
import { sequenceOf, tableOf } from '../../src/domain/model/Annotation.js';
import { EventBus } from '../../src/application/EventBus.js';
import { InMemoryTable } from '../../src/infrastructure/tables/InMemoryTable.js';
import type { Table } from '../../src/domain/ports/Table.js';

const Sales = defineSchema({
  name: 'Sales',
  fields: [
    { name: 'region', type: 'string' },
    { name: 'amount', type: 'float', gt: 0 },
  ],
});

const Summary = defineSchema({
  name: 'Summary',
  fields: [{ name: 'total', type: 'float', ge: 0 }],
});

function sales(amounts: number[]): InMemoryTable {
  return InMemoryTable.fromColumns(
    { region: amounts.map(() => 'north'), amount: amounts },
    { dtypes: { amount: 'float64' } },
  );
}

function sumAmounts(table: Table): number {
  return (table.column('amount')?.values ?? []).reduce<number>(
    (sum, value) => sum + (typeof value === 'number' ? value : 0),
    0,
  );
}

function caught(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
}

describe('checkSchemas', () => {
  describe('arguments', () => {
    it('should call the body with conforming arguments', () => {
      const body = vi.fn(sumAmounts);
      const total = checkSchemas(body, { parameters: [{ name: 'sales', type: tableOf(Sales) }] });
      const table = sales([1.5, 2.5]);

      expect(total(table)).toBe(4);
      expect(body).toHaveBeenCalledWith(table);
    });

    it('should not run the body when an argument fails', () => {
      const body = vi.fn(sumAmounts);
      const total = checkSchemas(body, { parameters: [{ name: 'sales', type: tableOf(Sales) }] });

      const error = caught(() => total(sales([1.5, -2.5])));

      expect(body).not.toHaveBeenCalled();
      expect(error).toBeInstanceOf(AggregateValidationError);
      expect(error).toMatchObject({ phase: 'input' });
    });

    it('should gather the issues of every parameter into one error', () => {
      const compare = checkSchemas(
        (left: Table, right: Table) => sumAmounts(left) - sumAmounts(right),
        {
          parameters: [
            { name: 'left', type: tableOf(Sales) },
            { name: 'right', type: tableOf(Sales) },
          ],
        },
        { name: 'compare' },
      );

      const error = caught(() => compare(sales([-1]), InMemoryTable.fromColumns({ amount: [1.5] })));

      expect(error).toBeInstanceOf(AggregateValidationError);
      if (error instanceof AggregateValidationError) {
        expect(error.errors.map((e) => e.location)).toEqual(['argument `left`', 'argument `right`']);
        expect(error.message).toBe(
          [
            "Validation of the arguments of 'compare' failed with 2 error(s):",
            "  - argument `left`: Column 'amount' failed gt=0 for 1 row(s): row 0 (-1)",
            "  - argument `right`: Column 'region' declared in schema 'Sales' was not found",
          ].join('\n'),
        );
      }
    });

    it('should locate failures inside nested arguments', () => {
      const totals = checkSchemas((batches: Table[]) => batches.map(sumAmounts), {
        parameters: [{ name: 'batches', type: sequenceOf(tableOf(Sales)) }],
      });

      const error = caught(() => totals([sales([1]), sales([2, -3])]));

      expect(error).toBeInstanceOf(AggregateValidationError);
      if (error instanceof AggregateValidationError) {
        expect(error.errors.map((e) => e.location)).toEqual(['argument `batches`[1]']);
      }
    });

    it('should inspect an omitted declared parameter as undefined', () => {
      const count = checkSchemas((table?: Table) => table?.rowCount ?? 0, {
        parameters: [{ name: 'table', type: tableOf(Sales) }],
      });

      const error = caught(() => count());

      expect(error).toBeInstanceOf(AggregateValidationError);
      if (error instanceof AggregateValidationError) {
        expect(error.errors[0]!.message).toBe("Expected a table for schema 'Sales' but got undefined");
      }
    });

    it('should pass undeclared and untyped arguments through', () => {
      const label = checkSchemas(
        (table: Table, prefix: string, suffix: string) => `${prefix}${table.rowCount}${suffix}`,
        { parameters: [{ name: 'table', type: tableOf(Sales) }, { name: 'prefix' }] },
      );

      expect(label(sales([1]), 'rows=', '!')).toBe('rows=1!');
    });

    it('should hand the coerced table to the body', () => {
      const Loose = defineSchema({ name: 'Loose', coerce: true, fields: [{ name: 'amount', type: 'float' }] });
      const body = vi.fn((table: Table) => table.column('amount')?.dtype);
      const dtypeOf = checkSchemas(body, { parameters: [{ name: 'table', type: tableOf(Loose) }] });
      const raw = InMemoryTable.fromColumns({ amount: ['1.5', '2'] });

      expect(dtypeOf(raw)).toBe('float64');
      expect(body.mock.calls[0]![0]).not.toBe(raw);
    });
  });

  describe('receiver', () => {
    it('should call a wrapped method on the object it is invoked on', () => {
      const pricing = {
        factor: 2,
        total(table: Table): number {
          return sumAmounts(table) * this.factor;
        },
      };
      pricing.total = checkSchemas(pricing.total, { parameters: [{ name: 'sales', type: tableOf(Sales) }] });

      expect(pricing.total(sales([1.5, 2.5]))).toBe(8);
    });
  });

  describe('return value', () => {
    it('should check the return value after the body ran', () => {
      const sideEffects: string[] = [];
      const summarize = checkSchemas(
        (table: Table) => {
          sideEffects.push('ran');
          return InMemoryTable.fromColumns({ total: [sumAmounts(table) - 100] });
        },
        { parameters: [{ name: 'sales', type: tableOf(Sales) }], returns: tableOf(Summary) },
        { name: 'summarize' },
      );

      const error = caught(() => summarize(sales([1.5])));

      expect(sideEffects).toEqual(['ran']);
      expect(error).toBeInstanceOf(AggregateValidationError);
      if (error instanceof AggregateValidationError) {
        expect(error.phase).toBe('output');
        expect(error.message).toBe(
          [
            "Validation of the return value of 'summarize' failed with 1 error(s):",
            "  - return value: Column 'total' failed ge=0 for 1 row(s): row 0 (-98.5)",
          ].join('\n'),
        );
      }
    });

    it('should return the value unchanged when it conforms', () => {
      const result = InMemoryTable.fromColumns({ total: [3.5] });
      const produce = checkSchemas(() => result, { returns: tableOf(Summary) });

      expect(produce()).toBe(result);
    });
  });

  describe('events', () => {
    it('should publish call:rejected before throwing', () => {
      const events = new EventBus();
      const rejected = vi.fn();
      events.on('call:rejected', rejected);
      const total = checkSchemas(sumAmounts, { parameters: [{ name: 'sales', type: tableOf(Sales) }] }, { events });

      caught(() => total(sales([-1, -2])));

      expect(rejected).toHaveBeenCalledWith(
        expect.objectContaining({ type: 'call:rejected', functionName: 'sumAmounts', phase: 'input', errorCount: 1 }),
      );
    });

    it('should forward the engine events to the same publisher', () => {
      const events = new EventBus();
      const validated = vi.fn();
      events.on('table:validated', validated);
      const total = checkSchemas(sumAmounts, { parameters: [{ name: 'sales', type: tableOf(Sales) }] }, { events });

      total(sales([1]));

      expect(validated).toHaveBeenCalledWith(
        expect.objectContaining({ schema: 'Sales', location: 'argument `sales`', rowCount: 1, errorCount: 0 }),
      );
    });
  });
});

describe('checkSchemasAsync', () => {
  it('should reject without calling the body when an argument fails', async () => {
    const body = vi.fn(async (table: Table) => sumAmounts(table));
    const total = checkSchemasAsync(body, { parameters: [{ name: 'sales', type: tableOf(Sales) }] });

    await expect(total(sales([-1]))).rejects.toBeInstanceOf(AggregateValidationError);
    expect(body).not.toHaveBeenCalled();
  });

  it('should call a wrapped async method on the object it is invoked on', async () => {
    const pricing = {
      factor: 3,
      async total(table: Table): Promise<number> {
        return sumAmounts(table) * this.factor;
      },
    };
    pricing.total = checkSchemasAsync(pricing.total, { parameters: [{ name: 'sales', type: tableOf(Sales) }] });

    await expect(pricing.total(sales([1.5]))).resolves.toBe(4.5);
  });

  it('should check the resolved value', async () => {
    const summarize = checkSchemasAsync(
      async (table: Table) => InMemoryTable.fromColumns({ total: [sumAmounts(table)] }),
      { parameters: [{ name: 'sales', type: tableOf(Sales) }], returns: tableOf(Summary) },
    );

    const result = await summarize(sales([1.5, 2]));

    expect(result.column('total')?.values).toEqual([3.5]);
  });

  it('should reject with phase output when the resolved value fails', async () => {
    const broken = checkSchemasAsync(async () => InMemoryTable.fromColumns({ total: ['many'] }), {
      returns: tableOf(Summary),
    });

    await expect(broken()).rejects.toMatchObject({ phase: 'output' });
  });
});
