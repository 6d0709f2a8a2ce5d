import { describe, it, expect } from 'vitest';
import { InMemoryTable } from '../../../src/infrastructure/tables/InMemoryTable.js';
import { InMemorySeries } from '../../../src/infrastructure/tables/InMemorySeries.js';
import { createColumn, inferDType } from '../../../src/infrastructure/tables/columns.js';
import { isSeries, isTable } from '../../../src/domain/ports/Table.js';

describe('inferDType', () => {
  it('should pick the narrowest dtype that fits every present value', () => {
    expect(inferDType([1, 2, null])).toBe('int64');
    expect(inferDType([1, 2.5])).toBe('float64');
    expect(inferDType(['a', undefined])).toBe('string');
    expect(inferDType([true, false])).toBe('bool');
    expect(inferDType([new Date('2024-01-01')])).toBe('datetime');
    expect(inferDType([1, 'a'])).toBe('object');
    expect(inferDType([null, Number.NaN])).toBe('object');
  });
});

describe('createColumn', () => {
  it('should reject a value that does not fit an explicit dtype', () => {
    expect(() => createColumn('n', [1, 'two'], 'int64')).toThrow(
      new TypeError("Column 'n' value 'two' at row 1 does not fit dtype int64"),
    );
  });

  it('should reject a value outside the declared categories', () => {
    expect(() => createColumn('size', ['S', 'XL'], undefined, ['S', 'M'])).toThrow(
      "Column 'size' value 'XL' at row 1 is not one of its categories",
    );
  });

  it('should derive sorted categories for a category column', () => {
    expect(createColumn('size', ['M', 'S', 'M'], 'category').categories).toEqual(['M', 'S']);
  });
});

describe('InMemoryTable', () => {
  describe('fromColumns', () => {
    it('should keep column order and give a default range index', () => {
      const table = InMemoryTable.fromColumns({ b: [1, 2], a: ['x', 'y'] });

      expect(table.columnNames).toEqual(['b', 'a']);
      expect(table.rowCount).toBe(2);
      expect(table.index).toEqual([{ name: null, dtype: 'int64', values: [0, 1] }]);
      expect(table.column('b')?.dtype).toBe('int64');
      expect(table.column('missing')).toBeUndefined();
    });

    it('should apply explicit dtypes and categories', () => {
      const table = InMemoryTable.fromColumns(
        { n: [1, 2], size: ['S', 'M'] },
        { dtypes: { n: 'float64' }, categories: { size: ['S', 'M', 'L'] } },
      );

      expect(table.column('n')?.dtype).toBe('float64');
      expect(table.column('size')).toEqual({
        name: 'size',
        dtype: 'category',
        values: ['S', 'M'],
        categories: ['S', 'M', 'L'],
      });
    });

    it('should reject columns of different lengths', () => {
      expect(() => InMemoryTable.fromColumns({ a: [1, 2], b: [1] })).toThrow(
        new RangeError("Column 'b' has 1 value(s), expected 2"),
      );
    });

    it('should reject an index of the wrong length', () => {
      expect(() => InMemoryTable.fromColumns({ a: [1, 2] }, { index: [{ name: 'id', values: [1] }] })).toThrow(
        'Index level id has 1 value(s), expected 2',
      );
    });

    it('should take the row count from the index when there are no columns', () => {
      const table = InMemoryTable.fromColumns({}, { index: [{ name: 'id', values: ['a', 'b', 'c'] }] });

      expect(table.rowCount).toBe(3);
      expect(table.index[0]?.dtype).toBe('string');
    });
  });

  describe('fromRecords', () => {
    it('should collect keys in first-seen order and fill absent keys with null', () => {
      const table = InMemoryTable.fromRecords([{ a: 1 }, { b: 'x', a: 2 }]);

      expect(table.columnNames).toEqual(['a', 'b']);
      expect(table.column('b')?.values).toEqual([null, 'x']);
      expect(table.toRecords()).toEqual([
        { a: 1, b: null },
        { a: 2, b: 'x' },
      ]);
    });
  });

  describe('withColumns', () => {
    it('should keep the index and leave the original untouched', () => {
      const table = InMemoryTable.fromColumns({ a: [1, 2] }, { index: [{ name: 'id', values: [10, 11] }] });

      const next = table.withColumns([{ name: 'z', dtype: 'string', values: ['p', 'q'] }]);

      expect(next.columnNames).toEqual(['z']);
      expect(next.index).toEqual(table.index);
      expect(table.columnNames).toEqual(['a']);
    });
  });

  describe('setIndex', () => {
    it('should move the named columns into the index', () => {
      const table = InMemoryTable.fromColumns({ region: ['n', 's'], day: [1, 2], sales: [3.5, 4.5] });

      const indexed = table.setIndex(['region', 'day']);

      expect(indexed.columnNames).toEqual(['sales']);
      expect(indexed.index.map((level) => [level.name, level.dtype])).toEqual([
        ['region', 'string'],
        ['day', 'int64'],
      ]);
    });

    it('should reject an unknown column', () => {
      expect(() => InMemoryTable.fromColumns({ a: [1] }).setIndex(['b'])).toThrow(
        "Cannot index by unknown column 'b'",
      );
    });
  });

  it('should satisfy the table guard but not the series guard', () => {
    const table = InMemoryTable.fromColumns({ a: [1] });

    expect(isTable(table)).toBe(true);
    expect(isSeries(table)).toBe(false);
  });
});

describe('InMemorySeries', () => {
  it('should infer its dtype and default to a range index', () => {
    const series = InMemorySeries.of([1.5, 2], { name: 'price' });

    expect(series.dtype).toBe('float64');
    expect(series.index[0]?.values).toEqual([0, 1]);
    expect(isSeries(series)).toBe(true);
    expect(isTable(series)).toBe(false);
  });

  it('should replace its data but keep name and index', () => {
    const series = InMemorySeries.of(['1', '2'], { name: 'n', index: [{ name: 'day', values: ['mon', 'tue'] }] });

    const next = series.withData({ dtype: 'int64', values: [1, 2] });

    expect(next.name).toBe('n');
    expect(next.dtype).toBe('int64');
    expect(next.index).toBe(series.index);
    expect(() => series.withData({ dtype: 'int64', values: [1] })).toThrow(
      'Series data has 1 value(s), expected 2',
    );
  });
});
