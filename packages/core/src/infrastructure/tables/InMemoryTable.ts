import type { ColumnData, DType, IndexLevel, Table } from '../../domain/ports/Table.js';
import type { IndexLevelInput } from './columns.js';
import { createColumn, createIndexLevel, rangeIndex } from './columns.js';

/** Options for building an `InMemoryTable`. */
export interface TableOptions {
  /** Explicit dtype per column. Columns not listed are inferred from their values. */
  readonly dtypes?: Readonly<Record<string, DType>>;
  /** Category set per `category` column. Listing a column here makes it `category`. */
  readonly categories?: Readonly<Record<string, readonly string[]>>;
  /** Row index, outermost level first. Default: one unnamed level `0..rowCount-1`. */
  readonly index?: readonly IndexLevelInput[];
}

/**
 * Immutable column-oriented table implementing the `Table` port.
 *
 * @example
 * ```typescript
 * const table = InMemoryTable.fromColumns(
 *   { col1: [1, 2], col3: [-1.5, 2.5] },
 *   { index: [{ name: 'id', values: [10, 11] }] },
 * );
 * ```
 */
export class InMemoryTable implements Table {
  readonly columnNames: readonly string[];

  private constructor(
    private readonly columns: ReadonlyMap<string, ColumnData>,
    readonly index: readonly IndexLevel[],
    readonly rowCount: number,
  ) {
    this.columnNames = Object.freeze([...columns.keys()]);
  }

  /** Build a table from a name → values mapping. Column order follows the object's key order. */
  static fromColumns(data: Readonly<Record<string, readonly unknown[]>>, options: TableOptions = {}): InMemoryTable {
    const columns = Object.entries(data).map(([name, values]) =>
      createColumn(name, values, options.dtypes?.[name], options.categories?.[name]),
    );
    return InMemoryTable.assemble(columns, options.index);
  }

  /**
   * Build a table from row objects. Columns appear in the order their keys are
   * first seen; a key absent from a row is a missing (`null`) cell.
   */
  static fromRecords(
    records: readonly Readonly<Record<string, unknown>>[],
    options: TableOptions = {},
  ): InMemoryTable {
    const names: string[] = [];
    const seen = new Set<string>();
    for (const record of records) {
      for (const name of Object.keys(record)) {
        if (!seen.has(name)) {
          seen.add(name);
          names.push(name);
        }
      }
    }

    const data: Record<string, unknown[]> = {};
    for (const name of names) {
      data[name] = records.map((record) => (name in record ? record[name] : null));
    }
    return InMemoryTable.fromColumns(data, options);
  }

  private static assemble(columns: readonly ColumnData[], indexInput?: readonly IndexLevelInput[]): InMemoryTable {
    const byName = new Map<string, ColumnData>();
    for (const column of columns) {
      if (byName.has(column.name)) throw new RangeError(`Duplicate column '${column.name}'`);
      byName.set(column.name, column);
    }

    const index = indexInput ? indexInput.map((level) => createIndexLevel(level)) : null;
    const rowCount = columns[0]?.values.length ?? index?.[0]?.values.length ?? 0;

    for (const column of columns) {
      if (column.values.length !== rowCount) {
        throw new RangeError(`Column '${column.name}' has ${column.values.length} value(s), expected ${rowCount}`);
      }
    }
    if (index) {
      if (index.length === 0) throw new RangeError('An index needs at least one level');
      for (const level of index) {
        if (level.values.length !== rowCount) {
          const label = level.name ?? '(unnamed)';
          throw new RangeError(`Index level ${label} has ${level.values.length} value(s), expected ${rowCount}`);
        }
      }
    }

    return new InMemoryTable(byName, index ? Object.freeze(index) : rangeIndex(rowCount), rowCount);
  }

  column(name: string): ColumnData | undefined {
    return this.columns.get(name);
  }

  withColumns(columns: readonly ColumnData[]): InMemoryTable {
    return InMemoryTable.assemble(columns, this.index);
  }

  /** Move the named columns into the row index, replacing the current one. */
  setIndex(names: readonly string[]): InMemoryTable {
    const levels = names.map((name) => {
      const column = this.columns.get(name);
      if (!column) throw new RangeError(`Cannot index by unknown column '${name}'`);
      return { name, values: column.values, dtype: column.dtype };
    });
    const remaining = this.columnNames.filter((name) => !names.includes(name)).map((name) => this.columns.get(name));
    return InMemoryTable.assemble(
      remaining.filter((column): column is ColumnData => column !== undefined),
      levels.length > 0 ? levels : undefined,
    );
  }

  /** Rows as plain objects keyed by column name. The index is not included. */
  toRecords(): Record<string, unknown>[] {
    return Array.from({ length: this.rowCount }, (_, row) => {
      const record: Record<string, unknown> = {};
      for (const name of this.columnNames) {
        record[name] = this.columns.get(name)?.values[row];
      }
      return record;
    });
  }
}
