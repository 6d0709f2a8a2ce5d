import type { DType, IndexLevel, Series, SeriesData } from '../../domain/ports/Table.js';
import type { IndexLevelInput } from './columns.js';
import { createColumn, createIndexLevel, rangeIndex } from './columns.js';

/** Options for building an `InMemorySeries`. */
export interface SeriesOptions {
  readonly name?: string | null;
  /** Element dtype. Inferred from the values when omitted. */
  readonly dtype?: DType;
  readonly categories?: readonly string[];
  /** Row index, outermost level first. Default: one unnamed level `0..length-1`. */
  readonly index?: readonly IndexLevelInput[];
}

/** Immutable single-column value implementing the `Series` port. */
export class InMemorySeries implements Series {
  private constructor(
    readonly name: string | null,
    readonly dtype: DType,
    readonly values: readonly unknown[],
    readonly categories: readonly string[] | undefined,
    readonly index: readonly IndexLevel[],
  ) {}

  static of(values: readonly unknown[], options: SeriesOptions = {}): InMemorySeries {
    const name = options.name ?? null;
    const column = createColumn(name ?? 'series', values, options.dtype, options.categories);
    const index = options.index ? options.index.map((level) => createIndexLevel(level)) : rangeIndex(values.length);
    for (const level of index) {
      if (level.values.length !== values.length) {
        throw new RangeError(`Index level has ${level.values.length} value(s), expected ${values.length}`);
      }
    }
    return new InMemorySeries(name, column.dtype, column.values, column.categories, index);
  }

  withData(data: SeriesData): InMemorySeries {
    if (data.values.length !== this.values.length) {
      throw new RangeError(`Series data has ${data.values.length} value(s), expected ${this.values.length}`);
    }
    return new InMemorySeries(this.name, data.dtype, data.values, data.categories, this.index);
  }
}
