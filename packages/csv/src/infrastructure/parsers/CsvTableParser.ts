import Papa from 'papaparse';
import type { CastResult, DType, SemanticType } from '@framecheck/core';
import { InMemoryTable, coerceValue } from '@framecheck/core';
import type { DetectedOptions, TableParser } from '../../domain/ports/TableParser.js';

/** Options for `CsvTableParser`. */
export interface CsvTableParserOptions {
  /** Column delimiter. Default: detected by PapaParse. */
  readonly delimiter?: string;
  /** Columns moved into the row index, outermost first. Default: none (a range index). */
  readonly indexColumns?: readonly string[];
  /** Dtype per column, overriding inference. Cells that do not convert raise a `TypeError`. */
  readonly dtypes?: Readonly<Record<string, DType>>;
}

const SEMANTIC_FOR_DTYPE: Readonly<Record<DType, SemanticType | null>> = {
  int64: 'integer',
  float64: 'float',
  string: 'string',
  bool: 'boolean',
  datetime: 'datetime',
  category: 'categorical',
  object: null,
};

const CANDIDATE_DELIMITERS = [',', ';', '\t', '|'] as const;

const BOOLEAN_PATTERN = /^(?:true|false)$/i;

/** Inference order: the first dtype every present cell converts to wins. */
const INFERRED: readonly DType[] = ['int64', 'float64', 'bool', 'datetime'];

function convert(cell: string, dtype: DType): CastResult {
  const type = SEMANTIC_FOR_DTYPE[dtype];
  if (type === null || type === 'categorical') return { ok: true, value: cell };
  if (type === 'boolean' && !BOOLEAN_PATTERN.test(cell.trim())) return { ok: false };
  return coerceValue(cell, type);
}

/**
 * CSV adapter using PapaParse. The first row is the header; empty cells are
 * missing values. Column dtypes are inferred (`int64`, `float64`, `bool`,
 * `datetime`, else `string`) unless given in `dtypes`.
 *
 * @example
 * ```typescript
 * const parser = new CsvTableParser({ indexColumns: ['id'] });
 * const table = parser.parse('id,amount\n1,9.5\n2,3\n');
 * ```
 */
export class CsvTableParser implements TableParser {
  private readonly options: CsvTableParserOptions;

  constructor(options?: CsvTableParserOptions) {
    this.options = {
      delimiter: options?.delimiter,
      indexColumns: options?.indexColumns ?? [],
      dtypes: options?.dtypes ?? {},
    };
  }

  parse(data: string | Buffer): InMemoryTable {
    const content = typeof data === 'string' ? data : data.toString('utf-8');

    const result = Papa.parse<string[]>(content, {
      header: false,
      delimiter: this.options.delimiter || undefined,
      skipEmptyLines: true,
      dynamicTyping: false,
    });

    const parseError = result.errors.find((error) => error.type !== 'Delimiter');
    if (parseError) {
      throw new Error(`Malformed CSV: ${parseError.message}`);
    }

    const [header, ...rows] = result.data;
    if (!header) return InMemoryTable.fromColumns({});

    const repeated = header.find((name, position) => header.indexOf(name) !== position);
    if (repeated !== undefined) {
      throw new RangeError(`CSV header repeats column '${repeated}'`);
    }

    rows.forEach((row, position) => {
      if (row.length !== header.length) {
        throw new RangeError(`CSV row ${position + 1} has ${row.length} field(s), expected ${header.length}`);
      }
    });

    const columns: Record<string, unknown[]> = {};
    const dtypes: Record<string, DType> = {};
    header.forEach((name, column) => {
      const cells = rows.map((row) => row[column] ?? '');
      const dtype = this.options.dtypes?.[name] ?? this.inferColumn(cells);
      dtypes[name] = dtype;
      columns[name] = cells.map((cell, row) => {
        if (cell === '') return null;
        const converted = convert(cell, dtype);
        if (!converted.ok) {
          throw new TypeError(`CSV column '${name}' value '${cell}' at row ${row} cannot be read as ${dtype}`);
        }
        return converted.value;
      });
    });

    const table = InMemoryTable.fromColumns(columns, { dtypes });
    const indexColumns = this.options.indexColumns ?? [];
    return indexColumns.length > 0 ? table.setIndex(indexColumns) : table;
  }

  detect(sample: string | Buffer): DetectedOptions {
    const content = typeof sample === 'string' ? sample : sample.toString('utf-8');
    const { meta } = Papa.parse<string[]>(content, {
      header: false,
      preview: 5,
      skipEmptyLines: true,
      delimitersToGuess: [...CANDIDATE_DELIMITERS],
    });
    return { delimiter: meta.delimiter || Papa.DefaultDelimiter };
  }

  private inferColumn(cells: readonly string[]): DType {
    const present = cells.filter((cell) => cell !== '');
    if (present.length === 0) return 'float64';
    return INFERRED.find((dtype) => present.every((cell) => convert(cell, dtype).ok)) ?? 'string';
  }
}
