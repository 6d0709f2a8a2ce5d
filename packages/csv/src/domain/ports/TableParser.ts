import type { Table } from '@framecheck/core';

/** Parser options that can be detected from a sample of the data. */
export interface DetectedOptions {
  /** Column delimiter character (e.g. `','`, `';'`, `'\t'`). */
  readonly delimiter: string;
}

/**
 * Port for turning serialized tabular text into a `Table`.
 *
 * Parsers work on data already in memory; reading files or streams is up to
 * the caller.
 */
export interface TableParser {
  /** Parse the whole input into one table. */
  parse(data: string | Buffer): Table;
  /** Detect parser options from a small sample of data. */
  detect?(sample: string | Buffer): DetectedOptions;
}
