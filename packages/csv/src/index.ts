export { CsvTableParser } from './infrastructure/parsers/CsvTableParser.js';
export type { CsvTableParserOptions } from './infrastructure/parsers/CsvTableParser.js';
export type { TableParser, DetectedOptions } from './domain/ports/TableParser.js';
