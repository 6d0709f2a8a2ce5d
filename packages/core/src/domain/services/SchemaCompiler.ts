import type { FieldDefinition, SemanticType } from '../model/FieldDefinition.js';
import { DTYPE_FOR_TYPE } from '../model/FieldDefinition.js';
import type { IndexDefinition, SchemaDefinition, SeriesSchemaDefinition, TableCheck } from '../model/Schema.js';
import type { ColumnSelector, FieldSpec, IndexSpec, SchemaModel, SeriesSchemaModel } from '../model/SchemaModel.js';
import type { FieldValue } from '../model/Values.js';
import { SchemaDefinitionError } from '../model/Errors.js';

type FieldRole = 'column' | 'index';

const NUMERIC_TYPES: ReadonlySet<SemanticType> = new Set(['integer', 'float']);
const TEXT_TYPES: ReadonlySet<SemanticType> = new Set(['string', 'categorical']);
const BOUND_KEYS = ['gt', 'ge', 'lt', 'le'] as const;
const STRING_KEYS = ['strContains', 'strStartswith', 'strEndswith'] as const;

function isSemanticType(type: string): type is SemanticType {
  return Object.hasOwn(DTYPE_FOR_TYPE, type);
}

function fitsType(value: FieldValue, type: SemanticType): boolean {
  switch (type) {
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'float':
      return typeof value === 'number' && !Number.isNaN(value);
    case 'string':
    case 'categorical':
      return typeof value === 'string';
    case 'boolean':
      return typeof value === 'boolean';
    case 'datetime':
      return value instanceof Date && !Number.isNaN(value.getTime());
  }
}

/**
 * Compiles declarations into frozen models. Collects every problem in the
 * declaration and raises them together as one `SchemaDefinitionError`.
 */
class SchemaCompiler {
  private readonly problems: string[] = [];

  constructor(private readonly schemaName: string) {}

  compileTable(definition: SchemaDefinition): SchemaModel {
    if (definition.filter === true && definition.strict === false) {
      this.problem('`filter: true` drops undeclared columns but `strict: false` asks to keep them');
    }

    const coerce = definition.coerce ?? false;
    const checkIndexName = definition.checkIndexName ?? false;
    const fields = this.compileFields(definition.fields, coerce);
    const index = this.compileIndex(definition.index, checkIndexName, new Set(fields.map((f) => f.name)));
    const checks = this.compileChecks(definition.checks ?? []);

    this.throwIfInvalid();

    const model: SchemaModel = {
      kind: 'table',
      name: this.schemaName,
      fields,
      index,
      config: Object.freeze({
        strict: definition.strict ?? false,
        filter: definition.filter ?? false,
        coerce,
        checkIndexName,
      }),
      checks,
    };
    return Object.freeze(model);
  }

  compileSeries(definition: SeriesSchemaDefinition): SeriesSchemaModel {
    if (definition.field.alias !== undefined) {
      this.problem(`field '${definition.field.name}': \`alias\` has no meaning on a series`);
    }
    const field = this.compileField(definition.field, definition.coerce ?? false, 'column');
    const index = this.compileIndex(definition.index, definition.checkIndexName ?? false, new Set());

    this.throwIfInvalid();

    const model: SeriesSchemaModel = { kind: 'series', name: this.schemaName, field, index };
    return Object.freeze(model);
  }

  private compileFields(definitions: readonly FieldDefinition[], coerce: boolean): readonly FieldSpec[] {
    const names = new Set<string>();
    const readers = new Map<string, string>();
    const fields: FieldSpec[] = [];

    for (const definition of definitions) {
      if (names.has(definition.name)) {
        this.problem(`duplicate column '${definition.name}'`);
      }
      names.add(definition.name);

      const field = this.compileField(definition, coerce, 'column');
      if (field.selector.kind === 'name') {
        const reader = readers.get(field.selector.column);
        if (reader !== undefined && reader !== field.name) {
          this.problem(`column '${field.selector.column}' is read by both '${reader}' and '${field.name}'`);
        }
        readers.set(field.selector.column, field.name);
      }
      fields.push(field);
    }

    return Object.freeze(fields);
  }

  private compileIndex(
    definition: IndexDefinition | undefined,
    checkIndexName: boolean,
    columnNames: ReadonlySet<string>,
  ): IndexSpec {
    if (!definition) {
      return Object.freeze({ levels: Object.freeze([]), checkIndexName, sorted: false, unique: false });
    }

    const sorted = definition.sorted ?? false;
    const unique = definition.unique ?? false;
    if (definition.levels.length === 0 && (sorted || unique)) {
      this.problem('index options `sorted` / `unique` need at least one declared index level');
    }

    const names = new Set<string>();
    const levels = definition.levels.map((level) => {
      if (names.has(level.name)) this.problem(`duplicate index level '${level.name}'`);
      if (columnNames.has(level.name)) this.problem(`'${level.name}' is declared both as a column and an index level`);
      names.add(level.name);
      return this.compileField(level, false, 'index');
    });

    return Object.freeze({ levels: Object.freeze(levels), checkIndexName, sorted, unique });
  }

  private compileChecks(checks: readonly TableCheck[]): readonly TableCheck[] {
    const names = new Set<string>();
    for (const check of checks) {
      if (typeof check.check !== 'function') this.problem(`table check '${check.name}' is not a function`);
      if (names.has(check.name)) this.problem(`duplicate table check '${check.name}'`);
      names.add(check.name);
    }
    return Object.freeze(checks.map((check) => Object.freeze({ name: check.name, check: check.check })));
  }

  private compileField(definition: FieldDefinition, defaultCoerce: boolean, role: FieldRole): FieldSpec {
    const label = role === 'index' ? `index level '${definition.name}'` : `field '${definition.name}'`;

    if (typeof definition.name !== 'string' || definition.name === '') {
      this.problem(`${role === 'index' ? 'index level' : 'field'} names must be non-empty strings`);
    }

    const type = definition.type;
    if (!isSemanticType(type)) {
      this.problem(`${label}: unsupported type '${String(type)}'`);
    }

    if (role === 'index') {
      if (definition.coerce === true) this.problem(`${label}: coercion is not supported on index levels`);
      if (definition.optional === true) this.problem(`${label}: index levels cannot be optional`);
      if (definition.alias !== undefined) this.problem(`${label}: \`alias\` is only supported on columns`);
    }

    this.checkBounds(definition, label);
    this.checkMembership(definition, label);
    this.checkStringConstraints(definition, label);
    this.checkCategories(definition, label);

    if (definition.check !== undefined && typeof definition.check !== 'function') {
      this.problem(`${label}: \`check\` must be a function`);
    }

    return freezeField({
      name: definition.name,
      type,
      dtype: isSemanticType(type) ? DTYPE_FOR_TYPE[type] : 'object',
      nullable: definition.nullable ?? false,
      optional: definition.optional ?? false,
      unique: definition.unique ?? false,
      coerce: role === 'index' ? false : (definition.coerce ?? defaultCoerce),
      gt: definition.gt,
      ge: definition.ge,
      lt: definition.lt,
      le: definition.le,
      isin: copy(definition.isin),
      notin: copy(definition.notin),
      strContains: definition.strContains,
      strStartswith: definition.strStartswith,
      strEndswith: definition.strEndswith,
      categories: copy(definition.categories),
      check: definition.check
        ? { name: definition.checkName ?? (definition.check.name || 'check'), fn: definition.check }
        : undefined,
      selector: this.compileSelector(definition, label),
    });
  }

  private compileSelector(definition: FieldDefinition, label: string): ColumnSelector {
    if (definition.regex === true && definition.alias === undefined) {
      this.problem(`${label}: \`regex\` requires an \`alias\` pattern`);
    }
    if (definition.alias === undefined) return { kind: 'name', column: definition.name };
    if (definition.alias === '') this.problem(`${label}: \`alias\` must not be empty`);
    if (definition.regex !== true) return { kind: 'name', column: definition.alias };

    try {
      return { kind: 'pattern', pattern: new RegExp(`^(?:${definition.alias})`) };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.problem(`${label}: invalid \`alias\` pattern (${reason})`);
      return { kind: 'name', column: definition.alias };
    }
  }

  private checkBounds(definition: FieldDefinition, label: string): void {
    const declared = BOUND_KEYS.filter((key) => definition[key] !== undefined);
    if (declared.length === 0) return;

    if (!NUMERIC_TYPES.has(definition.type)) {
      this.problem(`${label}: bounds (${declared.join(', ')}) are only valid on integer or float fields`);
      return;
    }
    for (const key of declared) {
      const bound = definition[key];
      if (typeof bound !== 'number' || !Number.isFinite(bound)) {
        this.problem(`${label}: \`${key}\` must be a finite number`);
        return;
      }
    }

    const { gt, ge, lt, le } = definition;
    const empty =
      (gt !== undefined && lt !== undefined && gt >= lt) ||
      (gt !== undefined && le !== undefined && gt >= le) ||
      (ge !== undefined && lt !== undefined && ge >= lt) ||
      (ge !== undefined && le !== undefined && ge > le);
    if (empty) this.problem(`${label}: bounds admit no value`);
  }

  private checkMembership(definition: FieldDefinition, label: string): void {
    for (const key of ['isin', 'notin'] as const) {
      const values = definition[key];
      if (values === undefined) continue;

      if (!Array.isArray(values)) {
        this.problem(`${label}: \`${key}\` must be an array`);
        continue;
      }
      if (key === 'isin' && values.length === 0) {
        this.problem(`${label}: \`isin\` must list at least one value`);
      }
      const wrong = values.filter((value) => !fitsType(value, definition.type));
      if (wrong.length > 0) {
        const listed = wrong.map((v) => String(v)).join(', ');
        this.problem(`${label}: \`${key}\` values ${listed} are not ${definition.type}`);
      }
    }

    const { isin, categories } = definition;
    if (isin && categories) {
      const outside = isin.filter((value) => typeof value !== 'string' || !categories.includes(value));
      if (outside.length > 0) {
        const listed = outside.map((v) => String(v)).join(', ');
        this.problem(`${label}: \`isin\` values ${listed} are not declared categories`);
      }
    }
  }

  private checkStringConstraints(definition: FieldDefinition, label: string): void {
    for (const key of STRING_KEYS) {
      const value = definition[key];
      if (value === undefined) continue;
      if (!TEXT_TYPES.has(definition.type)) {
        this.problem(`${label}: \`${key}\` is only valid on string or categorical fields`);
      } else if (typeof value !== 'string') {
        this.problem(`${label}: \`${key}\` must be a string`);
      }
    }
  }

  private checkCategories(definition: FieldDefinition, label: string): void {
    const { categories } = definition;
    if (categories === undefined) return;

    if (definition.type !== 'categorical') {
      this.problem(`${label}: \`categories\` is only valid on categorical fields`);
      return;
    }
    if (categories.length === 0 || categories.some((c) => typeof c !== 'string')) {
      this.problem(`${label}: \`categories\` must be a non-empty list of strings`);
    } else if (new Set(categories).size !== categories.length) {
      this.problem(`${label}: \`categories\` must not repeat`);
    }
  }

  private problem(message: string): void {
    this.problems.push(message);
  }

  private throwIfInvalid(): void {
    if (this.problems.length > 0) {
      throw new SchemaDefinitionError(this.schemaName, this.problems);
    }
  }
}

function copy<T>(values: readonly T[] | undefined): readonly T[] | undefined {
  return Array.isArray(values) ? [...values] : values;
}

function freezeField(field: FieldSpec): FieldSpec {
  if (field.isin) Object.freeze(field.isin);
  if (field.notin) Object.freeze(field.notin);
  if (field.categories) Object.freeze(field.categories);
  if (field.check) Object.freeze(field.check);
  Object.freeze(field.selector);
  return Object.freeze(field);
}

/**
 * Compile a table schema once, at declaration time.
 *
 * @throws SchemaDefinitionError when the declaration is malformed.
 *
 * @example
 * ```typescript
 * const Orders = defineSchema({
 *   name: 'Orders',
 *   fields: [
 *     { name: 'id', type: 'integer', unique: true },
 *     { name: 'amount', type: 'float', gt: 0 },
 *   ],
 *   strict: true,
 * });
 * ```
 */
export function defineSchema(definition: SchemaDefinition): SchemaModel {
  return new SchemaCompiler(definition.name).compileTable(definition);
}

/** Compile a single-series schema once, at declaration time. */
export function defineSeriesSchema(definition: SeriesSchemaDefinition): SeriesSchemaModel {
  return new SchemaCompiler(definition.name).compileSeries(definition);
}
