import type { FieldSpec } from '../model/SchemaModel.js';
import type { ConstraintViolationCode } from '../model/ValidationResult.js';
import type { FieldValue } from '../model/Values.js';
import { formatValue, valueKey } from '../model/Values.js';

/** A per-row constraint derived from a field's declaration. Missing cells are never passed to `test`. */
export interface ValueConstraint {
  readonly code: ConstraintViolationCode;
  /** The constraint as declared, e.g. `gt=0`. */
  readonly label: string;
  readonly test: (value: unknown) => boolean;
}

function numeric(test: (n: number) => boolean): (value: unknown) => boolean {
  return (value) => typeof value === 'number' && test(value);
}

function text(test: (s: string) => boolean): (value: unknown) => boolean {
  return (value) => typeof value === 'string' && test(value);
}

function listLabel(values: readonly FieldValue[]): string {
  return `[${values.map((v) => formatValue(v)).join(', ')}]`;
}

/**
 * Row-level constraints declared on a field, in evaluation order:
 * `gt`, `ge`, `lt`, `le`, `isin`, `notin`, `strContains`, `strStartswith`, `strEndswith`.
 */
export function valueConstraints(field: FieldSpec): readonly ValueConstraint[] {
  const constraints: ValueConstraint[] = [];
  const { gt, ge, lt, le, isin, notin, strContains, strStartswith, strEndswith } = field;

  if (gt !== undefined) constraints.push({ code: 'GREATER_THAN', label: `gt=${gt}`, test: numeric((n) => n > gt) });
  if (ge !== undefined) {
    constraints.push({ code: 'GREATER_THAN_OR_EQUAL', label: `ge=${ge}`, test: numeric((n) => n >= ge) });
  }
  if (lt !== undefined) constraints.push({ code: 'LESS_THAN', label: `lt=${lt}`, test: numeric((n) => n < lt) });
  if (le !== undefined) {
    constraints.push({ code: 'LESS_THAN_OR_EQUAL', label: `le=${le}`, test: numeric((n) => n <= le) });
  }
  if (isin !== undefined) {
    const allowed = new Set(isin.map((v) => valueKey(v)));
    constraints.push({ code: 'ISIN', label: `isin=${listLabel(isin)}`, test: (v) => allowed.has(valueKey(v)) });
  }
  if (notin !== undefined) {
    const forbidden = new Set(notin.map((v) => valueKey(v)));
    constraints.push({ code: 'NOTIN', label: `notin=${listLabel(notin)}`, test: (v) => !forbidden.has(valueKey(v)) });
  }
  if (strContains !== undefined) {
    constraints.push({
      code: 'STR_CONTAINS',
      label: `strContains=${formatValue(strContains)}`,
      test: text((s) => s.includes(strContains)),
    });
  }
  if (strStartswith !== undefined) {
    constraints.push({
      code: 'STR_STARTSWITH',
      label: `strStartswith=${formatValue(strStartswith)}`,
      test: text((s) => s.startsWith(strStartswith)),
    });
  }
  if (strEndswith !== undefined) {
    constraints.push({
      code: 'STR_ENDSWITH',
      label: `strEndswith=${formatValue(strEndswith)}`,
      test: text((s) => s.endsWith(strEndswith)),
    });
  }

  return constraints;
}
