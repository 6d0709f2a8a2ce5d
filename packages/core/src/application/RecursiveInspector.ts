import type { Annotation } from '../domain/model/Annotation.js';
import type { StructuralErrorCode, ValidationError } from '../domain/model/ValidationResult.js';
import type { Series, Table } from '../domain/ports/Table.js';
import { ValidationContext } from '../domain/model/ValidationContext.js';
import { describeValue } from '../domain/model/Values.js';
import { isSeries, isTable } from '../domain/ports/Table.js';
import type { ValidationEngine } from '../domain/services/ValidationEngine.js';

/** Outcome of inspecting one value: the (possibly rebuilt) value and every issue found inside it. */
export interface InspectionResult {
  readonly value: unknown;
  readonly errors: readonly ValidationError[];
}

/** Configuration for `RecursiveInspector`. */
export interface InspectorConfig {
  /** Maximum container nesting (plus lazy resolutions) followed on one path. Default: `64`. */
  readonly maxDepth?: number;
}

/** Runtime shape of a value, as far as the inspector cares. */
type Classified =
  | { readonly kind: 'table'; readonly value: Table }
  | { readonly kind: 'series'; readonly value: Series }
  | { readonly kind: 'sequence'; readonly value: readonly unknown[] }
  | { readonly kind: 'map'; readonly value: ReadonlyMap<unknown, unknown> }
  | { readonly kind: 'record'; readonly value: object }
  | { readonly kind: 'scalar'; readonly value: unknown };

function classify(value: unknown): Classified {
  if (isTable(value)) return { kind: 'table', value };
  if (isSeries(value)) return { kind: 'series', value };
  if (Array.isArray(value)) return { kind: 'sequence', value };
  if (value instanceof Map) return { kind: 'map', value };
  if (typeof value === 'object' && value !== null) {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto === Object.prototype || proto === null) return { kind: 'record', value };
  }
  return { kind: 'scalar', value };
}

const VALUE_FIELD = '<value>';

/** Per-inspection state: issues found so far and the containers on the current path. */
interface Walk {
  readonly errors: ValidationError[];
  readonly ancestors: Set<object>;
}

/**
 * Walks a value together with its annotation and validates every table or
 * series the annotation points at, wherever it sits in nested arrays, maps and
 * plain objects.
 *
 * Depth-first and annotation-guided: parts annotated `unchecked`, or not
 * reachable from an annotation, are never looked at. Containers are only
 * copied when something inside them was replaced by a coerced or filtered
 * table; otherwise the original objects are returned.
 */
export class RecursiveInspector {
  private readonly maxDepth: number;

  constructor(
    private readonly engine: ValidationEngine,
    config?: InspectorConfig,
  ) {
    this.maxDepth = config?.maxDepth ?? 64;
  }

  inspect(
    value: unknown,
    annotation: Annotation,
    context: ValidationContext = ValidationContext.root(),
  ): InspectionResult {
    const walk: Walk = { errors: [], ancestors: new Set() };
    const result = this.visit(value, annotation, context, 0, walk);
    return { value: result, errors: walk.errors };
  }

  private visit(
    value: unknown,
    annotation: Annotation,
    context: ValidationContext,
    depth: number,
    walk: Walk,
  ): unknown {
    switch (annotation.kind) {
      case 'unchecked':
        return value;

      case 'optional':
        if (value === null || value === undefined) return value;
        return this.visit(value, annotation.inner, context, depth, walk);

      case 'lazy':
        if (!this.enter(depth, context, walk)) return value;
        return this.visit(value, annotation.resolve(), context, depth + 1, walk);

      case 'table': {
        const shape = classify(value);
        if (shape.kind !== 'table') {
          this.structural(
            walk,
            'NOT_A_TABLE',
            context,
            `Expected a table for schema '${annotation.schema.name}' but got ${describeValue(value)}`,
            annotation.schema.name,
          );
          return value;
        }
        const report = this.engine.validate(annotation.schema, shape.value, context);
        walk.errors.push(...report.errors);
        return report.value;
      }

      case 'series': {
        const shape = classify(value);
        if (shape.kind !== 'series') {
          this.structural(
            walk,
            'NOT_A_SERIES',
            context,
            `Expected a series for schema '${annotation.schema.name}' but got ${describeValue(value)}`,
            annotation.schema.name,
          );
          return value;
        }
        const report = this.engine.validateSeries(annotation.schema, shape.value, context);
        walk.errors.push(...report.errors);
        return report.value;
      }

      case 'sequence': {
        const shape = classify(value);
        if (shape.kind !== 'sequence') {
          this.structural(walk, 'NOT_A_SEQUENCE', context, `Expected an array but got ${describeValue(value)}`);
          return value;
        }
        const items = shape.value;
        return this.within(items, depth, context, walk, () =>
          this.rebuildArray(items, (item, position) =>
            this.visit(item, annotation.items, context.at(position), depth + 1, walk),
          ),
        );
      }

      case 'tuple': {
        const shape = classify(value);
        if (shape.kind !== 'sequence') {
          this.structural(walk, 'NOT_A_SEQUENCE', context, `Expected an array but got ${describeValue(value)}`);
          return value;
        }
        const items = shape.value;
        if (items.length !== annotation.items.length) {
          this.structural(
            walk,
            'LENGTH_MISMATCH',
            context,
            `Expected ${annotation.items.length} element(s) but got ${items.length}`,
          );
          return value;
        }
        return this.within(items, depth, context, walk, () =>
          this.rebuildArray(items, (item, position) => {
            const itemAnnotation = annotation.items[position];
            if (!itemAnnotation) return item;
            return this.visit(item, itemAnnotation, context.at(position), depth + 1, walk);
          }),
        );
      }

      case 'mapping': {
        const shape = classify(value);
        if (shape.kind === 'map') {
          const entries = shape.value;
          return this.within(entries, depth, context, walk, () => {
            let changed = false;
            const rebuilt = new Map<unknown, unknown>();
            for (const [key, item] of entries) {
              const next = this.visit(item, annotation.values, context.key(String(key)), depth + 1, walk);
              if (next !== item) changed = true;
              rebuilt.set(key, next);
            }
            return changed ? rebuilt : entries;
          });
        }
        if (shape.kind === 'record') {
          const record = shape.value;
          return this.within(record, depth, context, walk, () => {
            let changed = false;
            const rebuilt = Object.entries(record).map(([key, item]: [string, unknown]): [string, unknown] => {
              const next = this.visit(item, annotation.values, context.key(key), depth + 1, walk);
              if (next !== item) changed = true;
              return [key, next];
            });
            return changed ? Object.fromEntries(rebuilt) : record;
          });
        }
        this.structural(
          walk,
          'NOT_A_MAPPING',
          context,
          `Expected a Map or plain object but got ${describeValue(value)}`,
        );
        return value;
      }
    }
  }

  /** Guard a container visit with the depth limit and the cycle check. */
  private within(
    container: object,
    depth: number,
    context: ValidationContext,
    walk: Walk,
    visitChildren: () => unknown,
  ): unknown {
    if (walk.ancestors.has(container)) {
      this.structural(walk, 'CIRCULAR_REFERENCE', context, 'Circular reference: the value contains itself');
      return container;
    }
    if (!this.enter(depth, context, walk)) return container;

    walk.ancestors.add(container);
    try {
      return visitChildren();
    } finally {
      walk.ancestors.delete(container);
    }
  }

  private enter(depth: number, context: ValidationContext, walk: Walk): boolean {
    if (depth + 1 <= this.maxDepth) return true;
    this.structural(walk, 'MAX_DEPTH_EXCEEDED', context, `Nesting exceeds the maximum depth of ${this.maxDepth}`);
    return false;
  }

  private rebuildArray(items: readonly unknown[], visitItem: (item: unknown, position: number) => unknown): unknown {
    let changed = false;
    const rebuilt = items.map((item, position) => {
      const next = visitItem(item, position);
      if (next !== item) changed = true;
      return next;
    });
    return changed ? rebuilt : items;
  }

  private structural(
    walk: Walk,
    code: StructuralErrorCode,
    context: ValidationContext,
    message: string,
    schema?: string,
  ): void {
    walk.errors.push({
      kind: 'structural',
      code,
      field: VALUE_FIELD,
      scope: 'value',
      location: context.location,
      schema,
      message,
    });
  }
}
