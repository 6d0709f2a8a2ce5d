import type { SchemaModel, SeriesSchemaModel } from './SchemaModel.js';

/**
 * Declares where schema-bound values live inside an argument or return value.
 *
 * The inspector walks a value and its annotation together; parts of the value
 * annotated `unchecked` are never looked at.
 */
export type Annotation =
  | { readonly kind: 'table'; readonly schema: SchemaModel }
  | { readonly kind: 'series'; readonly schema: SeriesSchemaModel }
  | { readonly kind: 'sequence'; readonly items: Annotation }
  | { readonly kind: 'tuple'; readonly items: readonly Annotation[] }
  | { readonly kind: 'mapping'; readonly values: Annotation }
  | { readonly kind: 'optional'; readonly inner: Annotation }
  | { readonly kind: 'lazy'; readonly resolve: () => Annotation }
  | { readonly kind: 'unchecked' };

/** A table validated against `schema`. */
export function tableOf(schema: SchemaModel): Annotation {
  return { kind: 'table', schema };
}

/** A standalone series validated against `schema`. */
export function seriesOf(schema: SeriesSchemaModel): Annotation {
  return { kind: 'series', schema };
}

/** An array of any length whose every element matches `items`. */
export function sequenceOf(items: Annotation): Annotation {
  return { kind: 'sequence', items };
}

/** A fixed-length array whose elements match `items` position by position. */
export function tupleOf(...items: Annotation[]): Annotation {
  return { kind: 'tuple', items };
}

/** A plain object or `Map` whose every value matches `values`. */
export function mappingOf(values: Annotation): Annotation {
  return { kind: 'mapping', values };
}

/** `null` / `undefined`, or a value matching `inner`. */
export function optionalOf(inner: Annotation): Annotation {
  return { kind: 'optional', inner };
}

/** Deferred annotation, for recursive shapes such as arbitrarily nested lists. */
export function lazyOf(resolve: () => Annotation): Annotation {
  return { kind: 'lazy', resolve };
}

/** A value passed through without inspection. */
export const unchecked: Annotation = { kind: 'unchecked' };
