import type { Annotation } from './Annotation.js';

/** One positional parameter of a wrapped function. Parameters without `type` are never inspected. */
export interface ParameterDeclaration {
  /** Name used in error locations, e.g. ``argument `frames`[1]``. */
  readonly name: string;
  readonly type?: Annotation;
}

/** What `checkSchemas()` validates on each call: positional parameters in order, and the return value. */
export interface CallSignature {
  readonly parameters?: readonly ParameterDeclaration[];
  readonly returns?: Annotation;
}
