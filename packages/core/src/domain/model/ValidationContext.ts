/** One step on the way from a call's arguments to the value being checked. */
export type PathSegment =
  | { readonly kind: 'argument'; readonly name: string }
  | { readonly kind: 'return' }
  | { readonly kind: 'position'; readonly index: number }
  | { readonly kind: 'key'; readonly key: string };

/**
 * Per-call traversal path, used to build error locations.
 *
 * Immutable: `child()` returns a new context, so sibling branches of the
 * inspection never see each other's segments.
 */
export class ValidationContext {
  private constructor(readonly path: readonly PathSegment[]) {}

  /** Context for a value validated directly, outside any call. */
  static root(): ValidationContext {
    return new ValidationContext([]);
  }

  static forArgument(name: string): ValidationContext {
    return new ValidationContext([{ kind: 'argument', name }]);
  }

  static forReturnValue(): ValidationContext {
    return new ValidationContext([{ kind: 'return' }]);
  }

  child(segment: PathSegment): ValidationContext {
    return new ValidationContext([...this.path, segment]);
  }

  at(index: number): ValidationContext {
    return this.child({ kind: 'position', index });
  }

  key(key: string): ValidationContext {
    return this.child({ kind: 'key', key });
  }

  /** Human-readable location, e.g. ``argument `frames`[1]['train']``. */
  get location(): string {
    if (this.path.length === 0) return 'value';
    return this.path.map((segment) => renderSegment(segment)).join('');
  }
}

function renderSegment(segment: PathSegment): string {
  switch (segment.kind) {
    case 'argument':
      return `argument \`${segment.name}\``;
    case 'return':
      return 'return value';
    case 'position':
      return `[${segment.index}]`;
    case 'key':
      return `['${segment.key}']`;
  }
}
