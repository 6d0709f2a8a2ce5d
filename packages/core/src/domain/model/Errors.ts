import type { ValidationError } from './ValidationResult.js';
import { formatError } from './ValidationResult.js';

/** Raised by `defineSchema()` when the declaration itself is malformed. Lists every problem found. */
export class SchemaDefinitionError extends Error {
  override readonly name = 'SchemaDefinitionError';

  constructor(
    readonly schemaName: string,
    readonly problems: readonly string[],
  ) {
    super(`Invalid schema '${schemaName}': ${problems.join('; ')}`);
  }
}

/** Which side of a wrapped call failed validation. */
export type ValidationPhase = 'input' | 'output';

/**
 * Raised by a function wrapped with `checkSchemas()` when its arguments or its
 * return value fail validation. Carries every issue found in that one pass.
 */
export class AggregateValidationError extends Error {
  override readonly name = 'AggregateValidationError';

  constructor(
    readonly errors: readonly ValidationError[],
    readonly phase: ValidationPhase,
    readonly functionName: string,
  ) {
    super(buildMessage(errors, phase, functionName));
  }
}

function buildMessage(errors: readonly ValidationError[], phase: ValidationPhase, functionName: string): string {
  const subject = phase === 'input' ? 'arguments' : 'return value';
  const lines = errors.map((error) => `  - ${formatError(error)}`);
  return [`Validation of the ${subject} of '${functionName}' failed with ${errors.length} error(s):`, ...lines].join(
    '\n',
  );
}
