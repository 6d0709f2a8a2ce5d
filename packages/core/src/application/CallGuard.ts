import type { Annotation } from '../domain/model/Annotation.js';
import type { CallSignature, ParameterDeclaration } from '../domain/model/CallSignature.js';
import type { ValidationPhase } from '../domain/model/Errors.js';
import type { ValidationError } from '../domain/model/ValidationResult.js';
import type { EventPublisher } from '../domain/events/DomainEvents.js';
import { AggregateValidationError } from '../domain/model/Errors.js';
import { ValidationEngine } from '../domain/services/ValidationEngine.js';
import { RecursiveInspector } from './RecursiveInspector.js';

/** Options accepted by `checkSchemas()` and `checkSchemasAsync()`. */
export interface CheckSchemasOptions {
  /** Engine used for every table and series. Default: a new engine publishing to `events`. */
  readonly engine?: ValidationEngine;
  /** Receives `call:rejected` events, and the engine's events when no `engine` is given. */
  readonly events?: EventPublisher;
  /** Nesting limit for the inspector. Default: `64`. */
  readonly maxDepth?: number;
  /** Function name used in error messages. Default: the wrapped function's own name. */
  readonly name?: string;
}

/**
 * State shared by the use cases of one wrapped function.
 *
 * Internal: built once per `checkSchemas()` call and reused by every
 * invocation of the wrapper. Holds nothing that changes between calls.
 */
export class CallGuard {
  readonly functionName: string;
  readonly inspector: RecursiveInspector;
  readonly parameters: readonly ParameterDeclaration[];
  readonly returns: Annotation | null;
  private readonly events: EventPublisher | null;

  constructor(functionName: string, signature: CallSignature, options?: CheckSchemasOptions) {
    this.functionName = options?.name ?? (functionName || 'anonymous');
    this.events = options?.events ?? null;
    const engine = options?.engine ?? new ValidationEngine({ events: options?.events });
    this.inspector = new RecursiveInspector(engine, { maxDepth: options?.maxDepth });
    this.parameters = signature.parameters ?? [];
    this.returns = signature.returns ?? null;
  }

  /** Publish `call:rejected` and raise the aggregated error for one phase of a call. */
  reject(errors: readonly ValidationError[], phase: ValidationPhase): never {
    this.events?.emit({
      type: 'call:rejected',
      functionName: this.functionName,
      phase,
      errorCount: errors.length,
      timestamp: Date.now(),
    });
    throw new AggregateValidationError(errors, phase, this.functionName);
  }
}
