import type { ValidationError } from '../../domain/model/ValidationResult.js';
import { ValidationContext } from '../../domain/model/ValidationContext.js';
import type { CallGuard } from '../CallGuard.js';

/** Use case: inspect every declared argument of a call before the wrapped body runs. */
export class ValidateArguments {
  constructor(private readonly guard: CallGuard) {}

  /**
   * Returns the arguments to call the body with: the originals, or copies in
   * which coerced or filtered tables replace the ones passed in. Throws
   * `AggregateValidationError` with the issues of all parameters together.
   */
  execute<A extends unknown[]>(args: A): A {
    const errors: ValidationError[] = [];
    const checked: unknown[] = [...args];
    let changed = false;

    this.guard.parameters.forEach((parameter, position) => {
      if (!parameter.type) return;
      const original = args[position];
      const context = ValidationContext.forArgument(parameter.name);
      const result = this.guard.inspector.inspect(original, parameter.type, context);
      errors.push(...result.errors);
      if (result.value !== original) {
        checked[position] = result.value;
        changed = true;
      }
    });

    if (errors.length > 0) this.guard.reject(errors, 'input');
    return changed ? (checked as A) : args;
  }
}
