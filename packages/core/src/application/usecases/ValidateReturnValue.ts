import { ValidationContext } from '../../domain/model/ValidationContext.js';
import type { CallGuard } from '../CallGuard.js';

/** Use case: inspect the value a wrapped body returned, after it ran. */
export class ValidateReturnValue {
  constructor(private readonly guard: CallGuard) {}

  execute<R>(value: R): R {
    const { returns } = this.guard;
    if (!returns) return value;

    const result = this.guard.inspector.inspect(value, returns, ValidationContext.forReturnValue());
    if (result.errors.length > 0) this.guard.reject(result.errors, 'output');
    if (result.value === value) return value;
    return result.value as R;
  }
}
