import type { CallSignature } from './domain/model/CallSignature.js';
import { CallGuard } from './application/CallGuard.js';
import type { CheckSchemasOptions } from './application/CallGuard.js';
import { ValidateArguments } from './application/usecases/ValidateArguments.js';
import { ValidateReturnValue } from './application/usecases/ValidateReturnValue.js';

/**
 * Wrap a function so that its arguments are validated before every call and
 * its return value after.
 *
 * Each parameter listed in `signature.parameters` (by position) with a `type`
 * annotation is inspected; a declared parameter the caller omitted is
 * inspected as `undefined`. Arguments past the declared parameters pass
 * through. Issues from all parameters are gathered first; if there are any,
 * the body does not run and an `AggregateValidationError` with phase `input`
 * is thrown. The return value is then checked against `signature.returns`; a
 * failure throws with phase `output`, after the body's side effects happened.
 *
 * When validation coerces or filters a table, the body receives (and the
 * caller gets back) the validated copy.
 *
 * @example
 * ```typescript
 * const Sales = defineSchema({ name: 'Sales', fields: [{ name: 'amount', type: 'float', gt: 0 }] });
 * const total = checkSchemas(
 *   (sales: Table) => sales.column('amount')?.values.length ?? 0,
 *   { parameters: [{ name: 'sales', type: tableOf(Sales) }] },
 * );
 * ```
 */
export function checkSchemas<A extends unknown[], R>(
  fn: (...args: A) => R,
  signature: CallSignature,
  options?: CheckSchemasOptions,
): (...args: A) => R {
  const guard = new CallGuard(fn.name, signature, options);
  const validateArguments = new ValidateArguments(guard);
  const validateReturnValue = new ValidateReturnValue(guard);

  return function (this: unknown, ...args: A): R {
    const checked = validateArguments.execute(args);
    return validateReturnValue.execute(fn.apply(this, checked));
  };
}

/**
 * `checkSchemas()` for functions returning a promise. Argument failures reject
 * the returned promise without calling `fn`; the resolved value is checked
 * against `signature.returns`.
 */
export function checkSchemasAsync<A extends unknown[], R>(
  fn: (...args: A) => Promise<R>,
  signature: CallSignature,
  options?: CheckSchemasOptions,
): (...args: A) => Promise<R> {
  const guard = new CallGuard(fn.name, signature, options);
  const validateArguments = new ValidateArguments(guard);
  const validateReturnValue = new ValidateReturnValue(guard);

  return async function (this: unknown, ...args: A): Promise<R> {
    const checked = validateArguments.execute(args);
    const result = await fn.apply(this, checked);
    return validateReturnValue.execute(result);
  };
}
