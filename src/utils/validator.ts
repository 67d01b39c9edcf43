import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Validates a value against any standard-schema compatible schema (zod, valibot, arktype, ...)
 * and wraps the outcome in an error-first tuple.
 *
 * - A throwing or rejecting `validate` becomes a {@link ValidationError} with the failure as `cause`.
 * - Reported issues become a {@link ValidationError} carrying those issues.
 * - Otherwise the schema's (possibly transformed) output is returned.
 */
export async function validator<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
): SafeWrapAsync<Error, StandardSchemaV1.InferOutput<T>> {
  type Result = StandardSchemaV1.Result<StandardSchemaV1.InferOutput<T>>;

  const [errStart, pending] = safeWrap<Result | Promise<Result>>(() => schema['~standard'].validate(input));
  if (errStart) {
    return [new ValidationError('error validating on validation start', [], { cause: errStart }), null];
  }

  const [errAsync, result] = await safeWrapAsync(() => Promise.resolve(pending));
  if (errAsync) {
    return [new ValidationError('error validating async data', [], { cause: errAsync }), null];
  }

  if (!result || typeof result !== 'object') {
    return [new ValidationError('error validation returned no result', []), null];
  }

  if (result.issues) {
    return [new ValidationError('error validating data', [...result.issues]), null];
  }

  return [null, result.value];
}
