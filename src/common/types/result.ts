/**
 * Expected failures travel as values; callers branch on `success`.
 * Thrown errors are kept for misuse and for failures inside async generators.
 */
export type Result<T, E = string> = { success: true; data: T } | { success: false; error: E };

export function Ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function Err<E>(error: E): Result<never, E> {
  return { success: false, error };
}

/** Transform the success value, passing a failure through untouched. */
export function mapOk<T, U, E>(result: Result<T, E>, fn: (data: T) => U): Result<U, E> {
  return result.success ? Ok(fn(result.data)) : result;
}
