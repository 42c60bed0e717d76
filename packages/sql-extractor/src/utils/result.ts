/**
 * Result type for error handling without exceptions.
 * Every probe step returns one, so a missing member is a value, not a throw.
 */
export type Result<T, E = Error> =
  | Readonly<{ success: true; data: T }>
  | Readonly<{ success: false; error: E }>;

/**
 * Creates a successful result.
 */
export function ok<T = undefined>(data?: T): Result<T, never> {
  return { success: true, data: data as T };
}

/**
 * Creates a failed result.
 */
export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}

/**
 * Chains an operation that returns a Result on the success value.
 */
export function flatMap<T, U, E>(
  result: Result<T, E>,
  fn: (data: T) => Result<U, E>,
): Result<U, E> {
  if (result.success) return fn(result.data);
  return result;
}

/**
 * Runs `fn`, turning a thrown value into a failed result.
 */
export function attempt<T, E>(
  fn: () => T,
  onThrow: (thrown: unknown) => E,
): Result<T, E> {
  try {
    return ok(fn());
  } catch (error) {
    return err(onThrow(error));
  }
}
