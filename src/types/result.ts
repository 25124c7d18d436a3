/**
 * Result Type for Functional Error Handling
 *
 * Provides a type-safe way to handle expected failure cases without exceptions.
 *
 * @module
 */

// =============================================================================
// Result Type Definition
// =============================================================================

/**
 * Result type representing either success (Ok) or failure (Err)
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates a successful Result containing a value
 */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/**
 * Creates a failed Result containing an error
 */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

// =============================================================================
// Transformations
// =============================================================================

/**
 * Chains Result operations (flatMap/andThen)
 */
export function andThen<T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>
): Result<U, E> {
  return result.ok ? fn(result.value) : result;
}

/**
 * Returns the provided Result if this Result is Err, otherwise returns this Ok
 */
export function or<T, E, F>(result: Result<T, E>, other: () => Result<T, F>): Result<T, F> {
  return result.ok ? result : other();
}
