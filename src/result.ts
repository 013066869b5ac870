/**
 * Outcome of an I/O call that can fail with a typed error.
 *
 * The error side is generic so that sources which cannot fail use `never`,
 * letting the compiler prove that the `"error"` branch is dead.
 */
export type Result<T, E> =
  | { readonly kind: "ok"; readonly value: T }
  | { readonly kind: "error"; readonly error: E };

/**
 * Wraps a successful value.
 */
export function ok<T>(value: T): Result<T, never> {
  return { kind: "ok", value };
}

/**
 * Wraps a failure.
 */
export function err<E>(error: E): Result<never, E> {
  return { kind: "error", error };
}

/** Shared success value for calls that return nothing. */
export const OK_VOID: Result<void, never> = ok(undefined);

/**
 * Applies `mapper` to the error side, leaving successes untouched (the very
 * same object is returned, so views inside it are not copied).
 */
export function mapError<T, E, F>(
  result: Result<T, E>,
  mapper: (error: E) => F,
): Result<T, F> {
  if (result.kind === "ok") {
    return result;
  }
  return err(mapper(result.error));
}

/**
 * Returns the value of a result or throws its error.
 *
 * Intended for the boundary with code that reports failures by throwing.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.kind === "error") {
    throw result.error;
  }
  return result.value;
}

/**
 * Marks a branch that the type system proves unreachable, such as the error
 * side of a `Result<T, never>`.
 */
export function unreachable(value: never): never {
  throw new TypeError(`Unreachable value reached: ${String(value)}`);
}
