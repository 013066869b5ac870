/**
 * Error types shared by the reader and writer contracts.
 *
 * These are plain data carriers; the contracts return them through
 * `Result` instead of throwing.
 */

import { unreachable } from "./result.ts";

/**
 * Error returned when a fixed-capacity destination cannot hold all of the
 * bytes it was asked to accept.
 */
export class BufferOverflow extends Error {
  /** Number of bytes that did not fit. */
  public readonly bytesPastEnd: number;

  /**
   * Creates a new BufferOverflow.
   * @param bytesPastEnd The number of bytes that did not fit.
   */
  constructor(bytesPastEnd: number) {
    super(
      `attempted to write ${bytesPastEnd} bytes past the end of the buffer`,
    );
    this.name = "BufferOverflow";
    this.bytesPastEnd = bytesPastEnd;
  }
}

/**
 * Error returned when more bytes were required from a reader than it had
 * before reaching its end.
 */
export class UnexpectedEnd extends Error {
  /** The number of bytes the read asked for. */
  public readonly totalRequired: number;
  /** The number of bytes obtained before the end was reached. */
  public readonly available: number;

  /**
   * Creates a new UnexpectedEnd.
   * @param totalRequired The number of bytes the read asked for.
   * @param available The number of bytes obtained before the end.
   */
  constructor(totalRequired: number, available: number) {
    super(
      `${totalRequired} bytes were required but only ${available} bytes were read`,
    );
    this.name = "UnexpectedEnd";
    this.totalRequired = totalRequired;
    this.available = available;
  }

  /** Bytes still missing when the end was reached. */
  public get missing(): number {
    return this.totalRequired - this.available;
  }
}

/**
 * Error returned from `readExact`: either the reader ran out of bytes or the
 * reader itself failed.
 */
export type ReadExactError<E> =
  | { readonly kind: "unexpectedEnd"; readonly error: UnexpectedEnd }
  | { readonly kind: "readingFailed"; readonly error: E };

/**
 * Shorthand for an `unexpectedEnd` variant.
 */
export function unexpectedEnd<E = never>(
  totalRequired: number,
  available: number,
): ReadExactError<E> {
  return {
    kind: "unexpectedEnd",
    error: new UnexpectedEnd(totalRequired, available),
  };
}

/**
 * Shorthand for a `readingFailed` variant.
 */
export function readingFailed<E>(error: E): ReadExactError<E> {
  return { kind: "readingFailed", error };
}

/**
 * Transforms the `readingFailed` side, keeping `unexpectedEnd` as is.
 */
export function mapReadExactError<E, F>(
  error: ReadExactError<E>,
  mapper: (error: E) => F,
): ReadExactError<F> {
  switch (error.kind) {
    case "unexpectedEnd":
      return error;
    case "readingFailed":
      return readingFailed(mapper(error.error));
  }
}

/**
 * Converts the error of an infallible reader into the only failure it can
 * have.
 */
export function intoUnexpectedEnd(
  error: ReadExactError<never>,
): UnexpectedEnd {
  switch (error.kind) {
    case "unexpectedEnd":
      return error.error;
    case "readingFailed":
      return unreachable(error.error);
  }
}

/**
 * Short human readable description of a `ReadExactError`.
 */
export function readExactErrorMessage<E>(error: ReadExactError<E>): string {
  switch (error.kind) {
    case "unexpectedEnd":
      return "unexpected end";
    case "readingFailed":
      return "reading failed";
  }
}
