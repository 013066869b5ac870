import type { BufWrite } from "./buf_write.ts";
import { type ReadExactError, readingFailed, unexpectedEnd } from "./errors.ts";
import { err, ok, OK_VOID, type Result } from "./result.ts";

/**
 * A reader with an internal buffer, exposed through a pair of primitives.
 *
 * `fillBuf` returns a view of the bytes that are available right now,
 * filling the internal buffer from the underlying source when it is empty.
 * Nothing is "read" by that call: the same bytes are returned again until
 * `consume` reports how many of them the caller used.
 *
 * The view is only valid until the next call to `fillBuf` or `consume` on
 * the same reader. It must not be kept, stored or handed to code that
 * outlives that window; copy the bytes out if they are needed later.
 *
 * An empty view signals the end of the stream.
 *
 * @typeParam E The error produced when reading fails. Sources that cannot
 * fail use `never`.
 */
export interface BufRead<E> {
  /**
   * Returns the unconsumed contents of the internal buffer, reading more
   * from the underlying source if it is empty.
   */
  fillBuf(): Result<Uint8Array, E>;

  /**
   * Marks `amount` bytes of the last view returned by `fillBuf` as used.
   *
   * `amount` must not exceed the length of that view. Breaking this rule is
   * a bug in the caller; implementations may throw a `RangeError`.
   */
  consume(amount: number): void;
}

/** Error type of a reader. */
export type ReadErrorOf<R> = R extends BufRead<infer E> ? E : never;

/**
 * Reads a single byte.
 *
 * @returns The byte, or `undefined` when the reader is at its end.
 */
export function readByte<E>(
  reader: BufRead<E>,
): Result<number | undefined, E> {
  const filled = reader.fillBuf();
  if (filled.kind === "error") {
    return filled;
  }
  if (filled.value.length === 0) {
    return ok(undefined);
  }
  const byte = filled.value[0];
  reader.consume(1);
  return ok(byte);
}

/**
 * Reads exactly as many bytes as needed to fill `destination`.
 *
 * If the reader ends first, fails with `unexpectedEnd` carrying the length
 * of `destination` and the number of bytes obtained. Any reader error is
 * returned immediately as `readingFailed`. In both cases the contents of
 * `destination` are unspecified, but no more bytes are consumed than the
 * destination could hold.
 */
export function readExact<E>(
  reader: BufRead<E>,
  destination: Uint8Array,
): Result<void, ReadExactError<E>> {
  const required = destination.length;
  let filled = 0;
  while (filled < required) {
    const result = reader.fillBuf();
    if (result.kind === "error") {
      return err(readingFailed(result.error));
    }
    const view = result.value;
    if (view.length === 0) {
      return err(unexpectedEnd<E>(required, filled));
    }
    const toCopy = Math.min(required - filled, view.length);
    destination.set(view.subarray(0, toCopy), filled);
    reader.consume(toCopy);
    filled += toCopy;
  }
  return OK_VOID;
}

/**
 * Appends everything up to the end of the reader to `target`.
 *
 * @returns The number of bytes appended. On failure the bytes appended so
 * far stay in `target`.
 */
export function readToEnd<E>(
  reader: BufRead<E>,
  target: BufWrite<never>,
): Result<number, E> {
  let total = 0;
  for (;;) {
    const result = reader.fillBuf();
    if (result.kind === "error") {
      return result;
    }
    const view = result.value;
    if (view.length === 0) {
      return ok(total);
    }
    // `never` error: the write cannot fail.
    target.writeAll(view);
    const length = view.length;
    total += length;
    reader.consume(length);
  }
}
