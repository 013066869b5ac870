import type { BufRead } from "./buf_read.ts";
import type { Result } from "./result.ts";

/**
 * A byte-oriented sink.
 *
 * Writing is expected to be buffered or otherwise cheap, so callers may feed
 * bytes in small pieces. There is no partial write: `writeAll` either
 * accepts every byte or fails.
 *
 * @typeParam E The error produced when writing fails. Sinks that cannot
 * fail use `never`.
 */
export interface BufWrite<E> {
  /**
   * Writes all of `bytes`. Does not succeed unless every byte was accepted.
   */
  writeAll(bytes: Uint8Array): Result<void, E>;

  /**
   * Pushes any intermediately buffered bytes to their destination.
   */
  flush(): Result<void, E>;
}

/** Error type of a writer. */
export type WriteErrorOf<W> = W extends BufWrite<infer E> ? E : never;

/**
 * An entity that is both a reader and a writer.
 */
export type BufReadWrite<R, W = R> = BufRead<R> & BufWrite<W>;

/**
 * Conversion of foreign errors into a target error type, usually provided by
 * the target error class itself:
 *
 * ```typescript
 * class AppError extends Error {
 *   static from(error: UnexpectedEnd | BufferOverflow): AppError {
 *     return new AppError(error.message, { cause: error });
 *   }
 * }
 * ```
 */
export interface ErrorConversion<S, T> {
  from(error: S): T;
}
