/**
 * Adapters that change the error channel of a reader or writer.
 *
 * They never buffer or copy: views, consumption and written bytes are those
 * of the wrapped entity, only error values are replaced.
 */

import type { BufRead } from "../buf_read.ts";
import type { BufReadWrite, BufWrite, ErrorConversion } from "../buf_write.ts";
import { mapError, type Result } from "../result.ts";

/**
 * Converts reader errors with a mapper function.
 */
export class MapReadErr<E, F> implements BufRead<F> {
  readonly #reader: BufRead<E>;
  readonly #mapper: (error: E) => F;

  public constructor(reader: BufRead<E>, mapper: (error: E) => F) {
    this.#reader = reader;
    this.#mapper = mapper;
  }

  /** Returns the inner view, or the mapped error. */
  public fillBuf(): Result<Uint8Array, F> {
    return mapError(this.#reader.fillBuf(), this.#mapper);
  }

  public consume(amount: number): void {
    this.#reader.consume(amount);
  }
}

/**
 * Converts writer errors with a mapper function.
 */
export class MapWriteErr<E, F> implements BufWrite<F> {
  readonly #writer: BufWrite<E>;
  readonly #mapper: (error: E) => F;

  public constructor(writer: BufWrite<E>, mapper: (error: E) => F) {
    this.#writer = writer;
    this.#mapper = mapper;
  }

  /**
   * @param bytes Passed to the inner writer as they are.
   * @returns The inner result, with its error mapped.
   */
  public writeAll(bytes: Uint8Array): Result<void, F> {
    return mapError(this.#writer.writeAll(bytes), this.#mapper);
  }

  public flush(): Result<void, F> {
    return mapError(this.#writer.flush(), this.#mapper);
  }
}

/**
 * Converts the errors of a reader-writer whose read and write errors are of
 * the same type, with one mapper for both.
 */
export class MapErr<E, F> implements BufRead<F>, BufWrite<F> {
  readonly #io: BufReadWrite<E>;
  readonly #mapper: (error: E) => F;

  public constructor(io: BufReadWrite<E>, mapper: (error: E) => F) {
    this.#io = io;
    this.#mapper = mapper;
  }

  /** Returns the inner view, or the mapped error. */
  public fillBuf(): Result<Uint8Array, F> {
    return mapError(this.#io.fillBuf(), this.#mapper);
  }

  public consume(amount: number): void {
    this.#io.consume(amount);
  }

  /**
   * @param bytes Passed to the inner writer as they are.
   * @returns The inner result, with its error mapped.
   */
  public writeAll(bytes: Uint8Array): Result<void, F> {
    return mapError(this.#io.writeAll(bytes), this.#mapper);
  }

  public flush(): Result<void, F> {
    return mapError(this.#io.flush(), this.#mapper);
  }
}

/**
 * Converts the read and write errors of a reader-writer into one common
 * error type, using that type's conversion.
 *
 * Unlike {@link MapErr}, the read and write errors may differ, which is the
 * usual case when composing into an application-wide error.
 */
export class UnifyErr<R, W, E> implements BufRead<E>, BufWrite<E> {
  readonly #io: BufReadWrite<R, W>;
  readonly #target: ErrorConversion<R | W, E>;

  public constructor(
    io: BufReadWrite<R, W>,
    target: ErrorConversion<R | W, E>,
  ) {
    this.#io = io;
    this.#target = target;
  }

  /** Returns the inner view, or the converted read error. */
  public fillBuf(): Result<Uint8Array, E> {
    return mapError(this.#io.fillBuf(), (error) => this.#target.from(error));
  }

  public consume(amount: number): void {
    this.#io.consume(amount);
  }

  /** Writes through the inner entity, converting its write error. */
  public writeAll(bytes: Uint8Array): Result<void, E> {
    return mapError(
      this.#io.writeAll(bytes),
      (error) => this.#target.from(error),
    );
  }

  public flush(): Result<void, E> {
    return mapError(this.#io.flush(), (error) => this.#target.from(error));
  }
}

/** Returns a reader whose errors are converted by `mapper`. */
export function mapReadErr<E, F>(
  reader: BufRead<E>,
  mapper: (error: E) => F,
): MapReadErr<E, F> {
  return new MapReadErr(reader, mapper);
}

/** Returns a writer whose errors are converted by `mapper`. */
export function mapWriteErr<E, F>(
  writer: BufWrite<E>,
  mapper: (error: E) => F,
): MapWriteErr<E, F> {
  return new MapWriteErr(writer, mapper);
}

/** Returns a reader-writer whose errors are converted by `mapper`. */
export function mapErr<E, F>(
  io: BufReadWrite<E>,
  mapper: (error: E) => F,
): MapErr<E, F> {
  return new MapErr(io, mapper);
}

/**
 * Returns a reader-writer whose read and write errors are both converted
 * through `target.from`.
 *
 * @example
 * ```typescript
 * const io = unifyErr(new FixedBuffer(storage), AppError);
 * // io: BufRead<AppError> & BufWrite<AppError>
 * ```
 */
export function unifyErr<R, W, E>(
  io: BufReadWrite<R, W>,
  target: ErrorConversion<R | W, E>,
): UnifyErr<R, W, E> {
  return new UnifyErr(io, target);
}
