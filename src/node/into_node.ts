import type { BufRead } from "../buf_read.ts";
import type { BufReadWrite, BufWrite, ErrorConversion } from "../buf_write.ts";
import { UnifyErr } from "../adapters/map_err.ts";
import { mapError, unwrap } from "../result.ts";
import {
  AS_ERROR,
  type NodeBufRead,
  type NodeRead,
  type NodeWrite,
} from "./node_io.ts";

/**
 * Copies what one `fillBuf` call returns, up to the size of `destination`.
 * Partial reads are normal; 0 means end of stream (or an empty destination).
 */
function readOnce(reader: NodeBufRead, destination: Uint8Array): number {
  const view = reader.fillBuf();
  const count = Math.min(destination.length, view.length);
  destination.set(view.subarray(0, count));
  reader.consume(count);
  return count;
}

/**
 * Exposes a `BufRead` in Node's conventions: errors are converted to `Error`
 * and thrown.
 */
export class AsNodeReader<E> implements NodeBufRead, NodeRead {
  readonly #reader: BufRead<E>;
  readonly #conversion: ErrorConversion<E, Error>;

  public constructor(
    reader: BufRead<E>,
    conversion: ErrorConversion<E, Error>,
  ) {
    this.#reader = reader;
    this.#conversion = conversion;
  }

  /**
   * Returns the reader's current view.
   *
   * @throws Error The converted reader error.
   */
  public fillBuf(): Uint8Array {
    return unwrap(
      mapError(this.#reader.fillBuf(), (error) => this.#conversion.from(error)),
    );
  }

  public consume(amount: number): void {
    this.#reader.consume(amount);
  }

  /**
   * Copies the bytes of one `fillBuf` call, as many as fit.
   *
   * @param destination Where to copy the bytes to.
   * @returns The number of bytes copied; 0 at end of stream.
   * @throws Error The converted reader error.
   */
  public read(destination: Uint8Array): number {
    return readOnce(this, destination);
  }
}

/**
 * Exposes a `BufWrite` in Node's conventions.
 */
export class AsNodeWriter<E> implements NodeWrite {
  readonly #writer: BufWrite<E>;
  readonly #conversion: ErrorConversion<E, Error>;

  public constructor(
    writer: BufWrite<E>,
    conversion: ErrorConversion<E, Error>,
  ) {
    this.#writer = writer;
    this.#conversion = conversion;
  }

  /** Writes all of `bytes`; there are no short writes. */
  public write(bytes: Uint8Array): number {
    this.writeAll(bytes);
    return bytes.length;
  }

  /** @throws Error The converted writer error. */
  public writeAll(bytes: Uint8Array): void {
    unwrap(
      mapError(
        this.#writer.writeAll(bytes),
        (error) => this.#conversion.from(error),
      ),
    );
  }

  public flush(): void {
    unwrap(
      mapError(this.#writer.flush(), (error) => this.#conversion.from(error)),
    );
  }
}

/**
 * Exposes a reader-writer in Node's conventions, unifying its read and
 * write errors into `Error`.
 */
export class AsNodeIo<R, W> implements NodeBufRead, NodeRead, NodeWrite {
  readonly #io: UnifyErr<R, W, Error>;

  public constructor(
    io: BufReadWrite<R, W>,
    conversion: ErrorConversion<R | W, Error>,
  ) {
    this.#io = new UnifyErr(io, conversion);
  }

  public fillBuf(): Uint8Array {
    return unwrap(this.#io.fillBuf());
  }

  public consume(amount: number): void {
    this.#io.consume(amount);
  }

  public read(destination: Uint8Array): number {
    return readOnce(this, destination);
  }

  public write(bytes: Uint8Array): number {
    this.writeAll(bytes);
    return bytes.length;
  }

  public writeAll(bytes: Uint8Array): void {
    unwrap(this.#io.writeAll(bytes));
  }

  public flush(): void {
    unwrap(this.#io.flush());
  }
}

/**
 * Returns a Node-style reader over `reader`. Readers whose errors are not
 * `Error`s need a conversion.
 */
export function intoNodeReader<E extends Error>(
  reader: BufRead<E>,
): AsNodeReader<E>;
export function intoNodeReader<E>(
  reader: BufRead<E>,
  conversion: ErrorConversion<E, Error>,
): AsNodeReader<E>;
export function intoNodeReader<E>(
  reader: BufRead<E>,
  conversion: ErrorConversion<E, Error> = AS_ERROR,
): AsNodeReader<E> {
  return new AsNodeReader(reader, conversion);
}

/**
 * Returns a Node-style writer over `writer`. Writers whose errors are not
 * `Error`s need a conversion.
 */
export function intoNodeWriter<E extends Error>(
  writer: BufWrite<E>,
): AsNodeWriter<E>;
export function intoNodeWriter<E>(
  writer: BufWrite<E>,
  conversion: ErrorConversion<E, Error>,
): AsNodeWriter<E>;
export function intoNodeWriter<E>(
  writer: BufWrite<E>,
  conversion: ErrorConversion<E, Error> = AS_ERROR,
): AsNodeWriter<E> {
  return new AsNodeWriter(writer, conversion);
}

/**
 * Returns a Node-style reader-writer over `io`. Entities whose errors are not
 * `Error`s need a conversion.
 */
export function intoNodeIo<R extends Error, W extends Error>(
  io: BufReadWrite<R, W>,
): AsNodeIo<R, W>;
export function intoNodeIo<R, W>(
  io: BufReadWrite<R, W>,
  conversion: ErrorConversion<R | W, Error>,
): AsNodeIo<R, W>;
export function intoNodeIo<R, W>(
  io: BufReadWrite<R, W>,
  conversion: ErrorConversion<R | W, Error> = AS_ERROR,
): AsNodeIo<R, W> {
  return new AsNodeIo(io, conversion);
}
