import type { BufRead } from "../buf_read.ts";
import type { BufWrite } from "../buf_write.ts";
import { type InvariantOptions, resolveInvariantChecks } from "../config.ts";
import { err, ok, OK_VOID, type Result } from "../result.ts";
import {
  type IoError,
  isRetryable,
  type NodeRawWrite,
  type NodeRead,
  toIoError,
} from "./node_io.ts";

/** Buffer size used when no capacity is given. */
export const DEFAULT_BUFFER_CAPACITY = 8192;

/** Options for {@link BufferedReader}. */
export interface BufferedReaderOptions extends InvariantOptions {
  /** Size of the internal buffer in bytes. Must be positive. */
  capacity?: number;
}

/** Options for {@link BufferedWriter}. */
export interface BufferedWriterOptions {
  /**
   * Size of the internal buffer in bytes. 0 passes every write straight to
   * the underlying writer.
   */
  capacity?: number;
}

function toCapacity(capacity: number, minimum: number): number {
  if (!Number.isSafeInteger(capacity) || capacity < minimum) {
    throw new RangeError(
      `Capacity must be an integer of at least ${minimum}. Got ${capacity}`,
    );
  }
  return capacity;
}

/**
 * Gives a copy-based reader an internal buffer so that it can be used as a
 * `BufRead<IoError>`.
 *
 * The buffer is refilled with one `read` call whenever it has been consumed
 * completely. Interrupted and would-block calls (`EINTR`, `EAGAIN`) are
 * retried inside `fillBuf`; every other failure is returned and leaves the
 * reader usable.
 */
export class BufferedReader implements BufRead<IoError> {
  readonly #source: NodeRead;
  readonly #buffer: Uint8Array;
  readonly #checkInvariants: boolean;
  #start = 0;
  #end = 0;

  /**
   * Creates a new buffered reader.
   *
   * @param source The reader to fill the buffer from. Owned by the adapter.
   * @param options Buffer capacity and invariant checks.
   */
  public constructor(source: NodeRead, options: BufferedReaderOptions = {}) {
    this.#source = source;
    this.#buffer = new Uint8Array(
      toCapacity(options.capacity ?? DEFAULT_BUFFER_CAPACITY, 1),
    );
    this.#checkInvariants = resolveInvariantChecks(options);
  }

  /**
   * Returns the buffered bytes, reading once from the source if none are
   * left.
   *
   * @returns An empty view when the source reports end of stream.
   */
  public fillBuf(): Result<Uint8Array, IoError> {
    if (this.#start >= this.#end) {
      for (;;) {
        try {
          const count = this.#source.read(this.#buffer);
          this.#start = 0;
          this.#end = Math.min(Math.max(count, 0), this.#buffer.length);
          break;
        } catch (thrown) {
          const error = toIoError(thrown);
          if (!isRetryable(error)) {
            return err(error);
          }
        }
      }
    }
    return ok(this.#buffer.subarray(this.#start, this.#end));
  }

  /**
   * @param amount Bytes of the last view to consume.
   * @throws RangeError if checks are on and `amount` exceeds the buffered
   * bytes.
   */
  public consume(amount: number): void {
    const available = this.buffered();
    if (this.#checkInvariants && !(amount >= 0 && amount <= available)) {
      throw new RangeError(
        `Cannot consume ${amount} bytes, only ${available} are buffered`,
      );
    }
    this.#start += Math.min(Math.max(amount, 0), available);
  }

  /** Number of bytes read from the source but not consumed yet. */
  public buffered(): number {
    return this.#end - this.#start;
  }

  public capacity(): number {
    return this.#buffer.length;
  }

  /** The wrapped reader. Reading from it directly skips buffered bytes. */
  public inner(): NodeRead {
    return this.#source;
  }
}

interface WriteProgress {
  written: number;
  error: IoError | undefined;
}

/**
 * Calls `sink.write` until all of `bytes` are written, retrying interrupted
 * and would-block calls.
 */
function writeFully(sink: NodeRawWrite, bytes: Uint8Array): WriteProgress {
  let written = 0;
  while (written < bytes.length) {
    let count: number;
    try {
      count = sink.write(bytes.subarray(written));
    } catch (thrown) {
      const error = toIoError(thrown);
      if (isRetryable(error)) {
        continue;
      }
      return { written, error };
    }
    if (count <= 0) {
      return {
        written,
        error: new Error(
          "failed to write whole buffer: writer accepted 0 bytes",
        ),
      };
    }
    written += Math.min(count, bytes.length - written);
  }
  return { written, error: undefined };
}

/**
 * Collects small writes in an internal buffer and passes them to a writer
 * that may write only part of what it is given.
 *
 * Bytes go out when the buffer would overflow and on `flush`. Writes at
 * least as large as the buffer go straight through. Bytes that could not be
 * written because of an error stay buffered for the next attempt.
 */
export class BufferedWriter implements BufWrite<IoError> {
  readonly #sink: NodeRawWrite;
  readonly #buffer: Uint8Array;
  #length = 0;

  /**
   * Creates a new buffered writer.
   *
   * @param sink The writer to pass the bytes to. Owned by the adapter.
   * @param options Buffer capacity.
   */
  public constructor(sink: NodeRawWrite, options: BufferedWriterOptions = {}) {
    this.#sink = sink;
    this.#buffer = new Uint8Array(
      toCapacity(options.capacity ?? DEFAULT_BUFFER_CAPACITY, 0),
    );
  }

  /**
   * Buffers `bytes`, writing out the buffer first if they do not fit.
   *
   * @param bytes The bytes to write.
   */
  public writeAll(bytes: Uint8Array): Result<void, IoError> {
    if (this.#length + bytes.length > this.#buffer.length) {
      const drained = this.#drain();
      if (drained.kind === "error") {
        return drained;
      }
    }
    if (bytes.length >= this.#buffer.length) {
      const { error } = writeFully(this.#sink, bytes);
      return error === undefined ? OK_VOID : err(error);
    }
    this.#buffer.set(bytes, this.#length);
    this.#length += bytes.length;
    return OK_VOID;
  }

  /** Writes out every buffered byte. */
  public flush(): Result<void, IoError> {
    return this.#drain();
  }

  /** Number of bytes waiting for the next flush. */
  public buffered(): number {
    return this.#length;
  }

  /** The wrapped writer. */
  public inner(): NodeRawWrite {
    return this.#sink;
  }

  #drain(): Result<void, IoError> {
    const { written, error } = writeFully(
      this.#sink,
      this.#buffer.subarray(0, this.#length),
    );
    this.#buffer.copyWithin(0, written, this.#length);
    this.#length -= written;
    return error === undefined ? OK_VOID : err(error);
  }
}
