import type { BufRead } from "../buf_read.ts";
import type { BufWrite } from "../buf_write.ts";
import { err, ok, OK_VOID, type Result } from "../result.ts";
import {
  type IoError,
  isInterrupted,
  type NodeBufRead,
  type NodeWrite,
  toIoError,
} from "./node_io.ts";

/**
 * Exposes a {@link NodeBufRead} as a `BufRead<IoError>`.
 *
 * Interrupted calls (`EINTR`) are retried here and never reach the caller;
 * this is the only place where that retry happens. Every other failure is
 * returned unchanged.
 */
export class NodeBufReadAdapter implements BufRead<IoError> {
  readonly #reader: NodeBufRead;

  /**
   * Creates a new adapter.
   *
   * @param reader The Node-style reader to wrap. Owned by the adapter.
   */
  public constructor(reader: NodeBufRead) {
    this.#reader = reader;
  }

  /**
   * Returns the wrapped reader's view, calling it again for as long as it
   * throws `EINTR`.
   */
  public fillBuf(): Result<Uint8Array, IoError> {
    for (;;) {
      try {
        return ok(this.#reader.fillBuf());
      } catch (thrown) {
        const error = toIoError(thrown);
        if (!isInterrupted(error)) {
          return err(error);
        }
      }
    }
  }

  public consume(amount: number): void {
    this.#reader.consume(amount);
  }

  /** The wrapped reader. */
  public inner(): NodeBufRead {
    return this.#reader;
  }
}

/**
 * Exposes a {@link NodeWrite} as a `BufWrite<IoError>`.
 *
 * The wrapped writer's `writeAll` is trusted to handle short and interrupted
 * writes itself.
 */
export class NodeWriteAdapter implements BufWrite<IoError> {
  readonly #writer: NodeWrite;

  /**
   * Creates a new adapter.
   *
   * @param writer The Node-style writer to wrap. Owned by the adapter.
   */
  public constructor(writer: NodeWrite) {
    this.#writer = writer;
  }

  /**
   * @param bytes The bytes to write.
   * @returns The thrown error, if the wrapped writer throws.
   */
  public writeAll(bytes: Uint8Array): Result<void, IoError> {
    try {
      this.#writer.writeAll(bytes);
      return OK_VOID;
    } catch (thrown) {
      return err(toIoError(thrown));
    }
  }

  public flush(): Result<void, IoError> {
    try {
      this.#writer.flush();
      return OK_VOID;
    } catch (thrown) {
      return err(toIoError(thrown));
    }
  }

  /** The wrapped writer. */
  public inner(): NodeWrite {
    return this.#writer;
  }
}

/**
 * Wraps a Node-style buffered reader as a `BufRead`.
 *
 * Only meant for readers that do not implement `BufRead` already.
 */
export function fromNodeReader(reader: NodeBufRead): NodeBufReadAdapter {
  return new NodeBufReadAdapter(reader);
}

/**
 * Wraps a Node-style writer as a `BufWrite`.
 */
export function fromNodeWriter(writer: NodeWrite): NodeWriteAdapter {
  return new NodeWriteAdapter(writer);
}
