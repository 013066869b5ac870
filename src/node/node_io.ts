/**
 * The synchronous I/O conventions of Node.js code, which the bridge adapters
 * translate to and from.
 *
 * On this side failures are thrown, not returned, and they are
 * `NodeJS.ErrnoException`s whose `code` names the condition. A call that was
 * interrupted by a signal throws with code `EINTR` and may simply be retried.
 */

import type { ErrorConversion } from "../buf_write.ts";

/** The error type of Node's I/O calls. */
export type IoError = NodeJS.ErrnoException;

/**
 * Buffered reader in Node's calling convention. Same contract as `BufRead`,
 * except that `fillBuf` throws on failure.
 */
export interface NodeBufRead {
  /**
   * Returns the unconsumed part of the internal buffer, refilling it when
   * empty. An empty result means end of stream.
   *
   * @throws IoError
   */
  fillBuf(): Uint8Array;

  /** Marks bytes of the last `fillBuf` result as used. */
  consume(amount: number): void;
}

/**
 * Copy-based reader, the shape of `fs.readSync`.
 */
export interface NodeRead {
  /**
   * Copies up to `destination.length` bytes into `destination`.
   *
   * @returns The number of bytes copied; 0 at end of stream.
   * @throws Error
   */
  read(destination: Uint8Array): number;
}

/**
 * Unbuffered writer that may accept only part of what it is given, the shape
 * of `fs.writeSync`.
 */
export interface NodeRawWrite {
  /**
   * Writes some prefix of `bytes`.
   *
   * @returns The number of bytes written.
   * @throws Error
   */
  write(bytes: Uint8Array): number;
}

/**
 * Writer in Node's calling convention.
 */
export interface NodeWrite extends NodeRawWrite {
  /**
   * Writes every byte of `bytes`.
   *
   * @throws Error
   */
  writeAll(bytes: Uint8Array): void;

  /** @throws Error */
  flush(): void;
}

/**
 * Whether `error` reports an interrupted call that should be retried.
 */
export function isInterrupted(error: IoError): boolean {
  return error.code === "EINTR";
}

/**
 * Whether `error` reports a call that did nothing and may be repeated as it
 * is: an interrupted call, or a non-blocking descriptor with no data yet.
 */
export function isRetryable(error: IoError): boolean {
  return isInterrupted(error) || error.code === "EAGAIN";
}

function codeOf(thrown: unknown): string | undefined {
  if (typeof thrown !== "object" || thrown === null || !("code" in thrown)) {
    return undefined;
  }
  return typeof thrown.code === "string" ? thrown.code : undefined;
}

/**
 * Normalises a thrown value into an `IoError`. Errors are returned as they
 * are; anything else is wrapped, keeping the original as `cause` and its
 * string `code`, if it has one.
 */
export function toIoError(thrown: unknown): IoError {
  if (thrown instanceof Error) {
    return thrown;
  }
  const error: IoError = new Error(
    `Non-error value thrown: ${String(thrown)}`,
    { cause: thrown },
  );
  const code = codeOf(thrown);
  if (code !== undefined) {
    error.code = code;
  }
  return error;
}

/** Conversion used when the errors already are `Error`s. */
export const AS_ERROR: ErrorConversion<unknown, Error> = { from: toIoError };
