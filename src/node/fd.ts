/**
 * Buffered readers and writers over file descriptors, using Node's
 * synchronous `fs` calls.
 */

import { readSync, writeSync } from "node:fs";
import {
  BufferedReader,
  type BufferedReaderOptions,
  BufferedWriter,
  type BufferedWriterOptions,
} from "./buffered.ts";
import type { NodeRawWrite, NodeRead } from "./node_io.ts";

/**
 * Copy-based reader over `fd`, reading from its current position.
 *
 * @param fd An open file descriptor.
 */
export function fdSource(fd: number): NodeRead {
  return {
    read: (destination) =>
      readSync(fd, destination, 0, destination.length, null),
  };
}

/**
 * Unbuffered writer over `fd`. Short writes are passed on to the caller.
 *
 * @param fd An open file descriptor.
 */
export function fdSink(fd: number): NodeRawWrite {
  return {
    write: (bytes) => writeSync(fd, bytes, 0, bytes.length),
  };
}

/** Returns a buffered reader over `fd`. The descriptor is not closed. */
export function readFd(
  fd: number,
  options?: BufferedReaderOptions,
): BufferedReader {
  return new BufferedReader(fdSource(fd), options);
}

/**
 * Returns a buffered writer over `fd`. Call `flush` before closing the
 * descriptor; the writer never closes it.
 */
export function writeFd(
  fd: number,
  options?: BufferedWriterOptions,
): BufferedWriter {
  return new BufferedWriter(fdSink(fd), options);
}

/** Buffered reader over standard input. */
export function stdinReader(options?: BufferedReaderOptions): BufferedReader {
  return readFd(0, options);
}

/** Buffered writer over standard output. */
export function stdoutWriter(options?: BufferedWriterOptions): BufferedWriter {
  return writeFd(1, options);
}

/** Writer over standard error. Unbuffered unless a capacity is given. */
export function stderrWriter(options?: BufferedWriterOptions): BufferedWriter {
  return writeFd(2, { capacity: 0, ...options });
}
