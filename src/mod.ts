// Contracts
export type { BufRead, ReadErrorOf } from "./buf_read.ts";
export { readByte, readExact, readToEnd } from "./buf_read.ts";
export type {
  BufReadWrite,
  BufWrite,
  ErrorConversion,
  WriteErrorOf,
} from "./buf_write.ts";

// Results and errors
export type { Result } from "./result.ts";
export { err, mapError, ok, OK_VOID, unreachable, unwrap } from "./result.ts";
export type { ReadExactError } from "./errors.ts";
export {
  BufferOverflow,
  intoUnexpectedEnd,
  mapReadExactError,
  readExactErrorMessage,
  readingFailed,
  UnexpectedEnd,
  unexpectedEnd,
} from "./errors.ts";

// Configuration
export type { InvariantOptions, IoConfig } from "./config.ts";
export { configure, currentConfig } from "./config.ts";

// Sources and sinks
export { Empty, empty, Null, nullIo, Sink, sink } from "./null_io.ts";
export { SliceReader } from "./in_memory/slice_reader.ts";
export { FixedBuffer } from "./in_memory/fixed_buffer.ts";
export { GrowableBuffer } from "./in_memory/growable_buffer.ts";

// Adapters
export { Take, take } from "./adapters/take.ts";
export { Chain, chain } from "./adapters/chain.ts";
export {
  MapErr,
  mapErr,
  MapReadErr,
  mapReadErr,
  MapWriteErr,
  mapWriteErr,
  UnifyErr,
  unifyErr,
} from "./adapters/map_err.ts";

// Node.js bridge
export type {
  IoError,
  NodeBufRead,
  NodeRawWrite,
  NodeRead,
  NodeWrite,
} from "./node/node_io.ts";
export { isInterrupted, isRetryable, toIoError } from "./node/node_io.ts";
export type {
  BufferedReaderOptions,
  BufferedWriterOptions,
} from "./node/buffered.ts";
export {
  BufferedReader,
  BufferedWriter,
  DEFAULT_BUFFER_CAPACITY,
} from "./node/buffered.ts";
export {
  fdSink,
  fdSource,
  readFd,
  stderrWriter,
  stdinReader,
  stdoutWriter,
  writeFd,
} from "./node/fd.ts";
export {
  fromNodeReader,
  fromNodeWriter,
  NodeBufReadAdapter,
  NodeWriteAdapter,
} from "./node/from_node.ts";
export {
  AsNodeIo,
  AsNodeReader,
  AsNodeWriter,
  intoNodeIo,
  intoNodeReader,
  intoNodeWriter,
} from "./node/into_node.ts";
export type { ToReadableOptions } from "./node/readable.ts";
export { toReadable } from "./node/readable.ts";
