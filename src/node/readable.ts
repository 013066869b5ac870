import { Readable } from "node:stream";
import type { BufRead } from "../buf_read.ts";
import type { ErrorConversion } from "../buf_write.ts";
import { AS_ERROR } from "./node_io.ts";

/**
 * Options for {@link toReadable}.
 */
export interface ToReadableOptions {
  /** Buffer level, in bytes, at which the stream stops pulling. */
  highWaterMark?: number;
}

/**
 * Streams the contents of `reader` as a `node:stream` `Readable`.
 *
 * Each pull performs one `fillBuf` and pushes a copy of the view, since the
 * view dies on the next call. A reader error destroys the stream with the
 * converted error; end of stream ends it.
 */
export function toReadable<E extends Error>(
  reader: BufRead<E>,
  options?: ToReadableOptions,
): Readable;
export function toReadable<E>(
  reader: BufRead<E>,
  options: ToReadableOptions | undefined,
  conversion: ErrorConversion<E, Error>,
): Readable;
export function toReadable<E>(
  reader: BufRead<E>,
  options: ToReadableOptions = {},
  conversion: ErrorConversion<E, Error> = AS_ERROR,
): Readable {
  return new Readable({
    highWaterMark: options.highWaterMark,
    read() {
      const result = reader.fillBuf();
      if (result.kind === "error") {
        this.destroy(conversion.from(result.error));
        return;
      }
      const view = result.value;
      if (view.length === 0) {
        this.push(null);
        return;
      }
      const chunk = view.slice();
      reader.consume(view.length);
      this.push(chunk);
    },
  });
}
