import { describe, expect, it } from "vitest";
import { BufferOverflow } from "../../errors.ts";
import { FixedBuffer } from "../../in_memory/fixed_buffer.ts";
import { GrowableBuffer } from "../../in_memory/growable_buffer.ts";
import { SliceReader } from "../../in_memory/slice_reader.ts";
import { unwrap } from "../../result.ts";
import {
  bytesOf,
  ChunkedReader,
  ScriptedReader,
  ScriptedWriter,
} from "../../test/test_utils.ts";
import { fromNodeReader } from "../from_node.ts";
import { intoNodeIo, intoNodeReader, intoNodeWriter } from "../into_node.ts";

describe("intoNodeReader", () => {
  it("copies as much as fits and reports the count", () => {
    const reader = intoNodeReader(
      new SliceReader(new Uint8Array([1, 2, 3, 4, 5])),
    );

    const small = new Uint8Array(3);
    expect(reader.read(small)).toBe(3);
    expect(bytesOf(small)).toEqual([1, 2, 3]);

    const large = new Uint8Array(10);
    expect(reader.read(large)).toBe(2);
    expect(bytesOf(large.subarray(0, 2))).toEqual([4, 5]);

    expect(reader.read(large)).toBe(0);
  });

  it("returns partial reads after a single fill", () => {
    const inner = new ChunkedReader(new Uint8Array([1, 2, 3, 4, 5]), 2);
    const reader = intoNodeReader(inner);

    expect(reader.read(new Uint8Array(10))).toBe(2);
    expect(inner.fillCalls).toBe(1);
  });

  it("exposes fillBuf and consume", () => {
    const reader = intoNodeReader(new SliceReader(new Uint8Array([6, 7])));

    expect(bytesOf(reader.fillBuf())).toEqual([6, 7]);
    reader.consume(1);
    expect(bytesOf(reader.fillBuf())).toEqual([7]);
  });

  it("throws converted errors", () => {
    const reader = intoNodeReader(
      new ScriptedReader<string>([{ error: "bad sector" }]),
      { from: (error) => new Error(`converted: ${error}`) },
    );

    expect(() => reader.read(new Uint8Array(1))).toThrow("converted: bad sector");
  });

  it("round-trips through the reverse bridge", () => {
    const reader = fromNodeReader(
      intoNodeReader(new SliceReader(new Uint8Array([3, 1, 4]))),
    );

    expect(bytesOf(unwrap(reader.fillBuf()))).toEqual([3, 1, 4]);
  });
});

describe("intoNodeWriter", () => {
  it("writes everything and reports the full length", () => {
    const inner = new GrowableBuffer();
    const writer = intoNodeWriter(inner);

    expect(writer.write(new Uint8Array([1, 2, 3]))).toBe(3);
    writer.writeAll(new Uint8Array([4]));
    writer.flush();

    expect(bytesOf(inner.bytes())).toEqual([1, 2, 3, 4]);
  });

  it("throws errors that already are Errors as they are", () => {
    const writer = intoNodeWriter(new FixedBuffer(new Uint8Array(2)));

    expect(writer.write(new Uint8Array([1, 2]))).toBe(2);
    expect(() => writer.write(new Uint8Array([3]))).toThrow(BufferOverflow);
  });

  it("converts other errors", () => {
    const inner = new ScriptedWriter<number>();
    const writer = intoNodeWriter(inner, {
      from: (code) => new Error(`errno ${code}`),
    });

    inner.failNext(32);
    expect(() => writer.flush()).toThrow("errno 32");
  });
});

describe("intoNodeIo", () => {
  it("reads and writes through one entity", () => {
    const storage = new Uint8Array([0, 0, 9, 9]);
    const io = intoNodeIo(new FixedBuffer(storage));

    expect(io.write(new Uint8Array([5, 6]))).toBe(2);
    io.flush();

    const destination = new Uint8Array(4);
    expect(io.read(destination)).toBe(2);
    expect(bytesOf(destination.subarray(0, 2))).toEqual([9, 9]);

    expect(() => io.writeAll(new Uint8Array([1]))).toThrow(
      "attempted to write 1 bytes past the end of the buffer",
    );
    expect(bytesOf(storage)).toEqual([5, 6, 9, 9]);
  });

  it("throws converted read and write errors", () => {
    const reader = new ScriptedReader<string>([{ error: "bad block" }]);
    const writer = new ScriptedWriter<number>();
    const io = intoNodeIo<string, number>(
      {
        fillBuf: () => reader.fillBuf(),
        consume: (amount) => reader.consume(amount),
        writeAll: (bytes) => writer.writeAll(bytes),
        flush: () => writer.flush(),
      },
      { from: (error) => new Error(`io: ${error}`) },
    );

    expect(() => io.read(new Uint8Array(1))).toThrow("io: bad block");
    expect(io.read(new Uint8Array(1))).toBe(0);

    writer.failNext(13);
    expect(() => io.flush()).toThrow("io: 13");
  });
});
