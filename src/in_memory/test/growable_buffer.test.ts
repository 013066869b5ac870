import { describe, expect, it } from "vitest";
import { readToEnd } from "../../buf_read.ts";
import { OK_VOID, unwrap } from "../../result.ts";
import { bytesOf } from "../../test/test_utils.ts";
import { GrowableBuffer } from "../growable_buffer.ts";
import { SliceReader } from "../slice_reader.ts";

describe("GrowableBuffer", () => {
  it("grows past its initial capacity", () => {
    const buffer = new GrowableBuffer(2);
    const payload = Uint8Array.from({ length: 300 }, (_, i) => i % 256);

    expect(buffer.writeAll(payload.subarray(0, 1))).toBe(OK_VOID);
    expect(buffer.writeAll(payload.subarray(1))).toBe(OK_VOID);

    expect(buffer.length).toBe(300);
    expect(bytesOf(buffer.bytes())).toEqual(bytesOf(payload));
  });

  it("starts empty with a zero capacity", () => {
    const buffer = new GrowableBuffer(0);
    expect(buffer.length).toBe(0);
    unwrap(buffer.writeAll(new Uint8Array([1])));
    expect(bytesOf(buffer.bytes())).toEqual([1]);
  });

  it("rejects invalid capacities", () => {
    expect(() => new GrowableBuffer(-1)).toThrow(RangeError);
    expect(() => new GrowableBuffer(1.5)).toThrow(RangeError);
  });

  it("returns an independent copy", () => {
    const buffer = new GrowableBuffer();
    unwrap(buffer.writeAll(new Uint8Array([1, 2])));

    const copy = buffer.toUint8Array();
    buffer.clear();
    unwrap(buffer.writeAll(new Uint8Array([3])));

    expect(bytesOf(copy)).toEqual([1, 2]);
    expect(bytesOf(buffer.bytes())).toEqual([3]);
  });

  it("round-trips through a slice reader", () => {
    const written = new GrowableBuffer(4);
    unwrap(written.writeAll(new Uint8Array([10, 20, 30])));
    unwrap(written.writeAll(new Uint8Array([40, 50, 60, 70])));
    expect(written.flush()).toBe(OK_VOID);

    const reader = new SliceReader(written.bytes());
    const readBack = new GrowableBuffer();
    expect(unwrap(readToEnd(reader, readBack))).toBe(7);

    expect(bytesOf(readBack.bytes())).toEqual([10, 20, 30, 40, 50, 60, 70]);
  });
});
