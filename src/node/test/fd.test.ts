import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  closeSync,
  mkdtempSync,
  openSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { readExact, readToEnd } from "../../buf_read.ts";
import { GrowableBuffer } from "../../in_memory/growable_buffer.ts";
import { OK_VOID, unwrap } from "../../result.ts";
import { bytesOf } from "../../test/test_utils.ts";
import {
  readFd,
  stderrWriter,
  stdinReader,
  stdoutWriter,
  writeFd,
} from "../fd.ts";

describe("file descriptors", () => {
  let directory: string;

  beforeEach(() => {
    directory = mkdtempSync(join(tmpdir(), "bufio-"));
  });

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  it("reads a file through a small buffer", () => {
    const path = join(directory, "input.bin");
    writeFileSync(path, new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]));
    const fd = openSync(path, "r");
    try {
      const reader = readFd(fd, { capacity: 4 });
      const header = new Uint8Array(3);
      unwrap(readExact(reader, header));
      expect(bytesOf(header)).toEqual([1, 2, 3]);

      const rest = new GrowableBuffer();
      expect(unwrap(readToEnd(reader, rest))).toBe(7);
      expect(bytesOf(rest.bytes())).toEqual([4, 5, 6, 7, 8, 9, 10]);
    } finally {
      closeSync(fd);
    }
  });

  it("writes a file once flushed", () => {
    const path = join(directory, "output.bin");
    const fd = openSync(path, "w");
    try {
      const writer = writeFd(fd, { capacity: 4 });
      expect(writer.writeAll(new Uint8Array([1, 2, 3]))).toBe(OK_VOID);
      expect(readFileSync(path).length).toBe(0);

      expect(writer.writeAll(new Uint8Array([4, 5, 6, 7, 8]))).toBe(OK_VOID);
      expect(writer.writeAll(new Uint8Array([9]))).toBe(OK_VOID);
      expect(writer.flush()).toBe(OK_VOID);
    } finally {
      closeSync(fd);
    }

    expect(bytesOf(readFileSync(path))).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it("sets up the standard streams without touching them", () => {
    expect(stdinReader({ capacity: 16 }).capacity()).toBe(16);
    expect(stdinReader().buffered()).toBe(0);
    expect(stdoutWriter().buffered()).toBe(0);
    expect(stderrWriter().buffered()).toBe(0);
  });
});
