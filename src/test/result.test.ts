import { describe, expect, it } from "vitest";
import {
  err,
  mapError,
  ok,
  OK_VOID,
  type Result,
  unreachable,
  unwrap,
} from "../result.ts";

describe("Result", () => {
  it("wraps values and errors", () => {
    expect(ok(3)).toEqual({ kind: "ok", value: 3 });
    expect(err("bad")).toEqual({ kind: "error", error: "bad" });
    expect(OK_VOID).toEqual({ kind: "ok", value: undefined });
  });

  describe("mapError", () => {
    it("maps the error side", () => {
      const result: Result<number, number> = err(2);
      expect(mapError(result, (code) => `code ${code}`)).toEqual({
        kind: "error",
        error: "code 2",
      });
    });

    it("returns successes as the same object", () => {
      const result: Result<number, number> = ok(7);
      let calls = 0;
      const mapped = mapError(result, (code) => {
        calls++;
        return code;
      });
      expect(mapped).toBe(result);
      expect(calls).toBe(0);
    });
  });

  describe("unwrap", () => {
    it("returns the value", () => {
      expect(unwrap(ok("value"))).toBe("value");
    });

    it("throws the error", () => {
      const failure = new RangeError("out of range");
      expect(() => unwrap(err(failure))).toThrow(failure);
    });
  });

  it("unreachable throws when reached anyway", () => {
    const forged = "forged" as never;
    expect(() => unreachable(forged)).toThrow(TypeError);
  });
});
