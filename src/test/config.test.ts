import { afterEach, describe, expect, it } from "vitest";
import {
  configure,
  currentConfig,
  resolveInvariantChecks,
} from "../config.ts";
import { SliceReader } from "../in_memory/slice_reader.ts";

describe("config", () => {
  const initial = currentConfig();

  afterEach(() => {
    configure(initial);
  });

  it("enables invariant checks outside production", () => {
    expect(initial.checkInvariants).toBe(true);
    expect(resolveInvariantChecks()).toBe(true);
  });

  it("prefers per-entity options over the default", () => {
    configure({ checkInvariants: false });

    expect(resolveInvariantChecks()).toBe(false);
    expect(resolveInvariantChecks({ checkInvariants: true })).toBe(true);
    expect(resolveInvariantChecks({})).toBe(false);
  });

  it("applies to entities created after the change", () => {
    const checked = new SliceReader(new Uint8Array([1]));
    configure({ checkInvariants: false });
    const unchecked = new SliceReader(new Uint8Array([1]));

    expect(() => checked.consume(2)).toThrow(RangeError);
    unchecked.consume(2);
    expect(unchecked.remaining()).toBe(0);
  });

  it("returns copies of the configuration", () => {
    const snapshot = currentConfig();
    snapshot.checkInvariants = false;

    expect(currentConfig().checkInvariants).toBe(true);
  });
});
