import type { BufRead } from "../buf_read.ts";
import { type InvariantOptions, resolveInvariantChecks } from "../config.ts";
import { ok, type Result } from "../result.ts";

/**
 * Reader over an immutable byte sequence.
 *
 * It cannot fail: the only error `readExact` can report is running out of
 * bytes, which `intoUnexpectedEnd` extracts without a dead branch.
 *
 * @example
 * ```typescript
 * const reader = new SliceReader(new Uint8Array([1, 2, 3]));
 * const header = new Uint8Array(2);
 * const result = readExact(reader, header); // header is [1, 2]
 * ```
 */
export class SliceReader implements BufRead<never> {
  readonly #bytes: Uint8Array;
  readonly #checkInvariants: boolean;
  #offset = 0;

  /**
   * Creates a reader over `bytes`. The bytes are not copied and must not be
   * modified while the reader is in use.
   */
  public constructor(bytes: Uint8Array, options?: InvariantOptions) {
    this.#bytes = bytes;
    this.#checkInvariants = resolveInvariantChecks(options);
  }

  /** Returns every byte not consumed yet. */
  public fillBuf(): Result<Uint8Array, never> {
    return ok(this.#bytes.subarray(this.#offset));
  }

  /**
   * @param amount Number of bytes to skip.
   * @throws RangeError if checks are on and fewer bytes remain.
   */
  public consume(amount: number): void {
    const remaining = this.remaining();
    if (this.#checkInvariants && !(amount >= 0 && amount <= remaining)) {
      throw new RangeError(
        `Cannot consume ${amount} bytes, only ${remaining} remain`,
      );
    }
    this.#offset += Math.min(Math.max(amount, 0), remaining);
  }

  /** Number of bytes not consumed yet. */
  public remaining(): number {
    return this.#bytes.length - this.#offset;
  }

  /** Number of bytes consumed so far. */
  public position(): number {
    return this.#offset;
  }
}
