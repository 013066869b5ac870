import type { BufRead } from "../buf_read.ts";
import { type InvariantOptions, resolveInvariantChecks } from "../config.ts";
import { ok, type Result } from "../result.ts";

const EMPTY_VIEW = new Uint8Array(0);

function toLimit(limit: number | bigint): number {
  if (typeof limit === "bigint") {
    if (limit < 0n) {
      throw new RangeError(`Limit must be non-negative. Got ${limit}`);
    }
    // Larger budgets cannot be reached by any view length anyway.
    return limit > BigInt(Number.MAX_SAFE_INTEGER)
      ? Number.MAX_SAFE_INTEGER
      : Number(limit);
  }
  if (!Number.isSafeInteger(limit) || limit < 0) {
    throw new RangeError(`Limit must be a non-negative integer. Got ${limit}`);
  }
  return limit;
}

/**
 * Reader adapter that returns at most a fixed number of bytes from the inner
 * reader, then reports end of stream.
 *
 * The inner reader is not told about the limit; views it returns are
 * truncated instead. Once the budget is used up the inner reader is never
 * called again. Errors from the inner reader leave the budget untouched, so
 * a later retry may still succeed, but nothing may be consumed until a
 * `fillBuf` call succeeds again.
 */
export class Take<E> implements BufRead<E> {
  readonly #inner: BufRead<E>;
  readonly #checkInvariants: boolean;
  #limit: number;
  #lastLength = 0;

  /**
   * @param inner The reader to limit. Owned by the adapter from now on.
   * @param limit Maximum number of bytes to return.
   */
  public constructor(
    inner: BufRead<E>,
    limit: number | bigint,
    options?: InvariantOptions,
  ) {
    this.#inner = inner;
    this.#limit = toLimit(limit);
    this.#checkInvariants = resolveInvariantChecks(options);
  }

  /**
   * Returns the inner reader's view, cut to the remaining budget.
   *
   * @returns An empty view once the budget is spent, without asking the
   * inner reader.
   */
  public fillBuf(): Result<Uint8Array, E> {
    if (this.#limit === 0) {
      this.#lastLength = 0;
      return ok(EMPTY_VIEW);
    }
    const result = this.#inner.fillBuf();
    if (result.kind === "error") {
      this.#lastLength = 0;
      return result;
    }
    const view = result.value.length > this.#limit
      ? result.value.subarray(0, this.#limit)
      : result.value;
    this.#lastLength = view.length;
    return ok(view);
  }

  /**
   * Consumes bytes of the last view and spends as much of the budget.
   *
   * With invariant checks off, an `amount` beyond the last view is cut to
   * that view, so bytes outside the window stay in the inner reader.
   *
   * @param amount Number of bytes to consume.
   * @throws RangeError if checks are on and `amount` exceeds the last view.
   */
  public consume(amount: number): void {
    if (this.#checkInvariants && !(amount >= 0 && amount <= this.#lastLength)) {
      throw new RangeError(
        `Cannot consume ${amount} bytes, the last view had ${this.#lastLength}`,
      );
    }
    const consumed = Math.min(Math.max(amount, 0), this.#lastLength);
    this.#lastLength -= consumed;
    this.#limit = Math.max(this.#limit - consumed, 0);
    this.#inner.consume(consumed);
  }

  /** Number of bytes that can still be returned. */
  public limit(): number {
    return this.#limit;
  }

  /**
   * Replaces the remaining budget. Bytes already returned are not affected.
   */
  public setLimit(limit: number | bigint): void {
    this.#limit = toLimit(limit);
    this.#lastLength = Math.min(this.#lastLength, this.#limit);
  }

  /** The wrapped reader. Consuming from it directly bypasses the budget. */
  public inner(): BufRead<E> {
    return this.#inner;
  }

  /**
   * Gives up the adapter and returns the wrapped reader, positioned right
   * after the bytes consumed through this adapter. The adapter must not be
   * used afterwards.
   */
  public intoInner(): BufRead<E> {
    this.#limit = 0;
    this.#lastLength = 0;
    return this.#inner;
  }
}

/**
 * Creates a reader that returns at most `limit` bytes of `reader`, after
 * which it always reports end of stream.
 */
export function take<E>(
  reader: BufRead<E>,
  limit: number | bigint,
  options?: InvariantOptions,
): Take<E> {
  return new Take(reader, limit, options);
}
