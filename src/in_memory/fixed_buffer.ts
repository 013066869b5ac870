import type { BufRead } from "../buf_read.ts";
import type { BufWrite } from "../buf_write.ts";
import { type InvariantOptions, resolveInvariantChecks } from "../config.ts";
import { BufferOverflow } from "../errors.ts";
import { err, ok, OK_VOID, type Result } from "../result.ts";

/**
 * Fixed-capacity mutable byte buffer that is both a reader and a writer.
 *
 * Reads and writes share a single cursor that only moves forward: writing
 * fills the bytes at the cursor and moves past them, reading returns the
 * bytes from the cursor to the end and consuming moves past them. Bytes
 * before the cursor are never returned again.
 *
 * Writing more than the remaining capacity fails with a
 * {@link BufferOverflow} and leaves the buffer unchanged.
 *
 * @example
 * ```typescript
 * const storage = new Uint8Array(4);
 * const buffer = new FixedBuffer(storage);
 * buffer.writeAll(new Uint8Array([1, 2, 3])); // ok
 * buffer.writeAll(new Uint8Array([4, 5]));    // BufferOverflow, bytesPastEnd=1
 * ```
 */
export class FixedBuffer implements BufRead<never>, BufWrite<BufferOverflow> {
  readonly #storage: Uint8Array;
  readonly #checkInvariants: boolean;
  #offset = 0;

  /**
   * Creates a buffer over `storage`, which is written to in place.
   */
  public constructor(storage: Uint8Array, options?: InvariantOptions) {
    this.#storage = storage;
    this.#checkInvariants = resolveInvariantChecks(options);
  }

  /**
   * Returns the storage after the cursor. Bytes written earlier are not part
   * of it.
   */
  public fillBuf(): Result<Uint8Array, never> {
    return ok(this.#storage.subarray(this.#offset));
  }

  /**
   * Moves the cursor forward without touching the storage.
   *
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

  /**
   * Copies `bytes` to the cursor and moves it past them.
   *
   * @param bytes The bytes to write.
   * @returns `BufferOverflow` if they do not fit, in which case nothing is
   * written.
   */
  public writeAll(bytes: Uint8Array): Result<void, BufferOverflow> {
    const remaining = this.remaining();
    if (bytes.length > remaining) {
      return err(new BufferOverflow(bytes.length - remaining));
    }
    this.#storage.set(bytes, this.#offset);
    this.#offset += bytes.length;
    return OK_VOID;
  }

  /** No-op; writes go straight to the storage. */
  public flush(): Result<void, never> {
    return OK_VOID;
  }

  /** Total size of the underlying storage. */
  public capacity(): number {
    return this.#storage.length;
  }

  /** Bytes between the cursor and the end of the storage. */
  public remaining(): number {
    return this.#storage.length - this.#offset;
  }

  /** Position of the cursor. */
  public position(): number {
    return this.#offset;
  }

  /**
   * View of the bytes before the cursor, i.e. everything written (or
   * consumed) so far.
   */
  public filled(): Uint8Array {
    return this.#storage.subarray(0, this.#offset);
  }
}
