import type { BufWrite } from "../buf_write.ts";
import { OK_VOID, type Result } from "../result.ts";

const DEFAULT_INITIAL_CAPACITY = 64;

/**
 * Writer that appends to an in-memory buffer, growing it as needed.
 * Writing never fails.
 */
export class GrowableBuffer implements BufWrite<never> {
  #storage: Uint8Array;
  #length = 0;

  /**
   * Creates an empty buffer.
   *
   * @param initialCapacity Number of bytes to reserve up front.
   */
  public constructor(initialCapacity: number = DEFAULT_INITIAL_CAPACITY) {
    if (!Number.isInteger(initialCapacity) || initialCapacity < 0) {
      throw new RangeError(
        `Initial capacity must be a non-negative integer. Got ${initialCapacity}`,
      );
    }
    this.#storage = new Uint8Array(initialCapacity);
  }

  /**
   * Appends `bytes`, growing the storage if needed.
   *
   * @param bytes The bytes to append. They are copied.
   */
  public writeAll(bytes: Uint8Array): Result<void, never> {
    if (bytes.length === 0) {
      return OK_VOID;
    }
    this.#reserve(bytes.length);
    this.#storage.set(bytes, this.#length);
    this.#length += bytes.length;
    return OK_VOID;
  }

  /** No-op. */
  public flush(): Result<void, never> {
    return OK_VOID;
  }

  /** Number of bytes written. */
  public get length(): number {
    return this.#length;
  }

  /**
   * View of the written bytes. Invalidated by the next write that has to
   * grow the storage.
   */
  public bytes(): Uint8Array {
    return this.#storage.subarray(0, this.#length);
  }

  /** Copy of the written bytes. */
  public toUint8Array(): Uint8Array {
    return this.#storage.slice(0, this.#length);
  }

  /** Forgets the written bytes, keeping the storage. */
  public clear(): void {
    this.#length = 0;
  }

  #reserve(additional: number): void {
    const required = this.#length + additional;
    if (required <= this.#storage.length) {
      return;
    }
    let capacity = Math.max(this.#storage.length, DEFAULT_INITIAL_CAPACITY);
    while (capacity < required) {
      capacity *= 2;
    }
    const grown = new Uint8Array(capacity);
    grown.set(this.#storage.subarray(0, this.#length));
    this.#storage = grown;
  }
}
