import type { BufRead } from "../buf_read.ts";
import type { Result } from "../result.ts";

/**
 * Reader adapter that returns everything from `first` and then everything
 * from `second`.
 *
 * The switch happens the first time `first` reports end of stream and is
 * final: `first` is never asked again, even if it could produce more bytes
 * later.
 */
export class Chain<E> implements BufRead<E> {
  readonly #first: BufRead<E>;
  readonly #second: BufRead<E>;
  #switched = false;

  /**
   * @param first Reader to drain first. Owned by the adapter from now on.
   * @param second Reader to continue with. Owned by the adapter from now on.
   */
  public constructor(first: BufRead<E>, second: BufRead<E>) {
    this.#first = first;
    this.#second = second;
  }

  /**
   * Returns a view of `first`, or of `second` once `first` has ended.
   * Errors of either reader are returned as they are and never cause a
   * switch.
   */
  public fillBuf(): Result<Uint8Array, E> {
    if (this.#switched) {
      return this.#second.fillBuf();
    }
    const result = this.#first.fillBuf();
    if (result.kind === "error" || result.value.length > 0) {
      return result;
    }
    this.#switched = true;
    return this.#second.fillBuf();
  }

  /** @param amount Bytes of the last view to consume, on the active side. */
  public consume(amount: number): void {
    if (this.#switched) {
      this.#second.consume(amount);
    } else {
      this.#first.consume(amount);
    }
  }

  /** Whether `first` has ended and reads now come from `second`. */
  public isSwitched(): boolean {
    return this.#switched;
  }

  /** The reader drained first. */
  public first(): BufRead<E> {
    return this.#first;
  }

  /** The reader continued with. */
  public second(): BufRead<E> {
    return this.#second;
  }

  /**
   * Gives up the adapter and returns both readers, `first` then `second`.
   */
  public intoInner(): [first: BufRead<E>, second: BufRead<E>] {
    return [this.#first, this.#second];
  }
}

/**
 * Creates a reader that reads `first` to its end and then `second`.
 */
export function chain<E>(first: BufRead<E>, second: BufRead<E>): Chain<E> {
  return new Chain(first, second);
}
