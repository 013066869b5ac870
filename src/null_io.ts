import type { BufRead } from "./buf_read.ts";
import type { BufWrite } from "./buf_write.ts";
import { type InvariantOptions, resolveInvariantChecks } from "./config.ts";
import { ok, OK_VOID, type Result } from "./result.ts";

const EMPTY_VIEW = new Uint8Array(0);

function checkZeroConsume(amount: number, enabled: boolean): void {
  if (enabled && amount !== 0) {
    throw new RangeError(
      `Cannot consume ${amount} bytes from a reader that has no data`,
    );
  }
}

/**
 * A reader with no data. Always at its end.
 */
export class Empty implements BufRead<never> {
  readonly #checkInvariants: boolean;

  public constructor(options?: InvariantOptions) {
    this.#checkInvariants = resolveInvariantChecks(options);
  }

  /** Always returns an empty view. */
  public fillBuf(): Result<Uint8Array, never> {
    return ok(EMPTY_VIEW);
  }

  /** @throws RangeError if checks are on and `amount` is not 0. */
  public consume(amount: number): void {
    checkZeroConsume(amount, this.#checkInvariants);
  }
}

/**
 * A writer which throws away everything written to it.
 */
export class Sink implements BufWrite<never> {
  /** Discards the bytes. */
  public writeAll(_bytes: Uint8Array): Result<void, never> {
    return OK_VOID;
  }

  public flush(): Result<void, never> {
    return OK_VOID;
  }
}

/**
 * A reader-writer that has no data and throws away everything written to it,
 * like `/dev/null`.
 */
export class Null implements BufRead<never>, BufWrite<never> {
  readonly #checkInvariants: boolean;

  public constructor(options?: InvariantOptions) {
    this.#checkInvariants = resolveInvariantChecks(options);
  }

  /** Always returns an empty view. */
  public fillBuf(): Result<Uint8Array, never> {
    return ok(EMPTY_VIEW);
  }

  /** @throws RangeError if checks are on and `amount` is not 0. */
  public consume(amount: number): void {
    checkZeroConsume(amount, this.#checkInvariants);
  }

  /** Discards the bytes. */
  public writeAll(_bytes: Uint8Array): Result<void, never> {
    return OK_VOID;
  }

  public flush(): Result<void, never> {
    return OK_VOID;
  }
}

/** Returns a reader that is at its end. */
export function empty(options?: InvariantOptions): Empty {
  return new Empty(options);
}

/** Returns a writer that discards all data. */
export function sink(): Sink {
  return new Sink();
}

/** Returns a reader-writer with no data that discards all writes. */
export function nullIo(options?: InvariantOptions): Null {
  return new Null(options);
}
