/**
 * Options accepted by types that carry optional invariant checks.
 */
export interface InvariantOptions {
  /**
   * Whether to verify caller preconditions such as `consume(amount)` staying
   * within the last view returned by `fillBuf`. Violations throw a
   * `RangeError`. Defaults to the process-wide setting.
   */
  checkInvariants?: boolean;
}

/**
 * Process-wide defaults.
 */
export interface IoConfig {
  /** Default for {@link InvariantOptions.checkInvariants}. */
  checkInvariants: boolean;
}

const config: IoConfig = {
  checkInvariants: process.env.NODE_ENV !== "production",
};

/**
 * Updates the process-wide defaults. Only affects entities created afterwards.
 */
export function configure(overrides: Partial<IoConfig>): void {
  if (overrides.checkInvariants !== undefined) {
    config.checkInvariants = overrides.checkInvariants;
  }
}

/**
 * Returns a copy of the current process-wide defaults.
 */
export function currentConfig(): IoConfig {
  return { ...config };
}

/**
 * Resolves whether invariant checks are enabled for a single entity.
 */
export function resolveInvariantChecks(options?: InvariantOptions): boolean {
  return options?.checkInvariants ?? config.checkInvariants;
}
