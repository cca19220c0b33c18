/**
 * Library-wide settings.
 *
 * There is very little to configure in a synchronous pull library. What there
 * is: where diagnostics go, and how much buffering a `tee` tolerates before
 * it says something about it. Per-call options always win over these
 * defaults.
 *
 * @example
 * ```ts
 * configure({ teeHighWaterMark: 1_000, logger: myLogger });
 * ```
 *
 * @module
 */

/**
 * Minimal logging surface. The global `console` satisfies it.
 */
export interface Logger {
  debug(...data: unknown[]): void;
  warn(...data: unknown[]): void;
  error(...data: unknown[]): void;
}

export interface EnumConfig {
  /** Sink for diagnostics. @default console */
  logger: Logger;

  /**
   * Number of elements buffered across a tee's branches above which the tee
   * logs a warning (once per tee).
   * @default 10000
   */
  teeHighWaterMark: number;
}

export const DEFAULT_TEE_HIGH_WATER_MARK = 10_000;

function defaults(): EnumConfig {
  return {
    logger: console,
    teeHighWaterMark: DEFAULT_TEE_HIGH_WATER_MARK,
  };
}

let current: EnumConfig = defaults();

/**
 * Merges `overrides` into the active configuration. Settings left out or
 * passed as `undefined` keep their current value.
 *
 * @returns The configuration now in effect
 */
export function configure(overrides: Partial<EnumConfig>): EnumConfig {
  // an explicit `undefined` leaves the setting as it was
  current = {
    logger: overrides.logger ?? current.logger,
    teeHighWaterMark: overrides.teeHighWaterMark ?? current.teeHighWaterMark,
  };
  return current;
}

export function getConfig(): Readonly<EnumConfig> {
  return current;
}

/**
 * Restores the defaults.
 */
export function resetConfig(): void {
  current = defaults();
}
