/**
 * Exponential backoff parameters, all delays in milliseconds.
 */
export interface BackoffOptions {
  initialDelay: number;
  multiplier: number;
  maxDelay: number;
}

/**
 * Delay before the given reconnect attempt (1-based).
 *
 * `min(initialDelay * multiplier^(attempt - 1), maxDelay)`. With a multiplier
 * of at least 1 the sequence never decreases.
 *
 * @example
 * ```typescript
 * const opts = { initialDelay: 2000, multiplier: 1.5, maxDelay: 10000 };
 * backoffDelay(1, opts); // 2000
 * backoffDelay(3, opts); // 4500
 * backoffDelay(5, opts); // 10000
 * ```
 */
export function backoffDelay(attempt: number, options: BackoffOptions): number {
  const exponent = Math.max(0, attempt - 1);
  const delay = options.initialDelay * Math.pow(options.multiplier, exponent);
  return Math.min(delay, options.maxDelay);
}

/**
 * Delays for attempts 1..attempts.
 */
export function backoffSchedule(attempts: number, options: BackoffOptions): number[] {
  const delays: number[] = [];
  for (let attempt = 1; attempt <= attempts; attempt++) {
    delays.push(backoffDelay(attempt, options));
  }
  return delays;
}
