/**
 * Fixed one-second window limiter.
 *
 * Counts messages in the current wall-clock second and refuses once the
 * limit is reached. A limit of 0 disables limiting.
 */
export class RateLimiter {
  private windowStart = -1;
  private count = 0;

  constructor(
    private readonly maxPerSecond: number,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Take one slot if the current window has room.
   */
  tryAcquire(): boolean {
    if (this.maxPerSecond === 0) {
      return true;
    }

    const windowStart = Math.floor(this.now() / 1000) * 1000;

    if (this.windowStart !== windowStart) {
      this.windowStart = windowStart;
      this.count = 0;
    }

    // Check before incrementing so refused messages don't eat into the window
    if (this.count >= this.maxPerSecond) {
      return false;
    }

    this.count++;
    return true;
  }

  reset(): void {
    this.windowStart = -1;
    this.count = 0;
  }
}
