/**
 * Advisory rate-limit state shared by every request of one gateway.
 * Races between writers are harmless: the latest 429 wins.
 */
export class RateLimitState {
  private retryAfterMs: number | undefined;
  private observedAt = 0;

  record(retryAfterMs: number, observedAt: number): void {
    this.retryAfterMs = retryAfterMs;
    this.observedAt = observedAt;
  }

  snapshot(): { retryAfterMs: number | undefined; observedAt: number } {
    return { retryAfterMs: this.retryAfterMs, observedAt: this.observedAt };
  }

  /** How long a new request should hold off, in milliseconds. */
  remainingDelay(now: number): number {
    if (this.retryAfterMs === undefined) return 0;
    return Math.max(0, this.observedAt + this.retryAfterMs - now);
  }
}
