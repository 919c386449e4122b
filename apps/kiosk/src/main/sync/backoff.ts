/**
 * Exponential retry delay shared by consecutive transient failures:
 * base, 2×base, 4×base ... capped.
 */
export class RetryBackoff {
  private readonly baseMs: number;

  private readonly capMs: number;

  private currentMs: number;

  constructor(baseMs: number, capMs: number) {
    this.baseMs = baseMs;
    this.capMs = Math.max(baseMs, capMs);
    this.currentMs = baseMs;
  }

  /** Delay to wait after the failure that just happened. */
  nextDelay(): number {
    const delayMs = this.currentMs;
    this.currentMs = Math.min(this.currentMs * 2, this.capMs);
    return delayMs;
  }

  peek(): number {
    return this.currentMs;
  }

  reset(): void {
    this.currentMs = this.baseMs;
  }
}
