/**
 * Daily emission quota. Owned by whoever wires the engine and reset by the
 * scheduler at day rollover; the counter has no notion of calendar time.
 */
export class DailySignalCounter {
  private emitted = 0;

  constructor(readonly limit: number) {}

  get count(): number {
    return this.emitted;
  }

  get remaining(): number {
    return Math.max(0, this.limit - this.emitted);
  }

  /**
   * Compare-and-increment in one synchronous step. Callers must not await
   * between deciding to emit and calling this.
   */
  tryAcquire(): boolean {
    if (this.emitted >= this.limit) return false;
    this.emitted++;
    return true;
  }

  reset(): void {
    this.emitted = 0;
  }
}
