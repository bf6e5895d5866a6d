/**
 * Monotonic clock the test advances by hand.
 */
export class ManualClock {
  private ms: number;

  constructor(startMs = 0) {
    this.ms = startMs;
  }

  readonly now = (): number => this.ms;

  advance(ms: number): void {
    this.ms += ms;
  }

  advanceSeconds(seconds: number): void {
    this.ms += seconds * 1000;
  }
}
