import { WindowSpec, WindowUsage } from './interfaces';

/**
 * Time-ordered call timestamps for one key and one window length.
 * A limit of zero or less disables the window.
 */
export class SlidingWindow {
  private readonly calls: number[] = [];

  constructor(readonly spec: WindowSpec) {}

  get used(): number {
    return this.calls.length;
  }

  prune(now: number): void {
    const cutoff = now - this.spec.windowMs;
    while (this.calls.length > 0) {
      const oldest = this.calls[0];
      if (oldest === undefined || oldest > cutoff) break;
      this.calls.shift();
    }
  }

  /**
   * Milliseconds until this window admits one more call; zero when it
   * admits now.
   */
  waitTime(now: number): number {
    this.prune(now);
    if (this.spec.limit <= 0 || this.calls.length < this.spec.limit) {
      return 0;
    }
    const oldest = this.calls[0] ?? now;
    return Math.max(1, oldest + this.spec.windowMs - now);
  }

  record(now: number): void {
    if (this.spec.limit > 0) {
      this.calls.push(now);
    }
  }

  /** Removes the most recent entry recorded at `at`, if still present. */
  withdraw(at: number): void {
    const index = this.calls.lastIndexOf(at);
    if (index >= 0) {
      this.calls.splice(index, 1);
    }
  }

  usage(now: number): WindowUsage {
    this.prune(now);
    return { ...this.spec, used: this.calls.length };
  }
}
