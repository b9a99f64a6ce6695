/**
 * Time source for created/filled timestamps and lockup checks, in seconds.
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

/**
 * Settable clock for replays and tests. Never moves backwards.
 */
export class ManualClock implements Clock {
  constructor(private current: number = 0) {}

  now(): number {
    return this.current;
  }

  advance(seconds: number): void {
    if (!Number.isFinite(seconds)) {
      throw new RangeError(`Clock cannot advance by ${seconds}`);
    }
    if (seconds < 0) {
      throw new RangeError(`Clock cannot move backwards (advance by ${seconds})`);
    }
    this.current += seconds;
  }

  set(seconds: number): void {
    if (!Number.isFinite(seconds)) {
      throw new RangeError(`Clock cannot be set to ${seconds}`);
    }
    if (seconds < this.current) {
      throw new RangeError(`Clock cannot move backwards (${this.current} -> ${seconds})`);
    }
    this.current = seconds;
  }
}
