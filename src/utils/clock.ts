/**
 * Clocks. Pipeline timestamps must be strictly ordered within a process
 * (a backup is always earlier than the apply that follows it), so the default
 * clock never returns the same millisecond twice.
 */

export interface Clock {
  now(): Date;
}

export class MonotonicClock implements Clock {
  private last = 0;

  constructor(private readonly source: () => number = Date.now) {}

  now(): Date {
    const t = Math.max(this.source(), this.last + 1);
    this.last = t;
    return new Date(t);
  }
}

export const systemClock: Clock = new MonotonicClock();
