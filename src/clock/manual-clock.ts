import type { Clock } from './clock';

/** Hand-driven clock for tests. */
export class ManualClock implements Clock {
  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  set(ms: number): void {
    if (ms < this.current) {
      throw new RangeError(`Clock cannot go backwards (${ms} < ${this.current})`);
    }
    this.current = ms;
  }

  advance(ms: number): void {
    this.set(this.current + ms);
  }
}
