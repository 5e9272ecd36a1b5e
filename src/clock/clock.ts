/**
 * Time source for auction windows and bid stamps.
 * Returns epoch milliseconds and never goes backwards within a process.
 */
export interface Clock {
  now(): number;
}

export const CLOCK = Symbol('CLOCK');

/**
 * Wall-clock anchored, but advanced by the monotonic high-resolution timer,
 * so system clock adjustments never move auction time backwards.
 */
export class SystemClock implements Clock {
  now(): number {
    return Math.floor(performance.timeOrigin + performance.now());
  }
}
