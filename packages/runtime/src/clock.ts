/**
 * Time source injected everywhere the engine reads the clock, so tests
 * can advance simulated time deterministically.
 */

export interface Clock {
  /** Milliseconds since the Unix epoch */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Clock that only moves when told to.
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    if (ms < 0) {
      throw new RangeError(`Cannot move a clock backwards (${String(ms)} ms)`);
    }
    this.current += ms;
  }

  set(ms: number): void {
    this.current = ms;
  }
}

export function isoTime(clock: Clock): string {
  return new Date(clock.now()).toISOString();
}
