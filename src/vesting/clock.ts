/**
 * Time source for unlock arithmetic, in unix seconds.
 */
export interface Clock {
  now(): bigint;
}

export const systemClock: Clock = {
  now: () => BigInt(Math.floor(Date.now() / 1000)),
};

/**
 * Clock that only moves when told to. Used by tests and simulations.
 */
export class ManualClock implements Clock {
  private current: bigint;

  constructor(start: bigint = 0n) {
    this.current = start;
  }

  now(): bigint {
    return this.current;
  }

  set(timestamp: bigint): void {
    if (timestamp < this.current) {
      throw new Error(`ManualClock cannot move backwards (${this.current} -> ${timestamp})`);
    }
    this.current = timestamp;
  }

  advance(seconds: bigint): void {
    this.set(this.current + seconds);
  }
}
