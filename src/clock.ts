/** Source of the current time in unix seconds */
export interface Clock {
  now(): bigint;
}

export const systemClock: Clock = {
  now: () => BigInt(Math.floor(Date.now() / 1000)),
};

/** Clock that only moves when told to */
export class ManualClock implements Clock {
  constructor(private current: bigint = 1_700_000_000n) {}

  now(): bigint {
    return this.current;
  }

  advance(seconds: bigint): void {
    this.current += seconds;
  }

  set(timestamp: bigint): void {
    this.current = timestamp;
  }
}
