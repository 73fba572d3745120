/** Source of the current time, in unix seconds. */
export interface Clock {
  now(): bigint;
}

export const systemClock: Clock = {
  now: () => BigInt(Math.floor(Date.now() / 1000)),
};

/** A clock that only moves when told to. */
export class ManualClock implements Clock {
  constructor(private current: bigint = 0n) {}

  now(): bigint {
    return this.current;
  }

  set(time: bigint): void {
    this.current = time;
  }

  advance(seconds: bigint): void {
    this.current += seconds;
  }
}
