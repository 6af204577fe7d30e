/**
 * Time source for the ledgers. Every entry point samples `now()` once per
 * call; nothing is cached between calls.
 */
export interface Clock {
  /** Current unix time in seconds. */
  now(): bigint;
}

export const systemClock: Clock = {
  now: () => BigInt(Math.floor(Date.now() / 1000)),
};

/** Hand-driven clock for tests and scenario replays. Never moves backwards. */
export class ManualClock implements Clock {
  private current: bigint;

  constructor(start: bigint) {
    this.current = start;
  }

  now(): bigint {
    return this.current;
  }

  advance(seconds: bigint): bigint {
    if (seconds < 0n) throw new Error(`Cannot move clock backwards by ${seconds}s`);
    this.current += seconds;
    return this.current;
  }

  /** Jump to an absolute time, like `time.increaseTo` on a dev chain. */
  setTo(timestamp: bigint): bigint {
    if (timestamp < this.current) {
      throw new Error(`Cannot move clock backwards: ${timestamp} < ${this.current}`);
    }
    this.current = timestamp;
    return this.current;
  }
}
