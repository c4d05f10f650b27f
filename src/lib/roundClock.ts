export type Clock = () => number;

export function unixNow(): number {
  return Math.floor(Date.now() / 1000);
}

/** Tracks when the current round opened and whether its interval has run out. */
export class RoundClock {
  private lastTimestamp: number;

  constructor(
    readonly intervalSec: number,
    private readonly now: Clock = unixNow
  ) {
    this.lastTimestamp = now();
  }

  get current(): number {
    return this.now();
  }

  get lastReset(): number {
    return this.lastTimestamp;
  }

  elapsed(): number {
    return this.now() - this.lastTimestamp;
  }

  hasElapsed(): boolean {
    return this.elapsed() >= this.intervalSec;
  }

  reset(): number {
    this.lastTimestamp = this.now();
    return this.lastTimestamp;
  }
}
