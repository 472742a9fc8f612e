import { sleep } from "../core/http";

export interface PacerClock {
  now: () => number;
  sleep: (ms: number) => Promise<void>;
}

/** Enforces a minimum gap between consecutive requests to one origin. */
export class Pacer {
  private lastRequestAt: number | undefined;

  constructor(
    private readonly delayMs: number,
    private readonly clock: PacerClock = { now: Date.now, sleep },
  ) {}

  async wait(): Promise<void> {
    if (this.lastRequestAt !== undefined) {
      const remaining = this.lastRequestAt + this.delayMs - this.clock.now();
      if (remaining > 0) {
        await this.clock.sleep(remaining);
      }
    }
    this.lastRequestAt = this.clock.now();
  }
}
