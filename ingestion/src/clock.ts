import { setTimeout as delay } from "timers/promises";

export interface Clock {
  /** Milliseconds since an arbitrary epoch. */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    if (ms > 0) await delay(ms);
  },
};

/** Clock whose time only moves when something sleeps on it. */
export class ManualClock implements Clock {
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    if (ms > 0) this.current += ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}
