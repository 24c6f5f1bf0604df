import { systemClock, type Clock } from "./clock.js";

/**
 * Process-wide gate enforcing a minimum interval between outbound calls.
 * Callers queue in arrival order; each waits until the interval since the
 * previous call has elapsed.
 */
export class RateLimiter {
  private readonly minIntervalMs: number;
  readonly clock: Clock;
  private lastCallAt: number | null = null;
  private tail: Promise<void> = Promise.resolve();

  constructor(minIntervalMs: number, clock: Clock = systemClock) {
    this.minIntervalMs = minIntervalMs;
    this.clock = clock;
  }

  get intervalMs(): number {
    return this.minIntervalMs;
  }

  /** Wait for a slot, then run `task`. Its failure does not block later callers. */
  schedule<T>(task: () => Promise<T>): Promise<T> {
    const slot = this.tail.then(() => this.waitForSlot());
    this.tail = slot;
    return slot.then(task);
  }

  private async waitForSlot(): Promise<void> {
    if (this.lastCallAt !== null) {
      const wait = this.lastCallAt + this.minIntervalMs - this.clock.now();
      if (wait > 0) await this.clock.sleep(wait);
    }
    this.lastCallAt = this.clock.now();
  }
}

let shared: RateLimiter | null = null;

/**
 * The limiter every geocoding call in this process goes through. Asking for
 * it again with another interval or clock is a configuration error: two
 * gates would let calls through faster than either allows.
 */
export function sharedGeocodeLimiter(minIntervalMs = 1000, clock: Clock = systemClock): RateLimiter {
  if (!shared) {
    shared = new RateLimiter(minIntervalMs, clock);
    return shared;
  }
  if (shared.intervalMs !== minIntervalMs) {
    throw new Error(
      `The shared geocoding limiter already spaces calls ${shared.intervalMs}ms apart; cannot also use ${minIntervalMs}ms`
    );
  }
  if (shared.clock !== clock) throw new Error("The shared geocoding limiter already runs on another clock");
  return shared;
}
