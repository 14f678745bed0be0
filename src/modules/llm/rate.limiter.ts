import { sleep, Sleep } from "./call.policy";

/**
 * Spaces call starts evenly: at most `requestsPerMinute` starts per minute.
 * Slots are reserved synchronously, so concurrent callers never share one.
 * A limit of 0 disables limiting.
 */
export class RateLimiter {
  private readonly intervalMs: number;
  private nextSlotAt = 0;

  constructor(
    requestsPerMinute: number,
    private readonly now: () => number = Date.now,
    private readonly wait: Sleep = sleep
  ) {
    this.intervalMs = requestsPerMinute > 0 ? 60_000 / requestsPerMinute : 0;
  }

  async acquire(): Promise<void> {
    if (this.intervalMs === 0) return;

    const now = this.now();
    const slot = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = slot + this.intervalMs;

    const delay = slot - now;
    if (delay > 0) await this.wait(delay);
  }
}
