import { sleep } from "../utils";

/**
 * Spaces request starts to the same host by at least `intervalMs`. Callers for
 * one host are served in arrival order; different hosts never wait on each
 * other. One instance is shared by every worker of a run.
 */
export class HostRateLimiter {
  private readonly tails = new Map<string, Promise<void>>();
  private readonly lastStart = new Map<string, number>();

  constructor(readonly intervalMs: number) {
    if (!Number.isFinite(intervalMs) || intervalMs < 0) {
      throw new RangeError(`politeness interval must be a non-negative number, got ${intervalMs}`);
    }
  }

  acquire(host: string): Promise<void> {
    const key = host.toLowerCase();
    const previous = this.tails.get(key) ?? Promise.resolve();
    const turn = previous.then(() => this.waitForSlot(key));
    this.tails.set(key, turn);
    return turn;
  }

  get hosts(): string[] {
    return [...this.lastStart.keys()];
  }

  private async waitForSlot(key: string): Promise<void> {
    const last = this.lastStart.get(key);
    if (last !== undefined) {
      // timers may fire a millisecond early; loop until the interval has really passed
      let wait = last + this.intervalMs - Date.now();
      while (wait > 0) {
        await sleep(wait);
        wait = last + this.intervalMs - Date.now();
      }
    }
    this.lastStart.set(key, Date.now());
  }
}
