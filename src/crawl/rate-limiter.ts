/**
 * Global politeness delay between consecutive fetches
 */

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * One interval for the whole crawl, no per-host state. wait() is called
 * once after every fetch, successful or not.
 */
export class RateLimiter {
  constructor(
    private readonly intervalMs: number,
    private readonly sleepFn: Sleep = sleep
  ) {}

  async wait(): Promise<void> {
    if (this.intervalMs <= 0) return;
    await this.sleepFn(this.intervalMs);
  }
}
