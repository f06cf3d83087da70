export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Per-host politeness delay shared by every outlet worker. Each call to
 * `wait` reserves the next free slot for its host before yielding, so
 * concurrent callers for one host are spaced `minDelayMs` apart while
 * other hosts proceed immediately.
 */
export class HostThrottle {
  private readonly nextSlot = new Map<string, number>();

  constructor(
    readonly minDelayMs: number,
    private readonly now: () => number = Date.now,
    private readonly sleepFn: Sleep = sleep
  ) {}

  async wait(host: string) {
    const key = host.toLowerCase();
    const current = this.now();
    const slot = Math.max(current, this.nextSlot.get(key) ?? current);
    this.nextSlot.set(key, slot + this.minDelayMs);
    const delay = slot - current;
    if (delay > 0) {
      await this.sleepFn(delay);
    }
    return delay;
  }
}
