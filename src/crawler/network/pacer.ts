export type Clock = () => number;
export type Sleep = (ms: number) => Promise<void>;

/**
 * Process-wide spacing of outbound requests. Each task starts at least
 * `intervalMs` after the previous task started and after the previous
 * task finished, whichever is later; with one worker that is a plain
 * delay between consecutive requests.
 */
export class RequestPacer {
  private nextSlot = 0;

  constructor(
    private readonly intervalMs: number,
    private readonly clock: Clock = Date.now,
    private readonly sleep: Sleep = delay,
  ) {}

  async run<T>(task: () => Promise<T>): Promise<T> {
    if (this.intervalMs <= 0) {
      return task();
    }

    const now = this.clock();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.intervalMs;

    if (slot > now) {
      await this.sleep(slot - now);
    }

    try {
      return await task();
    } finally {
      this.nextSlot = Math.max(this.nextSlot, this.clock() + this.intervalMs);
    }
  }
}

export async function delay(ms: number): Promise<void> {
  await new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
