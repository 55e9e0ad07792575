import type { Sleep } from "./retryPolicy";

/**
 * Per-host politeness gate. Requests to the same host are spaced at least
 * `minIntervalMs` apart; different hosts do not wait on each other.
 */
export class HostThrottle {
  private readonly nextSlot = new Map<string, number>();

  constructor(
    private readonly minIntervalMs: number,
    private readonly now: () => number = Date.now,
    private readonly sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms))
  ) {}

  /** Wait until `host` may be contacted again and reserve the slot. */
  async acquire(host: string): Promise<void> {
    const key = host.toLowerCase();
    const current = this.now();
    const slot = Math.max(current, this.nextSlot.get(key) ?? 0);
    // Reserve before sleeping so concurrent callers queue behind this one.
    this.nextSlot.set(key, slot + this.minIntervalMs);
    const wait = slot - current;
    if (wait > 0) await this.sleep(wait);
  }
}
