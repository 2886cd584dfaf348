/**
 * Per-key rate limit on event time. `ready` records the firing when it
 * returns true.
 */
export class Throttle {
  private readonly lastFired = new Map<string, number>();

  constructor(private readonly intervalMs: number) {}

  ready(key: string, ts: number): boolean {
    const last = this.lastFired.get(key);
    if (last !== undefined && ts - last < this.intervalMs) return false;
    this.lastFired.set(key, ts);
    return true;
  }
}
