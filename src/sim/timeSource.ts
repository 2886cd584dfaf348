/**
 * Where the simulation reads time from.
 *
 * The system source is wall-clock. The virtual source fast-forwards: a sleep
 * yields one macrotask turn (so pending work gets to run) and then jumps the
 * clock, which lets a five minute run finish in milliseconds.
 */

export interface TimeSource {
  now(): number;
  /** Resolves after `ms`, or early (without error) when `signal` aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemTimeSource: TimeSource = {
  now: () => Date.now(),
  sleep(ms, signal) {
    return new Promise<void>((resolve) => {
      if (signal?.aborted) {
        resolve();
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, Math.max(0, ms));
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  },
};

export class VirtualTimeSource implements TimeSource {
  private current: number;

  constructor(startMs = 0) {
    this.current = startMs;
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += Math.max(0, ms);
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    const target = this.current + Math.max(0, ms);
    return new Promise<void>((resolve) => {
      if (signal?.aborted) {
        resolve();
        return;
      }
      let aborted = false;
      const onAbort = () => {
        aborted = true;
        resolve();
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      setImmediate(() => {
        signal?.removeEventListener("abort", onAbort);
        if (aborted) return;
        this.current = Math.max(this.current, target);
        resolve();
      });
    });
  }
}

export function createTimeSource(mode: "realtime" | "virtual", startMs = Date.now()): TimeSource {
  return mode === "virtual" ? new VirtualTimeSource(startMs) : systemTimeSource;
}
