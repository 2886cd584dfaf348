/**
 * State Lock - serializes async mutations per key.
 *
 * The patient store owns one instance and locks on patient id, so the data
 * feed and an agent's medication order never interleave on the same patient
 * while different patients mutate independently.
 */

import { log, logError } from "./logger";

interface LockState {
  queue: Promise<void>;
  count: number;
}

const DEFAULT_LOCK_TIMEOUT_MS = 5000;

export class StateLock {
  private readonly locks = new Map<string, LockState>();
  private readonly timeoutMs: number;

  constructor(opts?: { timeoutMs?: number }) {
    this.timeoutMs = opts?.timeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
  }

  /**
   * Execute a function with exclusive access to the key.
   *
   * @throws If waiting for the lock times out or the function throws
   *
   * @example
   * ```typescript
   * await lock.withLock(patientId, "applyVitalUpdate", async () => {
   *   record.vitals = { ...record.vitals, ...vitals };
   * });
   * ```
   */
  async withLock<T>(key: string, operation: string, fn: () => T | Promise<T>): Promise<T> {
    const lockStart = Date.now();
    let lockAcquired = false;

    const lockState = this.locks.get(key) ?? { queue: Promise.resolve(), count: 0 };
    const existingQueue = lockState.queue;

    // Increment count before any async work
    lockState.count++;
    this.locks.set(key, lockState);

    let resolveOurLock: () => void = () => undefined;
    const ourLock = new Promise<void>((resolve) => {
      resolveOurLock = resolve;
    });

    lockState.queue = existingQueue.then(() => ourLock);

    let timer: NodeJS.Timeout | undefined;
    try {
      await Promise.race([
        existingQueue,
        new Promise<void>((_, reject) => {
          timer = setTimeout(() => {
            reject(new Error(`State lock timeout for ${key} operation ${operation}`));
          }, this.timeoutMs);
        }),
      ]);
      clearTimeout(timer);

      lockAcquired = true;
      const waitTime = Date.now() - lockStart;
      if (waitTime > 100) {
        log(`[stateLock] ${operation} waited ${waitTime}ms for lock on ${key}`);
      }

      return await fn();
    } catch (err) {
      if (!lockAcquired) {
        logError(`[stateLock] Lock timeout for ${key}:`, operation, err);
      }
      throw err;
    } finally {
      clearTimeout(timer);
      resolveOurLock();

      const currentState = this.locks.get(key);
      if (currentState) {
        currentState.count--;
        if (currentState.count <= 0) {
          this.locks.delete(key);
        }
      }
    }
  }

  /**
   * Execute a function with exclusive access, but don't wait if the lock is held.
   * Returns undefined if the lock is unavailable.
   */
  async tryWithLock<T>(key: string, operation: string, fn: () => T | Promise<T>): Promise<T | undefined> {
    if (this.locks.has(key)) {
      log(`[stateLock] Skipping ${operation} on ${key} - lock held`);
      return undefined;
    }
    return this.withLock(key, operation, fn);
  }

  hasActiveLock(key: string): boolean {
    return this.locks.has(key);
  }

  get activeLockCount(): number {
    return this.locks.size;
  }

  /** Only use in tests or shutdown. */
  clear(): void {
    this.locks.clear();
  }
}
