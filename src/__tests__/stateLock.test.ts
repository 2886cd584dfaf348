import { StateLock } from "../stateLock";
import { setLogLevel } from "../logger";

describe("StateLock", () => {
  let lock: StateLock;

  beforeAll(() => setLogLevel("error"));

  beforeEach(() => {
    lock = new StateLock();
  });

  afterEach(() => {
    lock.clear();
  });

  describe("withLock", () => {
    it("executes function and returns result", async () => {
      const result = await lock.withLock("patient-1", "test", async () => 42);
      expect(result).toBe(42);
    });

    it("serializes concurrent operations on one key", async () => {
      const order: number[] = [];

      const p1 = lock.withLock("patient-1", "op1", async () => {
        await new Promise((r) => setTimeout(r, 30));
        order.push(1);
      });
      const p2 = lock.withLock("patient-1", "op2", async () => {
        order.push(2);
      });

      await Promise.all([p1, p2]);
      expect(order).toEqual([1, 2]);
    });

    it("lets different keys run in parallel", async () => {
      const order: string[] = [];

      const p1 = lock.withLock("patient-1", "op1", async () => {
        await new Promise((r) => setTimeout(r, 30));
        order.push("p1");
      });
      const p2 = lock.withLock("patient-2", "op2", async () => {
        order.push("p2");
      });

      await Promise.all([p1, p2]);
      expect(order).toEqual(["p2", "p1"]);
    });

    it("releases the lock when the function throws", async () => {
      await expect(
        lock.withLock("patient-1", "boom", async () => {
          throw new Error("boom");
        })
      ).rejects.toThrow("boom");

      expect(lock.hasActiveLock("patient-1")).toBe(false);
      await expect(lock.withLock("patient-1", "after", () => "ok")).resolves.toBe("ok");
    });

    it("times out waiting behind a stuck holder", async () => {
      const short = new StateLock({ timeoutMs: 20 });
      let release: () => void = () => undefined;
      const holder = short.withLock("patient-1", "holder", () => new Promise<void>((r) => (release = r)));

      await expect(short.withLock("patient-1", "waiter", () => "never")).rejects.toThrow(
        "State lock timeout for patient-1 operation waiter"
      );

      release();
      await holder;
    });
  });

  describe("tryWithLock", () => {
    it("skips when the key is held", async () => {
      let release: () => void = () => undefined;
      const holder = lock.withLock("patient-1", "holder", () => new Promise<void>((r) => (release = r)));

      const result = await lock.tryWithLock("patient-1", "try", () => "ran");
      expect(result).toBeUndefined();

      release();
      await holder;
      await expect(lock.tryWithLock("patient-1", "try", () => "ran")).resolves.toBe("ran");
    });
  });

  it("tracks active lock count", async () => {
    let release: () => void = () => undefined;
    const holder = lock.withLock("patient-1", "holder", () => new Promise<void>((r) => (release = r)));
    expect(lock.activeLockCount).toBe(1);
    release();
    await holder;
    expect(lock.activeLockCount).toBe(0);
  });
});
