import { getEventListeners } from "events";
import { systemTimeSource, VirtualTimeSource } from "../timeSource";

describe("VirtualTimeSource", () => {
  it("jumps the clock after yielding once", async () => {
    const time = new VirtualTimeSource(1000);
    const sleeping = time.sleep(250);
    expect(time.now()).toBe(1000);
    await sleeping;
    expect(time.now()).toBe(1250);
  });

  it("removes its abort listener once the sleep completes", async () => {
    const time = new VirtualTimeSource(0);
    const controller = new AbortController();
    for (let i = 0; i < 20; i++) await time.sleep(1000, controller.signal);

    expect(getEventListeners(controller.signal, "abort")).toHaveLength(0);
    expect(time.now()).toBe(20_000);
  });

  it("wakes on abort without advancing the clock", async () => {
    const time = new VirtualTimeSource(0);
    const controller = new AbortController();
    const sleeping = time.sleep(5000, controller.signal);
    controller.abort();
    await sleeping;
    await new Promise((r) => setImmediate(r));

    expect(time.now()).toBe(0);
    expect(getEventListeners(controller.signal, "abort")).toHaveLength(0);
  });

  it("returns at once for an already aborted signal", async () => {
    const time = new VirtualTimeSource(0);
    await time.sleep(5000, AbortSignal.abort());
    expect(time.now()).toBe(0);
  });
});

describe("systemTimeSource", () => {
  it("removes its abort listener once the timer fires", async () => {
    const controller = new AbortController();
    for (let i = 0; i < 20; i++) await systemTimeSource.sleep(1, controller.signal);
    expect(getEventListeners(controller.signal, "abort")).toHaveLength(0);
  });

  it("wakes early on abort", async () => {
    const controller = new AbortController();
    const started = Date.now();
    const sleeping = systemTimeSource.sleep(10_000, controller.signal);
    controller.abort();
    await sleeping;
    expect(Date.now() - started).toBeLessThan(1000);
  });
});
