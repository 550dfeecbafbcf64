import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { ANALYSIS_CALLER, RateGate } from "./rateGate.js";

describe("RateGate", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("grants the first call immediately", async () => {
    const gate = new RateGate({ minIntervalMs: 1000 });
    await expect(gate.acquire("price-refresher", "price")).resolves.toBe(true);
    expect(gate.timeUntilNextSlot()).toBe(1000);
  });

  it("spaces sequential grants by the minimum interval", async () => {
    const gate = new RateGate({ minIntervalMs: 1000 });
    const grants: number[] = [];

    const run = (async () => {
      for (let i = 0; i < 4; i++) {
        await gate.acquire("price-refresher", `call ${i}`);
        grants.push(Date.now());
      }
    })();

    await vi.advanceTimersByTimeAsync(5000);
    await run;

    expect(grants).toHaveLength(4);
    for (let i = 1; i < grants.length; i++) {
      expect((grants[i] ?? 0) - (grants[i - 1] ?? 0)).toBeGreaterThanOrEqual(1000);
    }
  });

  it("never grants two concurrent waiters the same slot", async () => {
    const gate = new RateGate({ minIntervalMs: 1000 });
    const grants: number[] = [];
    const take = async (caller: string) => {
      await gate.acquire(caller, "history");
      grants.push(Date.now());
    };

    const all = Promise.all([take("a"), take("b"), take("c")]);
    await vi.advanceTimersByTimeAsync(5000);
    await all;

    const sorted = [...grants].sort((x, y) => x - y);
    expect(sorted).toHaveLength(3);
    expect((sorted[2] ?? 0) - (sorted[0] ?? 0)).toBeGreaterThanOrEqual(2000);
  });

  it("denies non-privileged callers during another caller's intensive operation", async () => {
    const gate = new RateGate({ minIntervalMs: 0 });
    gate.beginIntensive("watchlist-analyzer");

    await expect(gate.acquire("price-refresher", "price")).resolves.toBe(false);
    expect(gate.tryAcquire("price-refresher", "price")).toBe(false);
    expect(gate.isDeferred("price-refresher")).toBe(true);
  });

  it("lets the holder and privileged callers through", async () => {
    const gate = new RateGate({ minIntervalMs: 0 });
    gate.beginIntensive("watchlist-analyzer");

    await expect(gate.acquire("watchlist-analyzer", "history")).resolves.toBe(true);
    await expect(gate.acquire(ANALYSIS_CALLER, "history")).resolves.toBe(true);
    expect(gate.isDeferred(ANALYSIS_CALLER)).toBe(false);
  });

  it("ignores endIntensive from a caller that does not hold the lock", async () => {
    const gate = new RateGate({ minIntervalMs: 0 });
    gate.beginIntensive("watchlist-analyzer");
    gate.endIntensive("price-refresher");

    expect(gate.currentIntensiveHolder()).toBe("watchlist-analyzer");

    gate.endIntensive("watchlist-analyzer");
    expect(gate.currentIntensiveHolder()).toBeNull();
    await expect(gate.acquire("price-refresher", "price")).resolves.toBe(true);
  });

  it("refuses the intensive lock to a second caller", () => {
    const gate = new RateGate({ minIntervalMs: 0 });

    expect(gate.beginIntensive("watchlist-analyzer")).toBe(true);
    expect(gate.beginIntensive("bulk-import")).toBe(false);
    expect(gate.currentIntensiveHolder()).toBe("watchlist-analyzer");
    expect(gate.beginIntensive("watchlist-analyzer")).toBe(true);

    gate.endIntensive("watchlist-analyzer");
    expect(gate.beginIntensive("bulk-import")).toBe(true);
  });

  it("returns false on abort without claiming the slot", async () => {
    const gate = new RateGate({ minIntervalMs: 1000 });
    await gate.acquire("a", "first");

    const controller = new AbortController();
    const pending = gate.acquire("b", "second", controller.signal);
    await vi.advanceTimersByTimeAsync(100);
    controller.abort();

    await expect(pending).resolves.toBe(false);
    expect(gate.timeUntilNextSlot()).toBe(900);
  });

  it("reports whether a slot is free without claiming it", () => {
    const gate = new RateGate({ minIntervalMs: 1000 });
    expect(gate.tryAcquire("a", "price")).toBe(true);
    expect(gate.tryAcquire("a", "price")).toBe(true);
    expect(gate.timeUntilNextSlot()).toBe(0);
  });
});
