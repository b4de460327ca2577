import { setTimeout as sleep } from "node:timers/promises";
import { describe, expect, it } from "vitest";
import { mapPool } from "./worker-pool";

describe("mapPool", () => {
  it("keeps input order whatever order the work finishes in", async () => {
    const delays = [30, 5, 20, 0, 10];
    const out = await mapPool(delays, 3, async (ms, i) => {
      await sleep(ms);
      return i * 10;
    });
    expect(out).toEqual([0, 10, 20, 30, 40]);
  });

  it("never runs more than `concurrency` workers at once", async () => {
    let active = 0;
    let peak = 0;
    await mapPool(Array.from({ length: 8 }, (_, i) => i), 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await sleep(5);
      active--;
    });
    expect(peak).toBe(2);
  });

  it("stops handing out work after the first failure", async () => {
    const started: number[] = [];
    const run = mapPool([0, 1, 2, 3, 4], 1, async (n) => {
      started.push(n);
      if (n === 2) throw new Error("boom");
      return n;
    });
    await expect(run).rejects.toThrow("boom");
    expect(started).toEqual([0, 1, 2]);
  });

  it("aborts the worker signal for in-flight items", async () => {
    let sawAbort = false;
    const run = mapPool([0, 1], 2, async (n, _i, signal) => {
      if (n === 0) throw new Error("first");
      await sleep(10);
      sawAbort = signal.aborted;
      return n;
    });
    await expect(run).rejects.toThrow("first");
    expect(sawAbort).toBe(true);
  });

  it("rejects with the reason of an external abort", async () => {
    const controller = new AbortController();
    controller.abort(new Error("cancelled"));
    await expect(mapPool([1, 2], 2, async (n) => n, controller.signal)).rejects.toThrow("cancelled");
  });

  it("handles an empty list", async () => {
    await expect(mapPool([], 4, async () => 1)).resolves.toEqual([]);
  });
});
