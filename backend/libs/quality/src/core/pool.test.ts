import { describe, it, expect } from "vitest";
import { AnalysisAbortedError } from "../errors.js";
import { mapColumns, resolveConcurrency } from "./pool.js";

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("mapColumns", () => {
  it("keeps input order regardless of completion order", async () => {
    const delays = [30, 0, 10, 5];
    const out = await mapColumns(delays, async (ms, i) => {
      await sleep(ms);
      return i * 10;
    }, { concurrency: 4 });
    expect(out).toEqual([0, 10, 20, 30]);
  });

  it("never runs more than `concurrency` items at once", async () => {
    let active = 0;
    let peak = 0;
    await mapColumns([1, 2, 3, 4, 5, 6], async () => {
      active++;
      peak = Math.max(peak, active);
      await sleep(2);
      active--;
    }, { concurrency: 2 });
    expect(peak).toBe(2);
  });

  it("returns an empty array for no items", async () => {
    expect(await mapColumns([], (x: number) => x)).toEqual([]);
  });

  it("rejects before starting when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const seen: number[] = [];
    await expect(mapColumns([1, 2], (x) => seen.push(x), { signal: controller.signal })).rejects.toBeInstanceOf(
      AnalysisAbortedError
    );
    expect(seen).toEqual([]);
  });

  it("stops between columns once aborted", async () => {
    const controller = new AbortController();
    const seen: number[] = [];
    const run = mapColumns([0, 1, 2], (x) => {
      seen.push(x);
      controller.abort();
      return x;
    }, { concurrency: 1, signal: controller.signal });
    await expect(run).rejects.toBeInstanceOf(AnalysisAbortedError);
    expect(seen).toEqual([0]);
  });

  it("propagates the first error", async () => {
    const run = mapColumns([0, 1, 2], (x) => {
      if (x === 1) throw new Error("column 1 failed");
      return x;
    }, { concurrency: 1 });
    await expect(run).rejects.toThrow("column 1 failed");
  });
});

describe("resolveConcurrency", () => {
  it("uses the given positive value, floored", () => {
    expect(resolveConcurrency(3.7)).toBe(3);
  });

  it("falls back to at least one worker", () => {
    expect(resolveConcurrency(0)).toBeGreaterThanOrEqual(1);
    expect(resolveConcurrency()).toBeGreaterThanOrEqual(1);
  });
});
