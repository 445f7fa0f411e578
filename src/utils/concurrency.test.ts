import { describe, expect, it } from "vitest";
import { mapWithConcurrency, randomBetween } from "./concurrency";

describe("mapWithConcurrency", () => {
  it("keeps results in input order", async () => {
    const delays = [30, 10, 20, 0];
    const results = await mapWithConcurrency(delays, 2, async (ms, index) => {
      await new Promise((resolve) => setTimeout(resolve, ms));
      return `${index}:${ms}`;
    });
    expect(results).toEqual(["0:30", "1:10", "2:20", "3:0"]);
  });

  it("never runs more than the limit at once", async () => {
    let active = 0;
    let peak = 0;
    await mapWithConcurrency([1, 2, 3, 4, 5], 3, async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setImmediate(resolve));
      active--;
    });
    expect(peak).toBe(3);
  });

  it("handles an empty list", async () => {
    expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
  });

  it("rejects a non-positive limit", async () => {
    await expect(mapWithConcurrency([1], 0, async () => 1)).rejects.toThrow(
      "concurrency must be >= 1",
    );
  });
});

describe("randomBetween", () => {
  it("spans the inclusive range", () => {
    expect(randomBetween(1000, 3000, () => 0)).toBe(1000);
    expect(randomBetween(1000, 3000, () => 0.9999999)).toBe(3000);
  });

  it("returns the minimum for an empty range", () => {
    expect(randomBetween(500, 500, () => 0.7)).toBe(500);
  });
});
