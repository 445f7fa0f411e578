import { describe, expect, it, vi } from "vitest";
import { backoffDelay, withRetry } from "./retry";

const policy = { maxAttempts: 4, backoffStartMs: 2000, backoffMaxMs: 10_000 };

describe("backoffDelay", () => {
  it("doubles from the start delay and caps", () => {
    expect([0, 1, 2, 3].map((retry) => backoffDelay(policy, retry))).toEqual([
      2000, 4000, 8000, 10_000,
    ]);
  });
});

describe("withRetry", () => {
  it("returns the first result that should not be retried", async () => {
    const results = ["busy", "busy", "done"];
    const attempt = vi.fn(async (n: number) => results[n - 1]);
    const sleep = vi.fn(async (_ms: number) => {});
    const onRetry = vi.fn();

    const result = await withRetry(attempt, {
      policy,
      shouldRetry: (r) => r === "busy",
      sleep,
      onRetry,
    });

    expect(result).toBe("done");
    expect(attempt.mock.calls.map(([n]) => n)).toEqual([1, 2, 3]);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 4000]);
    expect(onRetry).toHaveBeenNthCalledWith(1, "busy", 1, 2000);
  });

  it("returns the last result at the attempt cap", async () => {
    const attempt = vi.fn(async (n: number) => `busy-${n}`);

    const result = await withRetry(attempt, {
      policy: { ...policy, maxAttempts: 2 },
      shouldRetry: () => true,
      sleep: async () => {},
    });

    expect(result).toBe("busy-2");
    expect(attempt).toHaveBeenCalledTimes(2);
  });

  it("always makes one attempt", async () => {
    const attempt = vi.fn(async () => "busy");

    await withRetry(attempt, {
      policy: { ...policy, maxAttempts: 0 },
      shouldRetry: () => true,
      sleep: async () => {},
    });

    expect(attempt).toHaveBeenCalledTimes(1);
  });
});
