import { describe, expect, it, vi } from "vitest";
import { calculateBackoff, withRetry } from "./exponential-backoff";

describe("calculateBackoff", () => {
  it("doubles from the base delay", () => {
    expect([1, 2, 3, 4].map((a) => calculateBackoff(a))).toEqual([500, 1000, 2000, 4000]);
  });

  it("caps at the maximum", () => {
    expect(calculateBackoff(6)).toBe(8000);
    expect(calculateBackoff(3, { baseMs: 100, maximumMs: 250 })).toBe(250);
  });
});

describe("withRetry", () => {
  it("returns once a retry succeeds", async () => {
    const task = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error("boom 1"))
      .mockRejectedValueOnce(new Error("boom 2"))
      .mockResolvedValue("ok");
    const onRetry = vi.fn();

    await expect(withRetry(task, { retries: 3, baseMs: 1, onRetry })).resolves.toBe("ok");
    expect(task).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls.map(([, attempt, delay]) => [attempt, delay])).toEqual([
      [1, 1],
      [2, 2],
    ]);
  });

  it("gives up after the configured retries with the last error", async () => {
    let n = 0;
    const task = vi.fn(async () => {
      n++;
      throw new Error(`failure ${n}`);
    });

    await expect(withRetry(task, { retries: 3, baseMs: 1 })).rejects.toThrow("failure 4");
    expect(task).toHaveBeenCalledTimes(4);
  });

  it("does not retry errors the predicate refuses", async () => {
    const task = vi.fn(async () => {
      throw new Error("not found");
    });

    await expect(withRetry(task, { retries: 3, baseMs: 1, shouldRetry: () => false })).rejects.toThrow("not found");
    expect(task).toHaveBeenCalledTimes(1);
  });

  it("stops retrying once the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const task = vi.fn(async () => {
      throw new Error("offline");
    });

    await expect(withRetry(task, { retries: 3, baseMs: 1, signal: controller.signal })).rejects.toThrow("offline");
    expect(task).toHaveBeenCalledTimes(1);
  });
});
