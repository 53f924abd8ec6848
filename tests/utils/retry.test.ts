import { describe, it, expect, vi } from "vitest";
import { backoffDelay, retryWithBackoff } from "../../src/utils/retry";

describe("backoffDelay", () => {
  it("should double per retry", () => {
    expect(backoffDelay(0, 100)).toBe(100);
    expect(backoffDelay(1, 100)).toBe(200);
    expect(backoffDelay(3, 100)).toBe(800);
  });

  it("should cap at the maximum", () => {
    expect(backoffDelay(10, 5000, 60000)).toBe(60000);
  });
});

describe("retryWithBackoff", () => {
  it("should return the first successful result", async () => {
    const sleep = vi.fn(() => Promise.resolve());
    const operation = vi
      .fn<[number], Promise<string>>()
      .mockRejectedValueOnce(new Error("one"))
      .mockRejectedValueOnce(new Error("two"))
      .mockResolvedValue("ok");

    const result = await retryWithBackoff(operation, { maxAttempts: 3, baseDelayMs: 100, sleep });

    expect(result).toBe("ok");
    expect(operation).toHaveBeenCalledTimes(3);
    expect(operation.mock.calls.map((call) => call[0])).toEqual([1, 2, 3]);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it("should rethrow the last error once attempts are exhausted", async () => {
    const sleep = vi.fn(() => Promise.resolve());
    const onRetry = vi.fn();
    let calls = 0;

    await expect(
      retryWithBackoff(
        () => {
          calls++;
          return Promise.reject(new Error(`failure ${calls}`));
        },
        { maxAttempts: 2, baseDelayMs: 50, sleep, onRetry }
      )
    ).rejects.toThrow("failure 2");

    expect(calls).toBe(2);
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0]?.slice(1)).toEqual([1, 50]);
  });

  it("should stop early when shouldRetry returns false", async () => {
    const sleep = vi.fn(() => Promise.resolve());
    const operation = vi.fn(() => Promise.reject(new Error("fatal")));

    await expect(
      retryWithBackoff(operation, { maxAttempts: 5, baseDelayMs: 10, sleep, shouldRetry: () => false })
    ).rejects.toThrow("fatal");

    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});
