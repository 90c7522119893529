import { describe, expect, it, vi } from "vitest";
import type { DebugEvent } from "../chat-types.js";
import { computeRetryDelayMs, isRetryable429Error, withRateLimitRetry } from "./retry.js";

describe("isRetryable429Error", () => {
  it("recognizes rate limits by status or message", () => {
    expect(isRetryable429Error({ status: 429 })).toBe(true);
    expect(isRetryable429Error(new Error("Too Many Requests"))).toBe(true);
    expect(isRetryable429Error('{"code":429}')).toBe(true);
    expect(isRetryable429Error(new Error("bad request"))).toBe(false);
  });
});

describe("computeRetryDelayMs", () => {
  it("doubles from the base delay and caps it", () => {
    const random = vi.spyOn(Math, "random").mockReturnValue(0);
    try {
      expect(computeRetryDelayMs(1)).toBe(1_250);
      expect(computeRetryDelayMs(3)).toBe(5_000);
      expect(computeRetryDelayMs(10)).toBe(20_000);
    } finally {
      random.mockRestore();
    }
  });
});

describe("withRateLimitRetry", () => {
  it("retries rate limits until the operation succeeds", async () => {
    const sleeps: number[] = [];
    const events: DebugEvent[] = [];
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce({ status: 429 })
      .mockResolvedValueOnce("done");

    await expect(
      withRateLimitRetry(operation, {
        stage: "stream",
        sleepFn: async (ms) => {
          sleeps.push(ms);
        },
        onDebug: (event) => events.push(event),
      }),
    ).resolves.toBe("done");

    expect(operation).toHaveBeenCalledTimes(2);
    expect(sleeps).toHaveLength(1);
    expect(events.map((event) => event.stage)).toEqual(["retry_429"]);
  });

  it("gives up after the last attempt and rethrows other errors at once", async () => {
    const sleepFn = async () => {};
    const limited = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("rate limit reached"));
    const broken = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("bad request"));

    await expect(withRateLimitRetry(limited, { stage: "s", sleepFn, maxAttempts: 2 })).rejects.toThrow(
      "rate limit reached",
    );
    expect(limited).toHaveBeenCalledTimes(2);
    await expect(withRateLimitRetry(broken, { stage: "s", sleepFn })).rejects.toThrow("bad request");
    expect(broken).toHaveBeenCalledTimes(1);
  });

  it("stops when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn<() => Promise<string>>();

    await expect(withRateLimitRetry(operation, { stage: "s", signal: controller.signal })).rejects.toThrow();
    expect(operation).not.toHaveBeenCalled();
  });
});
