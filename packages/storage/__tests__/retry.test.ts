import { describe, it, expect, vi } from "vitest";
import { retry } from "../src/utils/retry";

describe("retry", () => {
  it("returns the first successful result", async () => {
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 2) throw new Error(`fail ${attempt}`);
      return "ok";
    });
    const onRetry = vi.fn();

    await expect(retry(fn, { attempts: 3, baseDelayMs: 1, jitter: false, onRetry })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls.map(([, attempt]) => attempt)).toEqual([1, 2]);
  });

  it("rethrows the last error after exhausting attempts", async () => {
    const fn = vi.fn(async (attempt: number) => {
      throw new Error(`fail ${attempt}`);
    });

    await expect(retry(fn, { attempts: 2, baseDelayMs: 1, jitter: false })).rejects.toThrow("fail 1");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("does not retry errors rejected by shouldRetry", async () => {
    const fn = vi.fn(async () => {
      throw new Error("permanent");
    });

    await expect(
      retry(fn, { attempts: 5, baseDelayMs: 1, shouldRetry: () => false })
    ).rejects.toThrow("permanent");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("stops once the signal is aborted", async () => {
    const controller = new AbortController();
    const fn = vi.fn(async () => {
      controller.abort();
      throw new Error("boom");
    });

    await expect(retry(fn, { attempts: 3, baseDelayMs: 1, signal: controller.signal })).rejects.toThrow("boom");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("surfaces the original failure when the backoff sleep is interrupted", async () => {
    const controller = new AbortController();
    const fn = vi.fn(async () => {
      setTimeout(() => controller.abort(), 5);
      throw new Error("slow");
    });

    await expect(
      retry(fn, { attempts: 3, baseDelayMs: 10_000, jitter: false, signal: controller.signal })
    ).rejects.toThrow("slow");
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
