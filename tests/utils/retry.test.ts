import { RetryExhaustedError, sleep, withRetry } from "../../src/utils/retry.js";

class Transient extends Error {}

describe("withRetry", () => {
  it("returns the first successful result", async () => {
    const fn = vi.fn(async () => "ok");
    expect(await withRetry(fn)).toBe("ok");
    expect(fn).toHaveBeenCalledWith(0);
  });

  it("backs off exponentially between attempts", async () => {
    const pause = vi.fn(async () => {});
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Transient("1"))
      .mockRejectedValueOnce(new Transient("2"))
      .mockResolvedValueOnce("ok");

    expect(await withRetry(fn, { baseDelayMs: 100, sleep: pause })).toBe("ok");
    expect(fn.mock.calls.map(([attempt]) => attempt)).toEqual([0, 1, 2]);
    expect(pause.mock.calls).toEqual([
      [100, undefined],
      [200, undefined],
    ]);
  });

  it("caps the delay and prefers a server hint", async () => {
    const pause = vi.fn<(ms: number, signal?: AbortSignal) => Promise<void>>(async () => {});
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Transient("a"))
      .mockRejectedValueOnce(new Transient("b"))
      .mockRejectedValueOnce(new Transient("c"))
      .mockResolvedValueOnce("ok");

    await withRetry(fn, {
      baseDelayMs: 100,
      maxDelayMs: 150,
      sleep: pause,
      delayHintMs: (error) => (error instanceof Error && error.message === "c" ? 10_000 : undefined),
    });

    expect(pause.mock.calls.map(([ms]) => ms)).toEqual([100, 150, 150]);
  });

  it("rethrows errors the predicate rejects", async () => {
    const fatal = new Error("fatal");
    const fn = vi.fn(async () => {
      throw fatal;
    });

    await expect(withRetry(fn, { shouldRetry: (error) => error instanceof Transient })).rejects.toBe(fatal);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("wraps the last error once the budget is spent", async () => {
    const last = new Transient("still failing");
    const error = await withRetry(
      async () => {
        throw last;
      },
      { maxRetries: 2, sleep: async () => {} },
    ).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(error instanceof RetryExhaustedError ? [error.attempts, error.lastError] : []).toEqual([3, last]);
  });
});

describe("sleep", () => {
  it("resolves at once for an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(60_000, controller.signal)).resolves.toBeUndefined();
  });

  it("resolves early when the signal aborts", async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);
    controller.abort();
    await expect(pending).resolves.toBeUndefined();
  });
});
