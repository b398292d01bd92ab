import { computeRetryDelay, retry } from "../../src/shared/retry/retry";

type StatusError = Error & { status?: number };

const statusError = (status: number): StatusError => Object.assign(new Error(`status ${status}`), { status });

const isServerError = (err: unknown) =>
  err instanceof Error && typeof (err as StatusError).status === "number" && ((err as StatusError).status ?? 0) >= 500;

describe("retry", () => {
  it("retries transient failures then succeeds", async () => {
    let n = 0;
    const result = await retry(
      async () => {
        n += 1;
        if (n < 3) throw statusError(503);
        return "ok";
      },
      { retries: 5, minDelayMs: 1, maxDelayMs: 5, shouldRetry: isServerError }
    );

    expect(result).toBe("ok");
    expect(n).toBe(3);
  });

  it("stops immediately when shouldRetry declines and reports the give-up", async () => {
    const onGiveUp = jest.fn();
    let n = 0;

    await expect(
      retry(
        async () => {
          n += 1;
          throw statusError(404);
        },
        { retries: 5, minDelayMs: 1, maxDelayMs: 5, shouldRetry: isServerError, onGiveUp }
      )
    ).rejects.toThrow("status 404");

    expect(n).toBe(1);
    expect(onGiveUp).toHaveBeenCalledWith(expect.objectContaining({ attempt: 1, maxAttempts: 6 }));
  });

  it("reports each retry with its attempt number and delay", async () => {
    const onRetry = jest.fn();

    await expect(
      retry(
        async () => {
          throw statusError(500);
        },
        { retries: 2, minDelayMs: 1, maxDelayMs: 10, jitterRatio: 0, shouldRetry: () => true, onRetry }
      )
    ).rejects.toThrow("status 500");

    expect(onRetry.mock.calls.map(([ctx]) => [ctx.attempt, ctx.delayMs])).toEqual([
      [1, 1],
      [2, 2]
    ]);
  });
});

describe("computeRetryDelay", () => {
  const opts = { minDelayMs: 100, maxDelayMs: 1000, jitterRatio: 0 };

  it("backs off exponentially up to the cap", () => {
    expect([0, 1, 2, 3, 4].map((attempt) => computeRetryDelay(attempt, opts))).toEqual([100, 200, 400, 800, 1000]);
  });

  it("prefers a requested delay, still capped", () => {
    expect(computeRetryDelay(0, opts, 300)).toBe(300);
    expect(computeRetryDelay(0, opts, 5000)).toBe(1000);
    expect(computeRetryDelay(2, opts, -1)).toBe(400);
  });

  it("adds bounded jitter", () => {
    expect(computeRetryDelay(0, { ...opts, jitterRatio: 0.5, randomFn: () => 1 })).toBe(150);
    expect(computeRetryDelay(0, { ...opts, jitterRatio: 3, randomFn: () => 7 })).toBe(200);
  });
});
