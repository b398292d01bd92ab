export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type RetryAttempt = {
  attempt: number;
  maxAttempts: number;
  error: unknown;
};

export type RetryOptions = {
  retries: number; // extra attempts after the first one
  minDelayMs: number;
  maxDelayMs: number;
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: RetryAttempt & { delayMs: number }) => void;
  onGiveUp?: (ctx: RetryAttempt) => void;
  randomFn?: () => number;
  jitterRatio?: number;
};

const clampUnit = (value: number) => Math.min(1, Math.max(0, value));

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const normalizeDecision = (decision: RetryDecision): { retry: boolean; delayMs?: number } =>
  typeof decision === "boolean" ? { retry: decision } : decision;

/**
 * Delay before the retry following `attempt` (0-based). A server-provided delay
 * wins over exponential backoff; both are capped at `maxDelayMs` before jitter.
 */
export const computeRetryDelay = (
  attempt: number,
  opts: Pick<RetryOptions, "minDelayMs" | "maxDelayMs" | "randomFn" | "jitterRatio">,
  requestedDelayMs?: number
): number => {
  const hasRequested =
    typeof requestedDelayMs === "number" && Number.isFinite(requestedDelayMs) && requestedDelayMs >= 0;
  const base = hasRequested
    ? Math.min(opts.maxDelayMs, requestedDelayMs)
    : Math.min(opts.maxDelayMs, opts.minDelayMs * 2 ** attempt);

  const jitterRatio = clampUnit(opts.jitterRatio ?? 0.2);
  const random = clampUnit((opts.randomFn ?? Math.random)());
  return base + Math.floor(base * jitterRatio * random);
};

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const maxAttempts = opts.retries + 1;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      const decision = normalizeDecision(opts.shouldRetry(err));
      if (attempt >= opts.retries || !decision.retry) {
        opts.onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const delayMs = computeRetryDelay(attempt, opts, decision.delayMs);
      opts.onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs, error: err });
      await sleep(delayMs);
    }
  }
};
