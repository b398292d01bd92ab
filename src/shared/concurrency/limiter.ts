export type Limiter = {
  <T>(task: () => Promise<T>): Promise<T>;
  readonly active: () => number;
  readonly pending: () => number;
};

/**
 * Runs at most `concurrency` tasks at once, in submission order.
 * `createLimiter(1)` serializes every task passed to it.
 */
export const createLimiter = (concurrency: number): Limiter => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError("concurrency must be an integer >= 1");
  }

  let running = 0;
  const waiting: Array<() => void> = [];

  const release = () => {
    running -= 1;
    const start = waiting.shift();
    if (start) {
      running += 1;
      start();
    }
  };

  const acquire = (): Promise<void> => {
    if (running < concurrency) {
      running += 1;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => waiting.push(resolve));
  };

  const limit = async <T>(task: () => Promise<T>): Promise<T> => {
    await acquire();
    try {
      return await task();
    } finally {
      release();
    }
  };

  return Object.assign(limit, {
    active: () => running,
    pending: () => waiting.length
  });
};
