/** Raised when a collaborator call outlives its deadline */
export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * Race `fn()` against a deadline. A non-positive or missing `ms`
 * disables the deadline.
 */
export async function withTimeout<T>(
  label: string,
  ms: number | undefined,
  fn: () => Promise<T>
): Promise<T> {
  if (ms === undefined || ms <= 0) return fn();
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
  });
  try {
    return await Promise.race([fn(), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Map over `items` with at most `limit` calls in flight.
 * Results keep input order. `fn` must not throw; wrap failures in its result.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const queue = items.map((item, index) => ({ item, index }));

  async function worker(): Promise<void> {
    for (let job = queue.shift(); job; job = queue.shift()) {
      results[job.index] = await fn(job.item, job.index);
    }
  }

  const workers = Array.from(
    { length: Math.max(1, Math.min(limit, items.length)) },
    () => worker()
  );
  await Promise.all(workers);
  return results;
}
