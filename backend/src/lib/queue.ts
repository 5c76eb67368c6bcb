import pLimit from "p-limit";
import PQueue from "p-queue";

export type WorkerPool = <T>(task: () => Promise<T>) => Promise<T>;

// Excess tasks wait in the pool instead of firing at once.
export const createWorkerPool = (concurrency: number): WorkerPool => {
  const limit = pLimit(Math.max(1, concurrency));
  return (task) => limit(task);
};

export interface RateLimiter {
  schedule<T>(task: () => Promise<T>): Promise<T>;
  readonly pending: number;
}

/**
 * Spreads calls evenly: one start per `60s / requestsPerMinute`, one call in
 * flight at a time.
 */
export const createRateLimiter = (requestsPerMinute: number): RateLimiter => {
  const queue = new PQueue({
    concurrency: 1,
    intervalCap: 1,
    interval: Math.ceil(60_000 / Math.max(1, requestsPerMinute)),
  });

  return {
    schedule: (task) => queue.add(task),
    get pending() {
      return queue.size + queue.pending;
    },
  };
};

/** Runs tasks immediately. */
export const unlimited: RateLimiter = {
  schedule: (task) => task(),
  pending: 0,
};
