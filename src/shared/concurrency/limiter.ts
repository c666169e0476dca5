/**
 * Raised for tasks that were still queued when the limiter stopped dispatching.
 */
export class DispatchCancelledError extends Error {
  constructor(reason = "dispatch cancelled") {
    super(reason);
    this.name = "DispatchCancelledError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type Limiter = {
  <T>(task: () => Promise<T>): Promise<T>;
  /** Stops dispatch: queued tasks reject with DispatchCancelledError, running ones finish. */
  cancelPending(reason?: string): number;
  activeCount(): number;
  pendingCount(): number;
};

type QueuedTask = {
  run: () => void;
  cancel: (err: DispatchCancelledError) => void;
};

/**
 * A tiny concurrency limiter (no external deps).
 * Usage:
 *   const limit = createLimiter(10);
 *   await Promise.allSettled(records.map((r) => limit(() => process(r))));
 */
export const createLimiter = (concurrency: number): Limiter => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error("concurrency must be an integer >= 1");
  }

  let active = 0;
  let cancelledReason: string | undefined;
  const queue: QueuedTask[] = [];

  const next = () => {
    if (active >= concurrency) return;
    const task = queue.shift();
    if (!task) return;
    active += 1;
    task.run();
  };

  const limit = <T>(task: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      if (cancelledReason !== undefined) {
        reject(new DispatchCancelledError(cancelledReason));
        return;
      }

      queue.push({
        run: async () => {
          try {
            resolve(await task());
          } catch (err) {
            reject(err);
          } finally {
            active -= 1;
            next();
          }
        },
        cancel: reject
      });
      next();
    });

  return Object.assign(limit, {
    cancelPending: (reason = "dispatch cancelled") => {
      cancelledReason = reason;
      const dropped = queue.splice(0, queue.length);
      for (const task of dropped) task.cancel(new DispatchCancelledError(reason));
      return dropped.length;
    },
    activeCount: () => active,
    pendingCount: () => queue.length
  });
};
