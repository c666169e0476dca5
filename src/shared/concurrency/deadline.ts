export type DeadlineOptions = {
  /** Per-call budget. Omit for no per-call limit. */
  timeoutMs?: number;
  /** Outer deadline (e.g. the whole run). Aborting it fails the call immediately. */
  parentSignal?: AbortSignal;
  onTimeout: (origin: "call" | "parent") => Error;
  /** Receives rejections of a task that already lost the race. */
  onLateFailure?: (error: unknown) => void;
};

/**
 * Races `task` against its own timeout and an outer abort signal.
 * The task receives a signal that is aborted when either deadline fires, so
 * network calls underneath can stop early.
 */
export const withDeadline = <T>(task: (signal: AbortSignal) => Promise<T>, opts: DeadlineOptions): Promise<T> => {
  const { timeoutMs, parentSignal, onTimeout, onLateFailure } = opts;

  if (parentSignal?.aborted) {
    return Promise.reject(onTimeout("parent"));
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    const onParentAbort = () => fail(onTimeout("parent"));

    const release = () => {
      if (timer) clearTimeout(timer);
      parentSignal?.removeEventListener("abort", onParentAbort);
    };

    const fail = (error: Error) => {
      if (settled) return;
      settled = true;
      release();
      controller.abort(error);
      reject(error);
    };

    if (timeoutMs != null) {
      timer = setTimeout(() => fail(onTimeout("call")), timeoutMs);
    }
    parentSignal?.addEventListener("abort", onParentAbort, { once: true });

    task(controller.signal).then(
      (value) => {
        if (settled) return;
        settled = true;
        release();
        resolve(value);
      },
      (error: unknown) => {
        if (settled) {
          onLateFailure?.(error);
          return;
        }
        settled = true;
        release();
        reject(error);
      }
    );
  });
};
