export type DeadlineOptions = {
  /** Omitted means the task may run for as long as it takes. */
  timeoutMs?: number;
  /** Caller-side cancellation for the whole operation. */
  signal?: AbortSignal;
  onTimeout: () => Error;
  onAbort: () => Error;
};

/**
 * Runs `task` against a deadline timer and the caller's signal, whichever
 * settles first. The losing task is aborted through the signal it was handed,
 * so transports that honour it release their connection. Timers and
 * listeners are removed once the race is decided.
 */
export async function runWithDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions
): Promise<T> {
  if (options.signal?.aborted) throw options.onAbort();

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let detach: () => void = () => {};

  const deadline = new Promise<never>((_, reject) => {
    // reject before aborting so the race settles with our error, not the transport's
    const stop = (error: Error) => {
      reject(error);
      controller.abort(error);
    };

    if (options.timeoutMs !== undefined) {
      timer = setTimeout(() => stop(options.onTimeout()), options.timeoutMs);
    }

    const callerSignal = options.signal;
    if (callerSignal) {
      const onCallerAbort = () => stop(options.onAbort());
      callerSignal.addEventListener('abort', onCallerAbort, { once: true });
      detach = () => callerSignal.removeEventListener('abort', onCallerAbort);
    }
  });

  const work = new Promise<T>((resolve, reject) => {
    task(controller.signal).then(resolve, reject);
  });

  try {
    return await Promise.race([work, deadline]);
  } finally {
    if (timer !== undefined) clearTimeout(timer);
    detach();
  }
}
