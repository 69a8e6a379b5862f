import { TurnInterrupt } from './errors';

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new TurnInterrupt();
  }
}

export interface DeadlineOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  onTimeout: () => Error;
}

/**
 * Runs an operation with its own abort signal, rejecting with the error built
 * by `onTimeout` once the deadline passes and with a TurnInterrupt when the
 * parent signal aborts. The operation's signal is aborted in both cases.
 */
export async function runWithDeadline<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions,
): Promise<T> {
  throwIfAborted(options.signal);

  const controller = new AbortController();
  let rejectEarly: ((error: Error) => void) | undefined;

  const early = new Promise<never>((_, reject) => {
    rejectEarly = reject;
  });
  const onParentAbort = () => {
    rejectEarly?.(new TurnInterrupt());
    controller.abort();
  };

  options.signal?.addEventListener('abort', onParentAbort, { once: true });
  const timer = setTimeout(() => {
    rejectEarly?.(options.onTimeout());
    controller.abort();
  }, options.timeoutMs);

  try {
    return await Promise.race([operation(controller.signal), early]);
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', onParentAbort);
  }
}

/**
 * Sleeps for the given time; a parent abort ends the sleep with a
 * TurnInterrupt.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new TurnInterrupt());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new TurnInterrupt());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface LinkedAbortController {
  controller: AbortController;
  timedOut: () => boolean;
  dispose: () => void;
}

/**
 * Returns a controller aborted by the parent signal or, when given, after
 * `deadlineMs`. `dispose` detaches it from the parent and clears the timer.
 */
export function linkAbortController(
  parent?: AbortSignal,
  deadlineMs?: number,
): LinkedAbortController {
  const controller = new AbortController();
  let deadlinePassed = false;
  const onParentAbort = () => controller.abort();

  if (parent?.aborted) {
    controller.abort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  const timer =
    deadlineMs === undefined
      ? undefined
      : setTimeout(() => {
          deadlinePassed = true;
          controller.abort();
        }, deadlineMs);

  return {
    controller,
    timedOut: () => deadlinePassed,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}
