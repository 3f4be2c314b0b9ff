/**
 * Cancellation helpers shared by everything that suspends on an AbortSignal.
 */

export class AbortedError extends Error {
  public override readonly name = "AbortError";

  constructor(message = "Operation aborted") {
    super(message);
  }
}

export const abortReason = (signal: AbortSignal): Error =>
  signal.reason instanceof Error ? signal.reason : new AbortedError();

export const isAbortError = (error: unknown): boolean =>
  error instanceof Error && error.name === "AbortError";

export const throwIfAborted = (signal: AbortSignal | undefined): void => {
  if (signal?.aborted) {
    throw abortReason(signal);
  }
};

/**
 * Resolve after `ms`, or reject with the abort reason as soon as `signal`
 * aborts. The timer is cleared either way.
 */
export const delay = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      if (signal) reject(abortReason(signal));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });

/**
 * A promise that never resolves and rejects with the abort reason once
 * `signal` aborts. Meant for `Promise.race`.
 */
export const rejectOnAbort = (signal: AbortSignal): Promise<never> =>
  new Promise<never>((_resolve, reject) => {
    if (signal.aborted) {
      reject(abortReason(signal));
      return;
    }
    signal.addEventListener("abort", () => reject(abortReason(signal)), { once: true });
  });

/**
 * An AbortController that also aborts when any parent signal aborts.
 * `dispose` detaches it from the parents.
 */
export const linkedAbortController = (
  ...parents: (AbortSignal | undefined)[]
): { controller: AbortController; dispose: () => void } => {
  const controller = new AbortController();
  const cleanups: (() => void)[] = [];

  for (const parent of parents) {
    if (!parent) continue;
    if (parent.aborted) {
      controller.abort(parent.reason);
      break;
    }
    const onAbort = (): void => controller.abort(parent.reason);
    parent.addEventListener("abort", onAbort, { once: true });
    cleanups.push(() => parent.removeEventListener("abort", onAbort));
  }

  return {
    controller,
    dispose: () => {
      for (const cleanup of cleanups) cleanup();
    },
  };
};
