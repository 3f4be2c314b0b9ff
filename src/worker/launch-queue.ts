/**
 * Bounded launch queue.
 *
 * Every launch goes through here so that at most `concurrency` runtime
 * launches are in flight. Queued and running launches are cancellable, one
 * at a time or all at once on shutdown.
 */

import PQueue from "p-queue";

import { AbortedError, linkedAbortController, rejectOnAbort } from "@/lib/async";

export type LaunchStatus = "pending" | "running" | "completed" | "failed" | "cancelled";

export interface LaunchJob<T> {
  service: string;
  promise: Promise<T>;
  cancel: () => void;
  getStatus: () => LaunchStatus;
}

export interface LaunchQueueConfig {
  /** Maximum concurrent launches; unbounded when omitted */
  concurrency?: number;
}

export interface LaunchQueue {
  /**
   * Queue `fn` for `service`. The signal passed to `fn` aborts when the job
   * is cancelled or when `signal` aborts.
   */
  enqueue: <T>(
    service: string,
    fn: (signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal,
  ) => LaunchJob<T>;
  getStatus: (service: string) => LaunchStatus | null;
  /** Queued plus running launches */
  getPendingCount: () => number;
  cancelAll: () => void;
  waitForIdle: () => Promise<void>;
  /**
   * Resolves once every launch operation that has started has settled. A
   * cancelled job's promise rejects at once, but its operation may still be
   * running.
   */
  waitForInFlight: () => Promise<void>;
}

export const createLaunchQueue = (config: LaunchQueueConfig = {}): LaunchQueue => {
  const queue = new PQueue({ concurrency: config.concurrency ?? Number.POSITIVE_INFINITY });
  const jobs = new Map<string, LaunchStatus>();
  const controllers = new Map<string, AbortController>();
  const inFlight = new Set<Promise<void>>();

  const track = (operation: Promise<unknown>): void => {
    const settled: Promise<void> = operation
      .then(
        () => undefined,
        () => undefined,
      )
      .finally(() => {
        inFlight.delete(settled);
      });
    inFlight.add(settled);
  };

  const enqueue = <T>(
    service: string,
    fn: (signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal,
  ): LaunchJob<T> => {
    const { controller, dispose } = linkedAbortController(signal);

    jobs.set(service, "pending");
    controllers.set(service, controller);

    const queued = queue.add(
      async () => {
        if (controller.signal.aborted) {
          throw new AbortedError(`Launch of ${service} was cancelled`);
        }

        jobs.set(service, "running");
        const operation = fn(controller.signal);
        track(operation);
        const result = await operation;
        if (!controller.signal.aborted) {
          jobs.set(service, "completed");
        }
        return result;
      },
      { signal: controller.signal, throwOnTimeout: true },
    );

    // A cancelled job settles at once, not when it reaches the head of the queue
    const promise = Promise.race([queued, rejectOnAbort(controller.signal)])
      .catch((error: unknown) => {
        jobs.set(service, controller.signal.aborted ? "cancelled" : "failed");
        throw error;
      })
      .finally(() => {
        controllers.delete(service);
        dispose();
      });

    return {
      service,
      promise,
      cancel: () => {
        const status = jobs.get(service);
        if (status === "pending" || status === "running") {
          controller.abort(new AbortedError(`Launch of ${service} was cancelled`));
        }
      },
      getStatus: () => jobs.get(service) ?? "pending",
    };
  };

  const cancelAll = (): void => {
    for (const [service, controller] of controllers.entries()) {
      const status = jobs.get(service);
      if (status === "pending" || status === "running") {
        controller.abort(new AbortedError(`Launch of ${service} was cancelled`));
      }
    }
  };

  return {
    enqueue,
    getStatus: (service) => jobs.get(service) ?? null,
    getPendingCount: () => queue.size + queue.pending,
    cancelAll,
    waitForIdle: () => queue.onIdle(),
    waitForInFlight: async () => {
      await Promise.all([...inFlight]);
    },
  };
};
