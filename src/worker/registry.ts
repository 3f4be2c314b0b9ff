/**
 * In-memory service registry: the one shared mutable structure of a run.
 *
 * Each service has its own record and its own listener set, so a waiter on
 * one service is never woken (or blocked) by activity on unrelated services.
 * Writers own disjoint fields: the scheduler writes the phase, handle and
 * failure; the prober writes the verdict.
 */

import { InvalidTransitionError, toError } from "@/domains/errors";
import {
  type HealthStatus,
  type HealthVerdict,
  type LifecyclePhase,
  type LifecycleState,
  type ServiceDefinition,
  type ServiceFailure,
  type ServiceHandle,
  canTransition,
  deriveLifecycleState,
  initialVerdict,
} from "@/domains/service";
import { abortReason } from "@/lib/async";
import type { Logger } from "@/lib/logger";

/**
 * Read-only view of one service at a point in time.
 */
export interface ServiceSnapshot {
  name: string;
  phase: LifecyclePhase;
  state: LifecycleState;
  verdict: HealthVerdict;
  hasHealthCheck: boolean;
  handle: ServiceHandle | null;
  failure: ServiceFailure | null;
  updatedAt: Date;
}

export type RegistryEvent =
  | {
      type: "phase";
      service: string;
      from: LifecyclePhase;
      to: LifecyclePhase;
      snapshot: ServiceSnapshot;
    }
  | {
      type: "verdict";
      service: string;
      previous: HealthStatus;
      snapshot: ServiceSnapshot;
    };

export type RegistryListener = (event: RegistryEvent) => void;

export interface ServiceRegistry {
  /** Service names in declaration order */
  names(): readonly string[];
  get(name: string): ServiceSnapshot;
  getState(name: string): LifecycleState;
  snapshot(): ServiceSnapshot[];

  // Scheduler-owned writes
  transition(name: string, to: LifecyclePhase): ServiceSnapshot;
  fail(name: string, failure: ServiceFailure): ServiceSnapshot;
  setHandle(name: string, handle: ServiceHandle): void;

  // Prober-owned writes
  recordVerdict(verdict: HealthVerdict): ServiceSnapshot;

  /** Listen to every service; returns an unsubscribe function */
  subscribe(listener: RegistryListener): () => void;
  /** Listen to a single service; returns an unsubscribe function */
  watch(name: string, listener: RegistryListener): () => void;
  /**
   * Resolve with the first non-undefined result of `evaluate`, which runs now
   * and again after every change to one of `names`. Rejects when `signal`
   * aborts.
   */
  waitUntil<T>(
    names: readonly string[],
    evaluate: () => T | undefined,
    signal?: AbortSignal,
  ): Promise<T>;
}

interface ServiceRecord {
  definition: ServiceDefinition;
  phase: LifecyclePhase;
  verdict: HealthVerdict;
  handle: ServiceHandle | null;
  failure: ServiceFailure | null;
  updatedAt: Date;
  listeners: Set<RegistryListener>;
}

export class UnknownServiceError extends Error {
  public override readonly name = "UnknownServiceError";

  constructor(public readonly service: string) {
    super(`Unknown service: ${service}`);
  }
}

/**
 * Create a registry holding one `pending` record per service.
 *
 * @example
 * ```typescript
 * const registry = createServiceRegistry(graph.services());
 * registry.watch("db", (event) => logger.debug("db changed", { state: event.snapshot.state }));
 * await registry.waitUntil(["db"], () => (registry.getState("db") === "healthy" ? true : undefined));
 * ```
 */
export const createServiceRegistry = (
  definitions: readonly ServiceDefinition[],
  logger?: Logger,
): ServiceRegistry => {
  const records = new Map<string, ServiceRecord>();
  const globalListeners = new Set<RegistryListener>();

  for (const definition of definitions) {
    records.set(definition.name, {
      definition,
      phase: "pending",
      verdict: initialVerdict(definition.name),
      handle: null,
      failure: null,
      updatedAt: new Date(),
      listeners: new Set(),
    });
  }
  const order = Object.freeze(definitions.map((d) => d.name));

  const recordOf = (name: string): ServiceRecord => {
    const record = records.get(name);
    if (!record) {
      throw new UnknownServiceError(name);
    }
    return record;
  };

  const toSnapshot = (record: ServiceRecord): ServiceSnapshot => {
    const hasHealthCheck = record.definition.healthCheck !== null;
    return {
      name: record.definition.name,
      phase: record.phase,
      state: deriveLifecycleState(record.phase, record.verdict.status, hasHealthCheck),
      verdict: { ...record.verdict },
      hasHealthCheck,
      handle: record.handle,
      failure: record.failure,
      updatedAt: record.updatedAt,
    };
  };

  const notify = (record: ServiceRecord, event: RegistryEvent): void => {
    // Copy first: listeners may unsubscribe while being notified
    for (const listener of [...record.listeners, ...globalListeners]) {
      try {
        listener(event);
      } catch (error) {
        logger?.error("Registry listener failed", toError(error), { service: event.service });
      }
    }
  };

  const transition = (name: string, to: LifecyclePhase): ServiceSnapshot => {
    const record = recordOf(name);
    const from = record.phase;
    if (!canTransition(from, to)) {
      throw new InvalidTransitionError(name, from, to);
    }
    record.phase = to;
    record.updatedAt = new Date();
    const snapshot = toSnapshot(record);
    notify(record, { type: "phase", service: name, from, to, snapshot });
    return snapshot;
  };

  const fail = (name: string, failure: ServiceFailure): ServiceSnapshot => {
    const record = recordOf(name);
    if (!canTransition(record.phase, "failed")) {
      throw new InvalidTransitionError(name, record.phase, "failed");
    }
    record.failure = failure;
    return transition(name, "failed");
  };

  const setHandle = (name: string, handle: ServiceHandle): void => {
    const record = recordOf(name);
    record.handle = handle;
    record.updatedAt = new Date();
  };

  const recordVerdict = (verdict: HealthVerdict): ServiceSnapshot => {
    const record = recordOf(verdict.service);
    const previous = record.verdict.status;
    record.verdict = { ...verdict };
    record.updatedAt = new Date();
    const snapshot = toSnapshot(record);
    notify(record, { type: "verdict", service: verdict.service, previous, snapshot });
    return snapshot;
  };

  const subscribe = (listener: RegistryListener): (() => void) => {
    globalListeners.add(listener);
    return () => {
      globalListeners.delete(listener);
    };
  };

  const watch = (name: string, listener: RegistryListener): (() => void) => {
    const record = recordOf(name);
    record.listeners.add(listener);
    return () => {
      record.listeners.delete(listener);
    };
  };

  const waitUntil = <T>(
    names: readonly string[],
    evaluate: () => T | undefined,
    signal?: AbortSignal,
  ): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortReason(signal));
        return;
      }

      const immediate = evaluate();
      if (immediate !== undefined) {
        resolve(immediate);
        return;
      }

      const unwatchers: (() => void)[] = [];
      const cleanup = (): void => {
        for (const unwatch of unwatchers) unwatch();
        signal?.removeEventListener("abort", onAbort);
      };
      const onAbort = (): void => {
        cleanup();
        if (signal) reject(abortReason(signal));
      };
      const onChange = (): void => {
        let result: T | undefined;
        try {
          result = evaluate();
        } catch (error) {
          cleanup();
          reject(toError(error));
          return;
        }
        if (result !== undefined) {
          cleanup();
          resolve(result);
        }
      };

      for (const name of new Set(names)) {
        unwatchers.push(watch(name, onChange));
      }
      signal?.addEventListener("abort", onAbort, { once: true });
    });

  return {
    names: () => order,
    get: (name) => toSnapshot(recordOf(name)),
    getState: (name) => toSnapshot(recordOf(name)).state,
    snapshot: () => order.map((name) => toSnapshot(recordOf(name))),
    transition,
    fail,
    setHandle,
    recordVerdict,
    subscribe,
    watch,
    waitUntil,
  };
};
