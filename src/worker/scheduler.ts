/**
 * Startup scheduler.
 *
 * Brings every service up in dependency order. Each service runs its own
 * bring-up concurrently, dispatched in topological order: it waits on
 * registry notifications until every prerequisite edge is satisfied, moves
 * to `starting` in the same synchronous step as the final edge check, then
 * launches through the launch queue and, for health-checked services, waits
 * for the first healthy verdict.
 *
 * A failure, or a prerequisite turning unhealthy, fails every transitive
 * dependent with `DependencyFailedError` naming the root cause; independent
 * branches keep going. Optional edges (`required: false`) are skipped once
 * their prerequisite is unavailable.
 */

import type { RuntimeAdapter } from "@/adapters";
import {
  DependencyFailedError,
  LaunchError,
  ServiceUnhealthyError,
  StartupDeadlineExceededError,
  toError,
} from "@/domains/errors";
import type { DependencyGraph } from "@/domains/graph";
import {
  type DependencyEdge,
  type ServiceDefinition,
  type ServiceFailure,
  type ServiceHandle,
  isConditionSatisfied,
  isTerminalPhase,
} from "@/domains/service";
import { linkedAbortController, throwIfAborted } from "@/lib/async";
import type { Logger } from "@/lib/logger";
import type { Metrics } from "@/lib/metrics";

import type { LaunchQueue } from "./launch-queue";
import type { HealthProber } from "./prober";
import type { ServiceRegistry } from "./registry";

export type RunResult =
  | { kind: "success"; startOrder: readonly string[] }
  | {
      kind: "partial-failure";
      startOrder: readonly string[];
      /** Failed services in topological order */
      failures: readonly ServiceFailure[];
    }
  | { kind: "cancelled"; startOrder: readonly string[] };

export interface StartupSchedulerDeps {
  graph: DependencyGraph;
  registry: ServiceRegistry;
  runtime: RuntimeAdapter;
  prober: HealthProber;
  launchQueue: LaunchQueue;
  logger: Logger;
  metrics?: Metrics;
  /** Per-service limit from `starting` until ready */
  startupDeadlineMs?: number;
}

export interface StartupScheduler {
  /**
   * Bring every service up. Resolves once each service is ready or failed,
   * or once `signal` aborts.
   */
  run(signal?: AbortSignal): Promise<RunResult>;
  /** Services in the order they moved to `starting` */
  startOrder(): readonly string[];
  /**
   * Handles of every launched service, in launch completion order, including
   * launches that completed after the run was cancelled
   */
  handles(): readonly ServiceHandle[];
}

type Gate =
  | { kind: "ready" }
  | { kind: "failed"; prerequisite: string }
  | { kind: "stopped"; prerequisite: string };

type Readiness = "ready" | "unhealthy" | "terminal";

/**
 * Create the startup scheduler for one run.
 *
 * @example
 * ```typescript
 * const scheduler = createStartupScheduler({ graph, registry, runtime, prober, launchQueue, logger });
 * const result = await scheduler.run(signal);
 * if (result.kind === "partial-failure") {
 *   for (const failure of result.failures) logger.error("Service failed", failure.error);
 * }
 * ```
 */
export const createStartupScheduler = (deps: StartupSchedulerDeps): StartupScheduler => {
  const { graph, registry, runtime, prober, launchQueue, metrics, startupDeadlineMs } = deps;
  const logger = deps.logger.child({ component: "scheduler" });
  const startOrder: string[] = [];
  const handles: ServiceHandle[] = [];
  const ready = new Set<string>();

  const isUnavailable = (edge: DependencyEdge): boolean => {
    const state = registry.getState(edge.prerequisite);
    return state === "failed" || state === "stopped" || state === "unhealthy";
  };

  const evaluateGate = (edges: readonly DependencyEdge[]): Gate | undefined => {
    let satisfied = true;
    for (const edge of edges) {
      if (edge.required === false && isUnavailable(edge)) continue;
      const state = registry.getState(edge.prerequisite);
      // An unhealthy prerequisite can no longer satisfy any condition
      if (state === "failed" || state === "unhealthy") {
        return { kind: "failed", prerequisite: edge.prerequisite };
      }
      if (state === "stopped") return { kind: "stopped", prerequisite: edge.prerequisite };
      if (!isConditionSatisfied(edge.condition, state)) satisfied = false;
    }
    return satisfied ? { kind: "ready" } : undefined;
  };

  const fail = (name: string, error: Error, origin: string = name): void => {
    if (isTerminalPhase(registry.get(name).phase)) return;
    const rootCause = origin === name;
    registry.fail(name, { service: name, error, rootCause, origin });
    if (rootCause) {
      logger.error("Service failed", error, { service: name });
    } else {
      logger.warn("Service not started", { service: name, rootCause: origin, error: error.message });
    }
  };

  const stopPending = (name: string, prerequisite: string): void => {
    if (isTerminalPhase(registry.get(name).phase)) return;
    registry.transition(name, "stopped");
    logger.info("Service stopped before start", { service: name, prerequisite });
  };

  /**
   * Wait until the gate opens. Returns `ready` only after moving the service
   * to `starting` in the same step as the last check.
   */
  const awaitPrerequisites = async (name: string, signal: AbortSignal): Promise<Gate> => {
    const edges = graph.prerequisitesOf(name);
    const prerequisites = edges.map((edge) => edge.prerequisite);

    for (;;) {
      const observed = await registry.waitUntil(prerequisites, () => evaluateGate(edges), signal);
      throwIfAborted(signal);
      if (observed.kind !== "ready") return observed;

      // State may have moved since the notification; check again before starting
      const current = evaluateGate(edges);
      if (current?.kind === "ready") {
        registry.transition(name, "starting");
        startOrder.push(name);
        for (const edge of edges.filter(isUnavailable)) {
          logger.warn("Optional dependency unavailable", {
            service: name,
            prerequisite: edge.prerequisite,
            state: registry.getState(edge.prerequisite),
          });
        }
        return current;
      }
      if (current) return current;
    }
  };

  const awaitReadiness = (name: string, signal: AbortSignal): Promise<Readiness> =>
    registry.waitUntil<Readiness>(
      [name],
      () => {
        const snapshot = registry.get(name);
        if (isTerminalPhase(snapshot.phase)) return "terminal";
        if (snapshot.state === "healthy") return "ready";
        if (snapshot.state === "unhealthy") return "unhealthy";
        return undefined;
      },
      signal,
    );

  const launchAndAwaitReady = async (
    definition: ServiceDefinition,
    runSignal: AbortSignal,
    deadlineSignal: AbortSignal | undefined,
  ): Promise<void> => {
    const { name } = definition;
    const { controller, dispose } = linkedAbortController(runSignal, deadlineSignal);
    const signal = controller.signal;

    try {
      // A launch that completes after cancellation still hands back a handle to stop
      const launchService = async (launchSignal: AbortSignal): Promise<ServiceHandle> => {
        const launched = await runtime.launch(definition, launchSignal);
        metrics?.increment("launchesTotal");
        handles.push(launched);
        registry.setHandle(name, launched);
        return launched;
      };

      let handle: ServiceHandle;
      try {
        handle = await launchQueue.enqueue(name, launchService, signal).promise;
      } catch (error) {
        if (deadlineSignal?.aborted && !runSignal.aborted) {
          fail(name, toError(deadlineSignal.reason));
        } else if (!runSignal.aborted) {
          metrics?.increment("launchFailuresTotal");
          fail(name, new LaunchError(name, error));
        }
        return;
      }

      if (runSignal.aborted) return;

      registry.transition(name, "started");
      logger.info("Service started", { service: name, handle: handle.id });

      if (!definition.healthCheck) {
        ready.add(name);
        return;
      }

      prober.start(name);
      let readiness: Readiness;
      try {
        readiness = await awaitReadiness(name, signal);
      } catch (error) {
        if (deadlineSignal?.aborted && !runSignal.aborted) {
          fail(name, toError(deadlineSignal.reason));
          return;
        }
        if (runSignal.aborted) return;
        throw error;
      }

      if (readiness === "ready") {
        ready.add(name);
        logger.info("Service healthy", { service: name });
      } else if (readiness === "unhealthy") {
        const { verdict } = registry.get(name);
        fail(name, new ServiceUnhealthyError(name, verdict.consecutiveFailures, verdict.lastError));
      }
    } finally {
      dispose();
    }
  };

  const bringUp = async (definition: ServiceDefinition, signal: AbortSignal): Promise<void> => {
    const { name } = definition;

    const gate = await awaitPrerequisites(name, signal);
    if (gate.kind === "failed") {
      const origin = registry.get(gate.prerequisite).failure?.origin ?? gate.prerequisite;
      fail(name, new DependencyFailedError(name, gate.prerequisite, origin), origin);
      return;
    }
    if (gate.kind === "stopped") {
      stopPending(name, gate.prerequisite);
      return;
    }

    if (startupDeadlineMs === undefined) {
      await launchAndAwaitReady(definition, signal, undefined);
      return;
    }

    const deadline = new AbortController();
    const timer = setTimeout(
      () => deadline.abort(new StartupDeadlineExceededError(name, startupDeadlineMs)),
      startupDeadlineMs,
    );
    try {
      await launchAndAwaitReady(definition, signal, deadline.signal);
    } finally {
      clearTimeout(timer);
    }
  };

  const summarize = (signal: AbortSignal | undefined): RunResult => {
    const order = [...startOrder];
    if (signal?.aborted) {
      return { kind: "cancelled", startOrder: order };
    }

    const failures: ServiceFailure[] = [];
    for (const definition of graph.topologicalOrder()) {
      const { failure } = registry.get(definition.name);
      if (failure) failures.push(failure);
    }

    const allReady = graph.services().every((definition) => ready.has(definition.name));
    if (failures.length === 0 && allReady) {
      return { kind: "success", startOrder: order };
    }
    return { kind: "partial-failure", startOrder: order, failures };
  };

  const run = async (signal?: AbortSignal): Promise<RunResult> => {
    const { controller, dispose } = linkedAbortController(signal);
    const order = graph.topologicalOrder();
    logger.info("Starting services", { order: order.map((definition) => definition.name) });

    try {
      await Promise.all(
        order.map((definition) =>
          bringUp(definition, controller.signal).catch((error: unknown) => {
            if (controller.signal.aborted) return;
            fail(definition.name, toError(error));
          }),
        ),
      );
    } finally {
      dispose();
    }

    const result = summarize(signal);
    logger.info("Startup finished", {
      result: result.kind,
      started: result.startOrder.length,
      failed: result.kind === "partial-failure" ? result.failures.length : 0,
    });
    return result;
  };

  return {
    run,
    startOrder: () => [...startOrder],
    handles: () => [...handles],
  };
};
