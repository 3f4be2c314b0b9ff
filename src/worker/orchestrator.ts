/**
 * Orchestrator: wires registry, prober, launch queue and scheduler for one
 * run, and owns cooperative shutdown.
 */

import type { RuntimeAdapter } from "@/adapters";
import { toError } from "@/domains/errors";
import type { DependencyGraph } from "@/domains/graph";
import { type ServiceHandle, isTerminalPhase } from "@/domains/service";
import { AbortedError, delay } from "@/lib/async";
import type { Logger } from "@/lib/logger";
import type { Metrics } from "@/lib/metrics";

import { createLaunchQueue } from "./launch-queue";
import { createHealthProber } from "./prober";
import { type ServiceRegistry, createServiceRegistry } from "./registry";
import { type RunResult, createStartupScheduler } from "./scheduler";

/**
 * Configuration for one orchestrator run.
 */
export interface OrchestratorConfig {
  graph: DependencyGraph;
  runtime: RuntimeAdapter;
  logger: Logger;
  metrics?: Metrics;
  /** Maximum concurrent launches; unbounded when omitted */
  parallelLimit?: number;
  startupDeadlineMs?: number;
  /** Time given to in-flight launches, and to each service stop, on shutdown */
  shutdownGraceMs: number;
}

export interface Orchestrator {
  readonly registry: ServiceRegistry;
  /** Bring every service up; repeated calls return the same run */
  up(): Promise<RunResult>;
  /** Result of the finished run, or null while it is still going */
  result(): RunResult | null;
  /**
   * Abort the run, stop probing, let in-flight launches settle, stop launched
   * services in reverse dependency order and mark the rest `stopped`.
   */
  shutdown(): Promise<void>;
}

/**
 * Create an orchestrator for a validated dependency graph.
 *
 * @example
 * ```typescript
 * const orchestrator = createOrchestrator({ graph, runtime, logger, shutdownGraceMs: 10_000 });
 * const result = await orchestrator.up();
 * process.on("SIGTERM", () => void orchestrator.shutdown());
 * ```
 */
export const createOrchestrator = (config: OrchestratorConfig): Orchestrator => {
  const { graph, runtime, metrics, shutdownGraceMs } = config;
  const logger = config.logger.child({ component: "orchestrator" });

  const registry = createServiceRegistry(graph.services(), logger);
  const prober = createHealthProber({ graph, registry, runtime, logger, metrics });
  const launchQueue = createLaunchQueue({ concurrency: config.parallelLimit });
  const scheduler = createStartupScheduler({
    graph,
    registry,
    runtime,
    prober,
    launchQueue,
    logger,
    metrics,
    startupDeadlineMs: config.startupDeadlineMs,
  });

  const runController = new AbortController();
  let running: Promise<RunResult> | null = null;
  let finished: RunResult | null = null;
  let stopping: Promise<void> | null = null;

  const up = (): Promise<RunResult> => {
    if (!running) {
      running = scheduler.run(runController.signal).then((result) => {
        finished = result;
        return result;
      });
    }
    return running;
  };

  const settleInFlight = async (): Promise<void> => {
    const grace = new AbortController();
    const settled = Promise.all([
      running,
      launchQueue.waitForIdle(),
      launchQueue.waitForInFlight(),
    ]).then(() => "settled" as const);
    const outcome = await Promise.race([
      settled,
      delay(shutdownGraceMs, grace.signal).then(() => "timeout" as const),
    ]);
    grace.abort();
    if (outcome === "timeout") {
      logger.warn("In-flight launches did not settle within the grace period", {
        graceMs: shutdownGraceMs,
      });
    }
  };

  const stopService = async (handle: ServiceHandle): Promise<void> => {
    const grace = new AbortController();
    const timer = setTimeout(() => grace.abort(), shutdownGraceMs);
    try {
      await runtime.stop(handle, grace.signal);
      logger.info("Service stopped", { service: handle.service });
    } catch (error) {
      logger.error("Failed to stop service", toError(error), { service: handle.service });
    } finally {
      clearTimeout(timer);
    }
  };

  const markStopped = (name: string): void => {
    if (!isTerminalPhase(registry.get(name).phase)) {
      registry.transition(name, "stopped");
    }
  };

  const runShutdown = async (): Promise<void> => {
    logger.info("Shutting down");
    runController.abort(new AbortedError("Shutdown requested"));
    prober.stopAll();
    await settleInFlight();

    const launched = new Map(scheduler.handles().map((handle) => [handle.service, handle]));
    const reverseOrder = [...graph.topologicalOrder()].reverse();
    for (const { name } of reverseOrder) {
      const handle = launched.get(name);
      if (handle) {
        await stopService(handle);
      }
      markStopped(name);
    }

    logger.info("Shutdown complete");
  };

  const shutdown = (): Promise<void> => {
    if (!stopping) {
      stopping = runShutdown();
    }
    return stopping;
  };

  return {
    registry,
    up,
    result: () => finished,
    shutdown,
  };
};
