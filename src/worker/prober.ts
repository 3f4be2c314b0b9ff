/**
 * Health prober.
 *
 * Runs one independent probe loop per health-checked service while the
 * service is `started`. Each probe is bounded by the check's timeout; the
 * resulting verdict is written to the registry, which wakes any scheduler
 * waiting on it.
 */

import { TaskCancelledError, TimeoutStrategy, timeout } from "cockatiel";

import type { RuntimeAdapter } from "@/adapters";
import { ConfigurationError, ProbeTimeoutError, toError } from "@/domains/errors";
import type { DependencyGraph } from "@/domains/graph";
import type { HealthCheckDescriptor, HealthStatus, HealthVerdict } from "@/domains/service";
import { abortReason, delay } from "@/lib/async";
import type { Logger } from "@/lib/logger";
import type { Metrics } from "@/lib/metrics";

import type { ServiceRegistry } from "./registry";

export interface HealthProberDeps {
  graph: DependencyGraph;
  registry: ServiceRegistry;
  runtime: RuntimeAdapter;
  logger: Logger;
  metrics?: Metrics;
}

export interface HealthProber {
  /**
   * Run one probe now and record the verdict. Rejects only when `signal`
   * aborts; probe failures and timeouts are part of the verdict.
   */
  probe(name: string, signal?: AbortSignal): Promise<HealthVerdict>;
  /** Start the probe loop: first probe after one interval, then every interval */
  start(name: string): void;
  /** Cancel the loop and any in-flight probe */
  stop(name: string): void;
  stopAll(): void;
  isProbing(name: string): boolean;
}

interface ProbeState {
  /** When probing began, for the start period */
  startedAt: number;
  everHealthy: boolean;
}

interface ProbeLoop {
  controller: AbortController;
  unwatch: () => void;
}

type ProbeResult = { ok: true } | { ok: false; error: string };

/**
 * Fold one probe result into the previous verdict.
 *
 * Success resets the failure counter. A failure inside the start period is
 * not counted unless the service has been healthy before. The service turns
 * unhealthy once `retries` consecutive failures are counted; until then a
 * healthy service stays healthy.
 */
export const nextVerdict = (
  previous: HealthVerdict,
  result: ProbeResult,
  check: HealthCheckDescriptor,
  inStartPeriod: boolean,
  checkedAt: Date,
): HealthVerdict => {
  if (result.ok) {
    return {
      service: previous.service,
      status: "healthy",
      consecutiveFailures: 0,
      lastCheckedAt: checkedAt,
    };
  }

  const consecutiveFailures = inStartPeriod
    ? previous.consecutiveFailures
    : previous.consecutiveFailures + 1;

  let status: HealthStatus;
  if (consecutiveFailures >= check.retries) {
    status = "unhealthy";
  } else if (previous.status === "healthy") {
    status = "healthy";
  } else {
    status = "checking";
  }

  return {
    service: previous.service,
    status,
    consecutiveFailures,
    lastCheckedAt: checkedAt,
    lastError: result.error,
  };
};

/**
 * Create the health prober.
 *
 * @example
 * ```typescript
 * const prober = createHealthProber({ graph, registry, runtime, logger });
 * prober.start("db");
 * // ... later
 * prober.stopAll();
 * ```
 */
export const createHealthProber = (deps: HealthProberDeps): HealthProber => {
  const { graph, registry, runtime, metrics } = deps;
  const logger = deps.logger.child({ component: "prober" });
  const states = new Map<string, ProbeState>();
  const loops = new Map<string, ProbeLoop>();

  const checkOf = (name: string): HealthCheckDescriptor => {
    const check = graph.get(name).healthCheck;
    if (!check) {
      throw new ConfigurationError(`Service ${name} declares no health check`);
    }
    return check;
  };

  const stateOf = (name: string): ProbeState => {
    let state = states.get(name);
    if (!state) {
      state = { startedAt: Date.now(), everHealthy: false };
      states.set(name, state);
    }
    return state;
  };

  const runProbe = async (
    name: string,
    check: HealthCheckDescriptor,
    signal?: AbortSignal,
  ): Promise<ProbeResult> => {
    const definition = graph.get(name);
    const policy = timeout(check.timeoutMs, TimeoutStrategy.Aggressive);
    let timedOut = false;
    const timeoutListener = policy.onTimeout(() => {
      timedOut = true;
    });
    try {
      const outcome = await policy.execute(
        ({ signal: probeSignal }) => runtime.executeProbe(definition, check, probeSignal),
        signal,
      );
      if (outcome.ok) return { ok: true };
      return {
        ok: false,
        error: outcome.output || `Probe exited with code ${outcome.exitCode ?? "none"}`,
      };
    } catch (error) {
      if (signal?.aborted) {
        throw abortReason(signal);
      }
      // The probe may reject with its own abort error before the policy does
      if (timedOut || error instanceof TaskCancelledError) {
        metrics?.increment("probeTimeoutsTotal");
        return { ok: false, error: new ProbeTimeoutError(name, check.timeoutMs).message };
      }
      return { ok: false, error: toError(error).message };
    } finally {
      timeoutListener.dispose();
    }
  };

  const probe = async (name: string, signal?: AbortSignal): Promise<HealthVerdict> => {
    const check = checkOf(name);
    const state = stateOf(name);

    metrics?.increment("probesTotal");
    const result = await runProbe(name, check, signal);
    if (!result.ok) {
      metrics?.increment("probeFailuresTotal");
    }

    const previous = registry.get(name).verdict;
    const inStartPeriod = !state.everHealthy && Date.now() - state.startedAt < check.startPeriodMs;
    const verdict = nextVerdict(previous, result, check, inStartPeriod, new Date());
    if (verdict.status === "healthy") {
      state.everHealthy = true;
    }

    if (verdict.status !== previous.status) {
      logger.info("Health status changed", {
        service: name,
        from: previous.status,
        to: verdict.status,
        consecutiveFailures: verdict.consecutiveFailures,
      });
    } else if (!result.ok) {
      logger.debug("Health probe failed", {
        service: name,
        consecutiveFailures: verdict.consecutiveFailures,
        inStartPeriod,
        error: result.error,
      });
    }

    registry.recordVerdict(verdict);
    return verdict;
  };

  const runLoop = async (
    name: string,
    check: HealthCheckDescriptor,
    signal: AbortSignal,
  ): Promise<void> => {
    try {
      for (;;) {
        await delay(check.intervalMs, signal);
        if (registry.get(name).phase !== "started") return;
        await probe(name, signal);
      }
    } catch (error) {
      if (signal.aborted) return;
      throw error;
    }
  };

  const stop = (name: string): void => {
    const loop = loops.get(name);
    if (!loop) return;
    loops.delete(name);
    loop.unwatch();
    loop.controller.abort();
  };

  const start = (name: string): void => {
    if (loops.has(name)) return;
    const check = checkOf(name);

    states.set(name, { startedAt: Date.now(), everHealthy: false });
    const controller = new AbortController();
    const unwatch = registry.watch(name, (event) => {
      if (event.type === "phase" && event.to !== "started") {
        stop(name);
      }
    });
    const loop: ProbeLoop = { controller, unwatch };
    loops.set(name, loop);
    logger.debug("Probe loop started", { service: name, intervalMs: check.intervalMs });

    void runLoop(name, check, controller.signal)
      .catch((error: unknown) => {
        logger.error("Probe loop failed", toError(error), { service: name });
      })
      .finally(() => {
        if (loops.get(name) === loop) {
          loops.delete(name);
          unwatch();
        }
      });
  };

  const stopAll = (): void => {
    for (const name of [...loops.keys()]) {
      stop(name);
    }
  };

  return {
    probe,
    start,
    stop,
    stopAll,
    isProbing: (name) => loops.has(name),
  };
};
