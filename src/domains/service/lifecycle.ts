/**
 * Lifecycle state machine.
 *
 * ```
 * pending -> starting -> started -> (healthy | unhealthy) -> stopped
 *    \           \           \
 *     `-----------`-----------`--> failed (terminal)
 * ```
 *
 * `stopped` is reachable from every phase except `failed`.
 */

import type {
  DependencyCondition,
  HealthStatus,
  LifecyclePhase,
  LifecycleState,
} from "./types";

const ALLOWED_TRANSITIONS: Record<LifecyclePhase, readonly LifecyclePhase[]> = {
  pending: ["starting", "failed", "stopped"],
  starting: ["started", "failed", "stopped"],
  started: ["failed", "stopped"],
  stopped: [],
  failed: [],
};

export const canTransition = (from: LifecyclePhase, to: LifecyclePhase): boolean =>
  ALLOWED_TRANSITIONS[from].includes(to);

export const isTerminalPhase = (phase: LifecyclePhase): boolean =>
  phase === "failed" || phase === "stopped";

/**
 * Combine the scheduler's phase with the prober's verdict. Only a started
 * service that declares a health check reports `healthy` or `unhealthy`.
 */
export const deriveLifecycleState = (
  phase: LifecyclePhase,
  health: HealthStatus,
  hasHealthCheck: boolean,
): LifecycleState => {
  if (phase !== "started" || !hasHealthCheck) {
    return phase;
  }
  if (health === "healthy") return "healthy";
  if (health === "unhealthy") return "unhealthy";
  return "started";
};

export const isConditionSatisfied = (
  condition: DependencyCondition,
  state: LifecycleState,
): boolean => {
  switch (condition) {
    case "started":
      return state === "started" || state === "healthy";
    case "healthy":
      return state === "healthy";
  }
};
