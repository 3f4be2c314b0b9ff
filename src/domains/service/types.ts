/**
 * Service, health-check and lifecycle types.
 */

import * as v from "valibot";

// --- Health checks ---

/**
 * How a health probe is executed: an argv vector run directly, or a single
 * command line handed to the shell.
 */
export type ProbeTest =
  | { kind: "exec"; argv: readonly string[] }
  | { kind: "shell"; command: string };

export interface HealthCheckDescriptor {
  test: ProbeTest;
  intervalMs: number;
  /** A probe running longer than this counts as one failure */
  timeoutMs: number;
  /** Consecutive failures after which the service is unhealthy */
  retries: number;
  /** Failures during this window after launch do not consume the budget */
  startPeriodMs: number;
}

export const DEFAULT_HEALTH_CHECK_TIMING = {
  intervalMs: 30_000,
  timeoutMs: 30_000,
  retries: 3,
  startPeriodMs: 0,
} as const;

export const healthStatusSchema = v.picklist(["unknown", "checking", "healthy", "unhealthy"]);

export type HealthStatus = v.InferOutput<typeof healthStatusSchema>;

export interface HealthVerdict {
  service: string;
  status: HealthStatus;
  consecutiveFailures: number;
  lastCheckedAt: Date | null;
  lastError?: string;
}

export const initialVerdict = (service: string): HealthVerdict => ({
  service,
  status: "unknown",
  consecutiveFailures: 0,
  lastCheckedAt: null,
});

// --- Dependencies ---

/**
 * `started`: the prerequisite only has to be running.
 * `healthy`: the prerequisite's health check has to pass.
 */
export const dependencyConditionSchema = v.picklist(["started", "healthy"]);

export type DependencyCondition = v.InferOutput<typeof dependencyConditionSchema>;

export interface DependencyEdge {
  dependent: string;
  prerequisite: string;
  condition: DependencyCondition;
  /**
   * `false` for compose `required: false`: the dependent still waits for the
   * condition, but starts anyway once the prerequisite has failed, stopped or
   * turned unhealthy
   */
  required?: boolean;
}

// --- Services ---

export interface ServiceDefinition {
  name: string;
  healthCheck: HealthCheckDescriptor | null;
  networks: readonly string[];
  volumes: readonly string[];
  /** The declared service entry, handed to the runtime unexamined */
  spec: Readonly<Record<string, unknown>>;
}

// --- Lifecycle ---

/**
 * Phases written by the scheduler. `healthy` and `unhealthy` are not phases:
 * they are derived from the prober's verdict while a service is `started`.
 */
export const lifecyclePhaseSchema = v.picklist([
  "pending",
  "starting",
  "started",
  "stopped",
  "failed",
]);

export type LifecyclePhase = v.InferOutput<typeof lifecyclePhaseSchema>;

export const lifecycleStateSchema = v.picklist([
  "pending",
  "starting",
  "started",
  "healthy",
  "unhealthy",
  "stopped",
  "failed",
]);

export type LifecycleState = v.InferOutput<typeof lifecycleStateSchema>;

/**
 * Opaque reference to a launched service, returned by the runtime and handed
 * back to it on stop.
 */
export interface ServiceHandle {
  service: string;
  id: string;
  startedAt: Date;
}

/**
 * The first error that failed a service. `rootCause` is false for failures
 * that cascaded from a prerequisite; `origin` then names the service the
 * cascade started at.
 */
export interface ServiceFailure {
  service: string;
  error: Error;
  rootCause: boolean;
  origin: string;
}
