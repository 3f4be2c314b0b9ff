/**
 * Orchestration error types.
 *
 * Every failure the orchestrator reports derives from `OrchestrationError`, so
 * callers can branch on `code` without string matching.
 */

export type OrchestrationErrorCode =
  | "CYCLE"
  | "CONFIGURATION"
  | "LAUNCH_FAILED"
  | "PROBE_TIMEOUT"
  | "STARTUP_DEADLINE_EXCEEDED"
  | "UNHEALTHY"
  | "DEPENDENCY_FAILED"
  | "INVALID_TRANSITION";

export class OrchestrationError extends Error {
  public override readonly name: string = "OrchestrationError";

  constructor(
    message: string,
    public readonly code: OrchestrationErrorCode,
    public override readonly cause?: unknown,
  ) {
    super(message, { cause });
  }
}

/**
 * The dependency edges contain a cycle. `cycle` lists the services in
 * traversal order with the first one repeated at the end.
 */
export class CycleError extends OrchestrationError {
  public override readonly name = "CycleError";

  constructor(public readonly cycle: readonly string[]) {
    super(`Dependency cycle detected: ${cycle.join(" -> ")}`, "CYCLE");
  }
}

export class ConfigurationError extends OrchestrationError {
  public override readonly name = "ConfigurationError";

  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
    cause?: unknown,
  ) {
    super(message, "CONFIGURATION", cause);
  }
}

export class LaunchError extends OrchestrationError {
  public override readonly name = "LaunchError";

  constructor(
    public readonly service: string,
    cause?: unknown,
  ) {
    super(
      `Service ${service} failed to launch${cause instanceof Error ? `: ${cause.message}` : ""}`,
      "LAUNCH_FAILED",
      cause,
    );
  }
}

export class ProbeTimeoutError extends OrchestrationError {
  public override readonly name = "ProbeTimeoutError";

  constructor(
    public readonly service: string,
    public readonly timeoutMs: number,
  ) {
    super(`Health probe for ${service} timed out after ${timeoutMs}ms`, "PROBE_TIMEOUT");
  }
}

export class StartupDeadlineExceededError extends OrchestrationError {
  public override readonly name = "StartupDeadlineExceededError";

  constructor(
    public readonly service: string,
    public readonly deadlineMs: number,
  ) {
    super(
      `Service ${service} did not become ready within ${deadlineMs}ms`,
      "STARTUP_DEADLINE_EXCEEDED",
    );
  }
}

export class ServiceUnhealthyError extends OrchestrationError {
  public override readonly name = "ServiceUnhealthyError";

  constructor(
    public readonly service: string,
    public readonly consecutiveFailures: number,
    lastError?: string,
  ) {
    super(
      `Service ${service} is unhealthy after ${consecutiveFailures} consecutive failed probes${
        lastError ? ` (last: ${lastError})` : ""
      }`,
      "UNHEALTHY",
    );
  }
}

/**
 * A prerequisite failed, so the dependent was never launched.
 * `rootCause` names the service whose own failure started the cascade.
 */
export class DependencyFailedError extends OrchestrationError {
  public override readonly name = "DependencyFailedError";

  constructor(
    public readonly service: string,
    public readonly prerequisite: string,
    public readonly rootCause: string,
  ) {
    super(
      `Service ${service} was not started: dependency ${prerequisite} failed (root cause: ${rootCause})`,
      "DEPENDENCY_FAILED",
    );
  }
}

export class InvalidTransitionError extends OrchestrationError {
  public override readonly name = "InvalidTransitionError";

  constructor(
    public readonly service: string,
    public readonly from: string,
    public readonly to: string,
  ) {
    super(`Invalid lifecycle transition for ${service}: ${from} -> ${to}`, "INVALID_TRANSITION");
  }
}

export const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));
