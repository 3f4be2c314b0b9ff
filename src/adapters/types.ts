/**
 * Runtime adapter interface: the narrow control surface (launch, stop,
 * health query) through which the orchestrator drives services.
 */

import type { HealthCheckDescriptor, ServiceDefinition, ServiceHandle } from "@/domains/service";

export type RuntimeKind = "process" | "dry-run";

/**
 * Result of one health probe execution. A probe that could not run at all is
 * reported as `ok: false`, never thrown.
 */
export interface ProbeOutcome {
  ok: boolean;
  exitCode: number | null;
  /** Trimmed, truncated probe output for diagnostics */
  output: string;
}

export interface RuntimeAdapter {
  readonly kind: RuntimeKind;

  /**
   * Launch a service and resolve once it reports running.
   * Rejects with a RuntimeError when the launch fails, or with the abort
   * reason when `signal` aborts first.
   */
  launch(service: ServiceDefinition, signal: AbortSignal): Promise<ServiceHandle>;

  /**
   * Run one health probe. Implementations must stop work when `signal`
   * aborts; the caller enforces the probe timeout through it.
   */
  executeProbe(
    service: ServiceDefinition,
    check: HealthCheckDescriptor,
    signal: AbortSignal,
  ): Promise<ProbeOutcome>;

  /**
   * Stop a launched service. When `signal` aborts the stop is forced.
   */
  stop(handle: ServiceHandle, signal: AbortSignal): Promise<void>;
}

/** Cap on probe output kept in a verdict */
export const MAX_PROBE_OUTPUT_LENGTH = 512;

export const truncateOutput = (output: string): string => {
  const trimmed = output.trim();
  return trimmed.length > MAX_PROBE_OUTPUT_LENGTH
    ? `${trimmed.slice(0, MAX_PROBE_OUTPUT_LENGTH)}…`
    : trimmed;
};
