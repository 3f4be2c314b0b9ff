/**
 * Dry-run runtime: nothing is started. Launches succeed immediately and
 * probes pass, except for the services configured to fail, so a topology's
 * start order and failure propagation can be rehearsed without side effects.
 */

import type { HealthCheckDescriptor, ServiceDefinition, ServiceHandle } from "@/domains/service";
import { throwIfAborted } from "@/lib/async";

import { RuntimeError } from "../errors";
import type { ProbeOutcome, RuntimeAdapter } from "../types";

export interface DryRunAdapterConfig {
  failingProbes?: readonly string[];
  failingLaunches?: readonly string[];
}

export interface DryRunAdapter extends RuntimeAdapter {
  /** Service names in the order they were launched */
  launched(): readonly string[];
  /** Service names in the order they were stopped */
  stopped(): readonly string[];
}

export const createDryRunAdapter = (config: DryRunAdapterConfig = {}): DryRunAdapter => {
  const failingProbes = new Set(config.failingProbes ?? []);
  const failingLaunches = new Set(config.failingLaunches ?? []);
  const launched: string[] = [];
  const stopped: string[] = [];
  const handles = new Set<string>();
  let sequence = 0;

  return {
    kind: "dry-run",

    launch: async (service: ServiceDefinition, signal: AbortSignal): Promise<ServiceHandle> => {
      throwIfAborted(signal);
      if (failingLaunches.has(service.name)) {
        throw new RuntimeError(
          `Simulated launch failure for ${service.name}`,
          "SPAWN_FAILED",
          "dry-run",
        );
      }
      sequence += 1;
      const handle: ServiceHandle = {
        service: service.name,
        id: `dry-run-${sequence}`,
        startedAt: new Date(),
      };
      handles.add(handle.id);
      launched.push(service.name);
      return handle;
    },

    executeProbe: async (
      service: ServiceDefinition,
      _check: HealthCheckDescriptor,
      signal: AbortSignal,
    ): Promise<ProbeOutcome> => {
      throwIfAborted(signal);
      const ok = !failingProbes.has(service.name);
      return { ok, exitCode: ok ? 0 : 1, output: ok ? "" : "simulated probe failure" };
    },

    stop: async (handle: ServiceHandle): Promise<void> => {
      if (!handles.delete(handle.id)) {
        throw new RuntimeError(`Unknown handle ${handle.id}`, "UNKNOWN_HANDLE", "dry-run");
      }
      stopped.push(handle.service);
    },

    launched: () => [...launched],
    stopped: () => [...stopped],
  };
};
