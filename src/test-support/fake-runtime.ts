import { RuntimeError } from "@/adapters/errors";
import type { ProbeOutcome, RuntimeAdapter } from "@/adapters/types";
import type { ServiceHandle } from "@/domains/service";
import { delay, rejectOnAbort } from "@/lib/async";

export type ProbeBehavior = "pass" | "fail" | "hang";
/** `ignoreAbort` models a runtime that finishes a launch it was asked to cancel */
export type LaunchBehavior =
  | "ok"
  | "fail"
  | "hang"
  | { delayMs: number; ignoreAbort?: boolean };

export interface FakeRuntime extends RuntimeAdapter {
  /** Services in the order `launch` was called */
  readonly launches: string[];
  /** Services in the order `stop` was called */
  readonly stops: string[];
  /** Services in the order probes were executed */
  readonly probes: string[];
  /** Fixed behavior, or one behavior per attempt with the last one repeating */
  setProbe(service: string, behavior: ProbeBehavior | readonly ProbeBehavior[]): void;
  setLaunch(service: string, behavior: LaunchBehavior): void;
}

/**
 * Scriptable in-memory runtime. Launches succeed and probes pass unless told
 * otherwise.
 */
export const createFakeRuntime = (): FakeRuntime => {
  const probeBehaviors = new Map<string, readonly ProbeBehavior[]>();
  const launchBehaviors = new Map<string, LaunchBehavior>();
  const attempts = new Map<string, number>();
  const launches: string[] = [];
  const stops: string[] = [];
  const probes: string[] = [];
  let sequence = 0;

  const nextProbeBehavior = (service: string): ProbeBehavior => {
    const behaviors = probeBehaviors.get(service) ?? ["pass"];
    const attempt = attempts.get(service) ?? 0;
    attempts.set(service, attempt + 1);
    return behaviors[Math.min(attempt, behaviors.length - 1)] ?? "pass";
  };

  return {
    kind: "dry-run",
    launches,
    stops,
    probes,

    setProbe: (service, behavior) => {
      probeBehaviors.set(service, typeof behavior === "string" ? [behavior] : behavior);
      attempts.set(service, 0);
    },

    setLaunch: (service, behavior) => {
      launchBehaviors.set(service, behavior);
    },

    launch: async (service, signal): Promise<ServiceHandle> => {
      launches.push(service.name);
      const behavior = launchBehaviors.get(service.name) ?? "ok";
      if (behavior === "fail") {
        throw new RuntimeError(`Cannot start ${service.name}`, "SPAWN_FAILED", "dry-run");
      }
      if (behavior === "hang") {
        return rejectOnAbort(signal);
      }
      if (behavior !== "ok") {
        await delay(behavior.delayMs, behavior.ignoreAbort ? undefined : signal);
      }
      sequence += 1;
      return { service: service.name, id: `fake-${sequence}`, startedAt: new Date() };
    },

    executeProbe: async (service, _check, signal): Promise<ProbeOutcome> => {
      probes.push(service.name);
      switch (nextProbeBehavior(service.name)) {
        case "pass":
          return { ok: true, exitCode: 0, output: "" };
        case "fail":
          return { ok: false, exitCode: 1, output: "probe failed" };
        case "hang":
          return rejectOnAbort(signal);
      }
    },

    stop: async (handle) => {
      stops.push(handle.service);
    },
  };
};
