import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ConfigurationError } from "@/domains/errors";
import { buildDependencyGraph } from "@/domains/graph";
import type { HealthCheckDescriptor, HealthVerdict } from "@/domains/service";
import { createMetrics } from "@/lib/metrics";
import { createFakeRuntime } from "@/test-support/fake-runtime";
import { healthCheck, service } from "@/test-support/fixtures";
import { createMockLogger } from "@/test-support/logger";

import { createHealthProber, nextVerdict } from "./prober";
import { createServiceRegistry } from "./registry";

const setup = (check: HealthCheckDescriptor = healthCheck()) => {
  const graph = buildDependencyGraph([service("db", check), service("web")], []);
  const registry = createServiceRegistry(graph.services());
  const runtime = createFakeRuntime();
  const metrics = createMetrics();
  const logger = createMockLogger();
  const prober = createHealthProber({ graph, registry, runtime, logger, metrics });

  registry.transition("db", "starting");
  registry.transition("db", "started");

  return { registry, runtime, metrics, logger, prober };
};

describe("nextVerdict", () => {
  const checkedAt = new Date("2026-01-01T00:00:00.000Z");
  const check = healthCheck({ retries: 2 });
  const verdict = (overrides: Partial<HealthVerdict>): HealthVerdict => ({
    service: "db",
    status: "unknown",
    consecutiveFailures: 0,
    lastCheckedAt: null,
    ...overrides,
  });

  it("should reset the counter on success", () => {
    expect(
      nextVerdict(verdict({ status: "checking", consecutiveFailures: 1 }), { ok: true }, check, false, checkedAt),
    ).toEqual({ service: "db", status: "healthy", consecutiveFailures: 0, lastCheckedAt: checkedAt });
  });

  it("should turn unhealthy when the failures reach the retries", () => {
    expect(
      nextVerdict(
        verdict({ status: "checking", consecutiveFailures: 1 }),
        { ok: false, error: "refused" },
        check,
        false,
        checkedAt,
      ),
    ).toEqual({
      service: "db",
      status: "unhealthy",
      consecutiveFailures: 2,
      lastCheckedAt: checkedAt,
      lastError: "refused",
    });
  });

  it("should not count failures inside the start period", () => {
    expect(
      nextVerdict(verdict({}), { ok: false, error: "refused" }, check, true, checkedAt),
    ).toMatchObject({ status: "checking", consecutiveFailures: 0 });
  });

  it("should keep a healthy service healthy until the budget is spent", () => {
    expect(
      nextVerdict(verdict({ status: "healthy" }), { ok: false, error: "refused" }, check, false, checkedAt),
    ).toMatchObject({ status: "healthy", consecutiveFailures: 1 });
  });
});

describe("createHealthProber", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("probe", () => {
    it("should record a passing probe as healthy", async () => {
      const { prober, registry, metrics } = setup();

      const verdict = await prober.probe("db");

      expect(verdict).toMatchObject({ status: "healthy", consecutiveFailures: 0 });
      expect(registry.getState("db")).toBe("healthy");
      expect(metrics.counters()).toMatchObject({ probesTotal: 1, probeFailuresTotal: 0 });
    });

    it("should become unhealthy after `retries` consecutive failures", async () => {
      const { prober, runtime, registry } = setup();
      runtime.setProbe("db", "fail");

      const statuses: string[] = [];
      for (let i = 0; i < 3; i++) {
        statuses.push((await prober.probe("db")).status);
      }

      expect(statuses).toEqual(["checking", "checking", "unhealthy"]);
      expect(registry.get("db").verdict).toMatchObject({
        consecutiveFailures: 3,
        lastError: "probe failed",
      });
      expect(registry.getState("db")).toBe("unhealthy");
    });

    it("should keep a healthy service healthy until the retry budget is exhausted", async () => {
      const { prober, runtime } = setup();
      runtime.setProbe("db", ["pass", "fail", "fail", "fail", "pass"]);

      const verdicts: [string, number][] = [];
      for (let i = 0; i < 5; i++) {
        const verdict = await prober.probe("db");
        verdicts.push([verdict.status, verdict.consecutiveFailures]);
      }

      expect(verdicts).toEqual([
        ["healthy", 0],
        ["healthy", 1],
        ["healthy", 2],
        ["unhealthy", 3],
        ["healthy", 0],
      ]);
    });

    it("should count a timed out probe as one failure", async () => {
      const { prober, runtime, metrics } = setup(healthCheck({ timeoutMs: 500 }));
      runtime.setProbe("db", "hang");

      const pending = prober.probe("db");
      await vi.advanceTimersByTimeAsync(500);

      await expect(pending).resolves.toMatchObject({
        status: "checking",
        consecutiveFailures: 1,
        lastError: "Health probe for db timed out after 500ms",
      });
      expect(metrics.counters()).toMatchObject({
        probesTotal: 1,
        probeFailuresTotal: 1,
        probeTimeoutsTotal: 1,
      });
    });

    it("should ignore failures during the start period", async () => {
      const { prober, runtime } = setup(healthCheck({ startPeriodMs: 5_000 }));
      runtime.setProbe("db", "fail");

      await expect(prober.probe("db")).resolves.toMatchObject({
        status: "checking",
        consecutiveFailures: 0,
      });

      await vi.advanceTimersByTimeAsync(5_000);

      await expect(prober.probe("db")).resolves.toMatchObject({
        status: "checking",
        consecutiveFailures: 1,
      });
    });

    it("should count start period failures once the service has been healthy", async () => {
      const { prober, runtime } = setup(healthCheck({ startPeriodMs: 5_000 }));
      runtime.setProbe("db", ["pass", "fail"]);

      await prober.probe("db");

      await expect(prober.probe("db")).resolves.toMatchObject({
        status: "healthy",
        consecutiveFailures: 1,
      });
    });

    it("should reject without a verdict when the caller aborts", async () => {
      const { prober, runtime, registry } = setup(healthCheck({ timeoutMs: 10_000 }));
      runtime.setProbe("db", "hang");
      const controller = new AbortController();

      const pending = prober.probe("db", controller.signal);
      controller.abort(new Error("shutdown"));

      await expect(pending).rejects.toThrow("shutdown");
      expect(registry.get("db").verdict.status).toBe("unknown");
    });

    it("should refuse services without a health check", async () => {
      const { prober } = setup();

      await expect(prober.probe("web")).rejects.toThrow(ConfigurationError);
    });
  });

  describe("probe loop", () => {
    it("should probe first after one interval and then every interval", async () => {
      const { prober, runtime, registry } = setup(healthCheck({ intervalMs: 1_000 }));

      prober.start("db");
      expect(prober.isProbing("db")).toBe(true);

      await vi.advanceTimersByTimeAsync(999);
      expect(runtime.probes).toEqual([]);

      await vi.advanceTimersByTimeAsync(1);
      expect(runtime.probes).toEqual(["db"]);
      expect(registry.getState("db")).toBe("healthy");

      await vi.advanceTimersByTimeAsync(2_000);
      expect(runtime.probes).toEqual(["db", "db", "db"]);
    });

    it("should stop probing on stop", async () => {
      const { prober, runtime } = setup();

      prober.start("db");
      prober.stop("db");
      await vi.advanceTimersByTimeAsync(5_000);

      expect(prober.isProbing("db")).toBe(false);
      expect(runtime.probes).toEqual([]);
    });

    it("should stop probing when the service leaves the started phase", async () => {
      const { prober, runtime, registry } = setup();

      prober.start("db");
      registry.transition("db", "stopped");
      await vi.advanceTimersByTimeAsync(5_000);

      expect(prober.isProbing("db")).toBe(false);
      expect(runtime.probes).toEqual([]);
    });

    it("should abort in-flight probes on stopAll", async () => {
      const { prober, runtime, registry, logger } = setup(
        healthCheck({ intervalMs: 1_000, timeoutMs: 10_000 }),
      );
      runtime.setProbe("db", "hang");

      prober.start("db");
      await vi.advanceTimersByTimeAsync(1_000);
      expect(runtime.probes).toEqual(["db"]);

      prober.stopAll();
      await vi.advanceTimersByTimeAsync(20_000);

      expect(runtime.probes).toEqual(["db"]);
      expect(registry.get("db").verdict.status).toBe("unknown");
      expect(logger.error).not.toHaveBeenCalled();
    });

    it("should refuse to start a loop for services without a health check", () => {
      const { prober } = setup();

      expect(() => prober.start("web")).toThrow("Service web declares no health check");
    });
  });
});
