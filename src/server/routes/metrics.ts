import { Hono } from "hono";

import { lifecycleStateSchema } from "@/domains/service";
import type { Metrics } from "@/lib/metrics";

import type { ServiceStatusSource } from "./services";

const BUCKETS_MS = [100, 500, 1000] as const;

const counter = (name: string, help: string, value: number): string =>
  [`# HELP ${name} ${help}`, `# TYPE ${name} counter`, `${name} ${value}`].join("\n");

/**
 * `GET /metrics` in the Prometheus text format.
 */
export const createMetricsRoute = (
  metrics: Metrics,
  source: ServiceStatusSource,
): Hono => {
  const route = new Hono();

  route.get("/", (c) => {
    const counters = metrics.counters();
    const durations = metrics.requestDurations();

    const byState = new Map<string, number>(lifecycleStateSchema.options.map((state) => [state, 0]));
    for (const snapshot of source.registry.snapshot()) {
      byState.set(snapshot.state, (byState.get(snapshot.state) ?? 0) + 1);
    }

    const sections = [
      counter("orchestrator_launches_total", "Services launched", counters.launchesTotal),
      counter(
        "orchestrator_launch_failures_total",
        "Service launches that failed",
        counters.launchFailuresTotal,
      ),
      counter("orchestrator_probes_total", "Health probes executed", counters.probesTotal),
      counter(
        "orchestrator_probe_failures_total",
        "Health probes that failed",
        counters.probeFailuresTotal,
      ),
      counter(
        "orchestrator_probe_timeouts_total",
        "Health probes that timed out",
        counters.probeTimeoutsTotal,
      ),
      [
        "# HELP orchestrator_services Services by lifecycle state",
        "# TYPE orchestrator_services gauge",
        ...[...byState].map(([state, count]) => `orchestrator_services{state="${state}"} ${count}`),
      ].join("\n"),
      counter("http_requests_total", "Total number of HTTP requests", counters.httpRequestsTotal),
      [
        "# HELP http_request_duration_seconds HTTP request duration in seconds",
        "# TYPE http_request_duration_seconds histogram",
        ...BUCKETS_MS.map(
          (bucket) =>
            `http_request_duration_seconds_bucket{le="${(bucket / 1000).toFixed(1)}"} ${durations.filter((d) => d < bucket).length}`,
        ),
        `http_request_duration_seconds_bucket{le="+Inf"} ${durations.length}`,
      ].join("\n"),
    ];

    return c.text(sections.join("\n\n"), 200, {
      "Content-Type": "text/plain; version=0.0.4",
    });
  });

  return route;
};
