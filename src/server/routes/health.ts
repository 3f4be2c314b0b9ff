import { Hono } from "hono";

import type { Orchestrator } from "@/worker";

export type RunStatusSource = Pick<Orchestrator, "result">;

type HealthStatus = "starting" | "healthy" | "unhealthy" | "cancelled";

/**
 * `GET /health`: 200 once the run succeeded, 503 while it is starting or when
 * it failed or was cancelled.
 */
export const createHealthRoute = (source: RunStatusSource): Hono => {
  const health = new Hono();

  health.get("/", (c) => {
    const result = source.result();
    const timestamp = new Date().toISOString();

    if (!result) {
      const status: HealthStatus = "starting";
      return c.json({ status, timestamp }, 503);
    }

    switch (result.kind) {
      case "success": {
        const status: HealthStatus = "healthy";
        return c.json({ status, timestamp, startOrder: result.startOrder }, 200);
      }
      case "partial-failure": {
        const status: HealthStatus = "unhealthy";
        const failures = result.failures.map((failure) => ({
          service: failure.service,
          rootCause: failure.rootCause,
          origin: failure.origin,
          error: failure.error.message,
        }));
        return c.json({ status, timestamp, startOrder: result.startOrder, failures }, 503);
      }
      case "cancelled": {
        const status: HealthStatus = "cancelled";
        return c.json({ status, timestamp, startOrder: result.startOrder }, 503);
      }
    }
  });

  return health;
};
