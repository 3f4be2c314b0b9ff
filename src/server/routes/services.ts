import { Hono } from "hono";

import type { Orchestrator, ServiceSnapshot } from "@/worker";

export type ServiceStatusSource = Pick<Orchestrator, "registry">;

const toJson = (snapshot: ServiceSnapshot) => ({
  name: snapshot.name,
  state: snapshot.state,
  phase: snapshot.phase,
  hasHealthCheck: snapshot.hasHealthCheck,
  health: {
    status: snapshot.verdict.status,
    consecutiveFailures: snapshot.verdict.consecutiveFailures,
    lastCheckedAt: snapshot.verdict.lastCheckedAt?.toISOString() ?? null,
    lastError: snapshot.verdict.lastError ?? null,
  },
  handle: snapshot.handle?.id ?? null,
  failure: snapshot.failure
    ? {
        error: snapshot.failure.error.message,
        rootCause: snapshot.failure.rootCause,
        origin: snapshot.failure.origin,
      }
    : null,
  updatedAt: snapshot.updatedAt.toISOString(),
});

/**
 * `GET /services` lists every service; `GET /services/:name` returns one.
 */
export const createServicesRoute = (source: ServiceStatusSource): Hono => {
  const services = new Hono();

  services.get("/", (c) => c.json(source.registry.snapshot().map(toJson)));

  services.get("/:name", (c) => {
    const name = c.req.param("name");
    if (!source.registry.names().includes(name)) {
      return c.json({ error: `Unknown service: ${name}` }, 404);
    }
    return c.json(toJson(source.registry.get(name)));
  });

  return services;
};
