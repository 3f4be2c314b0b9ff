import { serve } from "@hono/node-server";
import { Hono } from "hono";

import type { Logger } from "@/lib/logger";
import type { Metrics } from "@/lib/metrics";
import type { Orchestrator } from "@/worker";

import { createHealthRoute } from "./routes/health";
import { createMetricsRoute } from "./routes/metrics";
import { createServicesRoute } from "./routes/services";

export interface ServerDeps {
  port: number;
  logger: Logger;
  metrics: Metrics;
  orchestrator: Pick<Orchestrator, "registry" | "result">;
}

export interface HttpServer {
  port: number;
  close: () => Promise<void>;
}

export const createStatusApp = (deps: Omit<ServerDeps, "port">): Hono => {
  const app = new Hono();

  // Request logging middleware
  app.use("*", async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    deps.logger.debug("HTTP request", {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: duration,
    });
    deps.metrics.increment("httpRequestsTotal");
    deps.metrics.recordRequestDuration(duration);
  });

  // Routes
  app.get("/", (c) => c.json({ message: "Service readiness orchestrator" }));
  app.route("/health", createHealthRoute(deps.orchestrator));
  app.route("/services", createServicesRoute(deps.orchestrator));
  app.route("/metrics", createMetricsRoute(deps.metrics, deps.orchestrator));

  return app;
};

export const startHttpServer = async (deps: ServerDeps): Promise<HttpServer> => {
  const app = createStatusApp(deps);

  // Start server
  const server = serve(
    {
      fetch: app.fetch,
      port: deps.port,
    },
    (info) => {
      deps.logger.info(`HTTP server listening on port ${info.port}`);
    },
  );

  return {
    port: deps.port,
    close: async (): Promise<void> => {
      return new Promise<void>((resolve) => {
        server.close(() => {
          deps.logger.info("HTTP server closed");
          resolve();
        });
      });
    },
  };
};
