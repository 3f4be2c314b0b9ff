/**
 * Service readiness orchestrator
 *
 * Loads a compose file, brings its services up in dependency order and keeps
 * them running until SIGINT or SIGTERM. In dry-run mode the run is rehearsed
 * and the process exits with the outcome.
 */

import { createRuntimeAdapter, runtimeConfigFor } from "./adapters";
import { loadComposeFile } from "./domains/compose";
import { ConfigurationError, toError } from "./domains/errors";
import { buildDependencyGraph } from "./domains/graph";
import { getConfig } from "./lib/config";
import { type Logger, createLogger } from "./lib/logger";
import { createMetrics } from "./lib/metrics";
import { type HttpServer, startHttpServer } from "./server";
import { type RunResult, createOrchestrator } from "./worker";

const logResult = (logger: Logger, result: RunResult): void => {
  switch (result.kind) {
    case "success":
      logger.info("All services ready", { startOrder: result.startOrder });
      return;
    case "partial-failure":
      for (const failure of result.failures) {
        if (failure.rootCause) {
          logger.error("Service failed", failure.error, { service: failure.service });
        } else {
          logger.warn("Service not started", {
            service: failure.service,
            rootCause: failure.origin,
          });
        }
      }
      logger.warn("Startup finished with failures", {
        startOrder: result.startOrder,
        failed: result.failures.map((failure) => failure.service),
      });
      return;
    case "cancelled":
      logger.info("Startup cancelled", { startOrder: result.startOrder });
      return;
  }
};

const main = async (): Promise<void> => {
  // 1. Validate environment configuration
  const config = getConfig();
  const logger = createLogger({
    level: config.logging.level,
    format: config.server.nodeEnv === "development" ? "pretty" : "json",
  });

  try {
    // 2. Load the compose file and build the dependency graph
    logger.info("Loading compose file", { file: config.compose.file });
    const project = await loadComposeFile(config.compose.file);
    const graph = buildDependencyGraph(project.services, project.edges);
    logger.info("Dependency graph built", {
      project: project.name,
      order: graph.topologicalOrder().map((service) => service.name),
    });

    // 3. Wire the runtime and orchestrator
    const metrics = createMetrics();
    const runtime = createRuntimeAdapter(runtimeConfigFor(config), logger);
    const orchestrator = createOrchestrator({
      graph,
      runtime,
      logger,
      metrics,
      parallelLimit: config.compose.parallelLimit,
      startupDeadlineMs: config.timing.startupDeadlineMs,
      shutdownGraceMs: config.timing.shutdownGraceMs,
    });

    // 4. Start HTTP server (health, services, metrics) when a port is set
    let httpServer: HttpServer | undefined;
    if (config.server.port !== undefined) {
      httpServer = await startHttpServer({
        port: config.server.port,
        logger,
        metrics,
        orchestrator,
      });
    }

    // 5. Setup graceful shutdown
    const shutdown = async (signal: string): Promise<void> => {
      logger.info(`Received ${signal}, shutting down`);
      await orchestrator.shutdown();
      await httpServer?.close();
      process.exit(0);
    };

    process.on("SIGTERM", () => void shutdown("SIGTERM"));
    process.on("SIGINT", () => void shutdown("SIGINT"));

    // 6. Bring services up
    const result = await orchestrator.up();
    logResult(logger, result);

    if (runtime.kind === "dry-run") {
      await orchestrator.shutdown();
      await httpServer?.close();
      process.exit(result.kind === "success" ? 0 : 1);
    }
  } catch (error) {
    const err = toError(error);
    logger.error("Fatal error during startup", err);
    if (err instanceof ConfigurationError) {
      for (const issue of err.issues) {
        logger.error(`  - ${issue}`);
      }
    }
    process.exit(1);
  }
};

main().catch((error) => {
  console.error("Unhandled error:", error);
  process.exit(1);
});
