import { type Env, getEnv } from "./env/env";
import type { LogLevel } from "./logger/schema";

export interface AppConfig {
  server: {
    nodeEnv: Env["NODE_ENV"];
    port: number | undefined;
  };
  logging: {
    level: LogLevel;
  };
  compose: {
    file: string;
    parallelLimit: number | undefined;
  };
  runtime: {
    kind: Env["RUNTIME"];
    /** Process runtime: an exit within this window fails the launch */
    settleMs: number | undefined;
    /** Dry-run runtime: services whose probes or launches are made to fail */
    failingProbes: string[];
    failingLaunches: string[];
  };
  timing: {
    startupDeadlineMs: number | undefined;
    shutdownGraceMs: number;
  };
}

export const createConfig = (env: Env): AppConfig => ({
  server: {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
  },
  logging: {
    level: env.LOG_LEVEL ?? (env.NODE_ENV === "production" ? "info" : "debug"),
  },
  compose: {
    file: env.COMPOSE_FILE,
    parallelLimit: env.COMPOSE_PARALLEL_LIMIT,
  },
  runtime: {
    kind: env.RUNTIME,
    settleMs: env.PROCESS_SETTLE_MS,
    failingProbes: env.DRY_RUN_FAILING_PROBES ?? [],
    failingLaunches: env.DRY_RUN_FAILING_LAUNCHES ?? [],
  },
  timing: {
    startupDeadlineMs: env.STARTUP_DEADLINE_MS,
    shutdownGraceMs: env.SHUTDOWN_GRACE_MS,
  },
});

let cachedConfig: AppConfig | undefined;

export const getConfig = (): AppConfig => {
  if (!cachedConfig) {
    cachedConfig = createConfig(getEnv());
  }
  return cachedConfig;
};
