import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { getEnv, parseEnv, resetEnvCache } from "./env";

describe("parseEnv", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = {};
    resetEnvCache();
  });

  afterEach(() => {
    process.env = originalEnv;
    vi.restoreAllMocks();
  });

  it("should apply defaults when nothing is set", () => {
    const env = parseEnv();

    expect(env.NODE_ENV).toBe("production");
    expect(env.COMPOSE_FILE).toBe("docker-compose.yml");
    expect(env.RUNTIME).toBe("process");
    expect(env.SHUTDOWN_GRACE_MS).toBe(10000);
    expect(env.STARTUP_DEADLINE_MS).toBeUndefined();
    expect(env.COMPOSE_PARALLEL_LIMIT).toBeUndefined();
    expect(env.PORT).toBeUndefined();
    expect(env.LOG_LEVEL).toBeUndefined();
  });

  it("should parse valid environment variables", () => {
    process.env = {
      NODE_ENV: "development",
      LOG_LEVEL: "warn",
      COMPOSE_FILE: "deploy/compose.yml",
      RUNTIME: "dry-run",
      COMPOSE_PARALLEL_LIMIT: "2",
      STARTUP_DEADLINE_MS: "60000",
      SHUTDOWN_GRACE_MS: "2500",
      PORT: "8080",
    };

    const env = parseEnv();

    expect(env).toEqual({
      NODE_ENV: "development",
      LOG_LEVEL: "warn",
      COMPOSE_FILE: "deploy/compose.yml",
      RUNTIME: "dry-run",
      COMPOSE_PARALLEL_LIMIT: 2,
      STARTUP_DEADLINE_MS: 60000,
      SHUTDOWN_GRACE_MS: 2500,
      PORT: 8080,
    });
  });

  it("should parse runtime options", () => {
    process.env = {
      PROCESS_SETTLE_MS: "0",
      DRY_RUN_FAILING_PROBES: "db, store,,",
      DRY_RUN_FAILING_LAUNCHES: "api",
    };

    const env = parseEnv();

    expect(env.PROCESS_SETTLE_MS).toBe(0);
    expect(env.DRY_RUN_FAILING_PROBES).toEqual(["db", "store"]);
    expect(env.DRY_RUN_FAILING_LAUNCHES).toEqual(["api"]);
  });

  it.each([
    ["RUNTIME", "kubernetes"],
    ["NODE_ENV", "staging"],
    ["LOG_LEVEL", "trace"],
    ["PORT", "65536"],
    ["PORT", "not-a-number"],
    ["COMPOSE_PARALLEL_LIMIT", "0"],
    ["STARTUP_DEADLINE_MS", "1.5"],
    ["PROCESS_SETTLE_MS", "-1"],
    ["COMPOSE_FILE", ""],
  ])("should exit when %s is %j", (key, value) => {
    process.env = { [key]: value };
    vi.spyOn(console, "error").mockImplementation(() => {});
    const exitSpy = vi.spyOn(process, "exit").mockImplementation(() => {
      throw new Error("process.exit");
    });

    expect(() => parseEnv()).toThrow("process.exit");
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it("should cache the parsed environment until reset", () => {
    process.env = { COMPOSE_FILE: "first.yml" };
    expect(getEnv().COMPOSE_FILE).toBe("first.yml");

    process.env = { COMPOSE_FILE: "second.yml" };
    expect(getEnv().COMPOSE_FILE).toBe("first.yml");

    resetEnvCache();
    expect(getEnv().COMPOSE_FILE).toBe("second.yml");
  });
});
