import { describe, expect, it } from "vitest";

import { normalizeCompose, normalizeHealthcheck } from "./normalize";

describe("normalizeHealthcheck", () => {
  it("should treat a string test as a shell command with default timing", () => {
    const issues: string[] = [];

    expect(normalizeHealthcheck("db", { test: "pg_isready" }, issues)).toEqual({
      test: { kind: "shell", command: "pg_isready" },
      intervalMs: 30_000,
      timeoutMs: 30_000,
      retries: 3,
      startPeriodMs: 0,
    });
    expect(issues).toEqual([]);
  });

  it("should treat zero retries and zero interval as the defaults", () => {
    const check = normalizeHealthcheck(
      "db",
      { test: ["CMD", "true"], retries: 0, interval: 0, start_period: 15_000 },
      [],
    );

    expect(check).toMatchObject({ intervalMs: 30_000, retries: 3, startPeriodMs: 15_000 });
  });

  it("should join CMD-SHELL arguments into one command line", () => {
    const check = normalizeHealthcheck("db", { test: ["CMD-SHELL", "curl", "-f", "x"] }, []);

    expect(check?.test).toEqual({ kind: "shell", command: "curl -f x" });
  });

  it.each([
    ["no test", {}],
    ["disable: true", { test: ["CMD", "true"], disable: true }],
    ["a NONE test", { test: ["NONE"] }],
  ])("should return null for %s", (_label, healthcheck) => {
    const issues: string[] = [];

    expect(normalizeHealthcheck("db", healthcheck, issues)).toBeNull();
    expect(issues).toEqual([]);
  });

  it("should return null when no healthcheck is declared", () => {
    expect(normalizeHealthcheck("db", undefined, [])).toBeNull();
  });

  it.each([
    [{ test: "  " }, "db: healthcheck test is empty"],
    [{ test: ["CMD"] }, "db: healthcheck CMD needs a command"],
    [{ test: ["CMD-SHELL"] }, "db: healthcheck CMD-SHELL needs a command"],
    [{ test: ["pg_isready"] }, 'db: healthcheck test must start with NONE, CMD or CMD-SHELL, got "pg_isready"'],
    [{ test: [] }, "db: healthcheck test must start with NONE, CMD or CMD-SHELL, got null"],
  ])("should report %j", (healthcheck, issue) => {
    const issues: string[] = [];

    expect(normalizeHealthcheck("db", healthcheck, issues)).toBeNull();
    expect(issues).toEqual([issue]);
  });
});

describe("normalizeCompose", () => {
  it("should read network maps and long-form volumes", () => {
    const project = normalizeCompose({
      services: {
        api: {
          networks: { front: null, back: { aliases: ["api"] } },
          volumes: [
            { type: "volume", source: "uploads", target: "/srv/uploads" },
            { type: "tmpfs", target: "/tmp" },
            "./config:/etc/app:ro",
          ],
        },
      },
    });

    expect(project.services[0]).toMatchObject({
      name: "api",
      healthCheck: null,
      networks: ["front", "back"],
      volumes: ["uploads:/srv/uploads", "/tmp", "./config:/etc/app:ro"],
    });
  });

  it("should pass the declared entry through as the service spec", () => {
    const entry = { image: "redis:7", command: ["redis-server", "--appendonly", "yes"] };

    const project = normalizeCompose({ services: { cache: entry } });

    expect(project.services[0]?.spec).toBe(entry);
  });

  it("should collect issues across services into one error", () => {
    expect(() =>
      normalizeCompose({
        services: {
          db: { healthcheck: { test: ["CMD"] } },
          api: { depends_on: { db: { condition: "service_completed_successfully", required: true } } },
        },
      }),
    ).toThrow(
      expect.objectContaining({
        message: "Invalid compose file",
        issues: [
          "db: healthcheck CMD needs a command",
          "api: condition service_completed_successfully on db is not supported",
        ],
      }),
    );
  });
});
