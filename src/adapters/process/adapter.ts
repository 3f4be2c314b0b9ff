/**
 * Local process runtime.
 *
 * Runs each service's `command` as a child process of the orchestrator and
 * each health check as a local command. Image, build, port and volume fields
 * are ignored: they belong to a container runtime.
 */

import { type ChildProcess, spawn } from "node:child_process";
import type { Readable } from "node:stream";

import * as v from "valibot";

import type { HealthCheckDescriptor, ServiceDefinition, ServiceHandle } from "@/domains/service";
import { abortReason, isAbortError } from "@/lib/async";
import type { Logger } from "@/lib/logger";

import { RuntimeError } from "../errors";
import { type ProbeOutcome, type RuntimeAdapter, truncateOutput } from "../types";

export interface ProcessAdapterConfig {
  logger: Logger;
  cwd?: string;
  /** A process exiting within this window after spawn fails the launch */
  settleMs?: number;
}

const commandSchema = v.union([
  v.pipe(v.string(), v.minLength(1)),
  v.pipe(v.array(v.string()), v.minLength(1)),
]);

const environmentSchema = v.union([
  v.record(v.string(), v.nullable(v.union([v.string(), v.number(), v.boolean()]))),
  v.array(v.string()),
]);

type LaunchCommand = { file: string; args: string[]; shell: boolean };

const resolveCommand = (service: ServiceDefinition): LaunchCommand => {
  const result = v.safeParse(commandSchema, service.spec.command);
  if (!result.success) {
    throw new RuntimeError(
      `Service ${service.name} declares no command to run as a process`,
      "MISSING_COMMAND",
      "process",
    );
  }
  const command = result.output;
  if (typeof command === "string") {
    return { file: command, args: [], shell: true };
  }
  const [file = "", ...args] = command;
  return { file, args, shell: false };
};

/**
 * Compose accepts both `KEY: value` maps and `KEY=value` lists. A null map
 * value or a bare `KEY` list entry inherits the orchestrator's value.
 */
export const resolveEnvironment = (
  service: ServiceDefinition,
  base: NodeJS.ProcessEnv = process.env,
): NodeJS.ProcessEnv => {
  const env: NodeJS.ProcessEnv = { ...base };
  const result = v.safeParse(environmentSchema, service.spec.environment);
  if (!result.success) {
    return env;
  }

  if (Array.isArray(result.output)) {
    for (const entry of result.output) {
      const separator = entry.indexOf("=");
      if (separator > 0) {
        env[entry.slice(0, separator)] = entry.slice(separator + 1);
      }
    }
    return env;
  }

  for (const [key, value] of Object.entries(result.output)) {
    if (value !== null) {
      env[key] = String(value);
    }
  }
  return env;
};

const forwardLines = (stream: Readable | null, write: (line: string) => void): void => {
  if (!stream) return;
  let buffer = "";
  stream.setEncoding("utf8");
  stream.on("data", (chunk: string) => {
    buffer += chunk;
    const lines = buffer.split("\n");
    buffer = lines.pop() ?? "";
    for (const line of lines) {
      if (line.length > 0) write(line);
    }
  });
  stream.on("end", () => {
    if (buffer.length > 0) write(buffer);
    buffer = "";
  });
};

const hasExited = (child: ChildProcess): boolean =>
  child.exitCode !== null || child.signalCode !== null;

const waitForExit = (child: ChildProcess): Promise<void> =>
  new Promise<void>((resolve) => {
    if (hasExited(child)) {
      resolve();
      return;
    }
    child.once("exit", () => resolve());
  });

/**
 * Create the local process runtime.
 *
 * @example
 * ```typescript
 * const runtime = createProcessAdapter({ logger, cwd: "/srv/app" });
 * const handle = await runtime.launch(service, signal);
 * await runtime.stop(handle, AbortSignal.timeout(10_000));
 * ```
 */
export const createProcessAdapter = (config: ProcessAdapterConfig): RuntimeAdapter => {
  const { logger, cwd, settleMs = 0 } = config;
  const children = new Map<string, ChildProcess>();

  const launch = (service: ServiceDefinition, signal: AbortSignal): Promise<ServiceHandle> => {
    const serviceLogger = logger.child({ service: service.name });

    return new Promise<ServiceHandle>((resolve, reject) => {
      if (signal.aborted) {
        reject(abortReason(signal));
        return;
      }

      // Throwing inside the executor rejects the launch
      const command = resolveCommand(service);

      const child = spawn(command.file, command.args, {
        cwd,
        env: resolveEnvironment(service),
        shell: command.shell,
        stdio: ["ignore", "pipe", "pipe"],
      });

      let settled = false;
      let settleTimer: NodeJS.Timeout | undefined;

      const finish = (outcome: () => void): void => {
        if (settled) return;
        settled = true;
        clearTimeout(settleTimer);
        signal.removeEventListener("abort", onAbort);
        outcome();
      };

      const onAbort = (): void => {
        child.kill("SIGKILL");
        finish(() => reject(abortReason(signal)));
      };

      const onRunning = (): void => {
        const handle: ServiceHandle = {
          service: service.name,
          id: `pid-${child.pid ?? "unknown"}`,
          startedAt: new Date(),
        };
        children.set(handle.id, child);
        child.once("exit", (code, exitSignal) => {
          if (children.get(handle.id) === child) {
            serviceLogger.warn("Service process exited", { code, signal: exitSignal });
          }
        });
        finish(() => resolve(handle));
      };

      forwardLines(child.stdout, (line) => serviceLogger.info(line));
      forwardLines(child.stderr, (line) => serviceLogger.warn(line));

      child.on("error", (error) => {
        if (settled) {
          serviceLogger.error("Service process error", error);
          return;
        }
        finish(() =>
          reject(
            new RuntimeError(
              `Failed to spawn ${service.name}: ${error.message}`,
              "SPAWN_FAILED",
              "process",
              error,
            ),
          ),
        );
      });

      child.once("exit", (code, exitSignal) => {
        finish(() =>
          reject(
            new RuntimeError(
              `Service ${service.name} exited during startup (code ${code ?? "none"}, signal ${exitSignal ?? "none"})`,
              "EXITED_EARLY",
              "process",
            ),
          ),
        );
      });

      child.once("spawn", () => {
        if (settleMs === 0) {
          onRunning();
          return;
        }
        settleTimer = setTimeout(onRunning, settleMs);
      });

      signal.addEventListener("abort", onAbort, { once: true });
    });
  };

  const executeProbe = (
    service: ServiceDefinition,
    check: HealthCheckDescriptor,
    signal: AbortSignal,
  ): Promise<ProbeOutcome> =>
    new Promise<ProbeOutcome>((resolve, reject) => {
      if (signal.aborted) {
        reject(abortReason(signal));
        return;
      }

      const command: LaunchCommand =
        check.test.kind === "shell"
          ? { file: check.test.command, args: [], shell: true }
          : { file: check.test.argv[0] ?? "", args: check.test.argv.slice(1), shell: false };

      const child = spawn(command.file, command.args, {
        cwd,
        env: resolveEnvironment(service),
        shell: command.shell,
        signal,
        stdio: ["ignore", "pipe", "pipe"],
      });

      let output = "";
      const collect = (chunk: Buffer | string): void => {
        output += chunk.toString();
      };
      child.stdout?.on("data", collect);
      child.stderr?.on("data", collect);

      child.on("error", (error) => {
        if (signal.aborted || isAbortError(error)) {
          reject(abortReason(signal));
          return;
        }
        resolve({ ok: false, exitCode: null, output: truncateOutput(error.message) });
      });

      child.once("close", (code) => {
        resolve({ ok: code === 0, exitCode: code, output: truncateOutput(output) });
      });
    });

  const stop = async (handle: ServiceHandle, signal: AbortSignal): Promise<void> => {
    const child = children.get(handle.id);
    if (!child) {
      throw new RuntimeError(`Unknown handle ${handle.id}`, "UNKNOWN_HANDLE", "process");
    }
    children.delete(handle.id);

    if (hasExited(child)) return;

    const exited = waitForExit(child);
    if (!child.kill("SIGTERM")) {
      throw new RuntimeError(`Could not signal ${handle.service}`, "STOP_FAILED", "process");
    }

    const forced = new Promise<void>((resolve) => {
      const onAbort = (): void => {
        logger.warn("Grace period elapsed, killing service", { service: handle.service });
        child.kill("SIGKILL");
        resolve();
      };
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener("abort", onAbort, { once: true });
      void exited.then(() => signal.removeEventListener("abort", onAbort));
    });

    await Promise.race([exited, forced]);
  };

  return { kind: "process", launch, executeProbe, stop };
};
