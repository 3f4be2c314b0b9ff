/**
 * Factory function for creating runtime adapters.
 */

import type { Logger } from "@/lib/logger";

import type { RuntimeConfig } from "./config";
import { createDryRunAdapter } from "./dry-run";
import { createProcessAdapter } from "./process";
import type { RuntimeAdapter } from "./types";

/**
 * Create a runtime adapter based on configuration.
 *
 * @param config - Validated runtime configuration
 * @param logger - Receives service output and process lifecycle messages
 */
export const createRuntimeAdapter = (config: RuntimeConfig, logger: Logger): RuntimeAdapter => {
  switch (config.runtime) {
    case "process":
      return createProcessAdapter({
        logger: logger.child({ runtime: "process" }),
        cwd: config.cwd,
        settleMs: config.settleMs,
      });
    case "dry-run":
      return createDryRunAdapter({
        failingProbes: config.failingProbes ?? [],
        failingLaunches: config.failingLaunches ?? [],
      });
  }
};
