import { type Mock, vi } from "vitest";

import type { Logger } from "@/lib/logger";

export interface MockLogger extends Logger {
  debug: Mock<Logger["debug"]>;
  info: Mock<Logger["info"]>;
  warn: Mock<Logger["warn"]>;
  error: Mock<Logger["error"]>;
}

/**
 * Logger whose methods are spies; `child` returns the same logger so
 * assertions see entries from every derived logger.
 */
export const createMockLogger = (): MockLogger => {
  const mock: MockLogger = {
    debug: vi.fn<Logger["debug"]>(),
    info: vi.fn<Logger["info"]>(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>(),
    child: () => mock,
  };
  return mock;
};
