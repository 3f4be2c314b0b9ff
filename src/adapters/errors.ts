/**
 * Runtime adapter error types.
 */

import type { RuntimeKind } from "./types";

export type RuntimeErrorCode =
  | "MISSING_COMMAND"
  | "SPAWN_FAILED"
  | "EXITED_EARLY"
  | "UNKNOWN_HANDLE"
  | "STOP_FAILED";

export class RuntimeError extends Error {
  public override readonly name = "RuntimeError";

  constructor(
    message: string,
    public readonly code: RuntimeErrorCode,
    public readonly runtime: RuntimeKind,
    public override readonly cause?: unknown,
  ) {
    super(message, { cause });
  }
}
