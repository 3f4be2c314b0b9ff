export { createLogger, logger, type LogFormat, type Logger, type LoggerConfig } from "./logger";

export type { LogLevel } from "./schema";
