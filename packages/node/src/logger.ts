import pino from "pino";
import type { Logger } from "pino";
import type { AppConfig } from "./config.js";

/**
 * Root logger. Pretty-printed in development, JSON lines otherwise.
 */
export function createLogger(config: Pick<AppConfig, "LOG_LEVEL" | "NODE_ENV">): Logger {
  return pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}
