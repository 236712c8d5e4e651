/**
 * @multiledger/node — Composition root.
 *
 * @packageDocumentation
 */

export { MultiTokenService } from "./services/multi-token-service.js";
export { loadConfig, extensionsFromConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger } from "./logger.js";
export { createShutdown } from "./shutdown.js";
export type { ExitFn } from "./shutdown.js";
