import type { Logger } from "pino";
import type { MultiTokenService } from "./services/multi-token-service.js";

export type ExitFn = (code: number) => void;

/**
 * Signal handler: drain the settlement queue, then exit. Exits 1 if
 * draining fails.
 */
export function createShutdown(
  service: Pick<MultiTokenService, "settle">,
  logger: Logger,
  exit: ExitFn = (code) => process.exit(code),
): (signal: string) => Promise<void> {
  return async (signal) => {
    logger.info({ signal }, "Shutdown signal received");
    try {
      await service.settle();
    } catch (err) {
      logger.error({ err, signal }, "Shutdown failed");
      exit(1);
      return;
    }
    logger.info("Shutdown complete");
    exit(0);
  };
}
