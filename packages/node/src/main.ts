/**
 * @multiledger/node — Entry point.
 *
 * Loads config, opens the ledger's stores and finishes any settlement
 * a previous run left open.
 */

import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { MultiTokenService } from "./services/multi-token-service.js";
import { createShutdown } from "./shutdown.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config);

  const service = new MultiTokenService(config, logger);
  logger.info(
    {
      accountId: service.ledger.accountId,
      extensions: service.ledger.extensions,
      eventLog: config.SETTLEMENT_LOG_PATH ?? "memory",
      state: config.LEDGER_STATE_PATH ?? "memory",
    },
    "Ledger node starting",
  );

  const resumed = await service.start();
  logger.info(
    {
      resumed: resumed.length,
      tokens: service.ledger.tokens().length,
      position: service.eventStore.globalPosition(),
    },
    "Ledger node ready",
  );

  const shutdown = createShutdown(service, logger);

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
