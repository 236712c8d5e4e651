/**
 * MultiTokenService — Composition root for the ledger packages.
 *
 * Wires one MultiToken, its settlement protocol and the stores behind
 * them from configuration. Callers never construct domain objects
 * directly.
 */

import type { Logger } from "pino";
import { InMemoryEventStore, JsonlEventStore } from "@multiledger/event-store";
import type { EventStore, EventStoreIntegrityResult } from "@multiledger/event-store";
import {
  FileKeyValueStore,
  InMemoryKeyValueStore,
  MultiToken,
  StorageCostRefunder,
} from "@multiledger/ledger";
import type { KeyValueStore } from "@multiledger/ledger";
import {
  AsyncTransferProtocol,
  QueueCallScheduler,
  ReceiverRegistry,
} from "@multiledger/settlement";
import type { ReceiverHook } from "@multiledger/settlement";
import type { PrincipalId } from "@multiledger/types";
import type { AppConfig } from "../config.js";
import { extensionsFromConfig } from "../config.js";

// =============================================================================
// Service
// =============================================================================

export class MultiTokenService {
  readonly ledger: MultiToken;
  readonly settlement: AsyncTransferProtocol;
  readonly scheduler: QueueCallScheduler;
  readonly receivers: ReceiverRegistry;
  readonly payments: StorageCostRefunder;
  readonly eventStore: EventStore;

  private readonly _logger: Logger;

  constructor(config: AppConfig, logger: Logger) {
    this._logger = logger;
    this.eventStore = openEventStore(config);
    this.payments = new StorageCostRefunder({ byteCost: config.STORAGE_BYTE_COST });

    this.ledger = new MultiToken({
      accountId: config.LEDGER_ACCOUNT_ID,
      adminId: config.LEDGER_ADMIN_ID,
      extensions: extensionsFromConfig(config),
      store: openStateStore(config),
      eventStore: this.eventStore,
      payments: this.payments,
      paymentFloor: config.PAYMENT_FLOOR,
    });

    this.scheduler = new QueueCallScheduler();
    this.receivers = new ReceiverRegistry();
    this.settlement = new AsyncTransferProtocol({
      ledger: this.ledger,
      receivers: this.receivers,
      scheduler: this.scheduler,
      limits: {
        computeForTransferCall: config.COMPUTE_FOR_TRANSFER_CALL,
        computeForResolve: config.COMPUTE_FOR_RESOLVE,
      },
      logger: logger.child({ component: "settlement" }),
    });
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  /**
   * Verify the event log, then finish settlements a previous run left open.
   *
   * @throws Error if the event log's hash chain does not verify
   */
  async start(): Promise<readonly string[]> {
    const integrity = this.verifyIntegrity();
    if (!integrity.valid) {
      throw new Error(
        `Event log failed verification after position ${integrity.lastVerifiedPosition}`,
      );
    }
    const resumed = this.settlement.recover();
    await this.settle();
    return resumed;
  }

  /**
   * Run every scheduled notification and resolution.
   */
  async settle(): Promise<number> {
    const ran = await this.scheduler.drain();
    if (ran > 0) {
      this._logger.debug({ ran }, "Settlement queue drained");
    }
    return ran;
  }

  // ─── Receivers ─────────────────────────────────────────────────────

  registerReceiver(receiverId: PrincipalId, hook: ReceiverHook): void {
    this.receivers.register(receiverId, hook);
    this._logger.info({ receiverId }, "Receiver hook registered");
  }

  // ─── Integrity ─────────────────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }
}

// =============================================================================
// Stores
// =============================================================================

function openEventStore(config: AppConfig): EventStore {
  return config.SETTLEMENT_LOG_PATH !== undefined
    ? new JsonlEventStore({ filePath: config.SETTLEMENT_LOG_PATH })
    : new InMemoryEventStore();
}

function openStateStore(config: AppConfig): KeyValueStore {
  return config.LEDGER_STATE_PATH !== undefined
    ? new FileKeyValueStore({ filePath: config.LEDGER_STATE_PATH })
    : new InMemoryKeyValueStore();
}
