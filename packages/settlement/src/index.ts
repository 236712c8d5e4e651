/**
 * @multiledger/settlement — Transfer-call settlement.
 *
 * Moves value to a receiver optimistically, notifies it, then refunds
 * whatever it reports as unused:
 * - AsyncTransferProtocol: transferCall / batchTransferCall / resolveTransfer / recover
 * - ReceiverRegistry: hooks that react to incoming value
 * - QueueCallScheduler: FIFO turns between the saga's phases
 * - SettlementLog: one event stream per settlement, folded back into state
 *
 * @packageDocumentation
 */

export { AsyncTransferProtocol } from "./async-transfer.js";
export type { AsyncTransferProtocolOptions } from "./async-transfer.js";

export { ReceiverRegistry } from "./receiver-registry.js";

export { QueueCallScheduler } from "./scheduler.js";
export type { CallScheduler, ScheduledCall } from "./scheduler.js";

export { SettlementLog, SETTLEMENT_STREAM_PREFIX, foldSettlement } from "./settlement-log.js";
export type { StartedEntry, ResolvedEntry } from "./settlement-log.js";

export { interpretOutcome, toRecordedOutcome, UnusedAmountsSchema } from "./outcome.js";

export type {
  SettlementState,
  NotificationOutcome,
  TransferNotification,
  ReceiverHook,
  TransferCallRequest,
  BatchTransferCallRequest,
  ResolveArgs,
  SettlementReceipt,
  SettlementRecord,
  ComputeLimits,
  SettlementErrorCode,
} from "./types.js";
export { SettlementError, DEFAULT_COMPUTE_LIMITS, DEFAULT_COMPUTE_FOR_RESOLVE } from "./types.js";
