/**
 * @multiledger/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore for tests and development
 * - JsonlEventStore for durable file-based persistence
 * - Hash chain over every stored event
 * - The ledger and settlement event catalog (zod payload schemas)
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  UnhashedStoredEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, linkEvent, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";
export { JsonlEventStore } from "./jsonl-store.js";
export type { JsonlEventStoreOptions } from "./jsonl-store.js";

// Ledger event catalog
export {
  LEDGER_EVENTS,
  LEDGER_EVENT_CATALOG,
  TokenMintedSchema,
  AccountRegisteredSchema,
  TransferSchema,
  RefundForfeitedSchema,
  ApprovalRecordSchema,
  SettlementStartedSchema,
  NotificationOutcomeSchema,
  SettlementNotifiedSchema,
  SettlementResolvedSchema,
  SettlementAbortedSchema,
  isLedgerEventType,
  validateEventPayload,
  eventSource,
  createLedgerEvent,
} from "./ledger-events.js";
export type {
  LedgerEventType,
  LedgerEventPayload,
  EventContext,
  TokenMintedPayload,
  AccountRegisteredPayload,
  TransferPayload,
  RefundForfeitedPayload,
  ApprovalRecord,
  SettlementStartedPayload,
  NotificationOutcomeRecord,
  SettlementNotifiedPayload,
  SettlementResolvedPayload,
  SettlementAbortedPayload,
} from "./ledger-events.js";
