/**
 * @multiledger/ledger — Multi-token balance ledger.
 *
 * Tracks balances of many token classes, each held by many principals,
 * inside one key-value store:
 * - BalanceLedger: per-(token, owner) balances and tracked supply
 * - TokenRegistry: token ids, owner-of-record, metadata, approval ids
 * - ApprovalStore: approvals consumed (wholesale) by transfers
 * - TransferEngine: single, batch and refund movements
 * - MultiToken: all-or-nothing invocations over the components
 *
 * Design rules:
 * - All amounts are bigint with checked u128 arithmetic
 * - Supply is the sum of balances, moved only by deposit/withdraw
 * - Fail-closed: invalid operations throw, never silently succeed
 */

// Facade
export { MultiToken } from "./multi-token.js";
export type { MultiTokenOptions, LedgerScope } from "./multi-token.js";

// Components
export { BalanceLedger } from "./balance-ledger.js";
export { TokenRegistry, compareTokenIds } from "./token-registry.js";
export type { TokenRegistryDeps } from "./token-registry.js";
export { KeyValueApprovalStore } from "./approval-store.js";
export type { ApprovalStore } from "./approval-store.js";
export { TransferEngine } from "./transfer-engine.js";
export type { TransferEngineDeps } from "./transfer-engine.js";
export { LedgerEventBuffer } from "./events.js";

// Storage
export {
  InMemoryKeyValueStore,
  FileKeyValueStore,
  StagedKeyValueStore,
  storageKeys,
} from "./storage.js";
export type {
  KeyValueStore,
  WritableKeyValueStore,
  WriteBatch,
  FileKeyValueStoreOptions,
} from "./storage.js";

// Payments
export { StorageCostRefunder } from "./payments.js";
export type { PaymentCollaborator, RefundQuote, StorageCostRefunderOptions } from "./payments.js";

// Arithmetic
export {
  U128_MAX,
  U64_MAX,
  parseAmount,
  formatAmount,
  assertAmount,
  parseCounter,
  checkedAdd,
  checkedSub,
  minAmount,
} from "./amount-math.js";

// Types
export type {
  LedgerExtensions,
  Invocation,
  MintRequest,
  TransferRequest,
  BatchTransferRequest,
  ApproveRequest,
  RefundRequest,
  TransferLeg,
  RefundResult,
  Payout,
  MintResult,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError, NO_EXTENSIONS } from "./types.js";
