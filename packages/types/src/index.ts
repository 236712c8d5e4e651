/**
 * @multiledger/types — Shared domain types for the multi-token ledger.
 *
 * These types are used across all packages:
 * - Principals, token ids and amounts
 * - Token views, metadata and approvals
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Token types
export type {
  PrincipalId,
  TokenId,
  Amount,
  TokenMetadata,
  Approval,
  ApprovalSet,
  Token,
} from "./token.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime type guards
export {
  isPrincipalId,
  isTokenId,
  isUintString,
  isRecord,
  isTokenMetadata,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
