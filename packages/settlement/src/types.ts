/**
 * @multiledger/settlement — Types for the transfer-call saga.
 *
 * A transfer-call moves value optimistically, tells the receiver about it,
 * then refunds whatever the receiver reports as unused:
 *
 *   started → notified → resolved
 *          ↘ aborted (the transfer step itself failed)
 */

import type { Amount, ApprovalSet, PrincipalId, TokenId } from "@multiledger/types";

// ─── Saga State ──────────────────────────────────────────────────────────

export type SettlementState = "started" | "notified" | "resolved" | "aborted";

/**
 * What came back from the receiver's hook.
 * `failed` covers a missing hook, a throw and a rejected promise alike.
 */
export type NotificationOutcome =
  | { readonly status: "succeeded"; readonly value: unknown }
  | { readonly status: "failed"; readonly reason: string };

/**
 * Payload handed to a receiver when value arrives through a transfer-call.
 */
export interface TransferNotification {
  readonly settlementId: string;
  readonly senderId: PrincipalId;
  readonly previousOwnerIds: readonly PrincipalId[];
  readonly tokenIds: readonly TokenId[];
  readonly amounts: readonly Amount[];
  readonly message: string;
}

/**
 * A receiver's reaction to incoming value.
 *
 * Should return (or resolve to) one unused amount per token, as
 * non-negative integer strings or safe integers. Anything else is
 * taken to mean every token was used.
 */
export type ReceiverHook = (notification: TransferNotification) => unknown;

// ─── Requests ────────────────────────────────────────────────────────────

export interface TransferCallRequest {
  readonly receiverId: PrincipalId;
  readonly tokenId: TokenId;
  readonly amount: Amount;
  readonly approvalId?: bigint | undefined;
  readonly message: string;
  readonly memo?: string | undefined;
}

export interface BatchTransferCallRequest {
  readonly receiverId: PrincipalId;
  readonly tokenIds: readonly TokenId[];
  readonly amounts: readonly Amount[];
  readonly approvalIds?: readonly (bigint | undefined)[] | undefined;
  readonly message: string;
  readonly memo?: string | undefined;
}

/**
 * Arguments the resolution continuation carries from the transfer step.
 */
export interface ResolveArgs {
  /** Ties the resolution to its saga log entry, when there is one */
  readonly settlementId?: string | undefined;
  readonly senderId: PrincipalId;
  readonly receiverId: PrincipalId;
  /** Whose balance each leg debited; refunds go back here */
  readonly previousOwnerIds: readonly PrincipalId[];
  readonly tokenIds: readonly TokenId[];
  readonly amounts: readonly Amount[];
  /** Accepted for compatibility; never restored */
  readonly priorApprovals?: readonly ApprovalSet[] | undefined;
}

// ─── Results ─────────────────────────────────────────────────────────────

export interface SettlementReceipt {
  readonly settlementId: string;
  readonly previousOwnerIds: readonly PrincipalId[];
  readonly amounts: readonly Amount[];
}

/**
 * A settlement as reconstructed from its log stream.
 */
export interface SettlementRecord {
  readonly settlementId: string;
  readonly state: SettlementState;
  readonly senderId: PrincipalId;
  readonly receiverId: PrincipalId;
  readonly previousOwnerIds: readonly PrincipalId[];
  readonly tokenIds: readonly TokenId[];
  readonly amounts: readonly Amount[];
  readonly message: string;
  readonly priorApprovals: readonly ApprovalSet[];
  readonly startedAt: string;
  readonly outcome?: NotificationOutcome | undefined;
  readonly settled?: readonly Amount[] | undefined;
  readonly refunded?: readonly Amount[] | undefined;
  readonly forfeited?: readonly Amount[] | undefined;
  readonly abortReason?: string | undefined;
}

// ─── Limits ──────────────────────────────────────────────────────────────

/**
 * Compute reserved for the two deferred phases.
 * A transfer-call must prepay strictly more than their sum.
 */
export interface ComputeLimits {
  readonly computeForTransferCall: bigint;
  readonly computeForResolve: bigint;
}

export const DEFAULT_COMPUTE_FOR_RESOLVE = 5_000_000_000_000n;

export const DEFAULT_COMPUTE_LIMITS: ComputeLimits = {
  computeForTransferCall: 25_000_000_000_000n + DEFAULT_COMPUTE_FOR_RESOLVE,
  computeForResolve: DEFAULT_COMPUTE_FOR_RESOLVE,
};

// ─── Error Types ─────────────────────────────────────────────────────────

export type SettlementErrorCode =
  | "PRECHECK_FAILED"
  | "UNAUTHORIZED"
  | "INVALID_ARGUMENT"
  | "UNKNOWN_SETTLEMENT"
  | "INVALID_STATE";

export class SettlementError extends Error {
  public readonly code: SettlementErrorCode;
  public readonly settlementId: string | undefined;

  constructor(code: SettlementErrorCode, message: string, settlementId?: string) {
    super(message);
    this.name = "SettlementError";
    this.code = code;
    this.settlementId = settlementId;
  }
}
