/**
 * @multiledger/ledger — Internal types for the multi-token engine.
 *
 * These extend the shared @multiledger/types with structures used by the
 * ledger components and the MultiToken facade.
 *
 * Rules:
 * - All types are readonly
 * - Amounts are bigint; checked arithmetic only
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type {
  Amount,
  ApprovalSet,
  PrincipalId,
  TokenId,
  TokenMetadata,
} from "@multiledger/types";

// ─── Extensions ──────────────────────────────────────────────────────────

/**
 * Optional capabilities, fixed when a ledger instance is constructed.
 */
export interface LedgerExtensions {
  /** Tokens carry metadata; mint requires it */
  readonly metadata: boolean;
  /** Approvals are tracked per token and consumed by transfers */
  readonly approvals: boolean;
  /** An owner → tokens index is kept for listing views */
  readonly enumeration: boolean;
}

export const NO_EXTENSIONS: LedgerExtensions = {
  metadata: false,
  approvals: false,
  enumeration: false,
};

// ─── Invocation ──────────────────────────────────────────────────────────

/**
 * One externally triggered call into the ledger.
 * Everything it writes commits together, or not at all.
 */
export interface Invocation {
  readonly caller: PrincipalId;
  /** Nominal payment attached to the call. Default: 0 */
  readonly attachedPayment?: Amount | undefined;
  /** Compute budget the caller prepaid. Default: 0 */
  readonly prepaidCompute?: bigint | undefined;
}

// ─── Requests ────────────────────────────────────────────────────────────

export interface MintRequest {
  readonly ownerId: PrincipalId;
  readonly amount: Amount;
  readonly metadata?: TokenMetadata | undefined;
  /** Receives the attached payment left after storage costs */
  readonly refundRecipient?: PrincipalId | undefined;
  readonly memo?: string | undefined;
}

export interface TransferRequest {
  readonly receiverId: PrincipalId;
  readonly tokenId: TokenId;
  readonly amount: Amount;
  readonly approvalId?: bigint | undefined;
  readonly memo?: string | undefined;
}

export interface BatchTransferRequest {
  readonly receiverId: PrincipalId;
  readonly tokenIds: readonly TokenId[];
  readonly amounts: readonly Amount[];
  /** Per-leg approval ids; same length as tokenIds when given */
  readonly approvalIds?: readonly (bigint | undefined)[] | undefined;
  readonly memo?: string | undefined;
}

export interface ApproveRequest {
  readonly tokenId: TokenId;
  readonly spenderId: PrincipalId;
  readonly ceiling: Amount;
}

export interface RefundRequest {
  readonly receiverId: PrincipalId;
  readonly originalOwnerIds: readonly PrincipalId[];
  readonly tokenIds: readonly TokenId[];
  readonly unused: readonly Amount[];
}

// ─── Results ─────────────────────────────────────────────────────────────

/**
 * Result of moving one token leg.
 */
export interface TransferLeg {
  readonly tokenId: TokenId;
  /** Whose balance was debited */
  readonly previousOwnerId: PrincipalId;
  readonly amount: Amount;
  /** Approvals the transfer cleared from the token */
  readonly removedApprovals: ApprovalSet;
}

export interface RefundResult {
  readonly tokenId: TokenId;
  /** Moved back to the original owner */
  readonly refunded: Amount;
  /** Burned because the original owner had no balance entry */
  readonly forfeited: Amount;
}

/**
 * A payment to hand back to the caller, executed after the invocation commits.
 */
export interface Payout {
  readonly recipientId: PrincipalId;
  readonly amount: Amount;
}

export interface MintResult {
  readonly tokenId: TokenId;
  readonly payout?: Payout | undefined;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_ARGUMENT"
  | "INVALID_AMOUNT"
  | "NOT_FOUND"
  | "NOT_REGISTERED"
  | "ALREADY_REGISTERED"
  | "UNAUTHORIZED"
  | "APPROVAL_MISMATCH"
  | "OVERFLOW"
  | "UNDERFLOW"
  | "INSUFFICIENT_BALANCE"
  | "PRECHECK_FAILED"
  | "ID_SPACE_EXHAUSTED"
  | "INVALID_METADATA";

/**
 * Structured error from the ledger engine.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
