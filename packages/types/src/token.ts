/**
 * Token Types
 *
 * Identity and ownership primitives for the multi-token ledger.
 *
 * Rules:
 * - Amounts are unsigned 128-bit integers carried as bigint
 * - Counters (token ids, approval ids) are unsigned 64-bit, carried as bigint
 * - Token ids are decimal strings allocated by the ledger, never reused
 * - Absence of a balance entry is distinct from a zero balance
 */

/**
 * An account identity able to own balances or be called.
 */
export type PrincipalId = string;

/**
 * Identifier of one asset class within the ledger.
 * Allocated from a monotonically increasing u64 counter ("1", "2", ...).
 */
export type TokenId = string;

/**
 * Unsigned 128-bit token amount.
 */
export type Amount = bigint;

/**
 * Descriptive metadata attached to a token at mint time.
 * Required when the ledger instance enables the metadata extension.
 */
export interface TokenMetadata {
  readonly title?: string | undefined;
  readonly description?: string | undefined;
  /** URL to associated media */
  readonly media?: string | undefined;
  /** Base64-encoded sha256 of the media content */
  readonly mediaHash?: string | undefined;
  /** ISO 8601 or unix-epoch string */
  readonly issuedAt?: string | undefined;
  readonly expiresAt?: string | undefined;
  readonly startsAt?: string | undefined;
  readonly updatedAt?: string | undefined;
  /** Free-form JSON string */
  readonly extra?: string | undefined;
  /** URL to an off-ledger JSON document */
  readonly reference?: string | undefined;
  readonly referenceHash?: string | undefined;
}

/**
 * A capability letting a non-owner principal move funds on the
 * owner-of-record's behalf.
 */
export interface Approval {
  /** Monotonically increasing per token, never reused */
  readonly approvalId: bigint;

  /** Maximum amount a single transfer may move under this approval */
  readonly ceiling: Amount;
}

/**
 * All approvals recorded for one token, keyed by spender.
 */
export type ApprovalSet = ReadonlyMap<PrincipalId, Approval>;

/**
 * View of a token as returned by the ledger.
 */
export interface Token {
  readonly tokenId: TokenId;

  /** Owner-of-record (the principal the token was minted to) */
  readonly ownerId: PrincipalId;

  /** Sum of all registered balances */
  readonly supply: Amount;

  /** Present iff the metadata extension is enabled */
  readonly metadata?: TokenMetadata | undefined;

  /** Present iff the approval extension is enabled */
  readonly approvals?: ApprovalSet | undefined;

  /** Next approval id to allocate; present iff the approval extension is enabled */
  readonly nextApprovalId?: bigint | undefined;
}
