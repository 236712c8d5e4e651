/**
 * @multiledger/ledger — Token registry.
 *
 * Allocates token ids, records the owner-of-record and optional metadata,
 * and keeps the per-token approval id counter.
 *
 * Rules:
 * - Token ids come from a u64 counter starting at 1 and are never reused
 * - Tokens are never destroyed
 * - Metadata is required iff the metadata extension is enabled
 */

import type { Amount, PrincipalId, Token, TokenId, TokenMetadata } from "@multiledger/types";
import { isTokenMetadata } from "@multiledger/types";
import { LEDGER_EVENTS } from "@multiledger/event-store";
import { assertAmount, formatAmount, parseCounter, U64_MAX } from "./amount-math.js";
import type { BalanceLedger } from "./balance-ledger.js";
import type { LedgerEventBuffer } from "./events.js";
import type { PaymentCollaborator } from "./payments.js";
import type { WritableKeyValueStore } from "./storage.js";
import { storageKeys } from "./storage.js";
import type { LedgerExtensions, MintRequest, MintResult } from "./types.js";
import { LedgerError } from "./types.js";

export interface TokenRegistryDeps {
  readonly store: WritableKeyValueStore;
  readonly ledger: BalanceLedger;
  readonly extensions: LedgerExtensions;
  readonly events: LedgerEventBuffer;
  readonly payments?: PaymentCollaborator | undefined;
}

export class TokenRegistry {
  private readonly _deps: TokenRegistryDeps;

  constructor(deps: TokenRegistryDeps) {
    this._deps = deps;
  }

  // ─── Mint ────────────────────────────────────────────────────────────

  /**
   * Create a token owned by `ownerId` holding `amount`.
   *
   * With a refund recipient, the storage this call adds is charged
   * against `attachedPayment` and the excess is quoted as a payout.
   */
  mint(request: MintRequest, attachedPayment: Amount = 0n): MintResult {
    const { store, ledger, extensions, events } = this._deps;
    assertAmount(request.amount);

    const initialUsage = store.storageUsage();
    const metadata = this._checkMetadata(request.metadata);
    const tokenId = this._allocateTokenId();

    store.set(storageKeys.owner(tokenId), request.ownerId);
    if (metadata !== undefined) {
      store.set(storageKeys.metadata(tokenId), JSON.stringify(metadata));
    }
    if (extensions.approvals) {
      store.set(storageKeys.nextApprovalId(tokenId), "0");
    }
    if (extensions.enumeration) {
      store.set(storageKeys.ownerToken(request.ownerId, tokenId), "1");
    }

    ledger.initializeSupply(tokenId);
    ledger.register(tokenId, request.ownerId);
    ledger.deposit(tokenId, request.ownerId, request.amount);

    events.record(LEDGER_EVENTS.TOKEN_MINTED, {
      ownerId: request.ownerId,
      tokenIds: [tokenId],
      amounts: [formatAmount(request.amount)],
      memo: request.memo,
    });

    if (request.refundRecipient === undefined) {
      return { tokenId };
    }

    const payments = this._deps.payments;
    if (payments === undefined) {
      throw new LedgerError("INVALID_ARGUMENT", "No payment collaborator is configured for storage refunds");
    }
    const payout = payments.refundExcess({
      bytesUsed: store.storageUsage() - initialUsage,
      attachedPayment,
      recipientId: request.refundRecipient,
    });
    return { tokenId, payout };
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  exists(tokenId: TokenId): boolean {
    return this._deps.store.has(storageKeys.owner(tokenId));
  }

  /**
   * Owner-of-record. Throws NOT_FOUND for an unknown token.
   */
  ownerOf(tokenId: TokenId): PrincipalId {
    const owner = this._deps.store.get(storageKeys.owner(tokenId));
    if (owner === undefined) {
      throw new LedgerError("NOT_FOUND", `Token ${tokenId} not found`);
    }
    return owner;
  }

  getToken(tokenId: TokenId): Token | undefined {
    const { store, ledger, extensions } = this._deps;
    const ownerId = store.get(storageKeys.owner(tokenId));
    if (ownerId === undefined) {
      return undefined;
    }

    const nextApprovalId = store.get(storageKeys.nextApprovalId(tokenId));
    return {
      tokenId,
      ownerId,
      supply: ledger.supplyOf(tokenId) ?? 0n,
      ...(extensions.metadata ? { metadata: this._readMetadata(tokenId) } : {}),
      ...(nextApprovalId !== undefined ? { nextApprovalId: parseCounter(nextApprovalId) } : {}),
    };
  }

  /**
   * Every token id in allocation order.
   */
  tokenIds(): readonly TokenId[] {
    const prefix = storageKeys.tokenPrefix();
    return this._deps.store
      .keys(prefix)
      .filter((key) => key.endsWith("/owner"))
      .map((key) => key.slice(prefix.length, -"/owner".length))
      .sort(compareTokenIds);
  }

  /**
   * Tokens minted to `ownerId`. Requires the enumeration extension.
   */
  tokensMintedTo(ownerId: PrincipalId): readonly TokenId[] {
    if (!this._deps.extensions.enumeration) {
      throw new LedgerError("INVALID_ARGUMENT", "The enumeration extension is disabled");
    }
    const prefix = storageKeys.ownerTokensPrefix(ownerId);
    return this._deps.store
      .keys(prefix)
      .map((key) => key.slice(prefix.length))
      .sort(compareTokenIds);
  }

  // ─── Approval Counter ────────────────────────────────────────────────

  /**
   * Take the next approval id for `tokenId`.
   */
  allocateApprovalId(tokenId: TokenId): bigint {
    const { store, extensions } = this._deps;
    if (!extensions.approvals) {
      throw new LedgerError("INVALID_ARGUMENT", "The approval extension is disabled");
    }
    const raw = store.get(storageKeys.nextApprovalId(tokenId));
    if (raw === undefined) {
      throw new LedgerError("NOT_FOUND", `Token ${tokenId} not found`);
    }
    const id = parseCounter(raw);
    if (id === U64_MAX) {
      throw new LedgerError("ID_SPACE_EXHAUSTED", `Approval ids exhausted for token ${tokenId}`);
    }
    store.set(storageKeys.nextApprovalId(tokenId), (id + 1n).toString());
    return id;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _allocateTokenId(): TokenId {
    const { store } = this._deps;
    const last = parseCounter(store.get(storageKeys.tokenCounter()) ?? "0");
    if (last === U64_MAX) {
      throw new LedgerError("ID_SPACE_EXHAUSTED", "Token id space exhausted");
    }
    const next = (last + 1n).toString();
    store.set(storageKeys.tokenCounter(), next);
    return next;
  }

  private _checkMetadata(metadata: TokenMetadata | undefined): TokenMetadata | undefined {
    if (!this._deps.extensions.metadata) {
      if (metadata !== undefined) {
        throw new LedgerError("INVALID_METADATA", "The metadata extension is disabled");
      }
      return undefined;
    }
    if (metadata === undefined) {
      throw new LedgerError("INVALID_METADATA", "MUST provide metadata");
    }
    if (!isTokenMetadata(metadata)) {
      throw new LedgerError("INVALID_METADATA", "Metadata fields must be known string fields");
    }
    return metadata;
  }

  private _readMetadata(tokenId: TokenId): TokenMetadata | undefined {
    const raw = this._deps.store.get(storageKeys.metadata(tokenId));
    if (raw === undefined) return undefined;
    const parsed: unknown = JSON.parse(raw);
    return isTokenMetadata(parsed) ? parsed : undefined;
  }
}

export function compareTokenIds(a: TokenId, b: TokenId): number {
  const x = BigInt(a);
  const y = BigInt(b);
  return x < y ? -1 : x > y ? 1 : 0;
}
