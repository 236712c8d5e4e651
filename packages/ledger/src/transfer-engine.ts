/**
 * @multiledger/ledger — Transfer engine.
 *
 * Validates and executes transfers against the BalanceLedger, consuming
 * approvals from the ApprovalStore.
 *
 * Every transfer attempt clears ALL approvals recorded for its token,
 * not only the one it used. Callers that must keep approvals across a
 * failed settlement have the removed set in the returned leg.
 */

import type { Amount, ApprovalSet, PrincipalId, TokenId } from "@multiledger/types";
import { LEDGER_EVENTS } from "@multiledger/event-store";
import { assertAmount, formatAmount, minAmount } from "./amount-math.js";
import type { ApprovalStore } from "./approval-store.js";
import type { BalanceLedger } from "./balance-ledger.js";
import type { LedgerEventBuffer } from "./events.js";
import type { TokenRegistry } from "./token-registry.js";
import type { RefundResult, TransferLeg } from "./types.js";
import { LedgerError } from "./types.js";

export interface TransferEngineDeps {
  readonly ledger: BalanceLedger;
  readonly registry: TokenRegistry;
  /** Absent when the approval extension is disabled */
  readonly approvals?: ApprovalStore | undefined;
  readonly events: LedgerEventBuffer;
}

const NO_APPROVALS: ApprovalSet = new Map();

export class TransferEngine {
  private readonly _deps: TransferEngineDeps;

  constructor(deps: TransferEngineDeps) {
    this._deps = deps;
  }

  /**
   * Move `amount` of `tokenId` to `receiverId`.
   *
   * The debited balance is resolved as follows:
   * 1. The owner-of-record moving its own funds
   * 2. A registered holder moving its own funds (no approval id given)
   * 3. A delegated spender moving the owner-of-record's funds, within the
   *    ceiling of an approval that matches `approvalId` when one is given
   */
  transferOne(
    senderId: PrincipalId,
    receiverId: PrincipalId,
    tokenId: TokenId,
    amount: Amount,
    approvalId?: bigint,
    memo?: string,
  ): TransferLeg {
    const { ledger, registry, approvals, events } = this._deps;

    assertAmount(amount);
    if (senderId === receiverId) {
      throw new LedgerError("INVALID_ARGUMENT", "Sender and receiver must differ");
    }
    if (amount === 0n) {
      throw new LedgerError("INVALID_ARGUMENT", "Transfer amount must be positive");
    }
    if (!registry.exists(tokenId)) {
      throw new LedgerError("NOT_FOUND", `Token ${tokenId} not found`);
    }

    const removedApprovals = approvals?.takeAll(tokenId) ?? NO_APPROVALS;
    const ownerOfRecord = registry.ownerOf(tokenId);

    let ownerId: PrincipalId;
    let authorizedId: PrincipalId | undefined;
    if (senderId === ownerOfRecord) {
      ownerId = senderId;
    } else if (approvalId === undefined && ledger.isRegistered(tokenId, senderId)) {
      ownerId = senderId;
    } else {
      const approval = removedApprovals.get(senderId);
      if (approval === undefined) {
        throw new LedgerError("UNAUTHORIZED", `Sender ${senderId} is not approved for token ${tokenId}`);
      }
      if (approvalId !== undefined && approval.approvalId !== approvalId) {
        throw new LedgerError(
          "APPROVAL_MISMATCH",
          `Approval id ${approvalId.toString()} does not match recorded id ${approval.approvalId.toString()}`,
        );
      }
      if (amount > approval.ceiling) {
        throw new LedgerError(
          "UNAUTHORIZED",
          `Amount ${amount.toString()} exceeds the approved ceiling ${approval.ceiling.toString()}`,
        );
      }
      ownerId = ownerOfRecord;
      authorizedId = senderId;
    }

    if (ownerId === receiverId) {
      throw new LedgerError("INVALID_ARGUMENT", "Owner and receiver must differ");
    }

    ledger.withdraw(tokenId, ownerId, amount);
    ledger.deposit(tokenId, receiverId, amount);

    events.record(LEDGER_EVENTS.TRANSFER, {
      oldOwnerId: ownerId,
      newOwnerId: receiverId,
      tokenIds: [tokenId],
      amounts: [formatAmount(amount)],
      authorizedId,
      memo,
    });

    return { tokenId, previousOwnerId: ownerId, amount, removedApprovals };
  }

  /**
   * Move several tokens to one receiver. Any failing leg fails the batch;
   * the invocation it runs in then commits nothing.
   */
  transferBatch(
    senderId: PrincipalId,
    receiverId: PrincipalId,
    tokenIds: readonly TokenId[],
    amounts: readonly Amount[],
    approvalIds?: readonly (bigint | undefined)[],
    memo?: string,
  ): readonly TransferLeg[] {
    if (tokenIds.length === 0 || tokenIds.length !== amounts.length) {
      throw new LedgerError(
        "INVALID_ARGUMENT",
        `Expected equal, non-empty token and amount lists, got ${tokenIds.length} and ${amounts.length}`,
      );
    }
    if (approvalIds !== undefined && approvalIds.length !== tokenIds.length) {
      throw new LedgerError(
        "INVALID_ARGUMENT",
        `Expected ${tokenIds.length} approval ids, got ${approvalIds.length}`,
      );
    }

    return tokenIds.map((tokenId, i) =>
      this.transferOne(senderId, receiverId, tokenId, amounts[i] ?? 0n, approvalIds?.[i], memo),
    );
  }

  /**
   * Return up to `unused` from `receiverId` to `originalOwnerId`.
   *
   * Bounded by what the receiver still holds. When the original owner has
   * no balance entry, the refund is withdrawn and burned instead.
   */
  refund(
    receiverId: PrincipalId,
    originalOwnerId: PrincipalId,
    tokenId: TokenId,
    unused: Amount,
  ): RefundResult {
    const { ledger, events } = this._deps;
    assertAmount(unused);

    const held = ledger.isRegistered(tokenId, receiverId) ? ledger.balanceOf(tokenId, receiverId) : 0n;
    const amount = minAmount(held, unused);
    if (amount === 0n) {
      return { tokenId, refunded: 0n, forfeited: 0n };
    }

    ledger.withdraw(tokenId, receiverId, amount);

    if (!ledger.isRegistered(tokenId, originalOwnerId)) {
      events.record(LEDGER_EVENTS.REFUND_FORFEITED, {
        tokenId,
        receiverId,
        originalOwnerId,
        amount: formatAmount(amount),
      });
      return { tokenId, refunded: 0n, forfeited: amount };
    }

    ledger.deposit(tokenId, originalOwnerId, amount);
    events.record(LEDGER_EVENTS.TRANSFER, {
      oldOwnerId: receiverId,
      newOwnerId: originalOwnerId,
      tokenIds: [tokenId],
      amounts: [formatAmount(amount)],
      memo: "refund",
    });
    return { tokenId, refunded: amount, forfeited: 0n };
  }
}
