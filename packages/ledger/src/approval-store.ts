/**
 * @multiledger/ledger — Approval storage.
 *
 * The ledger only consumes approvals: a transfer removes every approval
 * recorded for its token. Granting and revoking belong to the approval
 * collaborator; `KeyValueApprovalStore` is the in-process one.
 */

import type { Amount, Approval, ApprovalSet, PrincipalId, TokenId } from "@multiledger/types";
import { isUintString } from "@multiledger/types";
import { assertAmount, parseAmount, parseCounter } from "./amount-math.js";
import type { WritableKeyValueStore } from "./storage.js";
import { storageKeys } from "./storage.js";
import type { TokenRegistry } from "./token-registry.js";
import { LedgerError } from "./types.js";

export interface ApprovalStore {
  /** Remove and return every approval for the token. */
  takeAll(tokenId: TokenId): ApprovalSet;

  get(tokenId: TokenId, spenderId: PrincipalId): Approval | undefined;
}

export class KeyValueApprovalStore implements ApprovalStore {
  private readonly _store: WritableKeyValueStore;
  private readonly _registry: TokenRegistry;

  constructor(store: WritableKeyValueStore, registry: TokenRegistry) {
    this._store = store;
    this._registry = registry;
  }

  takeAll(tokenId: TokenId): ApprovalSet {
    const approvals = this.list(tokenId);
    for (const spenderId of approvals.keys()) {
      this._store.delete(storageKeys.approval(tokenId, spenderId));
    }
    return approvals;
  }

  get(tokenId: TokenId, spenderId: PrincipalId): Approval | undefined {
    const raw = this._store.get(storageKeys.approval(tokenId, spenderId));
    return raw === undefined ? undefined : decodeApproval(raw);
  }

  list(tokenId: TokenId): ApprovalSet {
    const prefix = storageKeys.approvalPrefix(tokenId);
    const approvals = new Map<PrincipalId, Approval>();
    for (const key of this._store.keys(prefix)) {
      const raw = this._store.get(key);
      if (raw !== undefined) {
        approvals.set(key.slice(prefix.length), decodeApproval(raw));
      }
    }
    return approvals;
  }

  /**
   * Approve `spenderId` to move up to `ceiling` per transfer.
   * Replaces any existing approval for the spender with a fresh id.
   */
  grant(tokenId: TokenId, spenderId: PrincipalId, ceiling: Amount): Approval {
    assertAmount(ceiling, "ceiling");
    const approval: Approval = {
      approvalId: this._registry.allocateApprovalId(tokenId),
      ceiling,
    };
    this._store.set(storageKeys.approval(tokenId, spenderId), encodeApproval(approval));
    return approval;
  }

  revoke(tokenId: TokenId, spenderId: PrincipalId): boolean {
    const key = storageKeys.approval(tokenId, spenderId);
    if (!this._store.has(key)) {
      return false;
    }
    this._store.delete(key);
    return true;
  }
}

function encodeApproval(approval: Approval): string {
  return JSON.stringify({
    approvalId: approval.approvalId.toString(),
    ceiling: approval.ceiling.toString(),
  });
}

function decodeApproval(raw: string): Approval {
  const parsed: unknown = JSON.parse(raw);
  if (parsed === null || typeof parsed !== "object") {
    throw new LedgerError("INVALID_ARGUMENT", `Malformed approval record: ${raw}`);
  }
  const approvalId: unknown = Reflect.get(parsed, "approvalId");
  const ceiling: unknown = Reflect.get(parsed, "ceiling");
  if (!isUintString(approvalId) || !isUintString(ceiling)) {
    throw new LedgerError("INVALID_ARGUMENT", `Malformed approval record: ${raw}`);
  }
  return { approvalId: parseCounter(approvalId), ceiling: parseAmount(ceiling) };
}
