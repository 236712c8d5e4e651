/**
 * @multiledger/ledger — Per-(token, owner) balances.
 *
 * The only component that writes balances or supply. Supply is the sum
 * of all balances of a token and moves only through deposit/withdraw.
 *
 * Rules:
 * - A balance entry exists only after registration; absence is not zero
 * - Entries are never deleted
 * - Checked arithmetic: overflow and underflow throw
 */

import type { Amount, PrincipalId, TokenId } from "@multiledger/types";
import { assertAmount, checkedAdd, checkedSub, formatAmount, parseAmount } from "./amount-math.js";
import type { WritableKeyValueStore } from "./storage.js";
import { storageKeys } from "./storage.js";
import { LedgerError } from "./types.js";

export class BalanceLedger {
  private readonly _store: WritableKeyValueStore;

  constructor(store: WritableKeyValueStore) {
    this._store = store;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /**
   * Balance of `ownerId` for `tokenId`.
   * Throws NOT_REGISTERED if the owner has no entry.
   */
  balanceOf(tokenId: TokenId, ownerId: PrincipalId): Amount {
    const raw = this._store.get(storageKeys.balance(tokenId, ownerId));
    if (raw === undefined) {
      throw new LedgerError(
        "NOT_REGISTERED",
        `The account ${ownerId} is not registered for token ${tokenId}`,
      );
    }
    return parseAmount(raw);
  }

  isRegistered(tokenId: TokenId, ownerId: PrincipalId): boolean {
    return this._store.has(storageKeys.balance(tokenId, ownerId));
  }

  /**
   * Tracked supply, or undefined for an unknown token.
   */
  supplyOf(tokenId: TokenId): Amount | undefined {
    const raw = this._store.get(storageKeys.supply(tokenId));
    return raw === undefined ? undefined : parseAmount(raw);
  }

  /**
   * Principals holding an entry for `tokenId`, in key order.
   */
  holders(tokenId: TokenId): readonly PrincipalId[] {
    const prefix = storageKeys.balancePrefix(tokenId);
    return this._store.keys(prefix).map((key) => key.slice(prefix.length));
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  /**
   * Start tracking supply for a new token at zero.
   */
  initializeSupply(tokenId: TokenId): void {
    this._store.set(storageKeys.supply(tokenId), "0");
  }

  /**
   * Insert a zero balance entry.
   * Throws ALREADY_REGISTERED if one exists.
   */
  register(tokenId: TokenId, ownerId: PrincipalId): void {
    if (this.isRegistered(tokenId, ownerId)) {
      throw new LedgerError(
        "ALREADY_REGISTERED",
        `The account ${ownerId} is already registered for token ${tokenId}`,
      );
    }
    this._store.set(storageKeys.balance(tokenId, ownerId), "0");
  }

  deposit(tokenId: TokenId, ownerId: PrincipalId, amount: Amount): void {
    assertAmount(amount);
    const balance = checkedAdd(this.balanceOf(tokenId, ownerId), amount, "Balance");
    const supply = checkedAdd(this._supply(tokenId), amount, "Total supply");

    this._store.set(storageKeys.balance(tokenId, ownerId), formatAmount(balance));
    this._store.set(storageKeys.supply(tokenId), formatAmount(supply));
  }

  withdraw(tokenId: TokenId, ownerId: PrincipalId, amount: Amount): void {
    assertAmount(amount);
    const current = this.balanceOf(tokenId, ownerId);
    if (amount > current) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `The account ${ownerId} doesn't have enough balance of token ${tokenId}: has ${current.toString()}, needs ${amount.toString()}`,
      );
    }
    const supply = checkedSub(this._supply(tokenId), amount, "Total supply");

    this._store.set(storageKeys.balance(tokenId, ownerId), formatAmount(current - amount));
    this._store.set(storageKeys.supply(tokenId), formatAmount(supply));
  }

  private _supply(tokenId: TokenId): Amount {
    const supply = this.supplyOf(tokenId);
    if (supply === undefined) {
      throw new LedgerError("NOT_FOUND", `Token ${tokenId} has no supply record`);
    }
    return supply;
  }
}
