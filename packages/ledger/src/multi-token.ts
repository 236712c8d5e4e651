/**
 * @multiledger/ledger — MultiToken facade.
 *
 * Owns the committed store and the event log, and runs every mutating
 * operation as an invocation:
 * - Writes go to a staged overlay of the committed store
 * - Events go to a per-invocation buffer
 * - Both commit only if the operation returns; a throw persists nothing
 *
 * API surface:
 * - mint() / register() / approve() / revoke()
 * - transfer() / batchTransfer()
 * - settleRefunds() — callable only by the ledger's own identity
 * - balanceOf() / batchBalanceOf() / supply() / batchSupply() / token() / tokens()
 * - hasSettlement()
 */

import { randomUUID } from "node:crypto";
import type { Amount, Approval, PrincipalId, Token, TokenId } from "@multiledger/types";
import type { EventStore } from "@multiledger/event-store";
import { InMemoryEventStore, LEDGER_EVENTS } from "@multiledger/event-store";
import { KeyValueApprovalStore } from "./approval-store.js";
import { BalanceLedger } from "./balance-ledger.js";
import { LedgerEventBuffer } from "./events.js";
import type { PaymentCollaborator } from "./payments.js";
import type { KeyValueStore } from "./storage.js";
import { InMemoryKeyValueStore, StagedKeyValueStore, storageKeys } from "./storage.js";
import { TokenRegistry } from "./token-registry.js";
import { TransferEngine } from "./transfer-engine.js";
import type {
  ApproveRequest,
  BatchTransferRequest,
  Invocation,
  LedgerExtensions,
  MintRequest,
  RefundRequest,
  RefundResult,
  TransferLeg,
  TransferRequest,
} from "./types.js";
import { LedgerError, NO_EXTENSIONS } from "./types.js";

export interface MultiTokenOptions {
  /** The ledger's own identity; the only caller allowed to settle refunds */
  readonly accountId: PrincipalId;
  /** Principal allowed to mint. Default: accountId */
  readonly adminId?: PrincipalId | undefined;
  readonly extensions?: Partial<LedgerExtensions> | undefined;
  /** Committed state. Default: a fresh in-memory store */
  readonly store?: KeyValueStore | undefined;
  /** Where committed events are appended. Default: in-memory */
  readonly eventStore?: EventStore | undefined;
  readonly eventStream?: string | undefined;
  readonly payments?: PaymentCollaborator | undefined;
  /** Minimum attached payment for transfers. Default: 1 */
  readonly paymentFloor?: Amount | undefined;
}

/**
 * Components bound to one invocation's staged store.
 */
export interface LedgerScope {
  readonly invocation: Invocation;
  readonly store: StagedKeyValueStore;
  readonly ledger: BalanceLedger;
  readonly registry: TokenRegistry;
  readonly approvals: KeyValueApprovalStore | undefined;
  readonly engine: TransferEngine;
  readonly events: LedgerEventBuffer;
}

export class MultiToken {
  private readonly _accountId: PrincipalId;
  private readonly _adminId: PrincipalId;
  private readonly _extensions: LedgerExtensions;
  private readonly _store: KeyValueStore;
  private readonly _eventStore: EventStore;
  private readonly _eventStream: string;
  private readonly _payments: PaymentCollaborator | undefined;
  private readonly _paymentFloor: Amount;

  constructor(options: MultiTokenOptions) {
    this._accountId = options.accountId;
    this._adminId = options.adminId ?? options.accountId;
    this._extensions = { ...NO_EXTENSIONS, ...options.extensions };
    this._store = options.store ?? new InMemoryKeyValueStore();
    this._eventStore = options.eventStore ?? new InMemoryEventStore();
    this._eventStream = options.eventStream ?? "ledger";
    this._payments = options.payments;
    this._paymentFloor = options.paymentFloor ?? 1n;
  }

  // ─── Invocation ──────────────────────────────────────────────────────

  /**
   * Run `action` as one all-or-nothing invocation.
   */
  invoke<T>(invocation: Invocation, action: (scope: LedgerScope) => T): T {
    const scope = this._scope(invocation);
    const result = action(scope);

    if (scope.events.length > 0) {
      this._eventStore.append(this._eventStream, scope.events.events);
    }
    scope.store.commit();
    return result;
  }

  /**
   * Reject the invocation unless it carries the minimum payment.
   */
  assertPaymentFloor(invocation: Invocation): void {
    const attached = invocation.attachedPayment ?? 0n;
    if (attached < this._paymentFloor) {
      throw new LedgerError(
        "PRECHECK_FAILED",
        `Requires attached payment of at least ${this._paymentFloor.toString()}, got ${attached.toString()}`,
      );
    }
  }

  // ─── Registry ────────────────────────────────────────────────────────

  mint(invocation: Invocation, request: MintRequest): Token {
    this._assertCaller(invocation, this._adminId, "mint");

    const { token, payout } = this.invoke(invocation, ({ registry }) => {
      const result = registry.mint(request, invocation.attachedPayment ?? 0n);
      const minted = registry.getToken(result.tokenId);
      if (minted === undefined) {
        throw new LedgerError("NOT_FOUND", `Token ${result.tokenId} not found after mint`);
      }
      return { token: minted, payout: result.payout };
    });

    if (payout !== undefined && this._payments !== undefined) {
      this._payments.disburse(payout);
    }
    return token;
  }

  /**
   * Create a zero balance entry for `accountId` (default: the caller).
   */
  register(invocation: Invocation, tokenId: TokenId, accountId: PrincipalId = invocation.caller): void {
    this.invoke(invocation, ({ registry, ledger, events }) => {
      if (!registry.exists(tokenId)) {
        throw new LedgerError("NOT_FOUND", `Token ${tokenId} not found`);
      }
      ledger.register(tokenId, accountId);
      events.record(LEDGER_EVENTS.ACCOUNT_REGISTERED, { tokenId, accountId });
    });
  }

  // ─── Approvals ───────────────────────────────────────────────────────

  approve(invocation: Invocation, request: ApproveRequest): Approval {
    this.assertPaymentFloor(invocation);
    return this.invoke(invocation, ({ registry, approvals }) => {
      this._assertCaller(invocation, registry.ownerOf(request.tokenId), "approve");
      return this._requireApprovals(approvals).grant(
        request.tokenId,
        request.spenderId,
        request.ceiling,
      );
    });
  }

  revoke(invocation: Invocation, tokenId: TokenId, spenderId: PrincipalId): boolean {
    this.assertPaymentFloor(invocation);
    return this.invoke(invocation, ({ registry, approvals }) => {
      this._assertCaller(invocation, registry.ownerOf(tokenId), "revoke");
      return this._requireApprovals(approvals).revoke(tokenId, spenderId);
    });
  }

  // ─── Transfers ───────────────────────────────────────────────────────

  transfer(invocation: Invocation, request: TransferRequest): TransferLeg {
    this.assertPaymentFloor(invocation);
    return this.invoke(invocation, ({ engine }) =>
      engine.transferOne(
        invocation.caller,
        request.receiverId,
        request.tokenId,
        request.amount,
        request.approvalId,
        request.memo,
      ),
    );
  }

  batchTransfer(invocation: Invocation, request: BatchTransferRequest): readonly TransferLeg[] {
    this.assertPaymentFloor(invocation);
    return this.invoke(invocation, ({ engine }) =>
      engine.transferBatch(
        invocation.caller,
        request.receiverId,
        request.tokenIds,
        request.amounts,
        request.approvalIds,
        request.memo,
      ),
    );
  }

  /**
   * Return unused amounts from a receiver to the original owners.
   * Only the ledger's own identity may call this.
   */
  settleRefunds(invocation: Invocation, request: RefundRequest): readonly RefundResult[] {
    this._assertCaller(invocation, this._accountId, "settle refunds");
    const { tokenIds, unused, originalOwnerIds } = request;
    if (tokenIds.length !== unused.length || tokenIds.length !== originalOwnerIds.length) {
      throw new LedgerError(
        "INVALID_ARGUMENT",
        `Expected equal token, owner and amount lists, got ${tokenIds.length}, ${originalOwnerIds.length} and ${unused.length}`,
      );
    }

    return this.invoke(invocation, ({ engine }) =>
      tokenIds.map((tokenId, i) =>
        engine.refund(request.receiverId, originalOwnerIds[i] ?? "", tokenId, unused[i] ?? 0n),
      ),
    );
  }

  // ─── Views ───────────────────────────────────────────────────────────

  balanceOf(accountId: PrincipalId, tokenId: TokenId): Amount {
    return this._view(({ ledger }) => ledger.balanceOf(tokenId, accountId));
  }

  batchBalanceOf(accountId: PrincipalId, tokenIds: readonly TokenId[]): readonly Amount[] {
    return this._view(({ ledger }) => tokenIds.map((tokenId) => ledger.balanceOf(tokenId, accountId)));
  }

  isRegistered(accountId: PrincipalId, tokenId: TokenId): boolean {
    return this._view(({ ledger }) => ledger.isRegistered(tokenId, accountId));
  }

  supply(tokenId: TokenId): Amount | undefined {
    return this._view(({ ledger }) => ledger.supplyOf(tokenId));
  }

  batchSupply(tokenIds: readonly TokenId[]): readonly (Amount | undefined)[] {
    return this._view(({ ledger }) => tokenIds.map((tokenId) => ledger.supplyOf(tokenId)));
  }

  /**
   * Every registered balance of a token, keyed by holder.
   */
  balances(tokenId: TokenId): ReadonlyMap<PrincipalId, Amount> {
    return this._view(({ ledger }) => {
      const result = new Map<PrincipalId, Amount>();
      for (const holder of ledger.holders(tokenId)) {
        result.set(holder, ledger.balanceOf(tokenId, holder));
      }
      return result;
    });
  }

  token(tokenId: TokenId): Token | undefined {
    return this._view((scope) => this._tokenView(scope, tokenId));
  }

  /**
   * Tokens in id order, starting at `fromIndex`.
   */
  tokens(fromIndex = 0, limit?: number): readonly Token[] {
    return this._view((scope) => {
      const ids = scope.registry.tokenIds();
      const end = limit === undefined ? ids.length : fromIndex + limit;
      return ids.slice(fromIndex, end).flatMap((id) => {
        const token = this._tokenView(scope, id);
        return token === undefined ? [] : [token];
      });
    });
  }

  tokensMintedTo(ownerId: PrincipalId): readonly TokenId[] {
    return this._view(({ registry }) => registry.tokensMintedTo(ownerId));
  }

  approval(tokenId: TokenId, spenderId: PrincipalId): Approval | undefined {
    return this._view(({ approvals }) => approvals?.get(tokenId, spenderId));
  }

  /**
   * Whether the transfer of a transfer-call committed.
   */
  hasSettlement(settlementId: string): boolean {
    return this._view(({ store }) => store.has(storageKeys.settlement(settlementId)));
  }

  // ─── Accessors ───────────────────────────────────────────────────────

  get accountId(): PrincipalId {
    return this._accountId;
  }

  get adminId(): PrincipalId {
    return this._adminId;
  }

  get extensions(): LedgerExtensions {
    return this._extensions;
  }

  get eventStore(): EventStore {
    return this._eventStore;
  }

  get eventStream(): string {
    return this._eventStream;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _scope(invocation: Invocation): LedgerScope {
    const store = new StagedKeyValueStore(this._store);
    const events = new LedgerEventBuffer({
      actor: invocation.caller,
      correlationId: randomUUID(),
    });
    const ledger = new BalanceLedger(store);
    const registry = new TokenRegistry({
      store,
      ledger,
      extensions: this._extensions,
      events,
      payments: this._payments,
    });
    const approvals = this._extensions.approvals
      ? new KeyValueApprovalStore(store, registry)
      : undefined;
    const engine = new TransferEngine({ ledger, registry, approvals, events });

    return { invocation, store, ledger, registry, approvals, engine, events };
  }

  /** Read-only work: the staged store is dropped, never committed. */
  private _view<T>(read: (scope: LedgerScope) => T): T {
    return read(this._scope({ caller: this._accountId }));
  }

  private _tokenView(scope: LedgerScope, tokenId: TokenId): Token | undefined {
    const token = scope.registry.getToken(tokenId);
    if (token === undefined || scope.approvals === undefined) {
      return token;
    }
    return { ...token, approvals: scope.approvals.list(tokenId) };
  }

  private _requireApprovals(approvals: KeyValueApprovalStore | undefined): KeyValueApprovalStore {
    if (approvals === undefined) {
      throw new LedgerError("INVALID_ARGUMENT", "The approval extension is disabled");
    }
    return approvals;
  }

  private _assertCaller(invocation: Invocation, expected: PrincipalId, action: string): void {
    if (invocation.caller !== expected) {
      throw new LedgerError(
        "UNAUTHORIZED",
        `${invocation.caller} is not allowed to ${action}; only ${expected} may`,
      );
    }
  }
}
