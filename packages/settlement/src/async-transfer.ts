/**
 * @multiledger/settlement — AsyncTransferProtocol.
 *
 * Transfer-call in three turns:
 * 1. transferCall(): prechecks, then commits the transfer optimistically
 * 2. notification: the receiver's hook reports what it did not use
 * 3. resolution: unused amounts go back to whoever was debited
 *
 * Between turns the transferred value is visible to everyone. The saga
 * state lives in the event store, so a restarted process can finish
 * what the previous one started (see recover()).
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import type { Amount } from "@multiledger/types";
import type { EventContext } from "@multiledger/event-store";
import type { Invocation, MultiToken } from "@multiledger/ledger";
import { formatAmount, storageKeys } from "@multiledger/ledger";
import { failureReason, interpretOutcome, toRecordedOutcome } from "./outcome.js";
import { ReceiverRegistry } from "./receiver-registry.js";
import type { CallScheduler } from "./scheduler.js";
import { QueueCallScheduler } from "./scheduler.js";
import type { StartedEntry } from "./settlement-log.js";
import { SettlementLog } from "./settlement-log.js";
import type {
  BatchTransferCallRequest,
  ComputeLimits,
  NotificationOutcome,
  ResolveArgs,
  SettlementReceipt,
  SettlementRecord,
  SettlementState,
  TransferCallRequest,
  TransferNotification,
} from "./types.js";
import { DEFAULT_COMPUTE_LIMITS, SettlementError } from "./types.js";

export interface AsyncTransferProtocolOptions {
  readonly ledger: MultiToken;
  readonly receivers?: ReceiverRegistry | undefined;
  /** Default: a QueueCallScheduler the caller drains */
  readonly scheduler?: CallScheduler | undefined;
  /** Default: settlement streams in the ledger's own event store */
  readonly log?: SettlementLog | undefined;
  readonly limits?: Partial<ComputeLimits> | undefined;
  readonly logger?: Logger | undefined;
}

export class AsyncTransferProtocol {
  private readonly _ledger: MultiToken;
  private readonly _receivers: ReceiverRegistry;
  private readonly _scheduler: CallScheduler;
  private readonly _log: SettlementLog;
  private readonly _limits: ComputeLimits;
  private readonly _logger: Logger;

  constructor(options: AsyncTransferProtocolOptions) {
    this._ledger = options.ledger;
    this._receivers = options.receivers ?? new ReceiverRegistry();
    this._scheduler = options.scheduler ?? new QueueCallScheduler();
    this._log = options.log ?? new SettlementLog(options.ledger.eventStore);
    this._limits = { ...DEFAULT_COMPUTE_LIMITS, ...options.limits };
    this._logger = options.logger ?? pino({ level: "silent" });
  }

  // ─── Transfer-call ───────────────────────────────────────────────────

  transferCall(invocation: Invocation, request: TransferCallRequest): SettlementReceipt {
    return this.batchTransferCall(invocation, {
      receiverId: request.receiverId,
      tokenIds: [request.tokenId],
      amounts: [request.amount],
      approvalIds: request.approvalId !== undefined ? [request.approvalId] : undefined,
      message: request.message,
      memo: request.memo,
    });
  }

  /**
   * Optimistically transfer several tokens and schedule the notification.
   *
   * @throws LedgerError PRECHECK_FAILED when the payment floor is not met
   * @throws SettlementError PRECHECK_FAILED when too little compute is prepaid
   * @throws LedgerError from the transfer step; the saga is logged as aborted
   * @throws EventStoreError when the log cannot be written; nothing commits
   */
  batchTransferCall(invocation: Invocation, request: BatchTransferCallRequest): SettlementReceipt {
    this._precheck(invocation);

    const { receiverId, tokenIds, amounts, message } = request;
    if (tokenIds.length === 0 || tokenIds.length !== amounts.length) {
      throw new SettlementError(
        "INVALID_ARGUMENT",
        `Expected equal, non-empty token and amount lists, got ${tokenIds.length} and ${amounts.length}`,
      );
    }

    const settlementId = randomUUID();
    const context = { actor: invocation.caller, correlationId: settlementId };
    const base = {
      settlementId,
      senderId: invocation.caller,
      receiverId,
      tokenIds,
      amounts,
      message,
    };

    // `started` is appended inside the transfer's invocation, before the
    // ledger events and the state commit.
    let entry: StartedEntry;
    try {
      entry = this._ledger.invoke(invocation, ({ engine, store }) => {
        const legs = engine.transferBatch(
          invocation.caller,
          receiverId,
          tokenIds,
          amounts,
          request.approvalIds,
          request.memo,
        );
        store.set(storageKeys.settlement(settlementId), invocation.caller);
        const started: StartedEntry = {
          ...base,
          previousOwnerIds: legs.map((l) => l.previousOwnerId),
          priorApprovals: legs.map((l) => l.removedApprovals),
        };
        this._log.recordStarted(started, context);
        return started;
      });
    } catch (err) {
      this._recordAbort({ ...base, previousOwnerIds: [], priorApprovals: [] }, failureReason(err), context);
      throw err;
    }

    this._logger.info(
      { settlementId, senderId: invocation.caller, receiverId, tokenIds, amounts: amounts.map(formatAmount) },
      "Settlement started",
    );

    this._scheduler.schedule({
      label: `notify ${receiverId} (${settlementId})`,
      run: () => this._notify(settlementId),
    });

    return { settlementId, previousOwnerIds: entry.previousOwnerIds, amounts };
  }

  // ─── Resolution ──────────────────────────────────────────────────────

  /**
   * Refund what the receiver did not use and return, per token, the
   * amount that stays with the receiver.
   *
   * Only the ledger's own identity may resolve.
   */
  resolveTransfer(
    invocation: Invocation,
    args: ResolveArgs,
    outcome: NotificationOutcome,
  ): readonly Amount[] {
    if (invocation.caller !== this._ledger.accountId) {
      throw new SettlementError(
        "UNAUTHORIZED",
        `Only ${this._ledger.accountId} may resolve a transfer, not ${invocation.caller}`,
        args.settlementId,
      );
    }

    const { settlementId, receiverId, previousOwnerIds, tokenIds, amounts } = args;
    if (tokenIds.length !== amounts.length || tokenIds.length !== previousOwnerIds.length) {
      throw new SettlementError(
        "INVALID_ARGUMENT",
        `Expected equal token, owner and amount lists, got ${tokenIds.length}, ${previousOwnerIds.length} and ${amounts.length}`,
        settlementId,
      );
    }
    if (settlementId !== undefined) {
      this._require(settlementId, "notified");
    }

    const unused = interpretOutcome(outcome, amounts);
    const results = this._ledger.settleRefunds(invocation, {
      receiverId,
      originalOwnerIds: previousOwnerIds,
      tokenIds,
      unused,
    });

    const refunded = results.map((r) => r.refunded);
    const forfeited = results.map((r) => r.forfeited);
    const settled = amounts.map((amount, i) => amount - (refunded[i] ?? 0n));

    results.forEach((r, i) => {
      const wanted = unused[i] ?? 0n;
      if (r.refunded + r.forfeited < wanted) {
        this._logger.warn(
          { settlementId, tokenId: r.tokenId, receiverId, unused: formatAmount(wanted), returned: formatAmount(r.refunded + r.forfeited) },
          "Partial refund: receiver no longer holds the unused amount",
        );
      }
      if (r.forfeited > 0n) {
        this._logger.warn(
          { settlementId, tokenId: r.tokenId, originalOwnerId: previousOwnerIds[i], amount: formatAmount(r.forfeited) },
          "Refund forfeited: original owner has no balance entry",
        );
      }
    });

    if (args.priorApprovals?.some((set) => set.size > 0) === true) {
      this._logger.debug({ settlementId }, "Prior approvals are not restored");
    }

    if (settlementId !== undefined) {
      this._log.recordResolved(
        settlementId,
        { settled, refunded, forfeited },
        { actor: this._ledger.accountId, correlationId: settlementId },
      );
    }
    this._logger.info(
      { settlementId, receiverId, settled: settled.map(formatAmount), refunded: refunded.map(formatAmount) },
      "Settlement resolved",
    );

    return settled;
  }

  // ─── Recovery ────────────────────────────────────────────────────────

  /**
   * Schedule resolution of every saga left unfinished by a previous process.
   * A saga that never recorded its notification resolves as a remote failure,
   * unless its transfer never committed, in which case it is aborted.
   * Call once at startup, before any new transfer-call.
   */
  recover(): readonly string[] {
    const resumed: string[] = [];
    for (const record of this._log.pending()) {
      const { settlementId } = record;
      const context = { actor: this._ledger.accountId, correlationId: settlementId };
      if (record.state === "started") {
        if (!this._ledger.hasSettlement(settlementId)) {
          const reason = "Transfer did not commit before the process stopped";
          this._log.recordAbortedAfterStart(settlementId, reason, context);
          this._logger.warn({ settlementId, receiverId: record.receiverId, reason }, "Settlement aborted");
          continue;
        }
        this._log.recordNotified(
          settlementId,
          { status: "failed", reason: "Notification interrupted before an outcome was recorded" },
          context,
        );
      }
      this._scheduleResolution(settlementId);
      resumed.push(settlementId);
    }
    if (resumed.length > 0) {
      this._logger.info({ count: resumed.length }, "Resuming unfinished settlements");
    }
    return resumed;
  }

  // ─── Views ───────────────────────────────────────────────────────────

  settlement(settlementId: string): SettlementRecord | undefined {
    return this._log.get(settlementId);
  }

  settlements(): readonly SettlementRecord[] {
    return this._log.list();
  }

  pendingSettlements(): readonly SettlementRecord[] {
    return this._log.pending();
  }

  get receivers(): ReceiverRegistry {
    return this._receivers;
  }

  get limits(): ComputeLimits {
    return this._limits;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _precheck(invocation: Invocation): void {
    this._ledger.assertPaymentFloor(invocation);

    const required = this._limits.computeForTransferCall + this._limits.computeForResolve;
    const prepaid = invocation.prepaidCompute ?? 0n;
    if (prepaid <= required) {
      throw new SettlementError(
        "PRECHECK_FAILED",
        `More compute required: prepaid ${prepaid.toString()}, need more than ${required.toString()}`,
      );
    }
  }

  /**
   * Log a saga whose transfer did not commit. A failure to write the
   * abort is logged; the caller rethrows the transfer's own error.
   */
  private _recordAbort(entry: StartedEntry, reason: string, context: EventContext): void {
    const { settlementId, receiverId } = entry;
    try {
      if (this._log.get(settlementId) === undefined) {
        this._log.recordAborted(entry, reason, context);
      } else {
        this._log.recordAbortedAfterStart(settlementId, reason, context);
      }
      this._logger.warn({ settlementId, receiverId, reason }, "Settlement aborted");
    } catch (logErr) {
      this._logger.error(
        { settlementId, receiverId, reason, err: logErr },
        "Failed to record settlement abort",
      );
    }
  }

  private async _notify(settlementId: string): Promise<void> {
    const record = this._require(settlementId, "started");
    const notification: TransferNotification = {
      settlementId,
      senderId: record.senderId,
      previousOwnerIds: record.previousOwnerIds,
      tokenIds: record.tokenIds,
      amounts: record.amounts,
      message: record.message,
    };

    const hook = this._receivers.get(record.receiverId);
    let outcome: NotificationOutcome;
    if (hook === undefined) {
      outcome = { status: "failed", reason: `No receiver hook registered for ${record.receiverId}` };
    } else {
      try {
        const value: unknown = await hook(notification);
        outcome = { status: "succeeded", value };
      } catch (err) {
        outcome = { status: "failed", reason: failureReason(err) };
      }
    }

    this._log.recordNotified(settlementId, toRecordedOutcome(outcome), {
      actor: this._ledger.accountId,
      correlationId: settlementId,
    });
    if (outcome.status === "failed") {
      this._logger.warn({ settlementId, receiverId: record.receiverId, reason: outcome.reason }, "Receiver notification failed");
    } else {
      this._logger.info({ settlementId, receiverId: record.receiverId }, "Receiver notified");
    }

    this._scheduleResolution(settlementId);
  }

  private _scheduleResolution(settlementId: string): void {
    this._scheduler.schedule({
      label: `resolve ${settlementId}`,
      run: () => {
        this._resolveSettlement(settlementId);
      },
    });
  }

  private _resolveSettlement(settlementId: string): readonly Amount[] {
    const record = this._require(settlementId, "notified");
    return this.resolveTransfer(
      { caller: this._ledger.accountId },
      {
        settlementId,
        senderId: record.senderId,
        receiverId: record.receiverId,
        previousOwnerIds: record.previousOwnerIds,
        tokenIds: record.tokenIds,
        amounts: record.amounts,
        priorApprovals: record.priorApprovals,
      },
      record.outcome ?? { status: "failed", reason: "No outcome recorded" },
    );
  }

  private _require(settlementId: string, state: SettlementState): SettlementRecord {
    const record = this._log.get(settlementId);
    if (record === undefined) {
      throw new SettlementError("UNKNOWN_SETTLEMENT", `Settlement ${settlementId} not found`, settlementId);
    }
    if (record.state !== state) {
      throw new SettlementError(
        "INVALID_STATE",
        `Settlement ${settlementId} is ${record.state}, expected ${state}`,
        settlementId,
      );
    }
    return record;
  }
}
