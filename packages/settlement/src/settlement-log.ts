/**
 * @multiledger/settlement — Durable saga log.
 *
 * Each settlement is its own stream, `settlement-<id>`:
 *
 *   v1 settlement.started
 *   v2 settlement.notified | settlement.aborted
 *   v3 settlement.resolved
 *
 * Appends carry the expected version, so a phase can be recorded once.
 * State is folded back from the stream, which is what `recover()` reads
 * after a restart.
 */

import type { Amount, ApprovalSet, PrincipalId } from "@multiledger/types";
import type { ApprovalRecord, EventContext, EventStore, StoredEvent } from "@multiledger/event-store";
import {
  createLedgerEvent,
  LEDGER_EVENTS,
  SettlementAbortedSchema,
  SettlementNotifiedSchema,
  SettlementResolvedSchema,
  SettlementStartedSchema,
} from "@multiledger/event-store";
import { formatAmount, parseAmount, parseCounter } from "@multiledger/ledger";
import type { NotificationOutcome, SettlementRecord, SettlementState } from "./types.js";
import { SettlementError } from "./types.js";

export const SETTLEMENT_STREAM_PREFIX = "settlement-";

export interface StartedEntry {
  readonly settlementId: string;
  readonly senderId: PrincipalId;
  readonly receiverId: PrincipalId;
  readonly previousOwnerIds: readonly PrincipalId[];
  readonly tokenIds: readonly string[];
  readonly amounts: readonly Amount[];
  readonly message: string;
  readonly priorApprovals: readonly ApprovalSet[];
}

export interface ResolvedEntry {
  readonly settled: readonly Amount[];
  readonly refunded: readonly Amount[];
  readonly forfeited: readonly Amount[];
}

export class SettlementLog {
  private readonly _store: EventStore;

  constructor(store: EventStore) {
    this._store = store;
  }

  get store(): EventStore {
    return this._store;
  }

  streamId(settlementId: string): string {
    return `${SETTLEMENT_STREAM_PREFIX}${settlementId}`;
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  recordStarted(entry: StartedEntry, context: EventContext): void {
    this._store.append(
      this.streamId(entry.settlementId),
      [createLedgerEvent(LEDGER_EVENTS.SETTLEMENT_STARTED, startedPayload(entry), context)],
      { expectedVersion: "no_stream" },
    );
  }

  /**
   * Record a saga whose transfer step never committed.
   */
  recordAborted(entry: StartedEntry, reason: string, context: EventContext): void {
    this._store.append(
      this.streamId(entry.settlementId),
      [
        createLedgerEvent(LEDGER_EVENTS.SETTLEMENT_STARTED, startedPayload(entry), context),
        createLedgerEvent(
          LEDGER_EVENTS.SETTLEMENT_ABORTED,
          { settlementId: entry.settlementId, reason },
          context,
        ),
      ],
      { expectedVersion: "no_stream" },
    );
  }

  /**
   * Abort a saga whose `started` entry is already written but whose
   * transfer did not commit.
   */
  recordAbortedAfterStart(settlementId: string, reason: string, context: EventContext): void {
    this._store.append(
      this.streamId(settlementId),
      [createLedgerEvent(LEDGER_EVENTS.SETTLEMENT_ABORTED, { settlementId, reason }, context)],
      { expectedVersion: 1 },
    );
  }

  recordNotified(settlementId: string, outcome: NotificationOutcome, context: EventContext): void {
    this._store.append(
      this.streamId(settlementId),
      [createLedgerEvent(LEDGER_EVENTS.SETTLEMENT_NOTIFIED, { settlementId, outcome }, context)],
      { expectedVersion: 1 },
    );
  }

  recordResolved(settlementId: string, entry: ResolvedEntry, context: EventContext): void {
    this._store.append(
      this.streamId(settlementId),
      [
        createLedgerEvent(
          LEDGER_EVENTS.SETTLEMENT_RESOLVED,
          {
            settlementId,
            settled: entry.settled.map(formatAmount),
            refunded: entry.refunded.map(formatAmount),
            forfeited: entry.forfeited.map(formatAmount),
          },
          context,
        ),
      ],
      { expectedVersion: 2 },
    );
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  get(settlementId: string): SettlementRecord | undefined {
    const events = this._store.read(this.streamId(settlementId));
    if (events.length === 0) return undefined;
    return foldSettlement(events);
  }

  /**
   * Every settlement, in the order they started.
   */
  list(): readonly SettlementRecord[] {
    const records: SettlementRecord[] = [];
    for (const streamId of this._store.listStreams(SETTLEMENT_STREAM_PREFIX)) {
      const record = foldSettlement(this._store.read(streamId));
      if (record !== undefined) records.push(record);
    }
    return records;
  }

  /**
   * Settlements that have neither resolved nor aborted.
   */
  pending(): readonly SettlementRecord[] {
    return this.list().filter((r) => r.state === "started" || r.state === "notified");
  }
}

// =============================================================================
// Encoding
// =============================================================================

function startedPayload(entry: StartedEntry) {
  return {
    settlementId: entry.settlementId,
    senderId: entry.senderId,
    receiverId: entry.receiverId,
    previousOwnerIds: [...entry.previousOwnerIds],
    tokenIds: [...entry.tokenIds],
    amounts: entry.amounts.map(formatAmount),
    message: entry.message,
    priorApprovals: entry.priorApprovals.map(encodeApprovals),
  };
}

function encodeApprovals(set: ApprovalSet): ApprovalRecord[] {
  return [...set].map(([spenderId, approval]) => ({
    spenderId,
    approvalId: approval.approvalId.toString(),
    ceiling: formatAmount(approval.ceiling),
  }));
}

function decodeApprovals(records: readonly ApprovalRecord[]): ApprovalSet {
  return new Map(
    records.map((r) => [
      r.spenderId,
      { approvalId: parseCounter(r.approvalId), ceiling: parseAmount(r.ceiling) },
    ]),
  );
}

// =============================================================================
// Folding
// =============================================================================

type MutableRecord = {
  -readonly [K in keyof SettlementRecord]: SettlementRecord[K];
};

function corrupt(streamId: string, detail: string): SettlementError {
  return new SettlementError("INVALID_STATE", `Settlement stream ${streamId}: ${detail}`);
}

/**
 * Rebuild a settlement from its stream. Payloads are validated against
 * the catalog schemas; a stream that does not begin with `started` or that
 * skips a phase is rejected.
 */
export function foldSettlement(events: readonly StoredEvent[]): SettlementRecord | undefined {
  const [first, ...rest] = events;
  if (first === undefined) return undefined;

  if (first.event.type !== LEDGER_EVENTS.SETTLEMENT_STARTED) {
    throw corrupt(first.streamId, `expected ${LEDGER_EVENTS.SETTLEMENT_STARTED}, got ${first.event.type}`);
  }
  const started = SettlementStartedSchema.parse(first.event.payload);

  const record: MutableRecord = {
    settlementId: started.settlementId,
    state: "started",
    senderId: started.senderId,
    receiverId: started.receiverId,
    previousOwnerIds: started.previousOwnerIds,
    tokenIds: started.tokenIds,
    amounts: started.amounts.map(parseAmount),
    message: started.message,
    priorApprovals: started.priorApprovals.map(decodeApprovals),
    startedAt: first.event.metadata.timestamp,
  };

  for (const stored of rest) {
    const { type, payload } = stored.event;
    const from: SettlementState = record.state;

    if (type === LEDGER_EVENTS.SETTLEMENT_NOTIFIED && from === "started") {
      const outcome = SettlementNotifiedSchema.parse(payload).outcome;
      record.outcome =
        outcome.status === "succeeded"
          ? { status: "succeeded", value: outcome.value }
          : { status: "failed", reason: outcome.reason };
      record.state = "notified";
    } else if (type === LEDGER_EVENTS.SETTLEMENT_ABORTED && from === "started") {
      record.abortReason = SettlementAbortedSchema.parse(payload).reason;
      record.state = "aborted";
    } else if (type === LEDGER_EVENTS.SETTLEMENT_RESOLVED && from === "notified") {
      const resolved = SettlementResolvedSchema.parse(payload);
      record.settled = resolved.settled.map(parseAmount);
      record.refunded = resolved.refunded.map(parseAmount);
      record.forfeited = resolved.forfeited.map(parseAmount);
      record.state = "resolved";
    } else {
      throw corrupt(stored.streamId, `unexpected ${type} in state ${from}`);
    }
  }

  return record;
}
