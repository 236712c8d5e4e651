/**
 * @multiledger/event-store — Ledger and settlement event definitions.
 *
 * The catalog of every domain event the ledger publishes.
 *
 * Naming convention: `<subsystem>.<action>` for the multi-token events
 * and `settlement.<state>` for the saga log.
 *
 * Each event type defines:
 * - A payload shape (zod schema, the single source of truth)
 * - An inferred payload type for producers and consumers
 *
 * Amounts are decimal strings: payloads must survive a JSONL round trip.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { DomainEvent, EventSource } from "@multiledger/types";

// =============================================================================
// Event Type Constants
// =============================================================================

export const LEDGER_EVENTS = {
  // Registry
  TOKEN_MINTED: "mt.token.minted",
  ACCOUNT_REGISTERED: "mt.account.registered",

  // Transfer
  TRANSFER: "mt.transfer",
  REFUND_FORFEITED: "mt.refund.forfeited",

  // Settlement saga
  SETTLEMENT_STARTED: "settlement.started",
  SETTLEMENT_NOTIFIED: "settlement.notified",
  SETTLEMENT_RESOLVED: "settlement.resolved",
  SETTLEMENT_ABORTED: "settlement.aborted",
} as const;

export type LedgerEventType = (typeof LEDGER_EVENTS)[keyof typeof LEDGER_EVENTS];

// =============================================================================
// Payload Schemas
// =============================================================================

const uint = z.string().regex(/^(0|[1-9]\d*)$/, "expected an unsigned integer string");
const principal = z.string().min(1);

export const TokenMintedSchema = z.object({
  ownerId: principal,
  tokenIds: z.array(z.string()).min(1),
  amounts: z.array(uint).min(1),
  memo: z.string().optional(),
});

export const AccountRegisteredSchema = z.object({
  tokenId: z.string(),
  accountId: principal,
});

export const TransferSchema = z.object({
  oldOwnerId: principal,
  newOwnerId: principal,
  tokenIds: z.array(z.string()).min(1),
  amounts: z.array(uint).min(1),
  /** Present only when a delegated spender moved the owner's funds */
  authorizedId: principal.optional(),
  memo: z.string().optional(),
});

export const RefundForfeitedSchema = z.object({
  tokenId: z.string(),
  receiverId: principal,
  originalOwnerId: principal,
  amount: uint,
});

export const ApprovalRecordSchema = z.object({
  spenderId: principal,
  approvalId: uint,
  ceiling: uint,
});

export const SettlementStartedSchema = z.object({
  settlementId: z.string().min(1),
  senderId: principal,
  receiverId: principal,
  /** Empty when the transfer step failed */
  previousOwnerIds: z.array(principal),
  tokenIds: z.array(z.string()).min(1),
  amounts: z.array(uint).min(1),
  message: z.string(),
  /** Approvals cleared by the optimistic transfer, per token */
  priorApprovals: z.array(z.array(ApprovalRecordSchema)),
});

export const NotificationOutcomeSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("succeeded"), value: z.unknown() }),
  z.object({ status: z.literal("failed"), reason: z.string() }),
]);

export const SettlementNotifiedSchema = z.object({
  settlementId: z.string().min(1),
  outcome: NotificationOutcomeSchema,
});

export const SettlementResolvedSchema = z.object({
  settlementId: z.string().min(1),
  settled: z.array(uint),
  refunded: z.array(uint),
  forfeited: z.array(uint),
});

export const SettlementAbortedSchema = z.object({
  settlementId: z.string().min(1),
  reason: z.string(),
});

export type TokenMintedPayload = z.infer<typeof TokenMintedSchema>;
export type AccountRegisteredPayload = z.infer<typeof AccountRegisteredSchema>;
export type TransferPayload = z.infer<typeof TransferSchema>;
export type RefundForfeitedPayload = z.infer<typeof RefundForfeitedSchema>;
export type ApprovalRecord = z.infer<typeof ApprovalRecordSchema>;
export type SettlementStartedPayload = z.infer<typeof SettlementStartedSchema>;
export type NotificationOutcomeRecord = z.infer<typeof NotificationOutcomeSchema>;
export type SettlementNotifiedPayload = z.infer<typeof SettlementNotifiedSchema>;
export type SettlementResolvedPayload = z.infer<typeof SettlementResolvedSchema>;
export type SettlementAbortedPayload = z.infer<typeof SettlementAbortedSchema>;

// =============================================================================
// Catalog
// =============================================================================

interface EventDefinition<S extends z.ZodTypeAny> {
  readonly schema: S;
  readonly source: EventSource;
  readonly description: string;
}

export const LEDGER_EVENT_CATALOG = {
  [LEDGER_EVENTS.TOKEN_MINTED]: {
    schema: TokenMintedSchema,
    source: "registry",
    description: "A new token class was minted to its owner-of-record",
  },
  [LEDGER_EVENTS.ACCOUNT_REGISTERED]: {
    schema: AccountRegisteredSchema,
    source: "registry",
    description: "A zero balance entry was registered for a principal",
  },
  [LEDGER_EVENTS.TRANSFER]: {
    schema: TransferSchema,
    source: "transfer",
    description: "Value moved between two principals",
  },
  [LEDGER_EVENTS.REFUND_FORFEITED]: {
    schema: RefundForfeitedSchema,
    source: "transfer",
    description: "A settlement refund was burned because the original owner's entry was gone",
  },
  [LEDGER_EVENTS.SETTLEMENT_STARTED]: {
    schema: SettlementStartedSchema,
    source: "settlement",
    description: "An optimistic transfer committed and the receiver is about to be notified",
  },
  [LEDGER_EVENTS.SETTLEMENT_NOTIFIED]: {
    schema: SettlementNotifiedSchema,
    source: "settlement",
    description: "The receiver's hook finished and its outcome was recorded",
  },
  [LEDGER_EVENTS.SETTLEMENT_RESOLVED]: {
    schema: SettlementResolvedSchema,
    source: "settlement",
    description: "Unused amounts were refunded and the transfer is final",
  },
  [LEDGER_EVENTS.SETTLEMENT_ABORTED]: {
    schema: SettlementAbortedSchema,
    source: "settlement",
    description: "The saga stopped without settling",
  },
} as const satisfies Record<LedgerEventType, EventDefinition<z.ZodTypeAny>>;

export type LedgerEventPayload<T extends LedgerEventType> = z.infer<
  (typeof LEDGER_EVENT_CATALOG)[T]["schema"]
>;

export function isLedgerEventType(type: string): type is LedgerEventType {
  return Object.prototype.hasOwnProperty.call(LEDGER_EVENT_CATALOG, type);
}

/**
 * Check a payload against its catalog schema.
 */
export function validateEventPayload(type: LedgerEventType, payload: unknown): boolean {
  return LEDGER_EVENT_CATALOG[type].schema.safeParse(payload).success;
}

/**
 * Subsystem that emits a given event type.
 */
export function eventSource(type: LedgerEventType): EventSource {
  return LEDGER_EVENT_CATALOG[type].source;
}

export interface EventContext {
  readonly actor: string;
  readonly correlationId: string;
  readonly causationId?: string | undefined;
  readonly timestamp?: string | undefined;
}

/**
 * Build a DomainEvent for a catalog type, stamping metadata.
 */
export function createLedgerEvent<T extends LedgerEventType>(
  type: T,
  payload: LedgerEventPayload<T>,
  context: EventContext,
): DomainEvent {
  return {
    type,
    metadata: {
      eventId: randomUUID(),
      timestamp: context.timestamp ?? new Date().toISOString(),
      actor: context.actor,
      correlationId: context.correlationId,
      source: eventSource(type),
      ...(context.causationId !== undefined ? { causationId: context.causationId } : {}),
    },
    payload,
  };
}
