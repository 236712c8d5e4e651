/**
 * Runtime Type Guards
 *
 * Narrowing functions for ledger domain types.
 * These enable safe runtime validation at system boundaries
 * (deserialized data, receiver replies, persisted saga records).
 */

import type { TokenMetadata } from "./token.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// =============================================================================
// Identity guards
// =============================================================================

export function isPrincipalId(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

/** Token ids are canonical decimal strings without leading zeros. */
export function isTokenId(value: unknown): value is string {
  return typeof value === "string" && /^[1-9]\d*$/.test(value);
}

/** A canonical unsigned integer string ("0", "42", never "042" or "-1"). */
export function isUintString(value: unknown): value is string {
  return typeof value === "string" && /^(0|[1-9]\d*)$/.test(value);
}

// =============================================================================
// Token guards
// =============================================================================

const METADATA_FIELDS = new Set<string>([
  "title",
  "description",
  "media",
  "mediaHash",
  "issuedAt",
  "expiresAt",
  "startsAt",
  "updatedAt",
  "extra",
  "reference",
  "referenceHash",
]);

/**
 * Metadata is a plain object whose known fields are strings when present.
 * Unknown fields are rejected.
 */
export function isTokenMetadata(value: unknown): value is TokenMetadata {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return false;
  for (const [key, field] of Object.entries(value)) {
    if (!METADATA_FIELDS.has(key)) return false;
    if (field !== undefined && typeof field !== "string") return false;
  }
  return true;
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["registry", "transfer", "settlement"]);

function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

/**
 * Narrow to a plain object whose fields can be inspected.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isEventMetadata(v: unknown): v is EventMetadata {
  if (!isRecord(v)) return false;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    isEventSource(v.source) &&
    (v.causationId === undefined || typeof v.causationId === "string")
  );
}

export function isDomainEvent(v: unknown): v is DomainEvent {
  if (!isRecord(v)) return false;
  return (
    typeof v.type === "string" &&
    v.type.length > 0 &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
