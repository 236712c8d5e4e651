/**
 * Runtime type guard tests for @multiledger/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isPrincipalId,
  isTokenId,
  isUintString,
  isRecord,
  isTokenMetadata,
  isEventMetadata,
  isDomainEvent,
} from "../src/guards.js";

// =============================================================================
// Identity guards
// =============================================================================

describe("isPrincipalId", () => {
  it("accepts a non-empty string", () => {
    expect(isPrincipalId("alice.test")).toBe(true);
  });

  it("rejects empty string and non-strings", () => {
    expect(isPrincipalId("")).toBe(false);
    expect(isPrincipalId(42)).toBe(false);
    expect(isPrincipalId(null)).toBe(false);
  });
});

describe("isTokenId", () => {
  it("accepts canonical positive decimal strings", () => {
    expect(isTokenId("1")).toBe(true);
    expect(isTokenId("18446744073709551615")).toBe(true);
  });

  it("rejects zero, leading zeros and non-digits", () => {
    expect(isTokenId("0")).toBe(false);
    expect(isTokenId("01")).toBe(false);
    expect(isTokenId("abc")).toBe(false);
    expect(isTokenId(1)).toBe(false);
  });
});

describe("isRecord", () => {
  it("accepts plain objects only", () => {
    expect(isRecord({ a: 1 })).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord("x")).toBe(false);
  });
});

describe("isUintString", () => {
  it("accepts zero and canonical integers", () => {
    expect(isUintString("0")).toBe(true);
    expect(isUintString("340282366920938463463374607431768211455")).toBe(true);
  });

  it("rejects negatives, decimals and padded values", () => {
    expect(isUintString("-1")).toBe(false);
    expect(isUintString("1.5")).toBe(false);
    expect(isUintString("007")).toBe(false);
    expect(isUintString("")).toBe(false);
  });
});

// =============================================================================
// Token guards
// =============================================================================

describe("isTokenMetadata", () => {
  it("accepts an empty object", () => {
    expect(isTokenMetadata({})).toBe(true);
  });

  it("accepts known string fields", () => {
    expect(isTokenMetadata({ title: "ABC", description: "Alphabet token", issuedAt: "123456" })).toBe(true);
  });

  it("rejects unknown fields", () => {
    expect(isTokenMetadata({ title: "ABC", color: "red" })).toBe(false);
  });

  it("rejects non-string field values", () => {
    expect(isTokenMetadata({ title: 7 })).toBe(false);
  });

  it("rejects arrays and null", () => {
    expect(isTokenMetadata([])).toBe(false);
    expect(isTokenMetadata(null)).toBe(false);
  });
});

// =============================================================================
// Event guards
// =============================================================================

const METADATA = {
  eventId: "evt-1",
  timestamp: "2024-01-15T10:00:00.000Z",
  actor: "alice",
  correlationId: "corr-1",
  source: "transfer",
};

describe("isEventMetadata", () => {
  it("accepts valid metadata", () => {
    expect(isEventMetadata(METADATA)).toBe(true);
  });

  it("accepts an optional causationId", () => {
    expect(isEventMetadata({ ...METADATA, causationId: "evt-0" })).toBe(true);
  });

  it("rejects an unknown source", () => {
    expect(isEventMetadata({ ...METADATA, source: "vault" })).toBe(false);
  });

  it("rejects a missing correlationId", () => {
    const { correlationId: _omit, ...rest } = METADATA;
    expect(isEventMetadata(rest)).toBe(false);
  });
});

describe("isDomainEvent", () => {
  it("accepts a valid event", () => {
    expect(isDomainEvent({ type: "mt.transfer", metadata: METADATA, payload: {} })).toBe(true);
  });

  it("rejects empty type", () => {
    expect(isDomainEvent({ type: "", metadata: METADATA, payload: {} })).toBe(false);
  });

  it("rejects null payload", () => {
    expect(isDomainEvent({ type: "mt.transfer", metadata: METADATA, payload: null })).toBe(false);
  });
});
