/**
 * Tests for the event hash chain.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { computeEventHash, linkEvent, verifyHashChain, GENESIS_HASH } from "../src/hash-chain.js";
import type { StoredEvent, UnhashedStoredEvent } from "../src/types.js";

function unhashed(position: number, payload: Record<string, unknown> = {}): UnhashedStoredEvent {
  return {
    event: {
      type: "mt.transfer",
      metadata: {
        eventId: `evt-${position}`,
        timestamp: "2026-01-01T00:00:00.000Z",
        actor: "alice",
        correlationId: "corr",
        source: "transfer",
      },
      payload,
    },
    streamId: "ledger",
    version: position,
    globalPosition: position,
    appendedAt: "2026-01-01T00:00:00.000Z",
  };
}

function chain(payloads: readonly Record<string, unknown>[]): StoredEvent[] {
  const out: StoredEvent[] = [];
  let previous = GENESIS_HASH;
  payloads.forEach((payload, i) => {
    const linked = linkEvent(unhashed(i + 1, payload), previous);
    out.push(linked);
    previous = linked.hash;
  });
  return out;
}

// =============================================================================
// computeEventHash
// =============================================================================

describe("computeEventHash", () => {
  it("produces a 64-char hex digest", () => {
    expect(computeEventHash(unhashed(1), GENESIS_HASH)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("ignores payload key order", () => {
    const a = computeEventHash(unhashed(1, { tokenId: "1", amount: "5" }), GENESIS_HASH);
    const b = computeEventHash(unhashed(1, { amount: "5", tokenId: "1" }), GENESIS_HASH);
    expect(a).toBe(b);
  });

  it("depends on the previous hash", () => {
    const event = unhashed(1);
    expect(computeEventHash(event, GENESIS_HASH)).not.toBe(computeEventHash(event, "other"));
  });

  it("depends on the payload", () => {
    expect(computeEventHash(unhashed(1, { amount: "5" }), GENESIS_HASH)).not.toBe(
      computeEventHash(unhashed(1, { amount: "6" }), GENESIS_HASH),
    );
  });
});

// =============================================================================
// verifyHashChain
// =============================================================================

describe("verifyHashChain", () => {
  it("accepts an intact chain", () => {
    const result = verifyHashChain(chain([{ n: "1" }, { n: "2" }, { n: "3" }]));

    expect(result).toEqual({ valid: true, lastVerifiedPosition: 3, errors: [] });
  });

  it("reports the first tampered position", () => {
    const events = chain([{ n: "1" }, { n: "2" }, { n: "3" }]);
    const second = events[1];
    if (second === undefined) throw new Error("missing event");
    events[1] = { ...second, event: { ...second.event, payload: { n: "20" } } };

    const result = verifyHashChain(events);

    expect(result.valid).toBe(false);
    expect(result.lastVerifiedPosition).toBe(1);
    expect(result.errors[0]?.position).toBe(2);
  });

  it("detects a removed event", () => {
    const events = chain([{ n: "1" }, { n: "2" }, { n: "3" }]);
    events.splice(1, 1);

    const result = verifyHashChain(events);

    expect(result.valid).toBe(false);
    expect(result.errors[0]?.reason).toContain("previousHash mismatch at position 3");
  });

  it("any intact chain verifies to its length", () => {
    fc.assert(
      fc.property(
        fc.array(fc.dictionary(fc.constantFrom("tokenId", "amount", "memo"), fc.string({ maxLength: 6 })), { maxLength: 12 }),
        (payloads) => {
          const result = verifyHashChain(chain(payloads));
          return result.valid && result.lastVerifiedPosition === payloads.length;
        },
      ),
    );
  });
});
