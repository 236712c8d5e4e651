/**
 * Tests for TransferEngine refunds, the compensation step of settlement.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { MultiToken } from "../src/multi-token.js";
import type { Invocation } from "../src/types.js";

const LEDGER = "ledger.test";

function call(caller: string): Invocation {
  return { caller, attachedPayment: 1n };
}

describe("refund", () => {
  let mt: MultiToken;

  beforeEach(() => {
    mt = new MultiToken({ accountId: LEDGER });
    mt.mint(call(LEDGER), { ownerId: "alice", amount: 1000n });
    mt.register(call("bob"), "1");
    mt.register(call("carol"), "1");
    mt.transfer(call("alice"), { receiverId: "bob", tokenId: "1", amount: 100n });
  });

  it("returns the unused amount to the original owner", () => {
    const [result] = mt.invoke(call(LEDGER), ({ engine }) => [engine.refund("bob", "alice", "1", 30n)]);

    expect(result).toEqual({ tokenId: "1", refunded: 30n, forfeited: 0n });
    expect(mt.balanceOf("bob", "1")).toBe(70n);
    expect(mt.balanceOf("alice", "1")).toBe(930n);
    expect(mt.supply("1")).toBe(1000n);
  });

  it("refunds only what the receiver still holds", () => {
    mt.transfer(call("bob"), { receiverId: "carol", tokenId: "1", amount: 90n });

    const result = mt.invoke(call(LEDGER), ({ engine }) => engine.refund("bob", "alice", "1", 30n));

    expect(result.refunded).toBe(10n);
    expect(mt.balanceOf("bob", "1")).toBe(0n);
    expect(mt.balanceOf("alice", "1")).toBe(910n);
  });

  it("burns the refund when the original owner has no entry", () => {
    const result = mt.invoke(call(LEDGER), ({ engine }) => engine.refund("bob", "ghost", "1", 30n));

    expect(result).toEqual({ tokenId: "1", refunded: 0n, forfeited: 30n });
    expect(mt.balanceOf("bob", "1")).toBe(70n);
    expect(mt.supply("1")).toBe(970n);
    expect(mt.isRegistered("ghost", "1")).toBe(false);

    const events = mt.eventStore.read("ledger");
    expect(events[events.length - 1]?.event).toMatchObject({
      type: "mt.refund.forfeited",
      payload: { tokenId: "1", receiverId: "bob", originalOwnerId: "ghost", amount: "30" },
    });
  });

  it("does nothing for a zero unused amount", () => {
    const position = mt.eventStore.globalPosition();

    const result = mt.invoke(call(LEDGER), ({ engine }) => engine.refund("bob", "alice", "1", 0n));

    expect(result).toEqual({ tokenId: "1", refunded: 0n, forfeited: 0n });
    expect(mt.eventStore.globalPosition()).toBe(position);
  });

  it("treats an unregistered receiver as holding nothing", () => {
    const result = mt.invoke(call(LEDGER), ({ engine }) => engine.refund("dave", "alice", "1", 30n));

    expect(result).toEqual({ tokenId: "1", refunded: 0n, forfeited: 0n });
  });

  it("settles several legs through the facade", () => {
    mt.mint(call(LEDGER), { ownerId: "alice", amount: 500n });
    mt.register(call("bob"), "2");
    mt.transfer(call("alice"), { receiverId: "bob", tokenId: "2", amount: 50n });

    const results = mt.settleRefunds(call(LEDGER), {
      receiverId: "bob",
      originalOwnerIds: ["alice", "alice"],
      tokenIds: ["1", "2"],
      unused: [100n, 20n],
    });

    expect(results.map((r) => r.refunded)).toEqual([100n, 20n]);
    expect(mt.batchBalanceOf("alice", ["1", "2"])).toEqual([1000n, 470n]);
  });
});
