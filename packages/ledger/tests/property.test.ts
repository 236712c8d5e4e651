/**
 * Property-Based Tests for @multiledger/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY sequence
 * of operations:
 *
 * 1. Supply equals the sum of all registered balances
 * 2. Failed operations change nothing
 * 3. A transfer followed by its reverse restores both balances
 * 4. Refunds never return more than was unused or held
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { MultiToken } from "../src/multi-token.js";
import { LedgerError } from "../src/types.js";
import type { Invocation } from "../src/types.js";

// =============================================================================
// Arbitraries
// =============================================================================

const LEDGER = "ledger.test";
const PRINCIPALS = ["alice", "bob", "carol", "dave"] as const;

const arbPrincipal = fc.constantFrom(...PRINCIPALS);
const arbTokenId = fc.constantFrom("1", "2");
const arbAmount = fc.bigInt({ min: 0n, max: 1_500n });

type Op =
  | { readonly kind: "transfer"; readonly from: string; readonly to: string; readonly tokenId: string; readonly amount: bigint }
  | { readonly kind: "register"; readonly who: string; readonly tokenId: string }
  | { readonly kind: "refund"; readonly receiver: string; readonly owner: string; readonly tokenId: string; readonly amount: bigint };

const arbOp: fc.Arbitrary<Op> = fc.oneof(
  fc.record({
    kind: fc.constant("transfer" as const),
    from: arbPrincipal,
    to: arbPrincipal,
    tokenId: arbTokenId,
    amount: arbAmount,
  }),
  fc.record({ kind: fc.constant("register" as const), who: arbPrincipal, tokenId: arbTokenId }),
  fc.record({
    kind: fc.constant("refund" as const),
    receiver: arbPrincipal,
    owner: fc.constantFrom(...PRINCIPALS, "ghost"),
    tokenId: arbTokenId,
    amount: arbAmount,
  }),
);

function call(caller: string): Invocation {
  return { caller, attachedPayment: 1n };
}

function freshLedger(): MultiToken {
  const mt = new MultiToken({ accountId: LEDGER });
  mt.mint(call(LEDGER), { ownerId: "alice", amount: 1_000n });
  mt.mint(call(LEDGER), { ownerId: "bob", amount: 2_000n });
  return mt;
}

function sumBalances(mt: MultiToken, tokenId: string): bigint {
  let total = 0n;
  for (const amount of mt.balances(tokenId).values()) {
    total += amount;
  }
  return total;
}

function snapshot(mt: MultiToken): string {
  return ["1", "2"]
    .map((id) => [...mt.balances(id)].map(([who, amount]) => `${id}:${who}=${amount.toString()}`).join(","))
    .join("|");
}

function apply(mt: MultiToken, op: Op): void {
  switch (op.kind) {
    case "transfer":
      mt.transfer(call(op.from), { receiverId: op.to, tokenId: op.tokenId, amount: op.amount });
      return;
    case "register":
      mt.register(call(op.who), op.tokenId);
      return;
    case "refund":
      mt.settleRefunds(call(LEDGER), {
        receiverId: op.receiver,
        originalOwnerIds: [op.owner],
        tokenIds: [op.tokenId],
        unused: [op.amount],
      });
      return;
  }
}

// =============================================================================
// Properties
// =============================================================================

describe("ledger properties", () => {
  it("supply always equals the sum of balances", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 40 }), (ops) => {
        const mt = freshLedger();
        for (const op of ops) {
          try {
            apply(mt, op);
          } catch (err) {
            if (!(err instanceof LedgerError)) throw err;
          }
          for (const tokenId of ["1", "2"]) {
            expect(mt.supply(tokenId)).toBe(sumBalances(mt, tokenId));
          }
        }
      }),
    );
  });

  it("a failed operation leaves every balance unchanged", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 20 }), arbOp, (prefix, op) => {
        const mt = freshLedger();
        for (const p of prefix) {
          try {
            apply(mt, p);
          } catch (err) {
            if (!(err instanceof LedgerError)) throw err;
          }
        }
        const before = snapshot(mt);
        try {
          apply(mt, op);
        } catch (err) {
          if (!(err instanceof LedgerError)) throw err;
          expect(snapshot(mt)).toBe(before);
        }
      }),
    );
  });

  it("a transfer and its reverse restore both balances", () => {
    fc.assert(
      fc.property(fc.bigInt({ min: 1n, max: 1_000n }), (amount) => {
        const mt = freshLedger();
        mt.register(call("carol"), "1");

        mt.transfer(call("alice"), { receiverId: "carol", tokenId: "1", amount });
        mt.transfer(call("carol"), { receiverId: "alice", tokenId: "1", amount });

        expect(mt.balanceOf("alice", "1")).toBe(1_000n);
        expect(mt.balanceOf("carol", "1")).toBe(0n);
      }),
    );
  });

  it("refunds are bounded by the unused amount and the receiver's holdings", () => {
    fc.assert(
      fc.property(
        fc.bigInt({ min: 1n, max: 1_000n }),
        fc.bigInt({ min: 0n, max: 1_000n }),
        fc.bigInt({ min: 0n, max: 2_000n }),
        (sent, spent, unused) => {
          fc.pre(spent <= sent);
          const mt = freshLedger();
          mt.register(call("carol"), "1");
          mt.register(call("dave"), "1");
          mt.transfer(call("alice"), { receiverId: "carol", tokenId: "1", amount: sent });
          if (spent > 0n) {
            mt.transfer(call("carol"), { receiverId: "dave", tokenId: "1", amount: spent });
          }

          const [result] = mt.settleRefunds(call(LEDGER), {
            receiverId: "carol",
            originalOwnerIds: ["alice"],
            tokenIds: ["1"],
            unused: [unused],
          });

          const held = sent - spent;
          const expected = unused < held ? unused : held;
          expect(result?.refunded).toBe(expected);
          expect(mt.balanceOf("carol", "1")).toBe(held - expected);
        },
      ),
    );
  });
});
