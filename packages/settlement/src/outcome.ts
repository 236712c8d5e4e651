/**
 * @multiledger/settlement — Reading a receiver's reply.
 *
 * Rules:
 * - Remote failure: nothing was used, everything is refundable
 * - Well-formed reply: one unused amount per token, clamped to what was sent
 * - Anything else: everything was used
 */

import { z } from "zod";
import type { Amount } from "@multiledger/types";
import { minAmount } from "@multiledger/ledger";
import type { NotificationOutcome } from "./types.js";

const UnusedAmountSchema = z.union([
  z.string().regex(/^(0|[1-9]\d*)$/),
  z.number().int().nonnegative().safe(),
  z.bigint().nonnegative(),
]);

export const UnusedAmountsSchema = z.array(UnusedAmountSchema);

/**
 * Per token, how much of what was sent the receiver gave back.
 */
export function interpretOutcome(
  outcome: NotificationOutcome,
  amounts: readonly Amount[],
): readonly Amount[] {
  if (outcome.status === "failed") {
    return [...amounts];
  }

  const parsed = UnusedAmountsSchema.safeParse(outcome.value);
  if (!parsed.success || parsed.data.length !== amounts.length) {
    return amounts.map(() => 0n);
  }

  return amounts.map((sent, i) => {
    const reported = parsed.data[i];
    return reported === undefined ? 0n : minAmount(BigInt(reported), sent);
  });
}

/**
 * Normalize an outcome so it can be written to the saga log.
 * Bigints become decimal strings; values JSON cannot hold become null.
 */
export function toRecordedOutcome(outcome: NotificationOutcome): NotificationOutcome {
  if (outcome.status === "failed") return outcome;
  return { status: "succeeded", value: toJsonValue(outcome.value) };
}

function toJsonValue(value: unknown): unknown {
  try {
    const text = JSON.stringify(value ?? null, (_key, v: unknown) =>
      typeof v === "bigint" ? v.toString() : v,
    );
    return text === undefined ? null : JSON.parse(text);
  } catch {
    // Cyclic or otherwise unserializable: reads back as a malformed reply
    return null;
  }
}

/**
 * Human-readable reason for a thrown or rejected hook.
 */
export function failureReason(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
