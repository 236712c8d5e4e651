/**
 * @multiledger/ledger — Refund of excess attached payment.
 *
 * A mint that names a refund recipient pays for the storage it adds out
 * of the attached payment; whatever is left goes back to the recipient.
 * Quoting happens inside the invocation. Disbursement happens after it
 * commits, so a failed invocation pays nobody.
 */

import type { Amount, PrincipalId } from "@multiledger/types";
import { assertAmount } from "./amount-math.js";
import type { Payout } from "./types.js";
import { LedgerError } from "./types.js";

export interface RefundQuote {
  readonly bytesUsed: number;
  readonly attachedPayment: Amount;
  readonly recipientId: PrincipalId;
}

export interface PaymentCollaborator {
  /**
   * Charge for `bytesUsed` and return the excess to refund, if any.
   * Throws PRECHECK_FAILED when the attached payment does not cover the cost.
   */
  refundExcess(quote: RefundQuote): Payout | undefined;

  /** Execute a payout once its invocation has committed. */
  disburse(payout: Payout): void;
}

export interface StorageCostRefunderOptions {
  /** Price of one byte of storage */
  readonly byteCost: Amount;
}

/**
 * Charges `bytes × byteCost` and records refunds in `payouts`.
 */
export class StorageCostRefunder implements PaymentCollaborator {
  private readonly _byteCost: Amount;
  private readonly _payouts: Payout[] = [];

  constructor(options: StorageCostRefunderOptions) {
    this._byteCost = assertAmount(options.byteCost, "byteCost");
  }

  refundExcess(quote: RefundQuote): Payout | undefined {
    const bytes = BigInt(Math.max(quote.bytesUsed, 0));
    const cost = bytes * this._byteCost;
    if (quote.attachedPayment < cost) {
      throw new LedgerError(
        "PRECHECK_FAILED",
        `Must attach ${cost.toString()} to cover ${bytes.toString()} bytes of storage, attached ${quote.attachedPayment.toString()}`,
      );
    }
    const excess = quote.attachedPayment - cost;
    return excess > 0n ? { recipientId: quote.recipientId, amount: excess } : undefined;
  }

  disburse(payout: Payout): void {
    this._payouts.push(payout);
  }

  get payouts(): readonly Payout[] {
    return this._payouts;
  }

  get byteCost(): Amount {
    return this._byteCost;
  }
}
