/**
 * @multiledger/ledger — Invocation event buffer.
 *
 * Components record catalog events here while an invocation runs.
 * The facade appends them to the event store only if the invocation
 * commits; a failed invocation publishes nothing.
 */

import type { DomainEvent } from "@multiledger/types";
import { createLedgerEvent } from "@multiledger/event-store";
import type { EventContext, LedgerEventPayload, LedgerEventType } from "@multiledger/event-store";

export class LedgerEventBuffer {
  private readonly _context: EventContext;
  private readonly _events: DomainEvent[] = [];

  constructor(context: EventContext) {
    this._context = context;
  }

  record<T extends LedgerEventType>(type: T, payload: LedgerEventPayload<T>): void {
    this._events.push(createLedgerEvent(type, payload, this._context));
  }

  get events(): readonly DomainEvent[] {
    return this._events;
  }

  get length(): number {
    return this._events.length;
  }

  get correlationId(): string {
    return this._context.correlationId;
  }
}
