/**
 * @multiledger/event-store — In-memory EventStore implementation.
 *
 * Suitable for unit tests, short-lived processes and ledgers whose
 * settlement state need not survive a restart.
 *
 * Properties:
 * - O(1) append (amortized)
 * - Synchronous subscription dispatch
 * - No durability guarantees
 */

import type { DomainEvent } from "@multiledger/types";
import { StreamIndex } from "./stream-index.js";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";

export class InMemoryEventStore implements EventStore {
  private readonly _index = new StreamIndex();

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    return this._index.commit(this._index.prepare(streamId, events, options));
  }

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    return this._index.read(streamId, options);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    return this._index.readAll(options);
  }

  listStreams(prefix?: string): readonly string[] {
    return this._index.listStreams(prefix);
  }

  subscribe(streamId: string, handler: EventHandler): Subscription {
    return this._index.subscribe(streamId, handler);
  }

  subscribeAll(handler: EventHandler): Subscription {
    return this._index.subscribeAll(handler);
  }

  streamExists(streamId: string): boolean {
    return this._index.streamExists(streamId);
  }

  streamVersion(streamId: string): number {
    return this._index.streamVersion(streamId);
  }

  globalPosition(): number {
    return this._index.globalPosition();
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return this._index.verifyIntegrity();
  }
}
