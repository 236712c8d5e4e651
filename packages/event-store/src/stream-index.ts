/**
 * @multiledger/event-store — In-memory stream index.
 *
 * Shared bookkeeping for every EventStore implementation:
 * - Per-stream arrays for stream reads
 * - A global array for readAll and global subscriptions
 * - Hash chain head
 * - Subscriber registries
 *
 * Appends happen in two steps so a durable store can write to disk
 * between them: `prepare()` validates and links the events without
 * touching state, `commit()` indexes them and dispatches subscribers.
 */

import type { DomainEvent } from "@multiledger/types";
import { isDomainEvent } from "@multiledger/types";
import { GENESIS_HASH, linkEvent, verifyHashChain } from "./hash-chain.js";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";

export class StreamIndex {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _globalLog: StoredEvent[] = [];
  private readonly _streamSubscribers = new Map<string, Set<EventHandler>>();
  private readonly _globalSubscribers = new Set<EventHandler>();
  private _lastHash: string = GENESIS_HASH;

  // ─── Append ─────────────────────────────────────────────────────────

  /**
   * Validate an append and build the linked events it would store.
   * Does not modify the index.
   */
  prepare(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): readonly StoredEvent[] {
    this.validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const currentVersion = this.streamVersion(streamId);
    const expectedVersion = options?.expectedVersion ?? "any";

    if (expectedVersion === "no_stream" && currentVersion !== 0) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" already exists (version ${currentVersion}), expected no_stream`,
        streamId,
      );
    }
    if (typeof expectedVersion === "number" && currentVersion !== expectedVersion) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${currentVersion}, expected ${expectedVersion}`,
        streamId,
      );
    }

    const appendedAt = new Date().toISOString();
    let previousHash = this._lastHash;
    let position = this.globalPosition();

    return events.map((event, i) => {
      position += 1;
      const stored = linkEvent(
        {
          event: toJsonSafe(event, streamId),
          streamId,
          version: currentVersion + i + 1,
          globalPosition: position,
          appendedAt,
        },
        previousHash,
      );
      previousHash = stored.hash;
      return stored;
    });
  }

  /**
   * Index prepared events and notify subscribers.
   */
  commit(stored: readonly StoredEvent[]): AppendResult {
    this.load(stored);

    const first = stored[0];
    const last = stored[stored.length - 1];
    if (first === undefined || last === undefined) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot commit zero events");
    }

    this._dispatch(first.streamId, stored);

    return {
      streamId: first.streamId,
      fromVersion: first.version,
      toVersion: last.version,
      count: stored.length,
    };
  }

  /**
   * Index events without dispatching (used when replaying a log).
   */
  load(stored: readonly StoredEvent[]): void {
    for (const event of stored) {
      let stream = this._streams.get(event.streamId);
      if (stream === undefined) {
        stream = [];
        this._streams.set(event.streamId, stream);
      }
      stream.push(event);
      this._globalLog.push(event);
      this._lastHash = event.hash;
    }
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this.validateStreamId(streamId);

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const stream = this._streams.get(streamId) ?? [];
    return limit(stream.filter((e) => e.version >= fromVersion), options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;
    return limit(
      this._globalLog.filter((e) => e.globalPosition >= fromPosition),
      options?.maxCount,
    );
  }

  listStreams(prefix = ""): readonly string[] {
    return [...this._streams.keys()].filter((id) => id.startsWith(prefix));
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    this.validateStreamId(streamId);

    let subscribers = this._streamSubscribers.get(streamId);
    if (subscribers === undefined) {
      subscribers = new Set();
      this._streamSubscribers.set(streamId, subscribers);
    }
    subscribers.add(handler);

    return {
      unsubscribe: () => {
        subscribers.delete(handler);
        if (subscribers.size === 0) {
          this._streamSubscribers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._globalSubscribers.add(handler);
    return {
      unsubscribe: () => {
        this._globalSubscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _dispatch(streamId: string, events: readonly StoredEvent[]): void {
    const streamSubs = this._streamSubscribers.get(streamId);
    if (streamSubs !== undefined) {
      for (const handler of streamSubs) {
        for (const event of events) {
          handler(event);
        }
      }
    }

    for (const handler of this._globalSubscribers) {
      for (const event of events) {
        handler(event);
      }
    }
  }
}

/**
 * Events are stored exactly as they would read back from disk, so hashes
 * computed in memory match hashes recomputed from a JSONL file.
 */
function toJsonSafe(event: DomainEvent, streamId: string): DomainEvent {
  let body: unknown;
  try {
    body = JSON.parse(JSON.stringify({
      type: event.type,
      metadata: event.metadata,
      payload: event.payload,
    }));
  } catch (err: unknown) {
    throw new EventStoreError(
      "INVALID_EVENT",
      `Event "${event.type}" is not JSON-serializable: ${err instanceof Error ? err.message : String(err)}`,
      streamId,
    );
  }
  if (!isDomainEvent(body)) {
    throw new EventStoreError("INVALID_EVENT", `Malformed event "${event.type}"`, streamId);
  }
  return body;
}

function limit(events: StoredEvent[], maxCount: number | undefined): StoredEvent[] {
  return maxCount !== undefined && maxCount >= 0 ? events.slice(0, maxCount) : events;
}
