/**
 * @multiledger/event-store — File-based JSONL EventStore implementation.
 *
 * Stores events as one JSON object per line in a `.jsonl` file. This is
 * what lets a settlement saga survive a process restart between its
 * optimistic transfer and its resolution.
 *
 * Crash safety:
 * - Each append writes all its lines in one call and fsyncs before returning
 * - A torn final line (unclean shutdown) is cut off on load, so later
 *   appends start on a fresh line
 * - The file is the source of truth; in-memory state is derived
 *
 * Integrity:
 * - Loaded records must continue the hash chain; a record that does not
 *   is rejected with CORRUPT_LOG rather than silently indexed
 */

import {
  appendFileSync,
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  truncateSync,
} from "node:fs";
import { dirname } from "node:path";
import type { DomainEvent } from "@multiledger/types";
import { isDomainEvent, isRecord } from "@multiledger/types";
import { computeEventHash, GENESIS_HASH } from "./hash-chain.js";
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
import { EventStoreError } from "./types.js";

export interface JsonlEventStoreOptions {
  /** Path to the JSONL file */
  readonly filePath: string;
}

export class JsonlEventStore implements EventStore {
  private readonly _filePath: string;
  private readonly _index = new StreamIndex();

  /**
   * Open (or lazily create) the log at `filePath`.
   * The parent directory is created if it doesn't exist.
   */
  constructor(options: JsonlEventStoreOptions) {
    this._filePath = options.filePath;
    mkdirSync(dirname(this._filePath), { recursive: true });
    this._loadFromFile();
  }

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    const stored = this._index.prepare(streamId, events, options);
    this._writeAndSync(stored.map((e) => JSON.stringify(e) + "\n").join(""));
    // Index only after the write is durable
    return this._index.commit(stored);
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

  get filePath(): string {
    return this._filePath;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const lines = readFileSync(this._filePath, "utf-8").split("\n");
    let previousHash = GENESIS_HASH;
    let offset = 0;
    // Bytes up to the end of the last good record, and whether its newline made it
    let validBytes = 0;
    let terminated = true;

    for (const [i, raw] of lines.entries()) {
      const hasNewline = i < lines.length - 1;
      offset += Buffer.byteLength(raw, "utf-8") + (hasNewline ? 1 : 0);

      const line = raw.trim();
      if (line.length === 0) continue;

      const record = parseRecord(line);
      if (record === undefined) {
        // Only the final line may be torn by a crash mid-write
        if (lines.slice(i + 1).every((rest) => rest.trim().length === 0)) break;
        throw new EventStoreError(
          "CORRUPT_LOG",
          `Unreadable record at line ${i + 1} of ${this._filePath}`,
        );
      }

      if (
        record.previousHash !== previousHash ||
        computeEventHash(record, record.previousHash) !== record.hash
      ) {
        throw new EventStoreError(
          "CORRUPT_LOG",
          `Hash chain broken at global position ${record.globalPosition} in ${this._filePath}`,
          record.streamId,
        );
      }

      this._index.load([record]);
      previousHash = record.hash;
      validBytes = offset;
      terminated = hasNewline;
    }

    // Drop a torn tail so the next append starts on a fresh line
    if (validBytes < offset) {
      truncateSync(this._filePath, validBytes);
    }
    if (!terminated) {
      this._writeAndSync("\n");
    }
  }

  private _writeAndSync(data: string): void {
    const fd = openSync(this._filePath, "a");
    try {
      appendFileSync(fd, data, "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }
}

function parseRecord(line: string): StoredEvent | undefined {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return undefined;
  }
  if (!isRecord(value)) return undefined;

  const v = value;
  if (
    !isDomainEvent(v.event) ||
    typeof v.streamId !== "string" ||
    typeof v.version !== "number" ||
    typeof v.globalPosition !== "number" ||
    typeof v.appendedAt !== "string" ||
    typeof v.hash !== "string" ||
    typeof v.previousHash !== "string"
  ) {
    return undefined;
  }

  return {
    event: v.event,
    streamId: v.streamId,
    version: v.version,
    globalPosition: v.globalPosition,
    appendedAt: v.appendedAt,
    hash: v.hash,
    previousHash: v.previousHash,
  };
}
