/**
 * @multiledger/ledger — Key-value storage.
 *
 * All ledger state lives in one string → string map. Components never
 * hold state of their own; they read and write through a store handed to
 * them for the duration of an invocation.
 *
 * - InMemoryKeyValueStore: committed state for tests and short-lived processes
 * - FileKeyValueStore: committed state persisted as a JSON document
 * - StagedKeyValueStore: per-invocation overlay, written back on commit
 *
 * Storage usage is measured in UTF-8 bytes of keys plus values.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import type { PrincipalId, TokenId } from "@multiledger/types";

// ─── Interfaces ──────────────────────────────────────────────────────────

/**
 * Pending writes: a value to set, or `undefined` to delete the key.
 */
export type WriteBatch = ReadonlyMap<string, string | undefined>;

export interface KeyValueStore {
  get(key: string): string | undefined;
  has(key: string): boolean;
  /** Keys starting with `prefix`, in lexicographic order */
  keys(prefix: string): readonly string[];
  /** Bytes currently held */
  storageUsage(): number;
  /** Apply every write in the batch, all-or-nothing */
  write(batch: WriteBatch): void;
}

export interface WritableKeyValueStore extends KeyValueStore {
  set(key: string, value: string): void;
  delete(key: string): void;
}

// ─── Keys ────────────────────────────────────────────────────────────────

/**
 * Deterministic key layout. Token ids are digit strings, so a token
 * segment never contains the separator.
 */
export const storageKeys = {
  tokenCounter: (): string => "t/next",
  owner: (tokenId: TokenId): string => `t/${tokenId}/owner`,
  metadata: (tokenId: TokenId): string => `t/${tokenId}/meta`,
  supply: (tokenId: TokenId): string => `t/${tokenId}/supply`,
  nextApprovalId: (tokenId: TokenId): string => `t/${tokenId}/next-approval`,
  balancePrefix: (tokenId: TokenId): string => `b/${tokenId}/`,
  balance: (tokenId: TokenId, ownerId: PrincipalId): string => `b/${tokenId}/${ownerId}`,
  approvalPrefix: (tokenId: TokenId): string => `a/${tokenId}/`,
  approval: (tokenId: TokenId, spenderId: PrincipalId): string => `a/${tokenId}/${spenderId}`,
  ownerTokensPrefix: (ownerId: PrincipalId): string => `e/${ownerId}/`,
  ownerToken: (ownerId: PrincipalId, tokenId: TokenId): string => `e/${ownerId}/${tokenId}`,
  tokenPrefix: (): string => "t/",
  /** Present once a transfer-call's transfer has committed. */
  settlement: (settlementId: string): string => `s/${settlementId}`,
} as const;

function entrySize(key: string, value: string): number {
  return Buffer.byteLength(key, "utf-8") + Buffer.byteLength(value, "utf-8");
}

// ─── In-Memory ───────────────────────────────────────────────────────────

export class InMemoryKeyValueStore implements KeyValueStore {
  protected readonly _entries = new Map<string, string>();
  private _usage = 0;

  constructor(initial?: Iterable<readonly [string, string]>) {
    if (initial !== undefined) {
      for (const [key, value] of initial) {
        this._put(key, value);
      }
    }
  }

  get(key: string): string | undefined {
    return this._entries.get(key);
  }

  has(key: string): boolean {
    return this._entries.has(key);
  }

  keys(prefix: string): readonly string[] {
    return [...this._entries.keys()].filter((k) => k.startsWith(prefix)).sort();
  }

  storageUsage(): number {
    return this._usage;
  }

  write(batch: WriteBatch): void {
    for (const [key, value] of batch) {
      if (value === undefined) {
        this._remove(key);
      } else {
        this._put(key, value);
      }
    }
  }

  private _put(key: string, value: string): void {
    this._remove(key);
    this._entries.set(key, value);
    this._usage += entrySize(key, value);
  }

  private _remove(key: string): void {
    const existing = this._entries.get(key);
    if (existing !== undefined) {
      this._usage -= entrySize(key, existing);
      this._entries.delete(key);
    }
  }
}

// ─── File ────────────────────────────────────────────────────────────────

export interface FileKeyValueStoreOptions {
  readonly filePath: string;
}

/**
 * Committed state persisted as a single JSON object.
 * Each write replaces the file through a temporary sibling and a rename.
 */
export class FileKeyValueStore extends InMemoryKeyValueStore {
  private readonly _filePath: string;

  constructor(options: FileKeyValueStoreOptions) {
    super(readEntries(options.filePath));
    this._filePath = options.filePath;
    mkdirSync(dirname(this._filePath), { recursive: true });
  }

  override write(batch: WriteBatch): void {
    super.write(batch);
    const tmp = `${this._filePath}.tmp`;
    writeFileSync(tmp, JSON.stringify(Object.fromEntries(this._entries)), "utf-8");
    renameSync(tmp, this._filePath);
  }

  get filePath(): string {
    return this._filePath;
  }
}

function readEntries(filePath: string): [string, string][] {
  if (!existsSync(filePath)) {
    return [];
  }
  const parsed: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error(`Ledger state file ${filePath} is not a JSON object`);
  }
  const entries: [string, string][] = [];
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value !== "string") {
      throw new Error(`Ledger state file ${filePath} has a non-string value at "${key}"`);
    }
    entries.push([key, value]);
  }
  return entries;
}

// ─── Staged Overlay ──────────────────────────────────────────────────────

/**
 * Buffers writes over a base store. Reads see the staged writes first.
 * Nothing reaches the base until `commit()`.
 */
export class StagedKeyValueStore implements WritableKeyValueStore {
  private readonly _base: KeyValueStore;
  private readonly _staged = new Map<string, string | undefined>();

  constructor(base: KeyValueStore) {
    this._base = base;
  }

  get(key: string): string | undefined {
    if (this._staged.has(key)) {
      return this._staged.get(key);
    }
    return this._base.get(key);
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  keys(prefix: string): readonly string[] {
    const merged = new Set(this._base.keys(prefix));
    for (const [key, value] of this._staged) {
      if (!key.startsWith(prefix)) continue;
      if (value === undefined) {
        merged.delete(key);
      } else {
        merged.add(key);
      }
    }
    return [...merged].sort();
  }

  storageUsage(): number {
    let usage = this._base.storageUsage();
    for (const [key, value] of this._staged) {
      const existing = this._base.get(key);
      if (existing !== undefined) usage -= entrySize(key, existing);
      if (value !== undefined) usage += entrySize(key, value);
    }
    return usage;
  }

  set(key: string, value: string): void {
    this._staged.set(key, value);
  }

  delete(key: string): void {
    this._staged.set(key, undefined);
  }

  write(batch: WriteBatch): void {
    for (const [key, value] of batch) {
      this._staged.set(key, value);
    }
  }

  /** Number of keys touched so far. */
  get pendingWrites(): number {
    return this._staged.size;
  }

  commit(): void {
    this._base.write(this._staged);
    this._staged.clear();
  }
}
