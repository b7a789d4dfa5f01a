/**
 * Core types for the table store
 */

import type { CacheStats } from "./cache.js";

/**
 * Table key: a non-empty string, compared by exact match
 */
export type StoreKey = string;

/**
 * Table name: must match `^[A-Za-z][A-Za-z0-9_]*$`
 */
export type StoreName = string;

/**
 * Value payload: a mapping from field name to a JSON value
 *
 * Only plain JSON is accepted: no Date, Map or class instances, no undefined,
 * NaN, Infinity, BigInt or functions, and no cycles.
 */
export type StoreData = Record<string, unknown>;

/**
 * Stored value as returned by reads
 */
export interface StoreValue {
  /** Epoch milliseconds of the first write; preserved across updates */
  created_at: number;
  /** Epoch milliseconds of the latest write */
  updated_at: number;
  data: StoreData;
}

/**
 * Value accepted by writes; timestamps are filled in by the table
 */
export interface StoreValueInput {
  data: StoreData;
  /** Used only when no document exists yet for the key */
  created_at?: number;
  /** Ignored: every write stamps its own time */
  updated_at?: number;
}

export type TableType = "kv" | "kkv";

/**
 * Registry record, one per table
 */
export interface TableInfo {
  name: StoreName;
  type: TableType;
  /** ISO-8601 timestamp */
  created_at: string;
  /** ISO-8601 timestamp */
  updated_at: string;
}

/**
 * Engine document: a flat mapping of field names to JSON values
 */
export type Document = Record<string, unknown>;

/**
 * Engine predicate: dot paths mapped to the value each must equal
 */
export type Filter = Record<string, unknown>;

/**
 * Engine document layout for KV tables
 */
export interface KvDocument {
  key: StoreKey;
  value: StoreValue;
}

/**
 * Engine document layout for KKV tables
 */
export interface KkvDocument {
  key1: StoreKey;
  key2: StoreKey;
  value: StoreValue;
}

/**
 * Which Table objects share a KV read cache
 * - "instance": each Table object has its own cache (writes through another
 *   object on the same file are seen only after the TTL)
 * - "file": one cache per file and logical table, shared by every Table object
 */
export type CacheScope = "instance" | "file";

/**
 * Clock returning epoch milliseconds
 */
export type Clock = () => number;

/**
 * Contract shared by KV and KKV tables
 */
export interface BaseTable {
  readonly name: StoreName;
  readonly type: TableType;
  /** The engine has no atomic multi-write; the transaction verbs only log */
  readonly supportsTransactions: false;
  beginTransaction(): void;
  commit(): void;
  rollback(): void;
  /** Release this table's reference to its connection */
  close(): Promise<void>;
}

/**
 * Single-key document table
 */
export interface KvTable extends BaseTable {
  readonly type: "kv";
  set(key: StoreKey, value: StoreValueInput): Promise<StoreValue>;
  get(key: StoreKey): Promise<StoreValue | null>;
  delete(key: StoreKey): Promise<boolean>;
  listKeys(): Promise<StoreKey[]>;
  listAll(): Promise<Map<StoreKey, StoreValue>>;
  /** Hit, miss and expiry counters of this table's read cache */
  cacheStats(): CacheStats;
  clearCache(): void;
}

/**
 * Two-key document table
 */
export interface KkvTable extends BaseTable {
  readonly type: "kkv";
  set(pkey: StoreKey, skey: StoreKey, value: StoreValueInput): Promise<StoreValue>;
  get(pkey: StoreKey, skey: StoreKey): Promise<StoreValue | null>;
  delete(pkey: StoreKey, skey: StoreKey): Promise<boolean>;
  listPkeys(): Promise<StoreKey[]>;
  listSkeys(pkey: StoreKey): Promise<StoreKey[]>;
  listAll(): Promise<Map<StoreKey, Map<StoreKey, StoreValue>>>;
}

export type Table = KvTable | KkvTable;

/**
 * Options for opening a database
 */
export interface DatabaseOptions {
  /** Directory holding table files and the metadata file (default: ./tablestore) */
  root?: string;
  /** KV read cache time-to-live in milliseconds (default: 300000) */
  cacheTtlMs?: number;
  /** Maximum cached entries per KV cache (default: 10000) */
  cacheMaxSize?: number;
  /** KV cache sharing (default: "instance") */
  cacheScope?: CacheScope;
  /** Clock used for timestamps and cache expiry (default: Date.now) */
  now?: Clock;
}
