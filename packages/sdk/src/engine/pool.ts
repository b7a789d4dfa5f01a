/**
 * Reference-counted pool of engine connections, one per file path
 *
 * Every Table object holds a handle; the pool closes a connection when its
 * last handle is released, or immediately when the file is evicted.
 */

import { resolve } from "node:path";
import type { TtlCache } from "../cache.js";
import { logger } from "../observability/logs.js";
import type { StoreValue } from "../types.js";
import { DocumentConnection } from "./connection.js";

interface PoolEntry {
  ready: Promise<DocumentConnection>;
  refs: number;
  /** Read caches shared by every KV table on this file, by logical table name */
  caches: Map<string, TtlCache<StoreValue>>;
}

/**
 * A counted reference to a pooled connection
 */
export class ConnectionHandle {
  readonly connection: DocumentConnection;
  #entry: PoolEntry;
  #release: () => Promise<void>;
  #released = false;

  constructor(connection: DocumentConnection, entry: PoolEntry, release: () => Promise<void>) {
    this.connection = connection;
    this.#entry = entry;
    this.#release = release;
  }

  get filePath(): string {
    return this.connection.filePath;
  }

  get released(): boolean {
    return this.#released;
  }

  /**
   * Read cache shared by every handle on this file for one logical table
   */
  sharedCache(tableName: string, create: () => TtlCache<StoreValue>): TtlCache<StoreValue> {
    let cache = this.#entry.caches.get(tableName);
    if (!cache) {
      cache = create();
      this.#entry.caches.set(tableName, cache);
    }
    return cache;
  }

  /**
   * Drop this reference (idempotent)
   */
  async release(): Promise<void> {
    if (this.#released) {
      return;
    }
    this.#released = true;
    await this.#release();
  }
}

export class ConnectionPool {
  #entries = new Map<string, PoolEntry>();

  /**
   * Number of open (or opening) connections
   */
  get size(): number {
    return this.#entries.size;
  }

  has(filePath: string): boolean {
    return this.#entries.has(resolve(filePath));
  }

  /**
   * Live references to a file's connection (0 if not open)
   */
  refCount(filePath: string): number {
    return this.#entries.get(resolve(filePath))?.refs ?? 0;
  }

  /**
   * Obtain a handle, opening the connection on first use
   * @throws ConnectionError if the engine file cannot be opened
   */
  async acquire(filePath: string): Promise<ConnectionHandle> {
    const key = resolve(filePath);
    let entry = this.#entries.get(key);

    if (!entry) {
      const created: PoolEntry = {
        ready: DocumentConnection.open(key),
        refs: 0,
        caches: new Map(),
      };
      this.#entries.set(key, created);
      entry = created;
      logger.debug("pool.open", { details: { path: key } });
    }

    entry.refs++;
    const current = entry;

    let connection: DocumentConnection;
    try {
      connection = await current.ready;
    } catch (err) {
      current.refs--;
      if (this.#entries.get(key) === current) {
        this.#entries.delete(key);
      }
      throw err;
    }

    return new ConnectionHandle(connection, current, () => this.#release(key, current));
  }

  /**
   * Close a file's connection regardless of outstanding handles
   * Handles still held fail with DocumentNotFoundError afterwards.
   */
  async evict(filePath: string): Promise<void> {
    const key = resolve(filePath);
    const entry = this.#entries.get(key);
    if (!entry) {
      return;
    }
    this.#entries.delete(key);
    await this.#closeEntry(key, entry, "dropped");
  }

  /**
   * Close every connection
   */
  async close(): Promise<void> {
    const entries = [...this.#entries];
    this.#entries.clear();
    await Promise.all(entries.map(([key, entry]) => this.#closeEntry(key, entry, "released")));
  }

  async #release(key: string, entry: PoolEntry): Promise<void> {
    entry.refs--;
    // A stale handle from an evicted entry must not touch a newer one
    if (entry.refs > 0 || this.#entries.get(key) !== entry) {
      return;
    }
    this.#entries.delete(key);
    await this.#closeEntry(key, entry, "released");
  }

  async #closeEntry(
    key: string,
    entry: PoolEntry,
    reason: "released" | "dropped"
  ): Promise<void> {
    entry.caches.clear();
    const connection = await entry.ready.catch(() => null);
    if (connection) {
      await connection.close(reason);
    }
    logger.debug("pool.close", { details: { path: key, reason } });
  }
}
