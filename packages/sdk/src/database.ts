/**
 * Table registry
 *
 * Owns a root directory holding one engine file per table (`<name>.json`)
 * plus the reserved metadata file `.table_info`, whose `_table_info` table
 * records each table's name, type and timestamps. The registry is the only
 * component that creates or deletes table files; it never touches table data.
 */

import * as path from "node:path";
import { resolveDatabaseOptions, type ResolvedDatabaseOptions } from "./config.js";
import { ConnectionPool, type ConnectionHandle } from "./engine/pool.js";
import type { DocumentTable } from "./engine/connection.js";
import {
  ConnectionError,
  TableExistsError,
  TableNotFoundError,
  TableTypeError,
  ValueTypeError,
} from "./errors.js";
import { stableStringify } from "./format.js";
import { atomicWrite, ensureDirectory, removeDocument, statFile } from "./io.js";
import { Mutex } from "./lock.js";
import { logger } from "./observability/logs.js";
import { describeErrors, isTableInfo } from "./schema/validator.js";
import { JsonKkvTable } from "./tables/kkv-table.js";
import { JsonKvTable } from "./tables/kv-table.js";
import type {
  DatabaseOptions,
  Document,
  KkvTable,
  KvTable,
  StoreName,
  Table,
  TableInfo,
  TableType,
} from "./types.js";
import { TABLE_INFO_TABLE, validateTableName } from "./validation.js";

/**
 * File holding the registry table, inside the root directory
 */
export const TABLE_INFO_FILE = ".table_info";

/**
 * Extension of table files
 */
export const TABLE_FILE_EXTENSION = ".json";

export interface OpenDatabaseOptions extends DatabaseOptions {
  /** Share connections with other databases (default: a pool owned by this database) */
  pool?: ConnectionPool;
}

/**
 * Registry of KV and KKV tables under one root directory
 *
 * Registry mutations and table lookups run under one mutex, so a concurrent
 * `getTable` sees a dropped table either fully present or fully gone.
 *
 * @example
 * ```typescript
 * const db = await openDatabase({ root: './data' });
 * await db.createKvTable('orders');
 *
 * const orders = await db.getKvTable('orders');
 * await orders.set('order-1', { data: { total: 42 } });
 * ```
 */
export class Database {
  readonly options: ResolvedDatabaseOptions;
  #pool: ConnectionPool;
  #ownsPool: boolean;
  #meta: ConnectionHandle;
  #mutex = new Mutex();
  #closed = false;

  private constructor(
    options: ResolvedDatabaseOptions,
    pool: ConnectionPool,
    ownsPool: boolean,
    meta: ConnectionHandle
  ) {
    this.options = options;
    this.#pool = pool;
    this.#ownsPool = ownsPool;
    this.#meta = meta;
  }

  /**
   * Open a database, creating the root directory and metadata file if needed
   * @throws ConnectionError if the metadata file cannot be opened
   */
  static async open(options: OpenDatabaseOptions = {}): Promise<Database> {
    const resolved = resolveDatabaseOptions(options);
    const pool = options.pool ?? new ConnectionPool();

    await ensureDirectory(resolved.root);
    const meta = await pool.acquire(path.join(resolved.root, TABLE_INFO_FILE));

    logger.info("database.open", { details: { root: resolved.root } });
    return new Database(resolved, pool, options.pool === undefined, meta);
  }

  get root(): string {
    return this.options.root;
  }

  get tableInfoPath(): string {
    return this.#meta.filePath;
  }

  /**
   * Path of a table's backing file
   */
  tablePath(name: StoreName): string {
    return path.join(this.options.root, `${name}${TABLE_FILE_EXTENSION}`);
  }

  /**
   * Create an empty KV table
   * @throws TableNameError if the name is invalid or reserved
   * @throws TableExistsError if the name is already registered
   */
  async createKvTable(name: StoreName): Promise<TableInfo> {
    return this.#createTable(name, "kv");
  }

  /**
   * Create an empty KKV table
   * @throws TableNameError if the name is invalid or reserved
   * @throws TableExistsError if the name is already registered
   */
  async createKkvTable(name: StoreName): Promise<TableInfo> {
    return this.#createTable(name, "kkv");
  }

  /**
   * Open a table of either type
   *
   * Each call returns a new Table object; objects for the same table share
   * one connection. Close the table to release it.
   *
   * @throws TableNameError if the name is invalid
   * @throws TableNotFoundError if the table is not registered or its file is missing
   */
  async getTable(name: StoreName): Promise<Table> {
    validateTableName(name);

    return this.#exclusive(async () => {
      const info = await this.#requireTableInfo(name);
      const filePath = this.tablePath(name);

      if ((await statFile(filePath)) === null) {
        throw new TableNotFoundError(name, "backing file is missing");
      }

      const handle = await this.#pool.acquire(filePath);
      const context = { name, handle, now: this.options.now };

      if (info.type === "kkv") {
        return new JsonKkvTable(context);
      }
      return new JsonKvTable(context, {
        ttlMs: this.options.cacheTtlMs,
        maxSize: this.options.cacheMaxSize,
        scope: this.options.cacheScope,
      });
    });
  }

  /**
   * Open a table that must be KV
   * @throws TableTypeError if it is a KKV table
   */
  async getKvTable(name: StoreName): Promise<KvTable> {
    const table = await this.getTable(name);
    if (table.type !== "kv") {
      await table.close();
      throw new TableTypeError(name, "kv", table.type);
    }
    return table;
  }

  /**
   * Open a table that must be KKV
   * @throws TableTypeError if it is a KV table
   */
  async getKkvTable(name: StoreName): Promise<KkvTable> {
    const table = await this.getTable(name);
    if (table.type !== "kkv") {
      await table.close();
      throw new TableTypeError(name, "kkv", table.type);
    }
    return table;
  }

  /**
   * Every registered table and its type
   */
  async listTables(): Promise<Record<StoreName, TableType>> {
    return this.#exclusive(async () => {
      const result: Record<StoreName, TableType> = {};
      for (const doc of await this.#infoTable().all()) {
        const info = decodeTableInfo(doc);
        result[info.name] = info.type;
      }
      return result;
    });
  }

  async hasTable(name: StoreName): Promise<boolean> {
    validateTableName(name);
    return this.#exclusive(async () => (await this.#findTableInfo(name)) !== null);
  }

  /**
   * Registry record of a table
   * @throws TableNotFoundError if the table is not registered
   */
  async getTableInfo(name: StoreName): Promise<TableInfo> {
    validateTableName(name);
    return this.#exclusive(() => this.#requireTableInfo(name));
  }

  /**
   * Type of a registered table
   * @throws TableNotFoundError if the table is not registered
   */
  async getTableType(name: StoreName): Promise<TableType> {
    return (await this.getTableInfo(name)).type;
  }

  /**
   * Delete a table's file and registry record
   *
   * Table objects still open on it fail with TableNotFoundError afterwards.
   * A file that is already gone is not an error.
   *
   * @throws TableNotFoundError if the table is not registered
   */
  async dropTable(name: StoreName): Promise<void> {
    validateTableName(name);

    await this.#exclusive(async () => {
      try {
        await this.#requireTableInfo(name);
      } catch (err) {
        logger.error("table.drop.error", {
          table: name,
          message: err instanceof Error ? err.message : String(err),
        });
        throw err;
      }

      const filePath = this.tablePath(name);
      await this.#pool.evict(filePath);
      await removeDocument(filePath);
      await this.#removeTableInfo(name);
      logger.info("table.drop", { table: name });
    });
  }

  /**
   * Release the metadata connection and, when this database owns its pool,
   * every table connection
   */
  async close(): Promise<void> {
    await this.#mutex.withLock(async () => {
      if (this.#closed) {
        return;
      }
      this.#closed = true;
      await this.#meta.release();
      if (this.#ownsPool) {
        await this.#pool.close();
      }
    });
  }

  async #createTable(name: StoreName, type: TableType): Promise<TableInfo> {
    try {
      validateTableName(name);
    } catch (err) {
      logger.error("table.create.error", {
        message: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }

    return this.#exclusive(async () => {
      if ((await this.#findTableInfo(name)) !== null) {
        throw new TableExistsError(name);
      }

      // Also resets a file left behind by an interrupted drop
      await atomicWrite(this.tablePath(name), stableStringify({}));
      const info = await this.#addTableInfo(name, type);
      logger.info("table.create", { table: name, details: { type } });
      return info;
    });
  }

  async #exclusive<T>(fn: () => Promise<T>): Promise<T> {
    return this.#mutex.withLock(async () => {
      if (this.#closed) {
        throw new ConnectionError(this.tableInfoPath, "database is closed");
      }
      return fn();
    });
  }

  #infoTable(): DocumentTable {
    return this.#meta.connection.table(TABLE_INFO_TABLE);
  }

  async #addTableInfo(name: StoreName, type: TableType): Promise<TableInfo> {
    const now = new Date(this.options.now()).toISOString();
    const [stored] = await this.#infoTable().upsert(
      (current) => ({
        name,
        type,
        created_at: current && isTableInfo(current) ? current.created_at : now,
        updated_at: now,
      }),
      { name }
    );
    if (!stored) {
      throw new ValueTypeError(`Table record for "${name}" was not stored`);
    }
    return decodeTableInfo(stored);
  }

  async #removeTableInfo(name: StoreName): Promise<void> {
    await this.#infoTable().remove({ name });
  }

  async #findTableInfo(name: StoreName): Promise<TableInfo | null> {
    const doc = await this.#infoTable().get({ name });
    return doc ? decodeTableInfo(doc) : null;
  }

  async #requireTableInfo(name: StoreName): Promise<TableInfo> {
    const info = await this.#findTableInfo(name);
    if (!info) {
      throw new TableNotFoundError(name);
    }
    return info;
  }
}

function decodeTableInfo(doc: Document): TableInfo {
  if (!isTableInfo(doc)) {
    throw new ValueTypeError("Malformed table record", describeErrors(isTableInfo, "record"));
  }
  return { name: doc.name, type: doc.type, created_at: doc.created_at, updated_at: doc.updated_at };
}

/**
 * Open a database rooted at `options.root` (or TABLESTORE_ROOT, or ./tablestore)
 *
 * @example
 * ```typescript
 * const db = await openDatabase({ root: './data', cacheTtlMs: 60_000 });
 * await db.createKkvTable('sessions');
 * const sessions = await db.getKkvTable('sessions');
 * await sessions.set('user-1', 'session-a', { data: { ip: '127.0.0.1' } });
 * ```
 */
export function openDatabase(options: OpenDatabaseOptions = {}): Promise<Database> {
  return Database.open(options);
}
