/**
 * Single-key table over the JSON document engine
 *
 * Each document is stored as `{ key, value }`. Reads go through a TTL cache:
 * a hit is served while it is younger than the TTL, a miss or an expired
 * entry falls through to the engine. Negative results are never cached.
 * Every operation, cache lookups included, runs under the file lock in the
 * order it was called.
 */

import { TtlCache, type CacheStats } from "../cache.js";
import { ValueTypeError } from "../errors.js";
import { logger } from "../observability/logs.js";
import { describeErrors, isKvDocument } from "../schema/validator.js";
import type {
  CacheScope,
  Document,
  KvDocument,
  KvTable,
  StoreKey,
  StoreValue,
  StoreValueInput,
} from "../types.js";
import { validateKey, validateValue } from "../validation.js";
import { AbstractTable, type TableContext } from "./base-table.js";

export interface KvCacheOptions {
  ttlMs: number;
  maxSize: number;
  scope: CacheScope;
}

export class JsonKvTable extends AbstractTable implements KvTable {
  readonly type = "kv" as const;
  #cache: TtlCache<StoreValue>;

  constructor(context: TableContext, cache: KvCacheOptions) {
    super(context);
    const create = (): TtlCache<StoreValue> =>
      new TtlCache<StoreValue>({ ttlMs: cache.ttlMs, maxSize: cache.maxSize, now: context.now });
    this.#cache =
      cache.scope === "file" ? context.handle.sharedCache(context.name, create) : create();
  }

  /**
   * Insert or replace the value for a key
   *
   * `updated_at` is stamped on every write; `created_at` is kept from the
   * stored value when the key already exists.
   *
   * @returns The value as stored
   * @throws KeyTypeError if the key is not a non-empty string
   * @throws ValueTypeError if `value.data` is not a mapping of plain JSON data
   */
  async set(key: StoreKey, value: StoreValueInput): Promise<StoreValue> {
    try {
      validateKey(key);
      validateValue(value);
    } catch (err) {
      logger.error("kv.set.error", { table: this.name, message: errorMessage(err) });
      throw err;
    }

    logger.debug("kv.set", { table: this.name, key });
    return this.run(async (table) => {
      const existing = await table.get({ key });
      const stored = this.stamp(value, existing ? this.#decode(existing).value : null);
      await table.upsert({ key, value: stored }, { key });
      this.#cache.set(key, stored);
      return structuredClone(stored);
    });
  }

  /**
   * Read the value for a key
   * @returns The value, or null if the key does not exist
   */
  async get(key: StoreKey): Promise<StoreValue | null> {
    validateKey(key);

    return this.run(async (table) => {
      // Looked up under the file lock so earlier writes through this table have landed
      const cached = this.#cache.get(key);
      if (cached) {
        return structuredClone(cached);
      }

      logger.debug("kv.get", { table: this.name, key });
      const doc = await table.get({ key });
      if (!doc) {
        return null;
      }
      const { value } = this.#decode(doc);
      this.#cache.set(key, value);
      return structuredClone(value);
    });
  }

  /**
   * Delete a key
   * @returns true if a document was removed, false if the key did not exist
   */
  async delete(key: StoreKey): Promise<boolean> {
    validateKey(key);

    logger.debug("kv.delete", { table: this.name, key });
    return this.run(async (table) => {
      const removed = await table.remove({ key });
      this.#cache.delete(key);
      return removed > 0;
    });
  }

  /**
   * Every key in the backing store (the cache is not consulted)
   */
  async listKeys(): Promise<StoreKey[]> {
    return this.run(async (table) => (await table.all()).map((doc) => this.#decode(doc).key));
  }

  /**
   * Every key and value in the backing store
   */
  async listAll(): Promise<Map<StoreKey, StoreValue>> {
    return this.run(async (table) => {
      const result = new Map<StoreKey, StoreValue>();
      for (const doc of await table.all()) {
        const { key, value } = this.#decode(doc);
        result.set(key, value);
      }
      return result;
    });
  }

  cacheStats(): CacheStats {
    return this.#cache.stats();
  }

  clearCache(): void {
    this.#cache.clear();
  }

  #decode(doc: Document): KvDocument {
    if (!isKvDocument(doc)) {
      throw new ValueTypeError(
        `Malformed document in table "${this.name}"`,
        describeErrors(isKvDocument, "document")
      );
    }
    return doc;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
