/**
 * Two-key table over the JSON document engine
 *
 * Each document is stored as `{ key1, key2, value }` and addressed by the
 * pair. There is no read cache.
 */

import { ValueTypeError } from "../errors.js";
import { logger } from "../observability/logs.js";
import { describeErrors, isKkvDocument } from "../schema/validator.js";
import type {
  Document,
  KkvDocument,
  KkvTable,
  StoreKey,
  StoreValue,
  StoreValueInput,
} from "../types.js";
import { validateKey, validateValue } from "../validation.js";
import { AbstractTable } from "./base-table.js";

export class JsonKkvTable extends AbstractTable implements KkvTable {
  readonly type = "kkv" as const;

  /**
   * Insert or replace the value for a (pkey, skey) pair
   * @returns The value as stored
   * @throws KeyTypeError if either key is not a non-empty string
   * @throws ValueTypeError if `value.data` is not a mapping of plain JSON data
   */
  async set(pkey: StoreKey, skey: StoreKey, value: StoreValueInput): Promise<StoreValue> {
    try {
      validateKey(pkey);
      validateKey(skey);
      validateValue(value);
    } catch (err) {
      logger.error("kkv.set.error", {
        table: this.name,
        message: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }

    logger.debug("kkv.set", { table: this.name, key: `${pkey}/${skey}` });
    const predicate = { key1: pkey, key2: skey };
    return this.run(async (table) => {
      const existing = await table.get(predicate);
      const stored = this.stamp(value, existing ? this.#decode(existing).value : null);
      await table.upsert({ key1: pkey, key2: skey, value: stored }, predicate);
      return stored;
    });
  }

  /**
   * @returns The value, or null if the pair does not exist
   */
  async get(pkey: StoreKey, skey: StoreKey): Promise<StoreValue | null> {
    validateKey(pkey);
    validateKey(skey);

    logger.debug("kkv.get", { table: this.name, key: `${pkey}/${skey}` });
    return this.run(async (table) => {
      const doc = await table.get({ key1: pkey, key2: skey });
      return doc ? this.#decode(doc).value : null;
    });
  }

  /**
   * @returns true if a document was removed, false if the pair did not exist
   */
  async delete(pkey: StoreKey, skey: StoreKey): Promise<boolean> {
    validateKey(pkey);
    validateKey(skey);

    logger.debug("kkv.delete", { table: this.name, key: `${pkey}/${skey}` });
    return this.run(async (table) => (await table.remove({ key1: pkey, key2: skey })) > 0);
  }

  /**
   * Distinct primary keys, in first-insertion order
   */
  async listPkeys(): Promise<StoreKey[]> {
    return this.run(async (table) => {
      const pkeys = new Set<StoreKey>();
      for (const doc of await table.all()) {
        pkeys.add(this.#decode(doc).key1);
      }
      return [...pkeys];
    });
  }

  /**
   * Secondary keys stored under one primary key
   */
  async listSkeys(pkey: StoreKey): Promise<StoreKey[]> {
    validateKey(pkey);
    return this.run(async (table) =>
      (await table.search({ key1: pkey })).map((doc) => this.#decode(doc).key2)
    );
  }

  /**
   * Every value, grouped as pkey -> skey -> value
   */
  async listAll(): Promise<Map<StoreKey, Map<StoreKey, StoreValue>>> {
    return this.run(async (table) => {
      const result = new Map<StoreKey, Map<StoreKey, StoreValue>>();
      for (const doc of await table.all()) {
        const { key1, key2, value } = this.#decode(doc);
        let group = result.get(key1);
        if (!group) {
          group = new Map();
          result.set(key1, group);
        }
        group.set(key2, value);
      }
      return result;
    });
  }

  #decode(doc: Document): KkvDocument {
    if (!isKkvDocument(doc)) {
      throw new ValueTypeError(
        `Malformed document in table "${this.name}"`,
        describeErrors(isKkvDocument, "document")
      );
    }
    return doc;
  }
}
