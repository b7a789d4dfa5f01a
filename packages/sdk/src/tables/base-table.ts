/**
 * Behaviour shared by KV and KKV tables
 */

import { isMissingFileError, type EngineSession, type TableSession } from "../engine/connection.js";
import type { ConnectionHandle } from "../engine/pool.js";
import { ConnectionError, TableNotFoundError } from "../errors.js";
import { logger } from "../observability/logs.js";
import type { Clock, StoreName, StoreValue, StoreValueInput, TableType } from "../types.js";

export interface TableContext {
  name: StoreName;
  handle: ConnectionHandle;
  now: Clock;
}

export abstract class AbstractTable {
  abstract readonly type: TableType;
  readonly name: StoreName;
  readonly supportsTransactions = false as const;
  protected readonly handle: ConnectionHandle;
  protected readonly now: Clock;

  constructor(context: TableContext) {
    this.name = context.name;
    this.handle = context.handle;
    this.now = context.now;
  }

  get filePath(): string {
    return this.handle.filePath;
  }

  /**
   * No-op: the engine has no atomic multi-write
   */
  beginTransaction(): void {
    this.#warnTransaction("beginTransaction");
  }

  /**
   * No-op: writes are already applied as they are made
   */
  commit(): void {
    this.#warnTransaction("commit");
  }

  /**
   * No-op: applied writes cannot be undone
   */
  rollback(): void {
    this.#warnTransaction("rollback");
  }

  /**
   * Release this table's reference to the shared connection
   */
  async close(): Promise<void> {
    await this.handle.release();
  }

  /**
   * Run fn under the file mutex against this table's logical table
   * @throws TableNotFoundError if the backing file is gone
   * @throws ConnectionError if this table was closed
   */
  protected async run<T>(fn: (table: TableSession) => Promise<T>): Promise<T> {
    if (this.handle.released) {
      throw new ConnectionError(this.filePath, `table "${this.name}" is closed`);
    }
    try {
      return await this.handle.connection.exclusive((session: EngineSession) =>
        fn(session.table(this.name))
      );
    } catch (err) {
      if (isMissingFileError(err)) {
        throw new TableNotFoundError(this.name, "backing file is missing", { cause: err });
      }
      throw err;
    }
  }

  /**
   * Build the value to store, keeping `created_at` from the stored value when there is one
   */
  protected stamp(input: StoreValueInput, previous: StoreValue | null): StoreValue {
    const now = this.now();
    return {
      created_at: previous?.created_at ?? input.created_at ?? now,
      updated_at: now,
      data: structuredClone(input.data),
    };
  }

  #warnTransaction(verb: string): void {
    logger.warn("table.transaction_unsupported", {
      table: this.name,
      message: `${verb}() has no effect: the document engine does not support transactions`,
    });
  }
}
