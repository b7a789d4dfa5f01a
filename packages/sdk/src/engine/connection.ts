/**
 * JSON file document engine
 *
 * One engine file holds any number of logical tables:
 *
 *   { "<table>": { "1": { ...doc }, "2": { ...doc } } }
 *
 * Document ids are increasing integers stored as string keys. The connection
 * keeps a parsed snapshot and re-reads the file whenever its mtime or size
 * changes, so edits made outside the connection become visible.
 *
 * Invariants:
 * - Every operation runs under the connection's mutex
 * - The snapshot is replaced only after a write has landed on disk, and
 *   holds the parsed form of what was written
 * - Documents handed out are copies; callers cannot mutate the snapshot
 */

import { dirname } from "node:path";
import { ConnectionError, DocumentNotFoundError, TableStoreError } from "../errors.js";
import { stableStringify } from "../format.js";
import { atomicWrite, ensureDirectory, readDocument, statFile } from "../io.js";
import { Mutex } from "../lock.js";
import { logger } from "../observability/logs.js";
import { matches } from "../query.js";
import { isEngineFile, type EngineFile } from "../schema/validator.js";
import type { Document, Filter } from "../types.js";

/**
 * Replacement document, or a function deriving it from the current match
 */
export type UpsertDocument = Document | ((current: Document | null) => Document);

export type CloseReason = "released" | "dropped";

interface FileStamp {
  mtimeMs: number;
  size: number;
}

interface EngineIO {
  read(): Promise<EngineFile>;
  /** Persist data; resolves to the file as it will read back */
  write(data: EngineFile): Promise<EngineFile>;
}

function sortedEntries(table: Record<string, Document>): Array<[string, Document]> {
  return Object.entries(table).sort(([a], [b]) => Number(a) - Number(b));
}

/**
 * Unlocked operations on one logical table, valid inside `exclusive()`
 */
export class TableSession {
  #io: EngineIO;
  readonly name: string;

  constructor(io: EngineIO, name: string) {
    this.#io = io;
    this.name = name;
  }

  async #entries(): Promise<Array<[string, Document]>> {
    const data = await this.#io.read();
    return sortedEntries(data[this.name] ?? {});
  }

  /**
   * Every document, in insertion order
   */
  async all(): Promise<Document[]> {
    return (await this.#entries()).map(([, doc]) => structuredClone(doc));
  }

  /**
   * Every document matching the predicate
   */
  async search(predicate: Filter): Promise<Document[]> {
    return (await this.#entries())
      .filter(([, doc]) => matches(doc, predicate))
      .map(([, doc]) => structuredClone(doc));
  }

  /**
   * First document matching the predicate, or null
   */
  async get(predicate: Filter): Promise<Document | null> {
    const found = (await this.#entries()).find(([, doc]) => matches(doc, predicate));
    return found ? structuredClone(found[1]) : null;
  }

  async contains(predicate: Filter): Promise<boolean> {
    return (await this.#entries()).some(([, doc]) => matches(doc, predicate));
  }

  /**
   * Insert the document if nothing matches, otherwise merge its fields into every match
   * @returns The documents as stored
   */
  async upsert(document: UpsertDocument, predicate: Filter): Promise<Document[]> {
    const data = await this.#io.read();
    const table: Record<string, Document> = { ...(data[this.name] ?? {}) };
    const resolve = (current: Document | null): Document =>
      structuredClone(typeof document === "function" ? document(current) : document);

    const matchingIds = Object.keys(table).filter((id) => {
      const doc = table[id];
      return doc !== undefined && matches(doc, predicate);
    });

    const storedIds: string[] = [];
    if (matchingIds.length === 0) {
      const nextId = String(
        Object.keys(table).reduce((max, id) => Math.max(max, Number(id)), 0) + 1
      );
      table[nextId] = resolve(null);
      storedIds.push(nextId);
    } else {
      for (const id of matchingIds) {
        const current = table[id] ?? {};
        table[id] = { ...current, ...resolve(structuredClone(current)) };
        storedIds.push(id);
      }
    }

    const written = (await this.#io.write({ ...data, [this.name]: table }))[this.name] ?? {};
    return storedIds.flatMap((id) => {
      const doc = written[id];
      return doc === undefined ? [] : [structuredClone(doc)];
    });
  }

  /**
   * Remove every document matching the predicate
   * @returns Number of documents removed
   */
  async remove(predicate: Filter): Promise<number> {
    const data = await this.#io.read();
    const table = data[this.name] ?? {};
    const kept: Record<string, Document> = {};
    let removed = 0;

    for (const [id, doc] of Object.entries(table)) {
      if (matches(doc, predicate)) {
        removed++;
      } else {
        kept[id] = doc;
      }
    }

    if (removed > 0) {
      await this.#io.write({ ...data, [this.name]: kept });
    }
    return removed;
  }

  /**
   * Remove the whole logical table
   * @returns true if it existed
   */
  async drop(): Promise<boolean> {
    const data = await this.#io.read();
    if (!(this.name in data)) {
      return false;
    }
    const rest: EngineFile = { ...data };
    delete rest[this.name];
    await this.#io.write(rest);
    return true;
  }
}

/**
 * Locked view of one logical table; each call is its own critical section
 */
export class DocumentTable {
  #connection: DocumentConnection;
  readonly name: string;

  constructor(connection: DocumentConnection, name: string) {
    this.#connection = connection;
    this.name = name;
  }

  all(): Promise<Document[]> {
    return this.#connection.exclusive((s) => s.table(this.name).all());
  }

  search(predicate: Filter): Promise<Document[]> {
    return this.#connection.exclusive((s) => s.table(this.name).search(predicate));
  }

  get(predicate: Filter): Promise<Document | null> {
    return this.#connection.exclusive((s) => s.table(this.name).get(predicate));
  }

  contains(predicate: Filter): Promise<boolean> {
    return this.#connection.exclusive((s) => s.table(this.name).contains(predicate));
  }

  upsert(document: UpsertDocument, predicate: Filter): Promise<Document[]> {
    return this.#connection.exclusive((s) => s.table(this.name).upsert(document, predicate));
  }

  remove(predicate: Filter): Promise<number> {
    return this.#connection.exclusive((s) => s.table(this.name).remove(predicate));
  }

  drop(): Promise<boolean> {
    return this.#connection.exclusive((s) => s.table(this.name).drop());
  }
}

/**
 * Handle passed to `exclusive()` callbacks
 */
export interface EngineSession {
  table(name: string): TableSession;
}

/**
 * Connection to one engine file
 */
export class DocumentConnection {
  readonly filePath: string;
  #mutex = new Mutex();
  #snapshot: EngineFile = {};
  #stamp: FileStamp | null = null;
  #closeReason: CloseReason | null = null;
  #io: EngineIO;

  private constructor(filePath: string) {
    this.filePath = filePath;
    this.#io = {
      read: () => this.#read(),
      write: (data) => this.#write(data),
    };
  }

  /**
   * Open a connection, creating an empty engine file if none exists
   * @throws ConnectionError if the file cannot be created, read or parsed
   */
  static async open(filePath: string): Promise<DocumentConnection> {
    const connection = new DocumentConnection(filePath);
    try {
      await ensureDirectory(dirname(filePath));
      if ((await statFile(filePath)) === null) {
        await atomicWrite(filePath, stableStringify({}));
      }
      await connection.#read();
    } catch (err) {
      if (err instanceof ConnectionError) {
        throw err;
      }
      throw new ConnectionError(filePath, "cannot open engine file", { cause: err });
    }
    return connection;
  }

  get closed(): boolean {
    return this.#closeReason !== null;
  }

  /**
   * Run fn with this file's mutex held
   * @throws ConnectionError if the connection was released
   * @throws DocumentNotFoundError if the connection was closed because its file was dropped
   */
  exclusive<T>(fn: (session: EngineSession) => Promise<T>): Promise<T> {
    return this.#mutex.withLock(async () => {
      this.#assertOpen();
      return fn({ table: (name) => new TableSession(this.#io, name) });
    });
  }

  /**
   * Locked access to a logical table
   */
  table(name: string): DocumentTable {
    return new DocumentTable(this, name);
  }

  /**
   * Close after in-flight operations finish; later operations fail
   */
  async close(reason: CloseReason = "released"): Promise<void> {
    await this.#mutex.withLock(async () => {
      if (this.#closeReason === null) {
        this.#closeReason = reason;
        this.#snapshot = {};
        this.#stamp = null;
      }
    });
  }

  #assertOpen(): void {
    if (this.#closeReason === "dropped") {
      throw new DocumentNotFoundError(this.filePath);
    }
    if (this.#closeReason === "released") {
      throw new ConnectionError(this.filePath, "connection is closed");
    }
  }

  async #read(): Promise<EngineFile> {
    const stats = await statFile(this.filePath);
    if (stats === null) {
      throw new DocumentNotFoundError(this.filePath);
    }

    if (
      this.#stamp !== null &&
      this.#stamp.mtimeMs === stats.mtimeMs &&
      this.#stamp.size === stats.size
    ) {
      return this.#snapshot;
    }

    const content = await readDocument(this.filePath);
    this.#snapshot = this.#parse(content);
    this.#stamp = { mtimeMs: stats.mtimeMs, size: stats.size };
    logger.debug("engine.reload", { details: { path: this.filePath, bytes: stats.size } });
    return this.#snapshot;
  }

  #parse(content: string): EngineFile {
    if (content.trim() === "") {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      throw new ConnectionError(this.filePath, "file is not valid JSON", { cause: err });
    }

    if (!isEngineFile(parsed)) {
      throw new ConnectionError(this.filePath, "file does not hold engine tables");
    }
    return parsed;
  }

  async #write(data: EngineFile): Promise<EngineFile> {
    const content = stableStringify(data);
    const written = this.#parse(content);
    await atomicWrite(this.filePath, content);
    const stats = await statFile(this.filePath);
    this.#snapshot = written;
    this.#stamp = stats ? { mtimeMs: stats.mtimeMs, size: stats.size } : null;
    return written;
  }
}

/**
 * True for errors meaning the engine file is gone
 */
export function isMissingFileError(err: unknown): boolean {
  return err instanceof TableStoreError && err.code === "ENOENT";
}
