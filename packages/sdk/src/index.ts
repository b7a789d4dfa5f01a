/**
 * Table store SDK
 *
 * KV and KKV document tables over JSON engine files, with a table registry
 */

// Re-export types
export type {
  StoreKey,
  StoreName,
  StoreData,
  StoreValue,
  StoreValueInput,
  TableType,
  TableInfo,
  Document,
  Filter,
  KvDocument,
  KkvDocument,
  CacheScope,
  Clock,
  BaseTable,
  KvTable,
  KkvTable,
  Table,
  DatabaseOptions,
} from "./types.js";

// Registry
export {
  Database,
  openDatabase,
  TABLE_INFO_FILE,
  TABLE_FILE_EXTENSION,
  type OpenDatabaseOptions,
} from "./database.js";

// Tables
export { JsonKvTable, type KvCacheOptions } from "./tables/kv-table.js";
export { JsonKkvTable } from "./tables/kkv-table.js";

// Document engine
export {
  DocumentConnection,
  DocumentTable,
  TableSession,
  type EngineSession,
  type UpsertDocument,
} from "./engine/connection.js";
export { ConnectionPool, ConnectionHandle } from "./engine/pool.js";

// Cache, locking and configuration
export type { CacheEntry, CacheOptions, CacheStats } from "./cache.js";
export { TtlCache, DEFAULT_CACHE_TTL_MS, DEFAULT_CACHE_MAX_SIZE } from "./cache.js";
export { Mutex } from "./lock.js";
export {
  resolveDatabaseOptions,
  expandTilde,
  DEFAULT_ROOT,
  type ResolvedDatabaseOptions,
} from "./config.js";

// Utilities
export { stableStringify } from "./format.js";
export { matches, getPath } from "./query.js";
export {
  validateTableName,
  validateKey,
  validateValue,
  TABLE_INFO_TABLE,
  RESERVED_TABLE_NAMES,
} from "./validation.js";
export { TABLE_NAME_PATTERN } from "./schema/validator.js";
export { atomicWrite, readDocument, removeDocument, ensureDirectory, statFile } from "./io.js";

// Logging
export { logger, Logger, levelFromEnv, type LogEntry, type LogLevel } from "./observability/logs.js";

// Errors
export {
  TableStoreError,
  KeyTypeError,
  ValueTypeError,
  TableNameError,
  TableExistsError,
  TableNotFoundError,
  TableTypeError,
  ConnectionError,
  DocumentNotFoundError,
  DocumentReadError,
  DocumentWriteError,
  DocumentRemoveError,
  DirectoryError,
} from "./errors.js";
