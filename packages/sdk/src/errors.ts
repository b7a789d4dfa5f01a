/**
 * Error types for table store operations
 *
 * Invariants:
 * - Every error carries a stable `name` and `code` for programmatic handling
 * - Every error supports a `cause` property for wrapping underlying errors
 * - Engine I/O errors include the absolute file path in the message
 */

/**
 * Base class for all table store errors
 */
export abstract class TableStoreError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a supplied key is not a non-empty string
 */
export class KeyTypeError extends TableStoreError {
  readonly code = "E_KEY_TYPE";

  constructor(
    public readonly key: unknown,
    options?: ErrorOptions
  ) {
    super(`Key must be a non-empty string, got ${describe(key)}`, options);
  }
}

/**
 * Thrown when a value is malformed or its `data` is not a mapping
 */
export class ValueTypeError extends TableStoreError {
  readonly code = "E_VALUE_TYPE";

  constructor(
    message: string,
    public readonly problems: string[] = [],
    options?: ErrorOptions
  ) {
    super(problems.length > 0 ? `${message}: ${problems.join("; ")}` : message, options);
  }
}

/**
 * Thrown when a table name fails the syntax rule or collides with a reserved name
 */
export class TableNameError extends TableStoreError {
  readonly code = "E_TABLE_NAME";

  constructor(
    public readonly tableName: unknown,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid table name ${describe(tableName)}: ${reason}`, options);
  }
}

/**
 * Thrown when creating a table whose name is already registered
 */
export class TableExistsError extends TableStoreError {
  readonly code = "E_TABLE_EXISTS";

  constructor(
    public readonly tableName: string,
    options?: ErrorOptions
  ) {
    super(`Table already exists: ${tableName}`, options);
  }
}

/**
 * Thrown when a table is not registered or its backing file has vanished
 */
export class TableNotFoundError extends TableStoreError {
  readonly code = "E_TABLE_NOT_FOUND";

  constructor(
    public readonly tableName: string,
    detail?: string,
    options?: ErrorOptions
  ) {
    super(
      detail ? `Table not found: ${tableName} (${detail})` : `Table not found: ${tableName}`,
      options
    );
  }
}

/**
 * Thrown by the typed getters when a table has the other shape
 */
export class TableTypeError extends TableStoreError {
  readonly code = "E_TABLE_TYPE";

  constructor(
    public readonly tableName: string,
    public readonly expected: string,
    public readonly actual: string,
    options?: ErrorOptions
  ) {
    super(`Table "${tableName}" is a ${actual} table, expected ${expected}`, options);
  }
}

/**
 * Thrown when the document engine cannot be opened, parsed or is already closed
 */
export class ConnectionError extends TableStoreError {
  readonly code = "E_CONNECTION";

  constructor(
    public readonly filePath: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Connection to ${filePath} failed: ${reason}`, options);
  }
}

/**
 * Thrown when an engine file cannot be found
 */
export class DocumentNotFoundError extends TableStoreError {
  readonly code = "ENOENT";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Document file not found: ${filePath}`, options);
  }
}

/**
 * Thrown when an engine file read fails
 */
export class DocumentReadError extends TableStoreError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read document file: ${filePath}`, options);
  }
}

/**
 * Thrown when an engine file write fails
 */
export class DocumentWriteError extends TableStoreError {
  readonly code = "WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write document file: ${filePath}`, options);
  }
}

/**
 * Thrown when an engine file removal fails
 */
export class DocumentRemoveError extends TableStoreError {
  readonly code = "REMOVE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to remove document file: ${filePath}`, options);
  }
}

/**
 * Thrown when a directory operation fails
 */
export class DirectoryError extends TableStoreError {
  readonly code = "DIRECTORY_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Directory operation failed: ${dirPath}`, options);
  }
}

/**
 * Read the `code` of a Node.js system error, if any
 */
export function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    const { code } = err;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

function describe(value: unknown): string {
  if (typeof value === "string") {
    return JSON.stringify(value);
  }
  if (value === null) {
    return "null";
  }
  return Array.isArray(value) ? "array" : typeof value;
}
