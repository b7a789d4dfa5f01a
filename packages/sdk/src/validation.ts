/**
 * Validation at the table and registry boundary
 *
 * Every check runs before any mutation is attempted.
 */

import { KeyTypeError, TableNameError, ValueTypeError } from "./errors.js";
import { TABLE_NAME_PATTERN, describeErrors, isStoreValueInput } from "./schema/validator.js";
import type { StoreKey, StoreName, StoreValueInput } from "./types.js";

/**
 * Name of the registry table inside the metadata file
 */
export const TABLE_INFO_TABLE = "_table_info";

/**
 * Names no user table may take
 */
export const RESERVED_TABLE_NAMES: ReadonlySet<string> = new Set([TABLE_INFO_TABLE]);

/**
 * Validate a table name
 * @throws TableNameError if the name is not a string, is reserved, or fails the syntax rule
 */
export function validateTableName(name: unknown): asserts name is StoreName {
  if (typeof name !== "string") {
    throw new TableNameError(name, "table name must be a string");
  }

  if (RESERVED_TABLE_NAMES.has(name)) {
    throw new TableNameError(name, "name is reserved for table metadata");
  }

  if (!TABLE_NAME_PATTERN.test(name)) {
    throw new TableNameError(
      name,
      "must start with a letter and contain only letters, numbers and underscores"
    );
  }
}

/**
 * Validate a table key
 * @throws KeyTypeError if the key is not a non-empty string
 */
export function validateKey(key: unknown): asserts key is StoreKey {
  if (typeof key !== "string" || key.length === 0) {
    throw new KeyTypeError(key);
  }
}

/**
 * Validate a value passed to `set`
 * @throws ValueTypeError if the value is not an object, or its `data` is not a mapping of plain JSON data
 */
export function validateValue(value: unknown): asserts value is StoreValueInput {
  if (!isStoreValueInput(value)) {
    throw new ValueTypeError("Invalid store value", describeErrors(isStoreValueInput, "value"));
  }

  const problems: string[] = [];
  collectJsonProblems(value.data, "value/data", new Set(), problems);
  if (problems.length > 0) {
    throw new ValueTypeError("Invalid store value", problems);
  }
}

function constructorName(value: object): string {
  const ctor: unknown = Reflect.get(value, "constructor");
  return typeof ctor === "function" && ctor.name !== "" ? ctor.name : "object";
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Record every place where value would not survive a JSON round trip unchanged
 */
function collectJsonProblems(
  value: unknown,
  path: string,
  ancestors: Set<object>,
  problems: string[]
): void {
  switch (typeof value) {
    case "string":
    case "boolean":
      return;
    case "number":
      if (!Number.isFinite(value)) {
        problems.push(`${path} must be a finite number`);
      }
      return;
    case "undefined":
      problems.push(`${path} must not be undefined`);
      return;
    case "bigint":
    case "function":
    case "symbol":
      problems.push(`${path} must be JSON data, got ${typeof value}`);
      return;
  }

  if (value === null || typeof value !== "object") {
    return;
  }
  if (ancestors.has(value)) {
    problems.push(`${path} is a circular reference`);
    return;
  }

  ancestors.add(value);
  if (Array.isArray(value)) {
    for (let i = 0; i < value.length; i++) {
      collectJsonProblems(value[i], `${path}/${i}`, ancestors, problems);
    }
  } else if (!isPlainObject(value)) {
    problems.push(`${path} must be a plain object, got ${constructorName(value)}`);
  } else {
    for (const key of Object.keys(value)) {
      collectJsonProblems(Reflect.get(value, key), `${path}/${key}`, ancestors, problems);
    }
  }
  ancestors.delete(value);
}
