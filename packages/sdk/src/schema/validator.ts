/**
 * Compiled JSON Schemas for engine files, table documents and registry records
 */

import { Ajv } from "ajv";
import type { ErrorObject, ValidateFunction } from "ajv";
import formatsPlugin from "ajv-formats";
import type { KkvDocument, KvDocument, StoreValueInput, TableInfo } from "../types.js";

/**
 * Pattern every table name must match
 */
export const TABLE_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_]*$/;

/**
 * Shape of an engine file: logical table name -> document id -> document
 */
export type EngineFile = Record<string, Record<string, Record<string, unknown>>>;

const ajv = new Ajv({ allErrors: true, strict: true });
formatsPlugin.default(ajv, ["date-time"]);

const storeValueSchema = {
  type: "object",
  required: ["created_at", "updated_at", "data"],
  properties: {
    created_at: { type: "number" },
    updated_at: { type: "number" },
    data: { type: "object" },
  },
};

const keySchema = { type: "string", minLength: 1 };

export const engineFileSchema = {
  type: "object",
  additionalProperties: {
    type: "object",
    additionalProperties: { type: "object" },
  },
};

export const kvDocumentSchema = {
  type: "object",
  required: ["key", "value"],
  properties: {
    key: keySchema,
    value: storeValueSchema,
  },
};

export const kkvDocumentSchema = {
  type: "object",
  required: ["key1", "key2", "value"],
  properties: {
    key1: keySchema,
    key2: keySchema,
    value: storeValueSchema,
  },
};

export const storeValueInputSchema = {
  type: "object",
  required: ["data"],
  properties: {
    data: { type: "object" },
    created_at: { type: "number" },
    updated_at: { type: "number" },
  },
};

export const tableInfoSchema = {
  type: "object",
  required: ["name", "type", "created_at", "updated_at"],
  properties: {
    name: { type: "string", pattern: TABLE_NAME_PATTERN.source },
    type: { type: "string", enum: ["kv", "kkv"] },
    created_at: { type: "string", format: "date-time" },
    updated_at: { type: "string", format: "date-time" },
  },
};

export const isEngineFile: ValidateFunction<EngineFile> = ajv.compile<EngineFile>(engineFileSchema);
export const isKvDocument: ValidateFunction<KvDocument> = ajv.compile<KvDocument>(kvDocumentSchema);
export const isKkvDocument: ValidateFunction<KkvDocument> =
  ajv.compile<KkvDocument>(kkvDocumentSchema);
export const isStoreValueInput: ValidateFunction<StoreValueInput> =
  ajv.compile<StoreValueInput>(storeValueInputSchema);
export const isTableInfo: ValidateFunction<TableInfo> = ajv.compile<TableInfo>(tableInfoSchema);

/**
 * Render the errors of the last validation as readable messages
 * @param validate - Compiled validator that just rejected a value
 * @param subject - Name used for the root of the value (e.g. "value")
 */
export function describeErrors(validate: ValidateFunction, subject: string): string[] {
  return (validate.errors ?? []).map((err) => formatError(err, subject));
}

function formatError(err: ErrorObject, subject: string): string {
  const path = err.instancePath ? `${subject}${err.instancePath}` : subject;

  switch (err.keyword) {
    case "required":
      return `${path} is missing required property: ${String(err.params.missingProperty)}`;
    case "type":
      return `${path} must be ${String(err.params.type)}`;
    case "enum":
      return `${path} must be one of the allowed values`;
    case "format":
      return `${path} must match format "${String(err.params.format)}"`;
    case "pattern":
      return `${path} must match pattern ${String(err.params.pattern)}`;
    case "minLength":
      return `${path} must not be empty`;
    default:
      return `${path} ${err.message ?? "is invalid"}`;
  }
}
