/**
 * Option resolution: explicit option > environment > default
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { DEFAULT_CACHE_MAX_SIZE, DEFAULT_CACHE_TTL_MS } from "./cache.js";
import type { CacheScope, Clock, DatabaseOptions } from "./types.js";

export const DEFAULT_ROOT = "./tablestore";

export interface ResolvedDatabaseOptions {
  root: string;
  cacheTtlMs: number;
  cacheMaxSize: number;
  cacheScope: CacheScope;
  now: Clock;
}

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // "~user" style references are left untouched
    return input;
  }

  return path.join(homedir(), match[2] ?? "");
}

function readNonNegativeInt(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const value = Number(raw);
  return Number.isInteger(value) && value >= 0 ? value : undefined;
}

function readCacheScope(raw: string | undefined): CacheScope | undefined {
  return raw === "instance" || raw === "file" ? raw : undefined;
}

/**
 * Resolve database options against TABLESTORE_* environment variables
 *
 * - TABLESTORE_ROOT: root directory
 * - TABLESTORE_CACHE_TTL_MS: KV cache TTL in milliseconds
 * - TABLESTORE_CACHE_SIZE: KV cache entry limit (0 disables caching)
 * - TABLESTORE_CACHE_SCOPE: "instance" or "file"
 *
 * Unparseable environment values fall back to the defaults.
 */
export function resolveDatabaseOptions(
  options: DatabaseOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedDatabaseOptions {
  const root = options.root ?? env.TABLESTORE_ROOT ?? DEFAULT_ROOT;

  return {
    root: path.resolve(expandTilde(root)),
    cacheTtlMs:
      options.cacheTtlMs ?? readNonNegativeInt(env.TABLESTORE_CACHE_TTL_MS) ?? DEFAULT_CACHE_TTL_MS,
    cacheMaxSize:
      options.cacheMaxSize ?? readNonNegativeInt(env.TABLESTORE_CACHE_SIZE) ?? DEFAULT_CACHE_MAX_SIZE,
    cacheScope: options.cacheScope ?? readCacheScope(env.TABLESTORE_CACHE_SCOPE) ?? "instance",
    now: options.now ?? Date.now,
  };
}
