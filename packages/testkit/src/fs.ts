/**
 * File system test utilities
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openDatabase } from "@tablestore/sdk";
import type { Database, OpenDatabaseOptions } from "@tablestore/sdk";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "tablestore-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempRoot(prefix = "tablestore-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Execute a function with a clean temp directory
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempRoot();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}

/**
 * Execute a function with a database in a temp directory, closing and
 * removing it afterwards
 * @param options - Database options (root is overridden)
 * @returns Result of fn
 */
export async function withTempDatabase<T>(
  fn: (db: Database, root: string) => Promise<T>,
  options: Omit<OpenDatabaseOptions, "root"> = {}
): Promise<T> {
  const root = await createTempRoot();
  let db: Database;
  try {
    db = await openDatabase({ ...options, root });
  } catch (err) {
    await removeDir(root);
    throw err;
  }

  try {
    return await fn(db, root);
  } finally {
    await db.close();
    await removeDir(root);
  }
}
