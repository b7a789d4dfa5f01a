import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { createTempRoot, removeDir, withTempDir } from "@tablestore/testkit";
import { DocumentConnection } from "./connection.js";
import { ConnectionError, DocumentNotFoundError } from "../errors.js";

describe("DocumentConnection", () => {
  let testDir: string;
  let filePath: string;
  let connection: DocumentConnection;

  beforeEach(async () => {
    testDir = await createTempRoot("tablestore-engine-");
    filePath = join(testDir, "orders.json");
    connection = await DocumentConnection.open(filePath);
  });

  afterEach(async () => {
    await connection.close();
    await removeDir(testDir);
  });

  async function readRaw(): Promise<unknown> {
    return JSON.parse(await readFile(filePath, "utf-8"));
  }

  describe("open()", () => {
    it("should create an empty engine file", async () => {
      expect(await readFile(filePath, "utf-8")).toBe("{}\n");
    });

    it("should keep an existing file's contents", async () => {
      const other = join(testDir, "existing.json");
      await writeFile(other, JSON.stringify({ t: { "1": { key: "a" } } }));

      const existing = await DocumentConnection.open(other);
      try {
        expect(await existing.table("t").all()).toEqual([{ key: "a" }]);
      } finally {
        await existing.close();
      }
    });

    it("should reject a file that is not JSON", async () => {
      const other = join(testDir, "broken.json");
      await writeFile(other, "not json");

      const error = await DocumentConnection.open(other).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(ConnectionError);
      expect(error).toMatchObject({
        message: `Connection to ${other} failed: file is not valid JSON`,
      });
    });

    it("should reject JSON that does not hold engine tables", async () => {
      const other = join(testDir, "shape.json");
      await writeFile(other, JSON.stringify({ t: [] }));

      await expect(DocumentConnection.open(other)).rejects.toThrow(
        "file does not hold engine tables"
      );
    });

    it("should treat an empty file as an empty engine", async () => {
      const other = join(testDir, "empty.json");
      await writeFile(other, "");

      const empty = await DocumentConnection.open(other);
      try {
        expect(await empty.table("t").all()).toEqual([]);
      } finally {
        await empty.close();
      }
    });

    it("should create missing parent directories", async () => {
      await withTempDir(async (dir) => {
        const nested = join(dir, "a", "b", "t.json");

        const opened = await DocumentConnection.open(nested);
        try {
          expect(await readFile(nested, "utf-8")).toBe("{}\n");
          expect(await opened.table("t").all()).toEqual([]);
        } finally {
          await opened.close();
        }
      });
    });
  });

  describe("upsert()", () => {
    it("should insert documents with increasing ids", async () => {
      const table = connection.table("t");

      await table.upsert({ key: "a" }, { key: "a" });
      await table.upsert({ key: "b" }, { key: "b" });

      expect(await readRaw()).toEqual({ t: { "1": { key: "a" }, "2": { key: "b" } } });
    });

    it("should merge fields into a matching document", async () => {
      const table = connection.table("t");
      await table.upsert({ key: "a", n: 1, keep: true }, { key: "a" });

      const stored = await table.upsert({ key: "a", n: 2 }, { key: "a" });

      expect(stored).toEqual([{ key: "a", n: 2, keep: true }]);
      expect(await table.all()).toEqual([{ key: "a", n: 2, keep: true }]);
    });

    it("should pass the current document to an updater", async () => {
      const table = connection.table("t");
      await table.upsert({ key: "a", n: 1 }, { key: "a" });

      const seen: unknown[] = [];
      await table.upsert(
        (current) => {
          seen.push(current);
          const n = current?.n;
          return { n: typeof n === "number" ? n + 1 : 0 };
        },
        { key: "a" }
      );
      await table.upsert(
        (current) => {
          seen.push(current);
          return { key: "b", n: 0 };
        },
        { key: "b" }
      );

      expect(seen).toEqual([{ key: "a", n: 1 }, null]);
      expect(await table.all()).toEqual([
        { key: "a", n: 2 },
        { key: "b", n: 0 },
      ]);
    });

    it("should number new documents after the highest remaining id", async () => {
      const table = connection.table("t");
      await table.upsert({ key: "a" }, { key: "a" });
      await table.upsert({ key: "b" }, { key: "b" });
      await table.upsert({ key: "c" }, { key: "c" });
      await table.remove({ key: "b" });
      await table.upsert({ key: "d" }, { key: "d" });

      expect(await readRaw()).toEqual({
        t: { "1": { key: "a" }, "3": { key: "c" }, "4": { key: "d" } },
      });
      expect((await table.all()).map((doc) => doc.key)).toEqual(["a", "c", "d"]);
    });

    it("should return and keep documents as the file reads them back", async () => {
      const table = connection.table("t");

      const stored = await table.upsert(
        { key: "a", when: new Date(0), n: Number.NaN },
        { key: "a" }
      );

      expect(stored).toEqual([{ key: "a", n: null, when: {} }]);
      expect(await table.get({ key: "a" })).toEqual({ key: "a", n: null, when: {} });
      expect(await readRaw()).toEqual({ t: { "1": { key: "a", n: null, when: {} } } });
    });

    it("should keep logical tables apart", async () => {
      await connection.table("t1").upsert({ key: "a", from: 1 }, { key: "a" });
      await connection.table("t2").upsert({ key: "a", from: 2 }, { key: "a" });

      expect(await connection.table("t1").get({ key: "a" })).toEqual({ key: "a", from: 1 });
      expect(await connection.table("t2").get({ key: "a" })).toEqual({ key: "a", from: 2 });
    });
  });

  describe("reads", () => {
    beforeEach(async () => {
      const table = connection.table("t");
      await table.upsert({ key1: "u1", key2: "s1", n: 1 }, { key1: "u1", key2: "s1" });
      await table.upsert({ key1: "u1", key2: "s2", n: 2 }, { key1: "u1", key2: "s2" });
      await table.upsert({ key1: "u2", key2: "s1", n: 3 }, { key1: "u2", key2: "s1" });
    });

    it("should search with a predicate", async () => {
      const found = await connection.table("t").search({ key1: "u1" });
      expect(found.map((doc) => doc.key2)).toEqual(["s1", "s2"]);
    });

    it("should search by several fields", async () => {
      const found = await connection.table("t").search({ key1: "u1", key2: "s2" });
      expect(found).toEqual([{ key1: "u1", key2: "s2", n: 2 }]);
    });

    it("should return the first match or null", async () => {
      const table = connection.table("t");
      expect(await table.get({ key2: "s1" })).toEqual({ key1: "u1", key2: "s1", n: 1 });
      expect(await table.get({ key2: "s9" })).toBeNull();
      expect(await table.contains({ key1: "u2" })).toBe(true);
    });

    it("should hand out copies", async () => {
      const table = connection.table("t");
      const doc = await table.get({ key1: "u2" });
      if (doc) {
        doc.n = 99;
      }

      expect(await table.get({ key1: "u2" })).toEqual({ key1: "u2", key2: "s1", n: 3 });
    });
  });

  describe("remove() and drop()", () => {
    it("should report how many documents were removed", async () => {
      const table = connection.table("t");
      await table.upsert({ key1: "u1", key2: "s1" }, { key1: "u1", key2: "s1" });
      await table.upsert({ key1: "u1", key2: "s2" }, { key1: "u1", key2: "s2" });

      expect(await table.remove({ key1: "u1" })).toBe(2);
      expect(await table.remove({ key1: "u1" })).toBe(0);
    });

    it("should drop a whole logical table", async () => {
      await connection.table("t1").upsert({ key: "a" }, { key: "a" });
      await connection.table("t2").upsert({ key: "b" }, { key: "b" });

      expect(await connection.table("t1").drop()).toBe(true);
      expect(await connection.table("t1").drop()).toBe(false);
      expect(await readRaw()).toEqual({ t2: { "1": { key: "b" } } });
    });
  });

  describe("external changes", () => {
    it("should reload a file edited outside the connection", async () => {
      const table = connection.table("t");
      await table.upsert({ key: "a", n: 1 }, { key: "a" });

      await writeFile(filePath, JSON.stringify({ t: { "1": { key: "a", n: 12345 } } }));

      expect(await table.get({ key: "a" })).toEqual({ key: "a", n: 12345 });
    });

    it("should fail with ConnectionError when the file is corrupted", async () => {
      await writeFile(filePath, "{ broken");

      await expect(connection.table("t").all()).rejects.toBeInstanceOf(ConnectionError);
    });

    it("should fail with DocumentNotFoundError when the file is deleted", async () => {
      await rm(filePath);

      await expect(connection.table("t").all()).rejects.toBeInstanceOf(DocumentNotFoundError);
    });
  });

  describe("close()", () => {
    it("should reject operations after a release", async () => {
      await connection.close();

      expect(connection.closed).toBe(true);
      await expect(connection.table("t").all()).rejects.toThrow(
        `Connection to ${filePath} failed: connection is closed`
      );
    });

    it("should report a dropped file as missing", async () => {
      await connection.close("dropped");

      await expect(connection.table("t").all()).rejects.toBeInstanceOf(DocumentNotFoundError);
    });

    it("should let in-flight operations finish", async () => {
      const pending = connection.table("t").upsert({ key: "a" }, { key: "a" });
      const closing = connection.close();

      await expect(pending).resolves.toEqual([{ key: "a" }]);
      await closing;
      expect(await readRaw()).toEqual({ t: { "1": { key: "a" } } });
    });
  });
});
