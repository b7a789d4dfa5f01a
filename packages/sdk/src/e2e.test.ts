/**
 * End-to-end tests: registry, both table types and the engine files together
 */

import { describe, it, expect } from "vitest";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { manualClock, withTempDatabase } from "@tablestore/testkit";
import { TableNotFoundError } from "./errors.js";
import { stableStringify } from "./format.js";

describe("tablestore end-to-end", () => {
  it("should run a complete KV and KKV workflow", async () => {
    const clock = manualClock(1_000);

    await withTempDatabase(
      async (db, root) => {
        // 1. Create one table of each type
        await db.createKvTable("inventory");
        await db.createKkvTable("carts");
        expect(await db.listTables()).toEqual({ inventory: "kv", carts: "kkv" });

        // 2. Write through typed handles
        const inventory = await db.getKvTable("inventory");
        const carts = await db.getKkvTable("carts");
        await inventory.set("sku-1", { data: { stock: 3 } });
        await inventory.set("sku-2", { data: { stock: 0 } });
        await carts.set("alice", "sku-1", { data: { qty: 2 } });
        await carts.set("bob", "sku-2", { data: { qty: 1 } });

        // 3. Update and read back
        clock.advance(5);
        await inventory.set("sku-1", { data: { stock: 1 } });
        expect(await inventory.get("sku-1")).toEqual({
          created_at: 1_000,
          updated_at: 1_005,
          data: { stock: 1 },
        });
        expect(await carts.listPkeys()).toEqual(["alice", "bob"]);

        // 4. Engine file holds exactly what was written, in canonical form
        const file = await readFile(join(root, "inventory.json"), "utf-8");
        expect(file).toBe(
          stableStringify({
            inventory: {
              "1": {
                key: "sku-1",
                value: { created_at: 1_000, updated_at: 1_005, data: { stock: 1 } },
              },
              "2": {
                key: "sku-2",
                value: { created_at: 1_000, updated_at: 1_000, data: { stock: 0 } },
              },
            },
          })
        );

        // 5. Drop one table; the other is untouched
        await db.dropTable("carts");
        expect(await db.listTables()).toEqual({ inventory: "kv" });
        await expect(carts.get("alice", "sku-1")).rejects.toBeInstanceOf(TableNotFoundError);
        expect(await inventory.listKeys()).toEqual(["sku-1", "sku-2"]);
      },
      { now: clock.now }
    );
  });

  it("should serialize concurrent writes to one table", async () => {
    await withTempDatabase(async (db) => {
      await db.createKvTable("counters");
      const first = await db.getKvTable("counters");
      const second = await db.getKvTable("counters");

      await Promise.all(
        Array.from({ length: 25 }, (_, i) =>
          (i % 2 === 0 ? first : second).set(`key-${i}`, { data: { i } })
        )
      );

      const all = await first.listAll();
      expect(all.size).toBe(25);
      expect(all.get("key-24")?.data).toEqual({ i: 24 });
    });
  });

  it("should keep tables with the same keys apart", async () => {
    await withTempDatabase(async (db) => {
      await db.createKvTable("left");
      await db.createKvTable("right");
      const left = await db.getKvTable("left");
      const right = await db.getKvTable("right");

      await left.set("shared", { data: { side: "left" } });
      await right.set("shared", { data: { side: "right" } });

      expect((await left.get("shared"))?.data).toEqual({ side: "left" });
      expect((await right.get("shared"))?.data).toEqual({ side: "right" });
    });
  });
});
