/**
 * Basic Usage Example
 *
 * Creates a KV table and a KKV table, writes and reads through both, then
 * drops one of them.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { openDatabase } from "@tablestore/sdk";
import { rm } from "node:fs/promises";

async function main() {
  const dataDir = "./examples-data/basic";
  await rm(dataDir, { recursive: true, force: true });

  console.log("📂 Opening database...");
  const db = await openDatabase({ root: dataDir });

  try {
    // CREATE: one table of each type
    console.log("\n✏️  Creating tables...");
    await db.createKvTable("products");
    await db.createKkvTable("reviews");
    console.log("✅ Tables:", await db.listTables());

    // KV: one value per key
    const products = await db.getKvTable("products");
    await products.set("lamp", { data: { price: 25, stock: 4 } });
    await products.set("chair", { data: { price: 80, stock: 1 } });

    const lamp = await products.get("lamp");
    if (lamp) {
      console.log(`\n📖 lamp: ${JSON.stringify(lamp.data)}`);
      console.log(`   created ${new Date(lamp.created_at).toISOString()}`);
    }

    // UPDATE: created_at is kept, updated_at moves
    await products.set("lamp", { data: { price: 22, stock: 4 } });
    console.log(`✅ Products: ${(await products.listKeys()).join(", ")}`);

    // KKV: values addressed by (product, reviewer)
    const reviews = await db.getKkvTable("reviews");
    await reviews.set("lamp", "reviewer-1", { data: { stars: 5 } });
    await reviews.set("lamp", "reviewer-2", { data: { stars: 3 } });
    await reviews.set("chair", "reviewer-1", { data: { stars: 4 } });

    console.log("\n🔍 Reviews by product:");
    for (const [product, byReviewer] of await reviews.listAll()) {
      const stars = [...byReviewer.values()].map((review) => review.data.stars);
      console.log(`   - ${product}: ${stars.join(", ")}`);
    }
    console.log(`   lamp reviewers: ${(await reviews.listSkeys("lamp")).join(", ")}`);

    // DELETE and DROP
    console.log("\n🗑️  Cleaning up...");
    await products.delete("chair");
    await db.dropTable("reviews");
    console.log("✅ Tables:", await db.listTables());
  } finally {
    await db.close();
  }

  console.log("\n✅ Example completed successfully!");
  console.log(`📁 Data stored in: ${dataDir}`);
}

main().catch(console.error);
