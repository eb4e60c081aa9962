/**
 * Basic Usage Example
 *
 * Demonstrates create, update, search and delete on the contact store.
 * Run after `npm run build` with: npx tsx examples/basic-usage.ts
 */

import { openStore, ConflictError, NotFoundError } from "@contactbook/store";

function main(): void {
  console.log("📇 Opening store...");
  const store = openStore();

  // CREATE
  console.log("\n✏️  Creating contacts...");
  const ada = store.create({ name: "Ada Park", phone: "555-010-1001", email: "ada@example.com" });
  const ben = store.create({ name: "Ben Park", phone: "(555) 010-1002", email: "ben@example.com" });
  store.create({ name: "Cleo Quinn", phone: "555.010.1003", email: "cleo@example.com" });
  console.log(`✅ Created ${store.stats().records} contacts`);

  // Phone and email are unique after normalization
  try {
    store.create({ name: "Ada Again", phone: "5550101001", email: "ada2@example.com" });
  } catch (err) {
    if (!(err instanceof ConflictError)) throw err;
    console.log(`⚠️  ${err.message}`);
  }

  // SEARCH
  console.log("\n🔍 Searching...");
  console.log(`   "park"          -> ${store.search("park").map((c) => c.name).join(", ")}`);
  console.log(`   "555 010 1003"  -> ${store.search("555 010 1003").map((c) => c.name).join(", ")}`);
  console.log(`   "BEN@example.com" -> ${store.search("BEN@example.com").map((c) => c.name).join(", ")}`);
  console.log(`   "qui" (substring) -> ${store.search("qui", { mode: "substring" }).map((c) => c.name).join(", ")}`);

  // UPDATE
  console.log("\n✏️  Updating...");
  const moved = store.update(ben.id, { name: "Ben Reyes" });
  console.log(`✅ ${ben.name} is now ${moved.name}`);
  console.log(`   "park" -> ${store.search("park").map((c) => c.name).join(", ")}`);

  // DELETE
  console.log("\n🗑️  Deleting...");
  console.log(`✅ Removed ${store.delete([ada.id, "no-such-id"])} contact`);
  try {
    store.get(ada.id);
  } catch (err) {
    if (!(err instanceof NotFoundError)) throw err;
    console.log(`   ${err.message}`);
  }

  // STATS
  console.log("\n📊 Index stats:", store.stats());
  console.log("   Consistent:", store.verify().ok);

  store.close();
}

main();
