/**
 * Basic Usage Example
 *
 * Demonstrates account CRUD and reporting with slotbank.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { mkdir, rm } from "node:fs/promises";
import { AccountNotFoundError, openAccounts } from "@slotbank/sdk";

async function main() {
  // Setup: Create temporary data directory
  const dataDir = "./examples-data/basic";
  await rm(dataDir, { recursive: true, force: true });
  await mkdir(dataDir, { recursive: true });

  console.log("📂 Opening data file...");
  const accounts = openAccounts({ file: `${dataDir}/accounts.dat` });
  await accounts.ensureInitialized();

  // CREATE
  console.log("\n✏️  Creating accounts...");
  await accounts.create(10, "Williams", "Bob", 3200);
  await accounts.create(4, "O'Brien", "Ann", -40);
  const long = await accounts.create(12, "Montgomery-Smithson", "Christopher", 0);
  console.log(`✅ Created #10, #4 and #12 (stored as ${long.lastName}, ${long.firstName})`);

  // READ
  console.log("\n📖 Reading account #10...");
  const bob = await accounts.read(10);
  console.log(`   ${bob.lastName}, ${bob.firstName}: $${bob.balance.toFixed(2)}`);

  // UPDATE
  console.log("\n💸 Depositing 250 and withdrawing 75.50...");
  await accounts.update(10, { kind: "balanceDelta", delta: 250 });
  const after = await accounts.update(10, { kind: "balanceDelta", delta: -75.5 });
  console.log(`✅ New balance: $${after.balance.toFixed(2)}`);

  // LIST
  console.log("\n📋 Accounts on file:");
  for await (const account of accounts.listAll()) {
    console.log(`   #${account.accountNumber} ${account.lastName} $${account.balance.toFixed(2)}`);
  }

  const summary = await accounts.aggregate();
  console.log(
    `   ${summary.count} accounts, total $${summary.totalBalance.toFixed(2)}, ` +
      `${summary.overdrawnCount} overdrawn`
  );

  // DELETE
  console.log("\n🗑️  Deleting account #4...");
  await accounts.delete(4);
  try {
    await accounts.read(4);
  } catch (err) {
    if (err instanceof AccountNotFoundError) {
      console.log("✅ Account #4 is gone");
    } else {
      throw err;
    }
  }

  // Cleanup
  await rm(dataDir, { recursive: true, force: true });
  console.log("\n✨ Done!");
}

main().catch((err) => {
  console.error("Error:", err);
  process.exit(1);
});
