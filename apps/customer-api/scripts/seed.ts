/**
 * Seeds the customers table with generated sample data.
 *
 * Usage:
 *   npm run seed
 *   npm run seed -- --count 5000
 *
 * Rows are inserted in batches of 500 with one multi-row INSERT each.
 * The table is created first when it does not exist yet.
 */

import { loadConfig } from "../src/config";
import { createPool, initSchema } from "../src/db";
import { buildInsert, generateCustomer } from "../src/sampleCustomers";

const countFlag = process.argv.indexOf("--count");
const TOTAL_CUSTOMERS = countFlag >= 0 ? parseInt(process.argv[countFlag + 1] || "1000", 10) : 1000;
const BATCH_SIZE = 500;

const pool = createPool({ ...loadConfig().db, max: 5 });

async function seed() {
  console.log(`\nSeeding ${TOTAL_CUSTOMERS.toLocaleString()} customers...\n`);
  const startTime = Date.now();

  await initSchema(pool);

  const { rows: countRows } = await pool.query<{ count: string }>("SELECT COUNT(*) AS count FROM customers");
  const existing = Number(countRows[0].count);
  if (existing > 0) {
    console.log(`  Table already has ${existing.toLocaleString()} rows. Adding more...\n`);
  }

  const totalBatches = Math.ceil(TOTAL_CUSTOMERS / BATCH_SIZE);
  let totalInserted = 0;

  for (let batch = 0; batch < totalBatches; batch++) {
    const batchStart = batch * BATCH_SIZE;
    const batchSize = Math.min(batchStart + BATCH_SIZE, TOTAL_CUSTOMERS) - batchStart;

    // offset by the existing count so emails stay unique across runs
    const customers = Array.from({ length: batchSize }, (_, i) => generateCustomer(batchStart + i + existing));
    const { text, values } = buildInsert(customers);
    const { rowCount } = await pool.query(text, values);
    totalInserted += rowCount ?? 0;

    const pct = Math.round(((batch + 1) / totalBatches) * 100);
    process.stdout.write(`\r  Seeding: ${pct}% (batch ${batch + 1}/${totalBatches})`);
  }

  const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log(`\n\n  Done! Inserted ${totalInserted.toLocaleString()} customers in ${elapsed}s`);

  const { rows: sample } = await pool.query(
    "SELECT id, name, email, member_since, status FROM customers ORDER BY id DESC LIMIT 5",
  );
  console.table(sample);
}

seed()
  .catch((err) => {
    console.error("\nSeed failed:", err);
    process.exitCode = 1;
  })
  .finally(() => pool.end().catch((err) => console.error("Pool shutdown failed:", err)));
