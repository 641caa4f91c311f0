/**
 * Seed Store Registry
 *
 * Loads own-brand and competitor stores (and optionally transaction history)
 * from a JSON file into the DynamoDB tables. Every store is validated against
 * the configured bounding box before it is written; re-running updates in place.
 *
 * Usage:
 *   npx tsx scripts/seed-stores.ts [path/to/stores.json]
 *
 * Environment:
 *   STORES_TABLE, TRANSACTIONS_TABLE - target tables
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import {
  StoreInput,
  TransactionPoint,
  ValidationError,
  createDynamoDBService,
  errorMessage,
  loadEngineConfig,
} from '@store-insights/core';

interface SeedFile {
  stores: StoreInput[];
  transactions?: Record<string, TransactionPoint[]>;
}

const DEFAULT_SEED_FILE = join(__dirname, 'data', 'sample-stores.json');

async function main(): Promise<void> {
  const file = process.argv[2] || DEFAULT_SEED_FILE;
  const seed: SeedFile = JSON.parse(readFileSync(file, 'utf-8'));

  if (!Array.isArray(seed.stores)) {
    throw new ValidationError(`${file}: "stores" must be an array`);
  }

  const config = loadEngineConfig();
  const db = createDynamoDBService(config.boundingBox);

  console.log(`Seeding ${seed.stores.length} stores from ${file}`);

  let written = 0;
  const rejected: string[] = [];

  for (const input of seed.stores) {
    try {
      await db.putStore(input);
      written++;
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      rejected.push(`${input.storeId}: ${error.message}`);
    }
  }

  console.log(`  Stores written: ${written}`);
  if (rejected.length > 0) {
    console.log(`  Rejected ${rejected.length}:`);
    rejected.forEach((reason) => console.log(`    - ${reason}`));
  }

  for (const [storeId, points] of Object.entries(seed.transactions || {})) {
    await db.batchPutTransactions(storeId, points);
    console.log(`  Transactions for ${storeId}: ${points.length}`);
  }

  console.log('Done');
}

main().catch((error) => {
  console.error('Seed failed:', errorMessage(error));
  process.exit(1);
});
