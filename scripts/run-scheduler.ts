/**
 * Insights Scheduler Entry Point
 *
 * Boots the engine, runs every job once, then keeps refreshing on the
 * configured cadences until SIGINT/SIGTERM. This is the only process that runs
 * jobs; each generation is saved to GENERATIONS_TABLE for the API to read.
 *
 * Usage:
 *   STORES_TABLE=... TRANSACTIONS_TABLE=... GENERATIONS_TABLE=... OPENWEATHER_API_KEY=... npx tsx scripts/run-scheduler.ts
 */

import { createStoreInsightsEngine, errorMessage } from '@store-insights/core';

async function main(): Promise<void> {
  if (!process.env.OPENWEATHER_API_KEY) {
    console.log('OPENWEATHER_API_KEY not set - weather will use fallback readings');
  }

  const engine = createStoreInsightsEngine();

  console.log('Starting insights scheduler...');
  console.log('Press Ctrl+C to stop');

  const results = await engine.initialize();
  for (const result of results) {
    console.log(`  ${result.job}: ${result.outcome} (${result.durationMs}ms)${result.error ? ` - ${result.error}` : ''}`);
  }

  engine.start();

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;

    console.log(`Received ${signal}, stopping scheduler...`);
    await engine.stop();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        console.error('Shutdown failed:', errorMessage(error));
        process.exit(1);
      });
    });
  }
}

main().catch((error) => {
  console.error('Scheduler crashed:', error);
  process.exit(1);
});
