/**
 * Initialize Script: Benchmark Baseline
 *
 * Restores the store to the benchmark's baseline data set (drops rows added
 * by earlier runs, reactivates users, re-bans every 50th) and flushes every
 * read-path cache, including the shared L2.
 *
 * Usage: npm run build && npm run initialize
 */

import '../env.js';
import { createReadPathLayer } from '../index.js';
import { loadConfig } from '../services/config.service.js';

const config = loadConfig();

// Logins are never attempted here
const layer = createReadPathLayer(config, {
  credentialVerifier: { verify: () => Promise.resolve(null) },
});

async function initializeBenchmark(): Promise<void> {
  console.log('Initializing benchmark baseline...');
  await layer.initialize();

  await layer.store.resetToBaseline();
  console.log('Store reset to baseline');

  await layer.invalidation.invalidateAll();
  console.log('Caches flushed');
}

void initializeBenchmark()
  .catch((error: unknown) => {
    console.error('Initialize failed:', error);
    process.exitCode = 1;
  })
  .finally(async () => {
    await layer.shutdown();
  });
