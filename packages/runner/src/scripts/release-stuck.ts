#!/usr/bin/env node
/**
 * Return stale IN_PROGRESS work items to the queue (or fail them once their
 * attempts are used up), or release every claim held by one worker.
 *
 * Usage:
 *   tsx src/scripts/release-stuck.ts [--older-than-seconds=900]
 *   tsx src/scripts/release-stuck.ts --worker-id=worker-1
 */

import { getEnv } from '../config/env.js';
import { errorMessage } from '../errors/classify.js';
import { createPersistence, retryPolicyFromEnv } from '../workers/runtime.js';
import { getArg } from './args.js';

async function main() {
  const env = getEnv();
  const { db, store } = createPersistence(env);

  try {
    const maxAttempts = retryPolicyFromEnv(env).maxAttempts;
    const workerId = getArg('worker-id');
    if (workerId) {
      const { requeued, failed } = await store.releaseClaims(workerId, maxAttempts);
      console.log(`Released ${requeued.length}, failed ${failed.length} (held by ${workerId})`);
      for (const id of requeued) console.log(`  requeued ${id}`);
      for (const id of failed) console.log(`  failed   ${id}`);
      return;
    }

    const olderThanSeconds = Number(getArg('older-than-seconds') ?? env.STALE_CLAIM_SECONDS);
    if (!Number.isFinite(olderThanSeconds) || olderThanSeconds < 0) {
      throw new Error('--older-than-seconds must be a non-negative number');
    }
    const olderThan = new Date(Date.now() - olderThanSeconds * 1000);
    const { requeued, failed } = await store.reclaimStale(olderThan, maxAttempts);

    console.log(`Requeued ${requeued.length}, failed ${failed.length} (claimed before ${olderThan.toISOString()})`);
    for (const id of requeued) console.log(`  requeued ${id}`);
    for (const id of failed) console.log(`  failed   ${id}`);
  } finally {
    await db.close();
  }
}

main().catch((err) => {
  console.error('Error:', errorMessage(err));
  process.exit(1);
});
