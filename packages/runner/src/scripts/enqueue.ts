#!/usr/bin/env node
/**
 * Enqueue work items from a JSON file (one request object or an array).
 *
 * Usage:
 *   tsx src/scripts/enqueue.ts --file=requests.json [--dedupe]
 *
 * --dedupe derives an idempotency key from each payload when none is given.
 */

import { getEnv } from '../config/env.js';
import { errorMessage } from '../errors/classify.js';
import { ValidationError } from '../errors/taxonomy.js';
import { defaultIdempotencyKey, parseTaskPayload } from '../portal/workflows/index.js';
import { DuplicateError } from '../store/errors.js';
import { createPersistence } from '../workers/runtime.js';
import { hasFlag, readRequestFile, requireArg } from './args.js';

async function main() {
  const file = requireArg('file', 'requests.json');
  const dedupe = hasFlag('dedupe');
  const { requests } = await readRequestFile(file);
  const { db, store } = createPersistence(getEnv());

  let enqueued = 0;
  let duplicates = 0;
  let invalid = 0;

  try {
    for (const request of requests) {
      try {
        const idempotencyKey =
          request.idempotencyKey ??
          (dedupe ? defaultIdempotencyKey(parseTaskPayload(request.taskType, request.payload)) : null);
        const id = await store.enqueue({ ...request, idempotencyKey });
        console.log(`  enqueued ${id} (${request.taskType})`);
        enqueued++;
      } catch (err) {
        if (err instanceof DuplicateError) {
          console.log(`  duplicate ${err.idempotencyKey} -> existing ${err.existingId ?? 'unknown'}`);
          duplicates++;
        } else if (err instanceof ValidationError) {
          console.log(`  invalid ${request.taskType}: ${err.message}`);
          invalid++;
        } else {
          throw err;
        }
      }
    }
  } finally {
    await db.close();
  }

  console.log(`\nEnqueued ${enqueued}, duplicates ${duplicates}, invalid ${invalid}`);
}

main().catch((err) => {
  console.error('Error:', errorMessage(err));
  process.exit(1);
});
