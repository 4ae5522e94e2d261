#!/usr/bin/env node
/**
 * Queue overview, or the full record of one work item.
 *
 * Usage:
 *   tsx src/scripts/show-status.ts                 # counts + 10 most recent items
 *   tsx src/scripts/show-status.ts --id=<uuid>     # one item with its outcome
 *   tsx src/scripts/show-status.ts --status=FAILED_TECH --limit=20
 */

import { getEnv } from '../config/env.js';
import { errorMessage } from '../errors/classify.js';
import { isWorkItemStatus, type WorkItemStatus } from '../queue/types.js';
import { toWorkItemView } from '../queue/view.js';
import { createPersistence } from '../workers/runtime.js';
import { getArg } from './args.js';

function parseStatuses(value: string | undefined): WorkItemStatus[] | undefined {
  if (!value) return undefined;
  return value.split(',').map((part) => {
    const status = part.trim().toUpperCase();
    if (!isWorkItemStatus(status)) {
      throw new Error(`Unknown status: ${part}`);
    }
    return status;
  });
}

async function main() {
  const { db, store } = createPersistence(getEnv());

  try {
    const id = getArg('id');
    if (id) {
      const item = await store.get(id);
      const outcome = await store.getOutcome(id);
      console.log(JSON.stringify(toWorkItemView(item, outcome), null, 2));
      return;
    }

    const counts = await store.counts();
    console.log('=== Queue ===');
    for (const [status, count] of Object.entries(counts)) {
      console.log(`  ${status.padEnd(18)} ${count}`);
    }

    const limit = Number(getArg('limit') ?? '10');
    const items = await store.list({ status: parseStatuses(getArg('status')), limit });
    console.log(`\n=== ${items.length} most recent ===`);
    for (const item of items) {
      console.log(
        `  ${item.id} | ${item.taskType} | status=${item.status} | attempts=${item.attemptCount} | worker=${item.claimedBy || 'none'}`,
      );
      if (item.lastError) {
        console.log(`    ${item.lastError.kind}: ${item.lastError.message}`);
      }
    }
  } finally {
    await db.close();
  }
}

main().catch((err) => {
  console.error('Error:', errorMessage(err));
  process.exit(1);
});
