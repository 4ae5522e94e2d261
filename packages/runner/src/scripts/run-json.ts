#!/usr/bin/env node
/**
 * Run requests from a JSON file immediately against the portal (no database)
 * and write the results as JSON.
 *
 * Usage:
 *   tsx src/scripts/run-json.ts --input=requests.json --output=results.json
 *
 * A single request object produces a single result object; an array produces
 * an array in the same order.
 */

import { writeFile } from 'node:fs/promises';
import { getEnv } from '../config/env.js';
import { errorMessage } from '../errors/classify.js';
import { toWorkItemView } from '../queue/view.js';
import { createPortalStack } from '../workers/runtime.js';
import { readRequestFile, requireArg } from './args.js';

async function main() {
  const input = requireArg('input', 'requests.json');
  const output = requireArg('output', 'results.json');
  const { requests, single } = await readRequestFile(input);
  const portal = createPortalStack(getEnv());

  try {
    const results = await portal.adHoc.runMany(requests);
    const views = results.map(({ item, outcome }) => toWorkItemView(item, outcome));
    await writeFile(output, JSON.stringify(single ? views[0] : views, null, 2) + '\n');

    for (const view of views) {
      const detail = view.lastError ? ` ${view.lastError.kind}: ${view.lastError.message}` : '';
      console.log(`  ${view.taskType} -> ${view.status} (attempts=${view.attemptCount})${detail}`);
    }
    console.log(`\nWrote ${views.length} result(s) to ${output}`);
  } finally {
    await portal.sessions.close();
  }
}

main().catch((err) => {
  console.error('Error:', errorMessage(err));
  process.exit(1);
});
