#!/usr/bin/env node
/**
 * Apply database migrations from packages/runner/sql
 *
 * Usage:
 *   tsx src/scripts/run-migration.ts          # Run all pending migrations in order
 *   tsx src/scripts/run-migration.ts 001      # Only migrations matching a prefix
 */

import { getEnv } from '../config/env.js';
import { errorMessage } from '../errors/classify.js';
import { runMigrations } from '../store/migrate.js';
import { createPersistence } from '../workers/runtime.js';

async function main() {
  const filter = process.argv[2];
  const { db } = createPersistence(getEnv());

  try {
    const applied = await runMigrations(db, { filter });
    if (applied.length === 0) {
      console.log('Database is up to date');
    } else {
      for (const file of applied) {
        console.log(`  applied ${file}`);
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
