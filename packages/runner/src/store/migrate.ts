import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { getLogger } from '../monitoring/logger.js';
import type { SqlDatabase } from './db.js';

const logger = getLogger({ service: 'migrate' });

export const MIGRATIONS_DIR = fileURLToPath(new URL('../../sql/', import.meta.url));

export async function listMigrationFiles(dir: string = MIGRATIONS_DIR, filter?: string): Promise<string[]> {
  const files = (await readdir(dir)).filter((f) => f.endsWith('.sql')).sort();
  if (!filter) return files;
  // Match by number prefix (e.g. "001") or full filename
  return files.filter((f) => f.startsWith(filter) || f === filter);
}

/**
 * Apply every migration file not yet recorded in schema_migrations, each in
 * its own transaction. Returns the names applied by this call.
 */
export async function runMigrations(
  db: SqlDatabase,
  options: { dir?: string; filter?: string } = {},
): Promise<string[]> {
  const dir = options.dir ?? MIGRATIONS_DIR;

  await db.query(
    `CREATE TABLE IF NOT EXISTS schema_migrations (
       name TEXT PRIMARY KEY,
       applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
     )`,
  );

  const { rows } = await db.query<{ name: string }>('SELECT name FROM schema_migrations');
  const alreadyApplied = new Set(rows.map((row) => row.name));
  const applied: string[] = [];

  for (const file of await listMigrationFiles(dir, options.filter)) {
    if (alreadyApplied.has(file)) {
      logger.debug('Migration already applied', { file });
      continue;
    }

    const sql = await readFile(join(dir, file), 'utf8');
    await db.transaction(async (tx) => {
      await tx.query(sql);
      await tx.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file]);
    });
    logger.info('Migration applied', { file });
    applied.push(file);
  }

  return applied;
}
