export * from './errors.js';
export * from './types.js';
export { MemoryWorkItemStore, type MemoryWorkItemStoreOptions } from './MemoryWorkItemStore.js';
export { PgWorkItemStore, CLAIM_SQL } from './PgWorkItemStore.js';
export { PgDatabase, type SqlDatabase, type SqlExecutor, type SqlQueryResult, type SqlRow } from './db.js';
export { runMigrations, listMigrationFiles, MIGRATIONS_DIR } from './migrate.js';
