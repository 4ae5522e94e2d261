import pg from 'pg';
import { errorMessage } from '../errors/classify.js';
import { getLogger } from '../monitoring/logger.js';

const logger = getLogger({ service: 'db' });

export type SqlRow = Record<string, unknown>;

export type SqlQueryResult<Row extends SqlRow> = {
  rows: Row[];
  rowCount: number;
};

export type SqlExecutor = {
  query<Row extends SqlRow = SqlRow>(text: string, params?: unknown[]): Promise<SqlQueryResult<Row>>;
};

/** A SqlExecutor that can also run a callback inside one transaction. */
export type SqlDatabase = SqlExecutor & {
  transaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T>;
};

export interface PgDatabaseOptions {
  connectionString: string;
  max?: number;
}

/** node-postgres Pool behind the SqlDatabase seam. */
export class PgDatabase implements SqlDatabase {
  readonly pool: pg.Pool;

  constructor(poolOrOptions: pg.Pool | PgDatabaseOptions) {
    this.pool =
      poolOrOptions instanceof pg.Pool
        ? poolOrOptions
        : new pg.Pool({ connectionString: poolOrOptions.connectionString, max: poolOrOptions.max ?? 5 });

    this.pool.on('error', (err) => {
      logger.error('Idle Postgres client error', { error: err.message });
    });
  }

  async query<Row extends SqlRow = SqlRow>(text: string, params: unknown[] = []): Promise<SqlQueryResult<Row>> {
    const result = await this.pool.query<Row>(text, params);
    return { rows: result.rows, rowCount: result.rowCount ?? 0 };
  }

  /**
   * BEGIN/COMMIT on a dedicated pool client. Any error thrown by `fn` rolls
   * the transaction back and is rethrown.
   */
  async transaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    const tx: SqlExecutor = {
      query: async <Row extends SqlRow = SqlRow>(text: string, params: unknown[] = []) => {
        const result = await client.query<Row>(text, params);
        return { rows: result.rows, rowCount: result.rowCount ?? 0 };
      },
    };

    try {
      await client.query('BEGIN');
      const value = await fn(tx);
      await client.query('COMMIT');
      return value;
    } catch (err) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackErr) {
        logger.error('Rollback failed', { error: errorMessage(rollbackErr) });
      }
      throw err;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
