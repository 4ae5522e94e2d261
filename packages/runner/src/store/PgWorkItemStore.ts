import { isErrorKind } from '../errors/taxonomy.js';
import { failureEvent, transition } from '../queue/stateMachine.js';
import {
  isWorkItemStatus,
  type EnqueueInput,
  type FailureStatus,
  type LastError,
  type Outcome,
  type OutcomeInput,
  type WorkItem,
  type WorkItemStatus,
} from '../queue/types.js';
import type { SqlDatabase, SqlExecutor } from './db.js';
import { ClaimLostError, DuplicateError, NotFoundError } from './errors.js';
import {
  DEFAULT_LIST_LIMIT,
  emptyCounts,
  releasedClaimMessage,
  type ClaimToken,
  type ListFilter,
  type ReclaimResult,
  type RecordFailureOptions,
  type StatusCounts,
  type WorkItemStore,
} from './types.js';

export type WorkItemRow = {
  id: string;
  task_type: string;
  payload: unknown;
  idempotency_key: string | null;
  status: string;
  attempt_count: number;
  last_error_kind: string | null;
  last_error_message: string | null;
  not_before: Date | string | null;
  claimed_by: string | null;
  claimed_at: Date | string | null;
  created_at: Date | string;
  updated_at: Date | string;
};

type OutcomeRow = {
  work_item_id: string;
  result: unknown;
  created_at: Date | string;
};

type OutcomeLineRow = {
  position: number;
  category: string;
  data: unknown;
};

const WORK_ITEM_COLUMNS = `id, task_type, payload, idempotency_key, status, attempt_count,
  last_error_kind, last_error_message, not_before, claimed_by, claimed_at, created_at, updated_at`;

/**
 * Atomic FIFO claim. SKIP LOCKED lets concurrent workers pass over a row
 * another transaction is claiming instead of blocking on it.
 */
export const CLAIM_SQL = `
  UPDATE work_items
  SET status = 'IN_PROGRESS',
      attempt_count = attempt_count + 1,
      claimed_by = $1,
      claimed_at = NOW(),
      not_before = NULL,
      updated_at = NOW()
  FROM (
    SELECT id FROM work_items
    WHERE status = 'PENDING'
      AND (not_before IS NULL OR not_before <= NOW())
    ORDER BY created_at ASC, id ASC
    LIMIT 1
    FOR UPDATE SKIP LOCKED
  ) next_item
  WHERE work_items.id = next_item.id
  RETURNING work_items.*
`;

const UNIQUE_VIOLATION = '23505';
// Raised for an id that is not a valid uuid.
const INVALID_TEXT_REPRESENTATION = '22P02';

/** WorkItemStore on PostgreSQL (tables from sql/001_work_items.sql). */
export class PgWorkItemStore implements WorkItemStore {
  constructor(private readonly db: SqlDatabase) {}

  async enqueue(input: EnqueueInput): Promise<string> {
    const key = input.idempotencyKey ?? null;
    let rows: Array<{ id: string }>;
    try {
      ({ rows } = await this.db.query<{ id: string }>(
        `INSERT INTO work_items (task_type, payload, idempotency_key)
         VALUES ($1, $2::jsonb, $3)
         ON CONFLICT (idempotency_key) WHERE idempotency_key IS NOT NULL DO NOTHING
         RETURNING id`,
        [input.taskType, JSON.stringify(input.payload), key],
      ));
    } catch (err) {
      if (key !== null && isUniqueViolation(err)) {
        throw new DuplicateError(key);
      }
      throw err;
    }

    if (rows.length > 0) {
      return rows[0].id;
    }
    if (key === null) {
      throw new Error('Insert into work_items returned no id');
    }

    const existing = await this.db.query<{ id: string }>(
      'SELECT id FROM work_items WHERE idempotency_key = $1',
      [key],
    );
    throw new DuplicateError(key, existing.rows[0]?.id ?? null);
  }

  async claimNext(workerId: string): Promise<WorkItem | null> {
    const { rows } = await this.db.query<WorkItemRow>(CLAIM_SQL, [workerId]);
    return rows.length > 0 ? mapWorkItem(rows[0]) : null;
  }

  async recordOutcome(id: string, outcome: OutcomeInput, claim: ClaimToken): Promise<void> {
    await this.db.transaction(async (tx) => {
      const current = await lockClaimedItem(tx, id, claim);
      const next = transition(current, 'succeed');

      await tx.query(
        `INSERT INTO work_item_outcomes (work_item_id, result) VALUES ($1, $2::jsonb)`,
        [id, JSON.stringify(outcome.result)],
      );

      if (outcome.lines.length > 0) {
        await tx.query(
          `INSERT INTO work_item_outcome_lines (work_item_id, position, category, data)
           SELECT $1, line.ord, line.value->>'category', line.value->'data'
           FROM jsonb_array_elements($2::jsonb) WITH ORDINALITY AS line(value, ord)`,
          [id, JSON.stringify(outcome.lines)],
        );
      }

      await tx.query(
        `UPDATE work_items
         SET status = $2,
             last_error_kind = NULL,
             last_error_message = NULL,
             not_before = NULL,
             claimed_by = NULL,
             claimed_at = NULL,
             updated_at = NOW()
         WHERE id = $1`,
        [id, next],
      );
    });
  }

  async recordFailure(
    id: string,
    status: FailureStatus | 'PENDING',
    error: LastError,
    claim: ClaimToken,
    options: RecordFailureOptions = {},
  ): Promise<void> {
    await this.db.transaction(async (tx) => {
      const current = await lockClaimedItem(tx, id, claim);
      const next = transition(current, failureEvent(status));
      const notBefore = next === 'PENDING' ? options.notBefore ?? null : null;

      await tx.query(
        `UPDATE work_items
         SET status = $2,
             last_error_kind = $3,
             last_error_message = $4,
             not_before = $5,
             claimed_by = NULL,
             claimed_at = NULL,
             updated_at = NOW()
         WHERE id = $1`,
        [id, next, error.kind, error.message, notBefore],
      );
    });
  }

  async get(id: string): Promise<WorkItem> {
    const { rows } = await queryById(id, () =>
      this.db.query<WorkItemRow>(`SELECT ${WORK_ITEM_COLUMNS} FROM work_items WHERE id = $1`, [id]),
    );
    if (rows.length === 0) {
      throw new NotFoundError(id);
    }
    return mapWorkItem(rows[0]);
  }

  async getOutcome(id: string): Promise<Outcome | null> {
    const outcomes = await this.db.query<OutcomeRow>(
      'SELECT work_item_id, result, created_at FROM work_item_outcomes WHERE work_item_id = $1',
      [id],
    );
    if (outcomes.rows.length === 0) {
      return null;
    }

    const lines = await this.db.query<OutcomeLineRow>(
      `SELECT position, category, data FROM work_item_outcome_lines
       WHERE work_item_id = $1
       ORDER BY position ASC`,
      [id],
    );

    const row = outcomes.rows[0];
    return {
      workItemId: row.work_item_id,
      result: toRecord(row.result),
      lines: lines.rows.map((line) => ({
        position: Number(line.position),
        category: line.category,
        data: toRecord(line.data),
      })),
      createdAt: toDate(row.created_at),
    };
  }

  async list(filter: ListFilter = {}): Promise<WorkItem[]> {
    const statuses = filter.status && filter.status.length > 0 ? filter.status : null;
    const { rows } = await this.db.query<WorkItemRow>(
      `SELECT ${WORK_ITEM_COLUMNS} FROM work_items
       WHERE ($1::text[] IS NULL OR status = ANY($1::text[]))
         AND ($2::text IS NULL OR task_type = $2)
       ORDER BY created_at DESC, id DESC
       LIMIT $3 OFFSET $4`,
      [statuses, filter.taskType ?? null, filter.limit ?? DEFAULT_LIST_LIMIT, filter.offset ?? 0],
    );
    return rows.map(mapWorkItem);
  }

  async nextClaimableAt(): Promise<Date | null> {
    const { rows } = await this.db.query<{ next_at: Date | string | null }>(
      `SELECT MIN(GREATEST(COALESCE(not_before, NOW()), NOW())) AS next_at
       FROM work_items WHERE status = 'PENDING'`,
    );
    const nextAt = rows[0]?.next_at ?? null;
    return nextAt === null ? null : toDate(nextAt);
  }

  async reclaimStale(olderThan: Date, maxAttempts: number): Promise<ReclaimResult> {
    const { rows } = await this.db.query<{ id: string; status: string }>(
      `WITH stale AS (
         SELECT id, claimed_at FROM work_items
         WHERE status = 'IN_PROGRESS' AND claimed_at < $1
         FOR UPDATE SKIP LOCKED
       )
       UPDATE work_items
       SET status = CASE WHEN work_items.attempt_count >= $2 THEN 'FAILED_TECH' ELSE 'PENDING' END,
           last_error_kind = 'TransientError',
           last_error_message = 'Claim expired: item was in progress since '
             || to_char(stale.claimed_at AT TIME ZONE 'UTC', 'YYYY-MM-DD"T"HH24:MI:SS.MS"Z"')
             || ' without a result',
           claimed_by = NULL,
           claimed_at = NULL,
           updated_at = NOW()
       FROM stale
       WHERE work_items.id = stale.id
       RETURNING work_items.id, work_items.status`,
      [olderThan, maxAttempts],
    );

    const result: ReclaimResult = { requeued: [], failed: [] };
    for (const row of rows) {
      (row.status === 'FAILED_TECH' ? result.failed : result.requeued).push(row.id);
    }
    return result;
  }

  async releaseClaims(workerId: string, maxAttempts: number): Promise<ReclaimResult> {
    const { rows } = await this.db.query<{ id: string; status: string }>(
      `UPDATE work_items
       SET status = CASE WHEN attempt_count >= $2 THEN 'FAILED_TECH' ELSE 'PENDING' END,
           last_error_kind = 'TransientError',
           last_error_message = $3,
           claimed_by = NULL,
           claimed_at = NULL,
           updated_at = NOW()
       WHERE status = 'IN_PROGRESS' AND claimed_by = $1
       RETURNING id, status`,
      [workerId, maxAttempts, releasedClaimMessage(workerId)],
    );

    const result: ReclaimResult = { requeued: [], failed: [] };
    for (const row of rows) {
      (row.status === 'FAILED_TECH' ? result.failed : result.requeued).push(row.id);
    }
    return result;
  }

  async counts(): Promise<StatusCounts> {
    const { rows } = await this.db.query<{ status: string; count: number | string }>(
      'SELECT status, COUNT(*)::int AS count FROM work_items GROUP BY status',
    );
    const counts = emptyCounts();
    for (const row of rows) {
      if (isWorkItemStatus(row.status)) {
        counts[row.status] = Number(row.count);
      }
    }
    return counts;
  }
}

// --- Helpers ---

/**
 * Lock the item row for the rest of the transaction and check that `claim`
 * still holds it. A status that forbids the write is left to transition().
 */
async function lockClaimedItem(tx: SqlExecutor, id: string, claim: ClaimToken): Promise<WorkItemStatus> {
  const { rows } = await queryById(id, () =>
    tx.query<{ status: string; claimed_by: string | null; attempt_count: number }>(
      'SELECT status, claimed_by, attempt_count FROM work_items WHERE id = $1 FOR UPDATE',
      [id],
    ),
  );
  if (rows.length === 0) {
    throw new NotFoundError(id);
  }
  const row = rows[0];
  const status = parseStatus(row.status);
  if (status === 'IN_PROGRESS' && (row.claimed_by !== claim.workerId || Number(row.attempt_count) !== claim.attempt)) {
    throw new ClaimLostError(id, claim.workerId, claim.attempt);
  }
  return status;
}

/** Run a lookup by id, treating an id Postgres cannot parse as a missing item. */
async function queryById<T>(id: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (err) {
    if (hasCode(err, INVALID_TEXT_REPRESENTATION)) {
      throw new NotFoundError(id);
    }
    throw err;
  }
}

function parseStatus(value: string): WorkItemStatus {
  if (!isWorkItemStatus(value)) {
    throw new Error(`Unknown work item status in database: ${value}`);
  }
  return value;
}

function hasCode(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}

function isUniqueViolation(err: unknown): boolean {
  return hasCode(err, UNIQUE_VIOLATION);
}

function toDate(value: Date | string): Date {
  return value instanceof Date ? value : new Date(value);
}

function toNullableDate(value: Date | string | null): Date | null {
  return value === null ? null : toDate(value);
}

function toRecord(value: unknown): Record<string, unknown> {
  const parsed: unknown = typeof value === 'string' ? JSON.parse(value) : value;
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return {};
  }
  return Object.fromEntries(Object.entries(parsed));
}

function mapLastError(row: WorkItemRow): LastError | null {
  if (row.last_error_kind === null || !isErrorKind(row.last_error_kind)) {
    return null;
  }
  return { kind: row.last_error_kind, message: row.last_error_message ?? '' };
}

export function mapWorkItem(row: WorkItemRow): WorkItem {
  return {
    id: row.id,
    taskType: row.task_type,
    payload: Object.freeze(toRecord(row.payload)),
    idempotencyKey: row.idempotency_key,
    status: parseStatus(row.status),
    attemptCount: Number(row.attempt_count),
    lastError: mapLastError(row),
    notBefore: toNullableDate(row.not_before),
    claimedBy: row.claimed_by,
    claimedAt: toNullableDate(row.claimed_at),
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
  };
}

