import { beforeEach, describe, expect, test, vi } from 'vitest';
import type { SqlDatabase, SqlExecutor } from '../../../src/store/db.js';
import { ClaimLostError, DuplicateError, InvalidTransitionError, NotFoundError } from '../../../src/store/errors.js';
import { CLAIM_SQL, mapWorkItem, PgWorkItemStore, type WorkItemRow } from '../../../src/store/PgWorkItemStore.js';

/**
 * SqlDatabase stand-in: every statement goes through one mock, queued
 * results are returned in call order, and transaction() reports how its
 * callback ended.
 */
function createFakeDb() {
  const query = vi.fn();
  const transactions = { committed: 0, rolledBack: 0 };
  const db: SqlDatabase = {
    query,
    transaction: vi.fn().mockImplementation(async (fn: (tx: SqlExecutor) => Promise<unknown>) => {
      try {
        const value = await fn(db);
        transactions.committed += 1;
        return value;
      } catch (err) {
        transactions.rolledBack += 1;
        throw err;
      }
    }),
  };
  query.mockResolvedValue({ rows: [], rowCount: 0 });
  return { db, query, transactions };
}

function sqlOf(query: ReturnType<typeof vi.fn>, call: number): string {
  return String(query.mock.calls[call][0]).replace(/\s+/g, ' ').trim();
}

const claimA = { workerId: 'worker-a', attempt: 1 };

/** Result of the FOR UPDATE lookup for an item held by worker-a on its first attempt. */
function lockedRow(status = 'IN_PROGRESS', claimedBy: string | null = 'worker-a', attemptCount = 1) {
  return { rows: [{ status, claimed_by: claimedBy, attempt_count: attemptCount }], rowCount: 1 };
}

function row(overrides: Partial<WorkItemRow> = {}): WorkItemRow {
  return {
    id: 'item-1',
    task_type: 'eligibility',
    payload: { memberId: 'M123' },
    idempotency_key: null,
    status: 'PENDING',
    attempt_count: 0,
    last_error_kind: null,
    last_error_message: null,
    not_before: null,
    claimed_by: null,
    claimed_at: null,
    created_at: new Date('2026-01-05T09:00:00.000Z'),
    updated_at: new Date('2026-01-05T09:00:00.000Z'),
    ...overrides,
  };
}

describe('PgWorkItemStore', () => {
  let fake: ReturnType<typeof createFakeDb>;
  let store: PgWorkItemStore;

  beforeEach(() => {
    fake = createFakeDb();
    store = new PgWorkItemStore(fake.db);
  });

  describe('enqueue', () => {
    test('inserts the payload as JSON and returns the new id', async () => {
      fake.query.mockResolvedValueOnce({ rows: [{ id: 'new-id' }], rowCount: 1 });

      const id = await store.enqueue({ taskType: 'eligibility', payload: { memberId: 'M123' }, idempotencyKey: 'k1' });

      expect(id).toBe('new-id');
      expect(sqlOf(fake.query, 0)).toContain('ON CONFLICT (idempotency_key) WHERE idempotency_key IS NOT NULL DO NOTHING');
      expect(fake.query.mock.calls[0][1]).toEqual(['eligibility', '{"memberId":"M123"}', 'k1']);
    });

    test('a conflicting key raises DuplicateError with the existing id', async () => {
      fake.query
        .mockResolvedValueOnce({ rows: [], rowCount: 0 })
        .mockResolvedValueOnce({ rows: [{ id: 'existing-id' }], rowCount: 1 });

      const attempt = store.enqueue({ taskType: 'eligibility', payload: {}, idempotencyKey: 'k1' });

      await expect(attempt).rejects.toThrow(DuplicateError);
      await expect(attempt).rejects.toMatchObject({ idempotencyKey: 'k1', existingId: 'existing-id' });
      expect(fake.query.mock.calls[1][1]).toEqual(['k1']);
    });

    test('a unique violation raised by the driver is also a duplicate', async () => {
      fake.query.mockRejectedValueOnce(Object.assign(new Error('duplicate key value'), { code: '23505' }));

      await expect(
        store.enqueue({ taskType: 'eligibility', payload: {}, idempotencyKey: 'k1' }),
      ).rejects.toThrow("Work item with idempotency key 'k1' already exists");
    });

    test('other driver errors propagate', async () => {
      fake.query.mockRejectedValueOnce(new Error('connection terminated'));

      await expect(store.enqueue({ taskType: 'eligibility', payload: {} })).rejects.toThrow('connection terminated');
    });
  });

  describe('claimNext', () => {
    test('runs the SKIP LOCKED claim for the worker and maps the row', async () => {
      fake.query.mockResolvedValueOnce({
        rows: [row({ status: 'IN_PROGRESS', attempt_count: 1, claimed_by: 'worker-a', claimed_at: '2026-01-05T09:00:01.000Z' })],
        rowCount: 1,
      });

      const item = await store.claimNext('worker-a');

      expect(fake.query).toHaveBeenCalledWith(CLAIM_SQL, ['worker-a']);
      expect(CLAIM_SQL).toContain('FOR UPDATE SKIP LOCKED');
      expect(CLAIM_SQL).toContain('ORDER BY created_at ASC, id ASC');
      expect(item?.status).toBe('IN_PROGRESS');
      expect(item?.claimedAt).toEqual(new Date('2026-01-05T09:00:01.000Z'));
    });

    test('returns null when nothing is claimable', async () => {
      expect(await store.claimNext('worker-a')).toBeNull();
    });
  });

  describe('recordOutcome', () => {
    test('locks the row and writes outcome, lines and status in one transaction', async () => {
      fake.query.mockResolvedValueOnce(lockedRow());

      await store.recordOutcome(
        'item-1',
        {
          result: { coverageStatus: 'Active' },
          lines: [{ category: 'Office Visit', data: { copay: 25 } }],
        },
        claimA,
      );

      expect(fake.transactions).toEqual({ committed: 1, rolledBack: 0 });
      expect(sqlOf(fake.query, 0)).toBe('SELECT status, claimed_by, attempt_count FROM work_items WHERE id = $1 FOR UPDATE');
      expect(sqlOf(fake.query, 1)).toContain('INSERT INTO work_item_outcomes');
      expect(fake.query.mock.calls[1][1]).toEqual(['item-1', '{"coverageStatus":"Active"}']);
      expect(sqlOf(fake.query, 2)).toContain('WITH ORDINALITY');
      expect(fake.query.mock.calls[2][1]).toEqual([
        'item-1',
        '[{"category":"Office Visit","data":{"copay":25}}]',
      ]);
      expect(sqlOf(fake.query, 3)).toContain('UPDATE work_items');
      expect(fake.query.mock.calls[3][1]).toEqual(['item-1', 'SUCCESS']);
    });

    test('skips the line insert when there are no lines', async () => {
      fake.query.mockResolvedValueOnce(lockedRow());

      await store.recordOutcome('item-1', { result: {}, lines: [] }, claimA);

      expect(fake.query).toHaveBeenCalledTimes(3);
    });

    test('rolls back when the item is not in progress', async () => {
      fake.query.mockResolvedValueOnce(lockedRow('PENDING', null));

      await expect(store.recordOutcome('item-1', { result: {}, lines: [] }, claimA)).rejects.toThrow(
        InvalidTransitionError,
      );
      expect(fake.transactions).toEqual({ committed: 0, rolledBack: 1 });
      expect(fake.query).toHaveBeenCalledTimes(1);
    });

    test('rolls back when the item does not exist', async () => {
      await expect(store.recordOutcome('missing', { result: {}, lines: [] }, claimA)).rejects.toThrow(NotFoundError);
      expect(fake.transactions.rolledBack).toBe(1);
    });

    test('rolls back when another worker now holds the claim', async () => {
      fake.query.mockResolvedValueOnce(lockedRow('IN_PROGRESS', 'worker-b', 2));

      await expect(store.recordOutcome('item-1', { result: {}, lines: [] }, claimA)).rejects.toThrow(ClaimLostError);
      expect(fake.transactions).toEqual({ committed: 0, rolledBack: 1 });
      expect(fake.query).toHaveBeenCalledTimes(1);
    });
  });

  describe('recordFailure', () => {
    test('requeues with the retry gate', async () => {
      fake.query.mockResolvedValueOnce(lockedRow());
      const notBefore = new Date('2026-01-05T09:00:02.000Z');

      await store.recordFailure('item-1', 'PENDING', { kind: 'TransientError', message: 'slow' }, claimA, { notBefore });

      expect(fake.query.mock.calls[1][1]).toEqual(['item-1', 'PENDING', 'TransientError', 'slow', notBefore]);
    });

    test('terminal failures never carry a retry gate', async () => {
      fake.query.mockResolvedValueOnce(lockedRow());

      await store.recordFailure(
        'item-1',
        'FAILED_VALIDATION',
        { kind: 'ValidationError', message: 'Invalid payload' },
        claimA,
        { notBefore: new Date() },
      );

      expect(fake.query.mock.calls[1][1]).toEqual(['item-1', 'FAILED_VALIDATION', 'ValidationError', 'Invalid payload', null]);
    });

    test('a write from an earlier attempt of the same worker is refused', async () => {
      fake.query.mockResolvedValueOnce(lockedRow('IN_PROGRESS', 'worker-a', 2));

      await expect(
        store.recordFailure('item-1', 'PENDING', { kind: 'TransientError', message: 'slow' }, claimA),
      ).rejects.toThrow('Work item item-1 is no longer claimed by worker-a for attempt 1');
      expect(fake.transactions.rolledBack).toBe(1);
    });
  });

  describe('reads', () => {
    test('get maps a row and throws NotFoundError for a missing id', async () => {
      fake.query.mockResolvedValueOnce({
        rows: [row({ status: 'FAILED_PORTAL', attempt_count: 1, last_error_kind: 'PortalBusinessError', last_error_message: 'Member not found' })],
        rowCount: 1,
      });

      const item = await store.get('item-1');
      expect(item.lastError).toEqual({ kind: 'PortalBusinessError', message: 'Member not found' });
      await expect(store.get('missing')).rejects.toThrow('Work item missing not found');
    });

    test('an id that is not a uuid is not found', async () => {
      fake.query.mockRejectedValueOnce(
        Object.assign(new Error('invalid input syntax for type uuid: "foo"'), { code: '22P02' }),
      );

      await expect(store.get('foo')).rejects.toThrow(NotFoundError);
    });

    test('other driver errors from get propagate', async () => {
      fake.query.mockRejectedValueOnce(new Error('connection terminated'));

      await expect(store.get('item-1')).rejects.toThrow('connection terminated');
    });

    test('getOutcome reads lines in position order', async () => {
      fake.query
        .mockResolvedValueOnce({
          rows: [{ work_item_id: 'item-1', result: '{"claimStatus":"Paid"}', created_at: '2026-01-05T09:01:00.000Z' }],
          rowCount: 1,
        })
        .mockResolvedValueOnce({
          rows: [{ position: '1', category: 'reason_code', data: { code: 'CO-45', description: null } }],
          rowCount: 1,
        });

      const outcome = await store.getOutcome('item-1');

      expect(outcome).toEqual({
        workItemId: 'item-1',
        result: { claimStatus: 'Paid' },
        lines: [{ position: 1, category: 'reason_code', data: { code: 'CO-45', description: null } }],
        createdAt: new Date('2026-01-05T09:01:00.000Z'),
      });
      expect(sqlOf(fake.query, 1)).toContain('ORDER BY position ASC');
    });

    test('getOutcome is null before success', async () => {
      expect(await store.getOutcome('item-1')).toBeNull();
      expect(fake.query).toHaveBeenCalledTimes(1);
    });

    test('list passes filters as parameters', async () => {
      await store.list({ status: ['PENDING', 'IN_PROGRESS'], taskType: 'appeals', limit: 10, offset: 20 });
      expect(fake.query.mock.calls[0][1]).toEqual([['PENDING', 'IN_PROGRESS'], 'appeals', 10, 20]);

      await store.list();
      expect(fake.query.mock.calls[1][1]).toEqual([null, null, 50, 0]);
    });

    test('counts fills missing statuses with zero', async () => {
      fake.query.mockResolvedValueOnce({
        rows: [
          { status: 'PENDING', count: 3 },
          { status: 'SUCCESS', count: '7' },
        ],
        rowCount: 2,
      });

      expect(await store.counts()).toEqual({
        PENDING: 3,
        IN_PROGRESS: 0,
        SUCCESS: 7,
        FAILED_VALIDATION: 0,
        FAILED_PORTAL: 0,
        FAILED_TECH: 0,
      });
    });

    test('nextClaimableAt is null without pending items', async () => {
      fake.query.mockResolvedValueOnce({ rows: [{ next_at: null }], rowCount: 1 });
      expect(await store.nextClaimableAt()).toBeNull();
    });
  });

  describe('recovery', () => {
    test('reclaimStale splits requeued and failed ids', async () => {
      fake.query.mockResolvedValueOnce({
        rows: [
          { id: 'a', status: 'PENDING' },
          { id: 'b', status: 'FAILED_TECH' },
        ],
        rowCount: 2,
      });
      const olderThan = new Date('2026-01-05T08:45:00.000Z');

      expect(await store.reclaimStale(olderThan, 3)).toEqual({ requeued: ['a'], failed: ['b'] });
      expect(fake.query.mock.calls[0][1]).toEqual([olderThan, 3]);
    });

    test('releaseClaims requeues or fails the worker claims by attempts used', async () => {
      fake.query.mockResolvedValueOnce({
        rows: [
          { id: 'a', status: 'PENDING' },
          { id: 'b', status: 'FAILED_TECH' },
        ],
        rowCount: 2,
      });

      expect(await store.releaseClaims('worker-a', 3)).toEqual({ requeued: ['a'], failed: ['b'] });
      expect(sqlOf(fake.query, 0)).toContain(
        "SET status = CASE WHEN attempt_count >= $2 THEN 'FAILED_TECH' ELSE 'PENDING' END",
      );
      expect(sqlOf(fake.query, 0)).toContain("WHERE status = 'IN_PROGRESS' AND claimed_by = $1");
      expect(fake.query.mock.calls[0][1]).toEqual([
        'worker-a',
        3,
        'Claim released: worker worker-a stopped before the item finished',
      ]);
    });
  });
});

describe('mapWorkItem', () => {
  test('parses string payloads and dates', () => {
    const item = mapWorkItem(
      row({ payload: '{"searchTerm":"CLM-1"}', not_before: '2026-01-05T09:00:04.000Z', attempt_count: 2 }),
    );

    expect(item.payload).toEqual({ searchTerm: 'CLM-1' });
    expect(Object.isFrozen(item.payload)).toBe(true);
    expect(item.notBefore).toEqual(new Date('2026-01-05T09:00:04.000Z'));
    expect(item.attemptCount).toBe(2);
  });

  test('ignores an unrecognised error kind', () => {
    expect(mapWorkItem(row({ last_error_kind: 'Mystery', last_error_message: 'x' })).lastError).toBeNull();
  });

  test('rejects an unknown status', () => {
    expect(() => mapWorkItem(row({ status: 'ARCHIVED' }))).toThrow('Unknown work item status in database: ARCHIVED');
  });
});
