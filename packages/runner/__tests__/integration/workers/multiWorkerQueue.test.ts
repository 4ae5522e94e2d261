/**
 * Several dispatchers sharing one store, the way several worker processes
 * share the work_items table: every item is executed by exactly one worker
 * per attempt and all of them reach a terminal status.
 */

import { beforeEach, describe, expect, test } from 'vitest';
import { TransientError } from '../../../src/errors/taxonomy.js';
import type { OutcomeInput, WorkItem } from '../../../src/queue/types.js';
import { MemoryWorkItemStore } from '../../../src/store/MemoryWorkItemStore.js';
import { QueueDispatcher } from '../../../src/workers/QueueDispatcher.js';
import type { WorkItemExecutor } from '../../../src/workers/types.js';
import { createFakeClock, deferred, eligibilityPayload, sequentialIds, type FakeClock } from '../../helpers/fixtures.js';

const OUTCOME: OutcomeInput = { result: { coverageStatus: 'Active' }, lines: [] };

/** Records which worker ran which attempt. */
class RecordingExecutor implements WorkItemExecutor {
  readonly runs: Array<{ id: string; attempt: number; worker: string | null }> = [];

  constructor(private readonly behaviour: (item: WorkItem) => Promise<OutcomeInput>) {}

  async execute(item: WorkItem): Promise<OutcomeInput> {
    this.runs.push({ id: item.id, attempt: item.attemptCount, worker: item.claimedBy });
    return this.behaviour(item);
  }
}

describe('multiple workers on one queue', () => {
  let clock: FakeClock;
  let store: MemoryWorkItemStore;

  function workers(executor: WorkItemExecutor, count: number): QueueDispatcher[] {
    return Array.from(
      { length: count },
      (_, index) =>
        new QueueDispatcher({
          store,
          executor,
          workerId: `worker-${index + 1}`,
          clock: clock.now,
          sleep: clock.sleep,
          random: () => 0,
        }),
    );
  }

  async function enqueueMany(count: number): Promise<string[]> {
    const ids: string[] = [];
    for (let i = 0; i < count; i++) {
      ids.push(await store.enqueue({ taskType: 'eligibility', payload: eligibilityPayload({ memberId: `M${i}` }) }));
    }
    return ids;
  }

  beforeEach(() => {
    clock = createFakeClock();
    store = new MemoryWorkItemStore({ now: clock.now, generateId: sequentialIds() });
  });

  test('concurrent claims never hand the same item to two workers', async () => {
    await enqueueMany(5);
    const gate = deferred<OutcomeInput>();
    const executor = new RecordingExecutor(() => gate.promise);
    const pool = workers(executor, 3);

    const inFlight = pool.map((worker) => worker.dispatchOnce());
    await new Promise((resolve) => setTimeout(resolve, 0));

    const claimed = await store.list({ status: ['IN_PROGRESS'] });
    expect(claimed).toHaveLength(3);
    expect(new Set(claimed.map((item) => item.id)).size).toBe(3);
    expect(new Set(claimed.map((item) => item.claimedBy))).toEqual(new Set(['worker-1', 'worker-2', 'worker-3']));

    gate.resolve(OUTCOME);
    await Promise.all(inFlight);
    expect((await store.counts()).SUCCESS).toBe(3);
  });

  test('every item runs exactly once when workers drain the queue together', async () => {
    const ids = await enqueueMany(8);
    const executor = new RecordingExecutor(async () => {
      await new Promise((resolve) => setTimeout(resolve, 1));
      return OUTCOME;
    });

    const reports = (await Promise.all(workers(executor, 3).map((worker) => worker.runUntilIdle()))).flat();

    expect(reports).toHaveLength(8);
    expect(executor.runs.map((run) => run.id).sort()).toEqual([...ids].sort());
    expect((await store.counts()).SUCCESS).toBe(8);
  });

  test('a retried item is picked up again and finishes', async () => {
    const ids = await enqueueMany(4);
    const flaky = ids[1];
    const executor = new RecordingExecutor(async (item) => {
      await new Promise((resolve) => setTimeout(resolve, 1));
      if (item.id === flaky && item.attemptCount === 1) {
        throw new TransientError('read ECONNRESET');
      }
      return OUTCOME;
    });

    await Promise.all(workers(executor, 2).map((worker) => worker.runUntilIdle()));

    expect(executor.runs).toHaveLength(5);
    expect(executor.runs.filter((run) => run.id === flaky).map((run) => run.attempt)).toEqual([1, 2]);
    expect(await store.get(flaky)).toMatchObject({ status: 'SUCCESS', attemptCount: 2, lastError: null });
    expect((await store.counts()).SUCCESS).toBe(4);
  });
});
