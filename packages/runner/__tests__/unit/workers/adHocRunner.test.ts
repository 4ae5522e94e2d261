import { describe, expect, test, vi } from 'vitest';
import { TransientError, ValidationError } from '../../../src/errors/taxonomy.js';
import type { OutcomeInput } from '../../../src/queue/types.js';
import { AdHocRunner } from '../../../src/workers/AdHocRunner.js';
import type { WorkItemExecutor } from '../../../src/workers/types.js';
import { appealsPayload, createFakeClock, eligibilityPayload } from '../../helpers/fixtures.js';

const OUTCOME: OutcomeInput = {
  result: { appealsFound: 1 },
  lines: [{ category: 'appeal', data: { appealId: 'AP-1' } }],
};

function createRunner() {
  const clock = createFakeClock();
  const execute = vi.fn<WorkItemExecutor['execute']>();
  const runner = new AdHocRunner({ executor: { execute }, clock: clock.now, sleep: clock.sleep, random: () => 0 });
  return { clock, execute, runner };
}

describe('AdHocRunner', () => {
  test('runs a payload to success and returns its outcome', async () => {
    const { execute, runner } = createRunner();
    execute.mockResolvedValue(OUTCOME);

    const { item, outcome } = await runner.run({ taskType: 'appeals', payload: appealsPayload() });

    expect(item).toMatchObject({ taskType: 'appeals', status: 'SUCCESS', attemptCount: 1, claimedBy: null });
    expect(outcome?.result).toEqual({ appealsFound: 1 });
    expect(outcome?.lines).toEqual([{ position: 1, category: 'appeal', data: { appealId: 'AP-1' } }]);
  });

  test('uses the same retry policy as the queue', async () => {
    const { clock, execute, runner } = createRunner();
    execute.mockRejectedValueOnce(new TransientError('Timeout 20000ms exceeded')).mockResolvedValueOnce(OUTCOME);

    const { item } = await runner.run({ taskType: 'appeals', payload: appealsPayload() });

    expect(item).toMatchObject({ status: 'SUCCESS', attemptCount: 2 });
    expect(clock.now().toISOString()).toBe('2026-01-05T09:00:02.000Z');
  });

  test('reports a terminal failure without an outcome', async () => {
    const { execute, runner } = createRunner();
    execute.mockRejectedValue(new ValidationError('Invalid payload: memberId: Required'));

    const { item, outcome } = await runner.run({ taskType: 'eligibility', payload: eligibilityPayload({ memberId: '' }) });

    expect(item).toMatchObject({
      status: 'FAILED_VALIDATION',
      attemptCount: 1,
      lastError: { kind: 'ValidationError', message: 'Invalid payload: memberId: Required' },
    });
    expect(outcome).toBeNull();
  });

  test('runMany runs one payload at a time, in order', async () => {
    const { execute, runner } = createRunner();
    let active = 0;
    let maxActive = 0;
    const seen: string[] = [];
    execute.mockImplementation(async (item) => {
      active += 1;
      maxActive = Math.max(maxActive, active);
      seen.push(String(item.payload.searchTerm));
      await Promise.resolve();
      active -= 1;
      return OUTCOME;
    });

    const results = await runner.runMany([
      { taskType: 'appeals', payload: appealsPayload({ searchTerm: 'CLM-1' }) },
      { taskType: 'appeals', payload: appealsPayload({ searchTerm: 'CLM-2' }) },
    ]);

    expect(results.map((result) => result.item.status)).toEqual(['SUCCESS', 'SUCCESS']);
    expect(seen).toEqual(['CLM-1', 'CLM-2']);
    expect(maxActive).toBe(1);
  });
});
