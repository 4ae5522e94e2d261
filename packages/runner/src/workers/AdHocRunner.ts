import { getLogger } from '../monitoring/logger.js';
import { RetryPolicy } from '../queue/retryPolicy.js';
import type { EnqueueInput, Outcome, WorkItem } from '../queue/types.js';
import { MemoryWorkItemStore } from '../store/MemoryWorkItemStore.js';
import { QueueDispatcher } from './QueueDispatcher.js';
import type { WorkItemExecutor } from './types.js';

const logger = getLogger({ service: 'AdHocRunner' });

export interface AdHocResult {
  item: WorkItem;
  outcome: Outcome | null;
}

export interface AdHocRunnerOptions {
  executor: WorkItemExecutor;
  retryPolicy?: RetryPolicy;
  workerId?: string;
  clock?: () => Date;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Single-shot mode: runs payloads immediately with the same executor, retry
 * policy and state machine as the durable queue, but keeps the records in
 * memory instead of PostgreSQL.
 */
export class AdHocRunner {
  private readonly opts: AdHocRunnerOptions;
  private readonly retryPolicy: RetryPolicy;

  constructor(opts: AdHocRunnerOptions) {
    this.opts = opts;
    this.retryPolicy = opts.retryPolicy ?? new RetryPolicy();
  }

  /** Run one payload until it reaches a terminal status. */
  async run(input: EnqueueInput): Promise<AdHocResult> {
    const store = new MemoryWorkItemStore({ now: this.opts.clock });
    const dispatcher = new QueueDispatcher({
      store,
      executor: this.opts.executor,
      workerId: this.opts.workerId ?? 'adhoc',
      retryPolicy: this.retryPolicy,
      clock: this.opts.clock,
      random: this.opts.random,
      sleep: this.opts.sleep,
    });

    const id = await store.enqueue(input);
    const reports = await dispatcher.runUntilIdle();
    const item = await store.get(id);

    logger.info('Ad hoc run finished', {
      workItemId: id,
      taskType: input.taskType,
      status: item.status,
      attempts: item.attemptCount,
      dispatches: reports.length,
    });

    return { item, outcome: await store.getOutcome(id) };
  }

  /** Run several payloads one after another (they share one portal session). */
  async runMany(inputs: EnqueueInput[]): Promise<AdHocResult[]> {
    const results: AdHocResult[] = [];
    for (const input of inputs) {
      results.push(await this.run(input));
    }
    return results;
  }
}
