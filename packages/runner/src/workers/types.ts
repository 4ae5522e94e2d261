import type { OutcomeInput, WorkItem } from '../queue/types.js';

/** Runs one claimed work item; throws a taxonomy error on failure. */
export interface WorkItemExecutor {
  execute(item: WorkItem): Promise<OutcomeInput>;
}
