import { Hono } from 'hono';
import { defaultIdempotencyKey, parseTaskPayload } from '../../portal/workflows/index.js';
import type { WorkItemStatus } from '../../queue/types.js';
import { toWorkItemView } from '../../queue/view.js';
import { DuplicateError } from '../../store/errors.js';
import type { WorkItemStore } from '../../store/types.js';
import type { AdHocRunner } from '../../workers/AdHocRunner.js';
import { parseBody, parseQuery } from '../middleware/index.js';
import {
  EnqueueWorkItemSchema,
  ListWorkItemsQuerySchema,
  RunWorkItemSchema,
  WorkItemIdSchema,
} from '../schemas/index.js';

export function createWorkItemRoutes(store: WorkItemStore) {
  const workItems = new Hono();

  // ─── POST /work-items - Enqueue ────────────────────────────────

  workItems.post('/', async (c) => {
    const parsed = await parseBody(c, EnqueueWorkItemSchema);
    if (!parsed.ok) return parsed.response;
    const body = parsed.data;

    const idempotencyKey =
      body.idempotencyKey ??
      (body.dedupe ? defaultIdempotencyKey(parseTaskPayload(body.taskType, body.payload)) : null);

    try {
      const id = await store.enqueue({ taskType: body.taskType, payload: body.payload, idempotencyKey });
      return c.json({ id, status: 'PENDING', idempotencyKey }, 201);
    } catch (err) {
      if (err instanceof DuplicateError) {
        return c.json(
          {
            error: 'duplicate_idempotency_key',
            idempotencyKey: err.idempotencyKey,
            existing_id: err.existingId,
          },
          409,
        );
      }
      throw err;
    }
  });

  // ─── GET /work-items - List ────────────────────────────────────

  workItems.get('/', async (c) => {
    const parsed = parseQuery(c, ListWorkItemsQuerySchema);
    if (!parsed.ok) return parsed.response;
    const query = parsed.data;

    const items = await store.list({
      status: query.status,
      taskType: query.taskType,
      limit: query.limit,
      offset: query.offset,
    });
    return c.json({
      items: items.map((item) => toWorkItemView(item)),
      limit: query.limit,
      offset: query.offset,
    });
  });

  // ─── GET /work-items/:id - Status + outcome ───────────────────

  workItems.get('/:id', async (c) => {
    const id = c.req.param('id');
    if (!WorkItemIdSchema.safeParse(id).success) {
      return c.json({ error: 'not_found', message: `Work item ${id} not found` }, 404);
    }

    const item = await store.get(id);
    const outcome = item.status === 'SUCCESS' ? await store.getOutcome(id) : null;
    return c.json(toWorkItemView(item, outcome));
  });

  return workItems;
}

const RUN_STATUS_CODES: Record<WorkItemStatus, 200 | 422 | 500 | 502> = {
  SUCCESS: 200,
  FAILED_VALIDATION: 422,
  FAILED_PORTAL: 502,
  FAILED_TECH: 500,
  // Not reachable after a completed ad hoc run
  PENDING: 500,
  IN_PROGRESS: 500,
};

export function createRunRoutes(adHoc: AdHocRunner) {
  const run = new Hono();

  // ─── POST /run - Ad hoc execution ─────────────────────────────

  run.post('/', async (c) => {
    const parsed = await parseBody(c, RunWorkItemSchema);
    if (!parsed.ok) return parsed.response;

    const { item, outcome } = await adHoc.run(parsed.data);
    return c.json(toWorkItemView(item, outcome), RUN_STATUS_CODES[item.status]);
  });

  return run;
}
