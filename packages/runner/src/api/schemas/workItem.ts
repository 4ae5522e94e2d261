import { z } from 'zod';
import { TASK_TYPES } from '../../portal/workflows/index.js';
import { isWorkItemStatus, WORK_ITEM_STATUSES, type WorkItemStatus } from '../../queue/types.js';

// --- Enqueue / run ---

export const EnqueueWorkItemSchema = z.object({
  taskType: z.enum(TASK_TYPES),
  payload: z.record(z.unknown()),
  idempotencyKey: z.string().trim().min(1).max(255).optional(),
  /** Derive the idempotency key from the payload when none is given. */
  dedupe: z.boolean().default(false),
});

export type EnqueueWorkItemInput = z.infer<typeof EnqueueWorkItemSchema>;

export const RunWorkItemSchema = EnqueueWorkItemSchema.pick({ taskType: true, payload: true });

export type RunWorkItemInput = z.infer<typeof RunWorkItemSchema>;

// --- List query ---

export const ListWorkItemsQuerySchema = z.object({
  status: z
    .string()
    .optional() // comma-separated: "PENDING,IN_PROGRESS"
    .transform((value, ctx): WorkItemStatus[] | undefined => {
      if (!value) return undefined;
      const statuses: WorkItemStatus[] = [];
      for (const part of value.split(',').map((s) => s.trim().toUpperCase()).filter(Boolean)) {
        if (!isWorkItemStatus(part)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Unknown status '${part}'. Expected one of: ${WORK_ITEM_STATUSES.join(', ')}`,
          });
          return z.NEVER;
        }
        statuses.push(part);
      }
      return statuses;
    }),
  taskType: z.enum(TASK_TYPES).optional(),
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

export type ListWorkItemsQuery = z.infer<typeof ListWorkItemsQuerySchema>;

// --- Path params ---

export const WorkItemIdSchema = z.string().uuid();
