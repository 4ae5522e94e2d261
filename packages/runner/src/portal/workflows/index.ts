import type { ZodType, ZodTypeDef } from 'zod';
import { ValidationError, type ValidationIssue } from '../../errors/taxonomy.js';
import { appealsKey, AppealsSchema, type AppealsData } from './appeals.js';
import { claimsKey, ClaimsSchema, type ClaimsData } from './claims.js';
import { claimStatusKey, ClaimStatusSchema, type ClaimStatusData } from './claimStatus.js';
import { eligibilityKey, EligibilitySchema, type EligibilityData } from './eligibility.js';

export const TASK_TYPES = ['eligibility', 'claim_status', 'appeals', 'claims'] as const;

export type TaskType = (typeof TASK_TYPES)[number];

/** A validated payload, tagged with the workflow that consumes it. */
export type TaskPayload =
  | { readonly taskType: 'eligibility'; readonly data: Readonly<EligibilityData> }
  | { readonly taskType: 'claim_status'; readonly data: Readonly<ClaimStatusData> }
  | { readonly taskType: 'appeals'; readonly data: Readonly<AppealsData> }
  | { readonly taskType: 'claims'; readonly data: Readonly<ClaimsData> };

export function isTaskType(value: string): value is TaskType {
  return TASK_TYPES.some((type) => type === value);
}

function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, raw: unknown): Readonly<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues: ValidationIssue[] = result.error.issues.map((issue) => ({
      field: issue.path.join('.'),
      message: issue.message,
    }));
    const summary = issues.map((issue) => (issue.field ? `${issue.field}: ${issue.message}` : issue.message));
    throw new ValidationError(`Invalid payload: ${summary.join('; ')}`, issues);
  }
  return Object.freeze(result.data);
}

/**
 * Validate a raw payload against its workflow's schema.
 *
 * @throws ValidationError for an unknown task type or a payload that breaks the rules
 */
export function parseTaskPayload(taskType: string, raw: unknown): TaskPayload {
  switch (taskType) {
    case 'eligibility':
      return { taskType, data: validate(EligibilitySchema, raw) };
    case 'claim_status':
      return { taskType, data: validate(ClaimStatusSchema, raw) };
    case 'appeals':
      return { taskType, data: validate(AppealsSchema, raw) };
    case 'claims':
      return { taskType, data: validate(ClaimsSchema, raw) };
    default:
      throw new ValidationError(`Unsupported task type '${taskType}'`, [
        { field: 'taskType', message: `Expected one of: ${TASK_TYPES.join(', ')}` },
      ]);
  }
}

/** Domain uniqueness key for a payload, used when the caller asks for deduplication. */
export function defaultIdempotencyKey(payload: TaskPayload): string {
  switch (payload.taskType) {
    case 'eligibility':
      return eligibilityKey(payload.data);
    case 'claim_status':
      return claimStatusKey(payload.data);
    case 'appeals':
      return appealsKey(payload.data);
    case 'claims':
      return claimsKey(payload.data);
  }
}

export { EligibilitySchema, ClaimStatusSchema, AppealsSchema, ClaimsSchema };
export type { EligibilityData, ClaimStatusData, AppealsData, ClaimsData };
export { summarizeEligibility } from './eligibility.js';
export { summarizeClaimStatus } from './claimStatus.js';
export { summarizeAppeals, APPEAL_SEARCH_MODES } from './appeals.js';
export { summarizeClaims, totalCharge, ServiceLineSchema, type ServiceLineData } from './claims.js';
