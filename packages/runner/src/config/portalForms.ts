import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const FieldSchema = z.object({
  selector: z.string().min(1),
  type: z.enum(['fill', 'select', 'check']).default('fill'),
  /** Rendering of ISO dates before they are typed into the portal. */
  dateFormat: z.enum(['iso', 'mm/dd/yyyy', 'yyyymmdd']).optional(),
});

const LinesSchema = z.object({
  row: z.string().min(1),
  cells: z.record(z.string().min(1)),
});

/**
 * A group of fields filled once per entry of an array in the payload.
 * `{n}` in a selector is replaced by the 1-based entry number; `add` is
 * clicked before every entry after the first.
 */
const RepeatSchema = z.object({
  source: z.string().min(1),
  add: z.string().min(1),
  fields: z.record(FieldSchema),
});

const FormSchema = z.object({
  path: z.string().min(1),
  ready: z.string().min(1),
  fields: z.record(FieldSchema),
  repeat: RepeatSchema.optional(),
  submit: z.string().min(1),
  result: z.object({
    container: z.string().min(1),
    fields: z.record(z.string().min(1)).default({}),
    lines: LinesSchema.optional(),
  }),
  businessError: z.string().min(1),
});

const LoginSchema = z.object({
  path: z.string().min(1),
  username: z.string().min(1),
  password: z.string().min(1),
  submit: z.string().min(1),
  loggedInMarker: z.string().min(1),
  /** Substring of the URL the portal redirects to when the session is gone. */
  urlPattern: z.string().min(1),
  errorBanner: z.string().min(1).optional(),
});

export const PortalFormsSchema = z.object({
  dashboardPath: z.string().min(1).default('/'),
  login: LoginSchema,
  forms: z.object({
    eligibility: FormSchema,
    claim_status: FormSchema,
    appeals: FormSchema,
    claims: FormSchema,
  }),
});

export type PortalFormsConfig = z.infer<typeof PortalFormsSchema>;
export type FormConfig = z.infer<typeof FormSchema>;
export type FormFieldConfig = z.infer<typeof FieldSchema>;
export type RepeatConfig = z.infer<typeof RepeatSchema>;
export type LoginConfig = z.infer<typeof LoginSchema>;

export const DEFAULT_PORTAL_FORMS_PATH = fileURLToPath(new URL('../../config/portal-forms.json', import.meta.url));

/** Read and validate the selector configuration for the portal's forms. */
export function loadPortalForms(path: string = DEFAULT_PORTAL_FORMS_PATH): PortalFormsConfig {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  const result = PortalFormsSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid portal form config at ${path}: ${details}`);
  }
  return result.data;
}
