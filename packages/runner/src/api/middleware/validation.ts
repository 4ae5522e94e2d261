import type { Context } from 'hono';
import type { ZodError, ZodType, ZodTypeDef } from 'zod';

export type Parsed<T> = { ok: true; data: T } | { ok: false; response: Response };

/** Parse the JSON body against a Zod schema; on failure the 400/422 response to return. */
export async function parseBody<T>(c: Context, schema: ZodType<T, ZodTypeDef, unknown>): Promise<Parsed<T>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return { ok: false, response: c.json({ error: 'bad_request', message: 'Invalid JSON body' }, 400) };
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    return {
      ok: false,
      response: c.json({ error: 'validation_error', details: formatZodError(result.error) }, 422),
    };
  }
  return { ok: true, data: result.data };
}

/** Parse query parameters against a Zod schema; on failure the 422 response to return. */
export function parseQuery<T>(c: Context, schema: ZodType<T, ZodTypeDef, unknown>): Parsed<T> {
  const result = schema.safeParse(c.req.query());
  if (!result.success) {
    return {
      ok: false,
      response: c.json({ error: 'validation_error', details: formatZodError(result.error) }, 422),
    };
  }
  return { ok: true, data: result.data };
}

export function formatZodError(error: ZodError) {
  return error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));
}
