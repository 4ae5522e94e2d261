import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { TASK_TYPES } from '../portal/workflows/index.js';

/** Value of `--name=value`, or undefined. */
export function getArg(name: string): string | undefined {
  const prefix = `--${name}=`;
  const arg = process.argv.find((a) => a.startsWith(prefix));
  return arg ? arg.slice(prefix.length) : undefined;
}

export function requireArg(name: string, example: string): string {
  const value = getArg(name);
  if (!value) {
    throw new Error(`--${name} is required (e.g. --${name}=${example})`);
  }
  return value;
}

export function hasFlag(name: string): boolean {
  return process.argv.includes(`--${name}`);
}

const JsonRequestSchema = z.object({
  taskType: z.enum(TASK_TYPES),
  payload: z.record(z.unknown()),
  idempotencyKey: z.string().min(1).max(255).optional(),
});

export type JsonRequest = z.infer<typeof JsonRequestSchema>;

/** A request file holds one request object or an array of them. */
export async function readRequestFile(path: string): Promise<{ requests: JsonRequest[]; single: boolean }> {
  const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
  const single = !Array.isArray(raw);
  const result = z.array(JsonRequestSchema).safeParse(single ? [raw] : raw);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('\n  ');
    throw new Error(`Invalid request file ${path}:\n  ${details}`);
  }
  return { requests: result.data, single };
}
