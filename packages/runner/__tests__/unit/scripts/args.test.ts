import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { getArg, hasFlag, readRequestFile, requireArg } from '../../../src/scripts/args.js';

describe('script arguments', () => {
  let originalArgv: string[];

  beforeEach(() => {
    originalArgv = process.argv;
    process.argv = ['node', 'enqueue.ts', '--file=requests.json', '--dedupe'];
  });

  afterEach(() => {
    process.argv = originalArgv;
  });

  test('reads --name=value arguments and bare flags', () => {
    expect(getArg('file')).toBe('requests.json');
    expect(getArg('output')).toBeUndefined();
    expect(hasFlag('dedupe')).toBe(true);
    expect(hasFlag('dry-run')).toBe(false);
  });

  test('requireArg explains how to pass a missing argument', () => {
    expect(() => requireArg('input', 'batch.json')).toThrow('--input is required (e.g. --input=batch.json)');
  });
});

describe('readRequestFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'portalrunner-requests-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function write(content: unknown): string {
    const path = join(dir, 'requests.json');
    writeFileSync(path, JSON.stringify(content));
    return path;
  }

  test('accepts a single request object', async () => {
    const path = write({ taskType: 'appeals', payload: { searchBy: 'member_id', searchTerm: 'M1' } });

    expect(await readRequestFile(path)).toEqual({
      requests: [{ taskType: 'appeals', payload: { searchBy: 'member_id', searchTerm: 'M1' } }],
      single: true,
    });
  });

  test('accepts an array of requests', async () => {
    const path = write([
      { taskType: 'appeals', payload: {} },
      { taskType: 'eligibility', payload: {}, idempotencyKey: 'row-2' },
    ]);

    const { requests, single } = await readRequestFile(path);
    expect(single).toBe(false);
    expect(requests.map((request) => request.taskType)).toEqual(['appeals', 'eligibility']);
  });

  test('names the offending entry', async () => {
    const path = write([{ taskType: 'appeals', payload: {} }, { taskType: 'unknown', payload: {} }]);

    await expect(readRequestFile(path)).rejects.toThrow(`Invalid request file ${path}:\n  1.taskType:`);
  });
});
