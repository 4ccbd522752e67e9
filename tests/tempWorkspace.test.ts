/**
 * Tests for scoped temporary directories
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { existsSync, mkdtempSync, readdirSync, rmSync } from 'fs';
import { writeFile } from 'fs/promises';
import { basename, join } from 'path';
import { tmpdir } from 'os';
import { StagingError } from '../src/errors.js';
import { withTempWorkspace } from '../src/utils/tempWorkspace.js';

describe('withTempWorkspace', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'workspace-test-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('returns the callback result and removes the directory with its contents', async () => {
    let seen = '';
    const result = await withTempWorkspace({ prefix: 'job-', root }, async (dir) => {
      seen = dir;
      await writeFile(join(dir, 'input.yml'), 'connectors: {}\n');
      return 42;
    });

    expect(result).toBe(42);
    expect(basename(seen).startsWith('job-')).toBe(true);
    expect(existsSync(seen)).toBe(false);
    expect(readdirSync(root)).toEqual([]);
  });

  it('removes the directory and rethrows when the callback fails', async () => {
    const failure = new Error('engine exploded');
    await expect(
      withTempWorkspace({ prefix: 'job-', root }, async (dir) => {
        await writeFile(join(dir, 'input.yml'), 'x');
        throw failure;
      })
    ).rejects.toBe(failure);
    expect(readdirSync(root)).toEqual([]);
  });

  it('gives concurrent callers separate directories', async () => {
    const dirs = await Promise.all(
      [1, 2, 3].map((n) => withTempWorkspace({ prefix: 'job-', root }, async (dir) => `${n}:${dir}`))
    );
    const unique = new Set(dirs.map((entry) => entry.split(':')[1]));
    expect(unique.size).toBe(3);
  });

  it('wraps mkdtemp failures in a StagingError', async () => {
    await expect(
      withTempWorkspace({ prefix: 'job-', root: join(root, 'does-not-exist') }, async () => 'unreachable')
    ).rejects.toBeInstanceOf(StagingError);
  });
});
