/**
 * Tests for the temp directory helpers.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { createTempDir, removeTempDir, writeTree } from './temp-utils.ts';

describe('temp-utils', () => {
  it('writes nested files and removes the directory', async () => {
    const root = await createTempDir('temp-utils-');
    expect(path.basename(root).startsWith('temp-utils-')).toBe(true);

    await writeTree(root, { 'a/b/c.txt': 'nested' });
    await expect(readFile(path.join(root, 'a', 'b', 'c.txt'), 'utf8')).resolves.toBe('nested');

    await removeTempDir(root);
    expect(existsSync(root)).toBe(false);
  });
});
