import { describe, expect, it } from 'vitest';

import { GIT_DIFF_TIMEOUT_MS, MS_PER_SECOND } from './time.ts';

describe('CLI time constants', () => {
  it('counts milliseconds per second', () => {
    expect(MS_PER_SECOND).toBe(1000);
  });

  it('gives git diff thirty seconds', () => {
    expect(GIT_DIFF_TIMEOUT_MS).toBe(30_000);
  });
});
