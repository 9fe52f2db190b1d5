/**
 * Tests for help and version output
 *
 * These tests assert:
 * - defaults are substituted into the help text
 * - every option the parser accepts is documented
 * - the version line is built from the package version
 */

import { afterEach, describe, expect, it, vi } from 'vitest';

import { showHelp } from './formatter.ts';

describe('showHelp', () => {
  const help = showHelp();

  it('fills in defaults', () => {
    expect(help).toContain('--oracle-timeout <seconds>    Budget per oracle call (default: 120)');
    expect(help).toContain('(default: HEAD~1;');
    expect(help).toContain('Template file pattern (default: **/*.bicep)');
    expect(help).toContain('Similarity needed to match a phrase (default: 0.8)');
    expect(help).not.toMatch(/\[[A-Z_]+\]/);
  });

  it.each([
    '--oracle-command',
    '--oracle-url',
    '--oracle-response-field',
    '--model',
    '--format',
    '--title',
    '--ci',
    '--diff ',
    '--diff-ref',
    '--template-dir',
    '--template-glob',
    '--pr-title',
    '--pr-description',
    '--drift-threshold',
    '--intent-threshold',
    '--operations-threshold',
    '--noise-file',
    '--noise-threshold',
    '--log-dir',
    '--structured-logs',
    '--verbose',
    '--help',
    '--version',
  ])('documents %s', (flag) => {
    expect(help).toContain(flag);
  });
});

describe('showVersion', () => {
  afterEach(() => {
    vi.doUnmock('../version/version.ts');
    vi.resetModules();
  });

  it('prefixes the package name', async () => {
    vi.resetModules();
    vi.doMock('../version/version.ts', () => ({ getPackageVersion: () => '9.9.9' }));

    const { showVersion } = await import('./help.ts');

    expect(showVersion()).toBe('whatif-gate v9.9.9');
  });
});
