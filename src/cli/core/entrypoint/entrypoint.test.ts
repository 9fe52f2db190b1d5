/**
 * Tests for the CLI entrypoint
 *
 * These tests assert:
 * - EPIPE on stdout/stderr is ignored, other stream errors propagate
 * - the main result becomes the process exit code; rejections become 1
 * - SIGINT/SIGTERM set 130/143, run the shutdown hook once and exit
 * - main answers --help/--version and maps argument errors to 2
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  addedListeners,
  captureErrorListeners,
  type ListenerSnapshot,
  removeNewListeners,
} from '../../../__test-utils__/mocks/process/error-listeners.ts';
import { createCaptureStream } from '../../../__test-utils__/mocks/streams/stream-mocks.ts';
import { createDeferred } from '../../../__test-utils__/utils/deferred.ts';
import { main, runEntrypoint, sanitizeArgs } from './entrypoint.ts';

const settle = () => new Promise((resolve) => setImmediate(resolve));

describe('runEntrypoint', () => {
  let before: ListenerSnapshot;
  let originalExitCode: typeof process.exitCode;

  beforeEach(() => {
    before = captureErrorListeners();
    originalExitCode = process.exitCode;
  });

  afterEach(() => {
    removeNewListeners(before);
    process.exitCode = originalExitCode;
  });

  it('ignores EPIPE and rethrows other stream errors', () => {
    runEntrypoint({ mainFn: () => Promise.resolve({ exitCode: 0 }) });

    for (const stream of [process.stdout, process.stderr]) {
      const [handler] = addedListeners(
        stream,
        stream === process.stdout ? before.stdout : before.stderr,
      );
      expect(handler).toBeDefined();
      expect(() => handler?.(Object.assign(new Error('EPIPE'), { code: 'EPIPE' }))).not.toThrow();
      expect(() => handler?.(Object.assign(new Error('boom'), { code: 'EIO' }))).toThrow('boom');
    }
  });

  it('sets the exit code from the main result', async () => {
    runEntrypoint({ mainFn: () => Promise.resolve({ exitCode: 2 }) });
    await settle();

    expect(process.exitCode).toBe(2);
  });

  it('reports unexpected rejections and exits 1', async () => {
    const stderr = createCaptureStream();

    runEntrypoint({ mainFn: () => Promise.reject(new Error('boom')), stderr });
    await settle();

    expect(stderr.text()).toBe('Fatal: UNEXPECTED_ERROR: boom\n');
    expect(process.exitCode).toBe(1);
  });

  it('handles the first signal only and exits with 130', async () => {
    const exit = vi.fn();
    const onSignal = vi.fn();
    const pending = createDeferred<{ exitCode: number }>();

    runEntrypoint({ mainFn: () => pending.promise, onSignal, exit });
    process.emit('SIGINT');
    process.emit('SIGTERM');
    await settle();

    expect(onSignal).toHaveBeenCalledTimes(1);
    expect(onSignal).toHaveBeenCalledWith('SIGINT');
    expect(exit).toHaveBeenCalledWith(130);

    pending.resolve({ exitCode: 0 });
    await settle();
    expect(process.exitCode).toBe(130);
  });

  it('reports a failing shutdown hook and still exits with 143', async () => {
    const exit = vi.fn();
    const stderr = createCaptureStream();
    const pending = createDeferred<{ exitCode: number }>();

    runEntrypoint({
      mainFn: () => pending.promise,
      onSignal: () => Promise.reject(new Error('flush failed')),
      exit,
      stderr,
    });
    process.emit('SIGTERM');
    await settle();

    expect(stderr.text()).toBe('WARN: signal handler failed: flush failed\n');
    expect(exit).toHaveBeenCalledWith(143);

    pending.resolve({ exitCode: 0 });
    await settle();
  });

  it('removes its signal handlers when main completes', async () => {
    const sigint = new Set(process.listeners('SIGINT'));

    runEntrypoint({ mainFn: () => Promise.resolve({ exitCode: 0 }) });
    await settle();

    expect(process.listeners('SIGINT').filter((l) => !sigint.has(l))).toEqual([]);
  });
});

describe('sanitizeArgs', () => {
  it('keeps flag names and redacts values', () => {
    expect(
      sanitizeArgs(['-v', '--oracle-url=https://classifier.test', '--ci', 'secret-value']),
    ).toEqual(['-v', '--oracle-url=<redacted>', '--ci', '<redacted>']);
  });
});

describe('main', () => {
  it('prints help', async () => {
    const stdout = createCaptureStream();

    await expect(main(['--help'], { stdout })).resolves.toEqual({ exitCode: 0 });
    expect(stdout.text()).toContain('USAGE:');
  });

  it('prints the version', async () => {
    const stdout = createCaptureStream();

    await expect(main(['--version'], { stdout })).resolves.toEqual({ exitCode: 0 });
    expect(stdout.text()).toMatch(/^whatif-gate v\S+\n$/);
  });

  it('maps argument errors to exit 2', async () => {
    const stderr = createCaptureStream();

    await expect(main(['--format', 'xml'], { stderr })).resolves.toEqual({ exitCode: 2 });
    expect(stderr.lines()).toEqual([
      'Error: --format must be json or markdown (got "xml")',
      'Run whatif-gate --help for usage.',
    ]);
  });
});
