/**
 * Tests for the run logger
 *
 * These tests assert:
 * - text lines carry timestamp, scope, trace prefix and level
 * - structured lines are JSON with trace fields
 * - debug lines reach the stream only when verbose
 * - the log file receives every line and stops at its budget
 */

import { readFile, rm } from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createCaptureStream } from '../../__test-utils__/mocks/streams/stream-mocks.ts';
import { createTempDir } from '../../__test-utils__/utils/temp-utils.ts';
import { createLogger, formatLogLine } from './logger.ts';
import type { TraceContext } from './tracing.ts';

const fixedDate = new Date('2026-01-01T00:00:00.000Z');
const now = () => fixedDate;

const trace: TraceContext = {
  traceId: '4bf92f3577b34da6a3ce929d0e0e4736',
  spanId: '00f067aa0ba902b7',
  parentSpanId: '1111111111111111',
  sampled: true,
};

let tempDir = '';

beforeEach(async () => {
  tempDir = await createTempDir('whatif-gate-logs-');
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

describe('formatLogLine', () => {
  it('formats a text line with trace prefix and fields', () => {
    expect(
      formatLogLine(
        'warn',
        'Input truncated\nat limit',
        {
          scope: 'whatif-gate',
          structured: false,
          timestamp: '2026-01-01T00:00:00.000Z',
          traceContext: trace,
        },
        { chars: 100_000 },
      ),
    ).toBe(
      '[2026-01-01T00:00:00.000Z] [whatif-gate] [trace=4bf92f35] WARN Input truncated at limit (chars=100000)',
    );
  });

  it('formats a structured line', () => {
    const line = formatLogLine(
      'info',
      'Verdict SAFE',
      { scope: 'gate', structured: true, timestamp: 't', traceContext: trace },
      { safe: true },
    );

    expect(JSON.parse(line)).toEqual({
      timestamp: 't',
      level: 'info',
      scope: 'gate',
      message: 'Verdict SAFE',
      traceId: trace.traceId,
      spanId: trace.spanId,
      parentSpanId: trace.parentSpanId,
      sampled: true,
      fields: { safe: true },
    });
  });

  it('omits the trace prefix without a trace context', () => {
    expect(formatLogLine('error', 'boom', { scope: 's', structured: false, timestamp: 't' })).toBe(
      '[t] [s] ERROR boom',
    );
  });
});

describe('createLogger', () => {
  it('writes to the stream and hides debug lines unless verbose', async () => {
    const stream = createCaptureStream();
    const logger = await createLogger({ scope: 'gate', stream, now });

    logger.debug('hidden');
    logger.info('shown');
    await logger.close();

    expect(stream.lines()).toEqual(['[2026-01-01T00:00:00.000Z] [gate] INFO shown']);
  });

  it('writes debug lines when verbose', async () => {
    const stream = createCaptureStream();
    const logger = await createLogger({ scope: 'gate', stream, verbose: true, now });

    logger.debug('detail');

    expect(stream.lines()).toEqual(['[2026-01-01T00:00:00.000Z] [gate] DEBUG detail']);
  });

  it('copies every line, debug included, to the log file', async () => {
    const stream = createCaptureStream();
    const logFile = path.join(tempDir, 'nested', 'gate.log');
    const logger = await createLogger({ scope: 'gate', stream, logFile, now });

    logger.debug('one');
    logger.warn('two');
    await logger.close();

    expect(await readFile(logFile, 'utf8')).toBe(
      '[2026-01-01T00:00:00.000Z] [gate] DEBUG one\n[2026-01-01T00:00:00.000Z] [gate] WARN two\n',
    );
  });

  it('truncates the log file at its byte budget', async () => {
    const logFile = path.join(tempDir, 'gate.log');
    const logger = await createLogger({
      scope: 'g',
      stream: createCaptureStream(),
      logFile,
      maxFileBytes: 40,
      now,
    });

    // 38 bytes per line
    logger.info('a');
    logger.info('b');
    logger.info('c');
    await logger.close();

    expect((await readFile(logFile, 'utf8')).split('\n')).toEqual([
      '[2026-01-01T00:00:00.000Z] [g] INFO a',
      '[2026-01-01T00:00:00.000Z] [g] WARN [TRUNCATED at 40 bytes]',
      '',
    ]);
  });
});
