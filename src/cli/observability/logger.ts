/**
 * Risk Gate — Logging
 *
 * Role:
 *   Diagnostic output for a gate run. Lines go to a diagnostic stream
 *   (stderr by default, keeping stdout for the report) and optionally to a
 *   log file.
 *
 * Guarantees:
 *   - One line per message, in call order
 *   - Normalized text lines or structured JSON lines, never mixed
 *   - Trace ids on every line when a trace context is given
 *   - The log file stops at its byte budget with a single truncation note
 *
 * Non-goals:
 *   - No log rotation
 *   - No decisions based on what was logged
 */

import { createWriteStream, type WriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import path from 'node:path';

import type { TraceContext } from './tracing.ts';
import { shortTraceId } from './tracing.ts';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Readonly<Record<string, string | number | boolean>>;

interface StructuredPayload {
  timestamp: string;
  level: LogLevel;
  scope: string;
  message: string;
  traceId?: string;
  spanId?: string;
  parentSpanId?: string;
  sampled?: boolean;
  fields?: LogFields;
}

export interface LoggerOptions {
  readonly scope: string;
  /** Diagnostic stream; stderr when omitted. */
  readonly stream?: NodeJS.WritableStream;
  readonly structured?: boolean;
  /** Emit debug lines. */
  readonly verbose?: boolean;
  readonly traceContext?: TraceContext;
  /** Also append every line to this file. */
  readonly logFile?: string;
  /** Byte budget for the log file. */
  readonly maxFileBytes?: number;
  readonly now?: () => Date;
}

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  /** Flush and close the log file, if any. */
  close(): Promise<void>;
}

export const DEFAULT_MAX_LOG_FILE_BYTES = 5 * 1024 * 1024;

/* -------------------------------------------------------------------------- */
/* Formatting                                                                 */
/* -------------------------------------------------------------------------- */

export interface LogLineContext {
  readonly scope: string;
  readonly structured: boolean;
  readonly timestamp: string;
  readonly traceContext?: TraceContext;
}

function formatFields(fields: LogFields | undefined): string {
  if (fields === undefined) {
    return '';
  }
  const pairs = Object.entries(fields).map(([key, value]) => `${key}=${String(value)}`);
  return pairs.length === 0 ? '' : ` (${pairs.join(' ')})`;
}

/**
 * Format one log line without its trailing newline.
 */
export function formatLogLine(
  level: LogLevel,
  message: string,
  context: LogLineContext,
  fields?: LogFields,
): string {
  const { scope, structured, timestamp, traceContext } = context;

  if (structured) {
    const payload: StructuredPayload = { timestamp, level, scope, message };
    if (traceContext) {
      payload.traceId = traceContext.traceId;
      payload.spanId = traceContext.spanId;
      if (traceContext.parentSpanId !== undefined) {
        payload.parentSpanId = traceContext.parentSpanId;
      }
      payload.sampled = traceContext.sampled;
    }
    if (fields !== undefined && Object.keys(fields).length > 0) {
      payload.fields = fields;
    }
    return JSON.stringify(payload);
  }

  const trace = traceContext ? ` [trace=${shortTraceId(traceContext)}]` : '';
  // Messages stay on one line
  const text = message.replaceAll(/\r?\n/g, ' ');
  return `[${timestamp}] [${scope}]${trace} ${level.toUpperCase()} ${text}${formatFields(fields)}`;
}

/* -------------------------------------------------------------------------- */
/* Log file                                                                   */
/* -------------------------------------------------------------------------- */

interface BoundedFile {
  write(line: string): void;
  close(): Promise<void>;
}

function openBoundedFile(
  stream: WriteStream,
  maxBytes: number,
  truncationNote: () => string,
): BoundedFile {
  let remaining = Math.max(0, maxBytes);
  let truncated = false;

  return {
    write(line: string): void {
      if (truncated) {
        return;
      }
      const bytes = Buffer.byteLength(line);
      if (bytes > remaining) {
        truncated = true;
        stream.write(`${truncationNote()}\n`);
        return;
      }
      remaining -= bytes;
      stream.write(line);
    },
    close(): Promise<void> {
      return new Promise<void>((resolve, reject) => {
        stream.on('error', reject);
        stream.end(() => resolve());
      });
    },
  };
}

/* -------------------------------------------------------------------------- */
/* Public API                                                                 */
/* -------------------------------------------------------------------------- */

/**
 * Create the logger for one run. The log file's directory is created when
 * a file is requested.
 */
export async function createLogger(options: LoggerOptions): Promise<Logger> {
  const stream = options.stream ?? process.stderr;
  const structured = options.structured === true;
  const now = options.now ?? (() => new Date());

  const lineContext = (): LogLineContext => ({
    scope: options.scope,
    structured,
    timestamp: now().toISOString(),
    ...(options.traceContext === undefined ? {} : { traceContext: options.traceContext }),
  });

  let file: BoundedFile | undefined;
  if (options.logFile !== undefined) {
    const maxBytes = options.maxFileBytes ?? DEFAULT_MAX_LOG_FILE_BYTES;
    await mkdir(path.dirname(options.logFile), { recursive: true });
    const fileStream = createWriteStream(options.logFile, { flags: 'w' });
    file = openBoundedFile(fileStream, maxBytes, () =>
      formatLogLine('warn', `[TRUNCATED at ${maxBytes} bytes]`, lineContext()),
    );
  }

  const emit = (level: LogLevel, message: string, fields?: LogFields): void => {
    const line = `${formatLogLine(level, message, lineContext(), fields)}\n`;
    file?.write(line);
    if (level !== 'debug' || options.verbose === true) {
      stream.write(line);
    }
  };

  return {
    debug: (message, fields) => emit('debug', message, fields),
    info: (message, fields) => emit('info', message, fields),
    warn: (message, fields) => emit('warn', message, fields),
    error: (message, fields) => emit('error', message, fields),
    close: async () => {
      await file?.close();
    },
  };
}
