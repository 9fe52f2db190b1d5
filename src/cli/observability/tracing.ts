/**
 * Risk Gate — Trace Context
 *
 * Role:
 *   Correlation ids for one gate run, so log lines, telemetry and oracle
 *   requests of the same evaluation can be joined.
 *
 * Guarantees:
 *   - W3C Trace Context shapes (32-hex trace id, 16-hex span id)
 *   - A run joins an outer trace when a valid `traceparent` is supplied
 */

import { randomBytes } from 'node:crypto';

export interface TraceContext {
  readonly traceId: string;
  readonly spanId: string;
  readonly parentSpanId?: string;
  readonly sampled: boolean;
}

const TRACE_ID_RE = /^[0-9a-f]{32}$/;
const SPAN_ID_RE = /^[0-9a-f]{16}$/;
const FLAGS_RE = /^[0-9a-f]{2}$/;

export function generateTraceId(): string {
  return randomBytes(16).toString('hex');
}

export function generateSpanId(): string {
  return randomBytes(8).toString('hex');
}

/**
 * Start the trace for a run, continuing `parent` when given.
 */
export function createTraceContext(parent?: TraceContext): TraceContext {
  if (parent === undefined) {
    return { traceId: generateTraceId(), spanId: generateSpanId(), sampled: true };
  }
  return {
    traceId: parent.traceId,
    spanId: generateSpanId(),
    parentSpanId: parent.spanId,
    sampled: parent.sampled,
  };
}

/**
 * @example
 * formatTraceparent(ctx) // "00-4bf92f35...-00f067aa...-01"
 */
export function formatTraceparent(ctx: TraceContext): string {
  return `00-${ctx.traceId}-${ctx.spanId}-${ctx.sampled ? '01' : '00'}`;
}

/**
 * Parse a `traceparent` header value. Returns undefined when malformed.
 */
export function parseTraceparent(value: string): TraceContext | undefined {
  const [version, traceId, spanId, flags, ...rest] = value.trim().toLowerCase().split('-');
  if (
    rest.length > 0 ||
    version !== '00' ||
    traceId === undefined ||
    !TRACE_ID_RE.test(traceId) ||
    spanId === undefined ||
    !SPAN_ID_RE.test(spanId) ||
    flags === undefined ||
    !FLAGS_RE.test(flags)
  ) {
    return undefined;
  }
  // An all-zero id is invalid per the header format
  if (/^0+$/.test(traceId) || /^0+$/.test(spanId)) {
    return undefined;
  }
  return { traceId, spanId, sampled: (Number.parseInt(flags, 16) & 1) === 1 };
}

/** Short form used in text log lines. */
export function shortTraceId(ctx: TraceContext): string {
  return ctx.traceId.slice(0, 8);
}
