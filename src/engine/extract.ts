/**
 * Risk Engine — Response Extraction
 *
 * Oracle responses are free text that should contain one JSON object,
 * sometimes wrapped in prose or code fences. Extraction tries the whole
 * text first, then every balanced `{...}` pair in order of its opening brace,
 * skipping braces inside string literals. Pairs are found in one pass, so
 * unclosed braces in long prose do not trigger rescans. The first candidate
 * that parses as an object wins.
 */

import { OracleError } from '../errors/errors.ts';

const RESPONSE_PREVIEW_CHARS = 500;

export type StructuredBlock = Record<string, unknown>;

export function isStructuredBlock(value: unknown): value is StructuredBlock {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParseObject(candidate: string): StructuredBlock | undefined {
  try {
    const parsed: unknown = JSON.parse(candidate);
    return isStructuredBlock(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

export interface BraceSpan {
  readonly start: number;
  readonly end: number;
}

/**
 * Every balanced `{...}` pair in `text`, ordered by opening brace, found in a
 * single string-aware pass from the first `{`. Braces that never close yield
 * no span; the pairs nested inside them still do.
 */
export function balancedSpans(text: string): BraceSpan[] {
  const first = text.indexOf('{');
  if (first === -1) {
    return [];
  }

  const open: number[] = [];
  const spans: BraceSpan[] = [];
  let inString = false;
  let escaped = false;

  for (let i = first; i < text.length; i++) {
    const ch = text.charAt(i);

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      open.push(i);
    } else if (ch === '}') {
      const start = open.pop();
      if (start !== undefined) {
        spans.push({ start, end: i });
      }
    }
  }

  return spans.sort((a, b) => a.start - b.start);
}

/**
 * Extract the first well-formed JSON object from `text`.
 *
 * @throws {OracleError} `ORACLE_RESPONSE_UNPARSABLE` when no object is found.
 */
export function extractFirstStructuredBlock(text: string): StructuredBlock {
  const whole = tryParseObject(text.trim());
  if (whole !== undefined) {
    return whole;
  }

  for (const span of balancedSpans(text)) {
    const block = tryParseObject(text.slice(span.start, span.end + 1));
    if (block !== undefined) {
      return block;
    }
  }

  const preview =
    text.length > RESPONSE_PREVIEW_CHARS ? `${text.slice(0, RESPONSE_PREVIEW_CHARS)}...` : text;
  throw new OracleError(
    'ORACLE_RESPONSE_UNPARSABLE',
    'Classifier response did not contain a JSON object',
    { details: { responsePreview: preview } },
  );
}
