/**
 * Risk Gate — What-If Input
 *
 * Reads the deployment preview piped on stdin. Refuses an interactive
 * terminal and empty input; oversized or unfamiliar input is accepted with
 * a warning.
 */

import { InputError } from '../../errors/errors.ts';
import {
  ignoreWarnings,
  WARNING_INPUT_TRUNCATED,
  WARNING_INPUT_UNRECOGNIZED,
  type WarningSink,
} from '../../engine/warnings.ts';
import { MAX_INPUT_CHARS } from '../constants/paths.ts';

export type InputStream = NodeJS.ReadableStream & { readonly isTTY?: boolean };

/** Text that appears in What-If output; at least one is expected. */
export const WHATIF_MARKERS: readonly string[] = [
  'Resource changes:',
  '+ Create',
  '~ Modify',
  '- Delete',
  'Resource and property changes',
  'Scope:',
];

export interface ReadInputOptions {
  readonly maxChars?: number;
  readonly onWarning?: WarningSink;
}

async function readAll(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}

export function looksLikeWhatIfOutput(content: string): boolean {
  return WHATIF_MARKERS.some((marker) => content.includes(marker));
}

/**
 * Read and check the What-If text.
 *
 * @throws {InputError} `INPUT_TTY`, `INPUT_EMPTY` or `INPUT_UNREADABLE`.
 */
export async function readWhatIfInput(
  stream: InputStream,
  options: ReadInputOptions = {},
): Promise<string> {
  const maxChars = options.maxChars ?? MAX_INPUT_CHARS;
  const onWarning = options.onWarning ?? ignoreWarnings;

  if (stream.isTTY === true) {
    throw new InputError(
      'INPUT_TTY',
      'No input detected. Pipe What-If output to this command, for example: az deployment group what-if ... | whatif-gate',
    );
  }

  let content: string;
  try {
    content = await readAll(stream);
  } catch (error) {
    throw new InputError('INPUT_UNREADABLE', 'Could not read What-If output from stdin', {
      cause: error,
    });
  }

  if (content.trim().length === 0) {
    throw new InputError('INPUT_EMPTY', 'No What-If output received. Input is empty.');
  }

  if (content.length > maxChars) {
    onWarning({
      code: WARNING_INPUT_TRUNCATED,
      stage: 'input',
      message: `Input truncated to ${maxChars} characters (original: ${content.length} characters)`,
    });
    content = content.slice(0, maxChars);
  }

  if (!looksLikeWhatIfOutput(content)) {
    onWarning({
      code: WARNING_INPUT_UNRECOGNIZED,
      stage: 'input',
      message:
        "Input may not be What-If output: expected markers like 'Resource changes:' or '+ Create'. Proceeding anyway.",
    });
  }

  return content;
}
