/**
 * Stream test doubles.
 *
 * Real Node streams that capture what is written and replay fixed input,
 * so code under test sees ordinary stream behavior.
 */

import { Readable, Writable } from 'node:stream';

export interface CaptureStream extends Writable {
  /** Everything written so far. */
  text(): string;
  /** Written text split into lines, without the trailing empty line. */
  lines(): string[];
}

export function createCaptureStream(): CaptureStream {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback): void {
      chunks.push(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
      callback();
    },
  });
  const text = (): string => chunks.join('');
  return Object.assign(stream, {
    text,
    lines: (): string[] => {
      const all = text().split('\n');
      return all.at(-1) === '' ? all.slice(0, -1) : all;
    },
  });
}

export type StdinMock = Readable & { isTTY: boolean };

/**
 * A stdin replacement that yields `content` once, in the given chunks.
 */
export function createStdinMock(content: string | readonly string[], isTTY = false): StdinMock {
  const chunks = typeof content === 'string' ? [content] : [...content];
  return Object.assign(Readable.from(chunks.map((chunk) => Buffer.from(chunk))), { isTTY });
}
