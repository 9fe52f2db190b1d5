/**
 * Risk Gate — Diff Context
 *
 * Supplies the code diff the drift bucket compares against. The diff comes
 * from a file when one is named, otherwise from `git diff <ref>`.
 *
 * Guarantees:
 *   - A named diff file that cannot be read is an InputError
 *   - Any git failure degrades to an empty diff plus a warning
 */

import { execFile } from 'node:child_process';
import { readFile } from 'node:fs/promises';

import { InputError } from '../../errors/errors.ts';
import {
  ignoreWarnings,
  WARNING_DIFF_UNAVAILABLE,
  type WarningSink,
} from '../../engine/warnings.ts';
import { GIT_DIFF_TIMEOUT_MS } from '../constants/time.ts';

export interface GitDiffResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

export type RunGitDiff = (
  ref: string,
  options: { readonly cwd?: string; readonly timeoutMs: number },
) => Promise<GitDiffResult>;

export interface DiffDeps {
  readonly readFile?: (path: string) => Promise<string>;
  readonly runGitDiff?: RunGitDiff;
}

export interface DiffRequest {
  readonly diffFile?: string;
  readonly diffRef: string;
  readonly cwd?: string;
  readonly timeoutMs?: number;
}

const MAX_GIT_OUTPUT_BYTES = 64 * 1024 * 1024;

/**
 * Run `git diff <ref>`. Exit codes are reported, not thrown; a missing git
 * binary or a timeout rejects.
 */
export const runGitDiff: RunGitDiff = (ref, options) =>
  new Promise((resolve, reject) => {
    execFile(
      'git',
      ['diff', ref],
      {
        cwd: options.cwd,
        timeout: options.timeoutMs,
        maxBuffer: MAX_GIT_OUTPUT_BYTES,
        encoding: 'utf8',
      },
      (error, stdout, stderr) => {
        if (error === null) {
          resolve({ exitCode: 0, stdout, stderr });
          return;
        }
        if (typeof error.code === 'number' && error.killed !== true) {
          resolve({ exitCode: error.code, stdout, stderr });
          return;
        }
        reject(error);
      },
    );
  });

const readUtf8 = (path: string): Promise<string> => readFile(path, 'utf8');

/**
 * Resolve the diff text for an evaluation.
 *
 * @throws {InputError} `INPUT_UNREADABLE` when `diffFile` cannot be read.
 */
export async function getDiff(
  request: DiffRequest,
  deps: DiffDeps = {},
  onWarning: WarningSink = ignoreWarnings,
): Promise<string> {
  if (request.diffFile !== undefined) {
    const read = deps.readFile ?? readUtf8;
    try {
      return await read(request.diffFile);
    } catch (error) {
      throw new InputError('INPUT_UNREADABLE', `Could not read diff file: ${request.diffFile}`, {
        cause: error,
        details: { diffFile: request.diffFile },
      });
    }
  }

  const run = deps.runGitDiff ?? runGitDiff;
  const unavailable = (reason: string): string => {
    onWarning({
      code: WARNING_DIFF_UNAVAILABLE,
      stage: 'context',
      message: `Could not collect git diff against ${request.diffRef} (${reason}); continuing with an empty diff`,
    });
    return '';
  };

  try {
    const result = await run(request.diffRef, {
      ...(request.cwd === undefined ? {} : { cwd: request.cwd }),
      timeoutMs: request.timeoutMs ?? GIT_DIFF_TIMEOUT_MS,
    });
    if (result.exitCode !== 0) {
      const stderr = result.stderr.trim();
      return unavailable(
        stderr.length > 0
          ? `git exited with code ${result.exitCode}: ${stderr}`
          : `git exited with code ${result.exitCode}`,
      );
    }
    return result.stdout;
  } catch (error) {
    return unavailable(error instanceof Error ? error.message : String(error));
  }
}
