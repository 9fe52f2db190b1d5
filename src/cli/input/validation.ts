/**
 * Risk Gate — Path Validation
 *
 * Directories the gate writes to (logs, telemetry) must stay inside the
 * working directory, symlinks included.
 */

import fs from 'node:fs';
import path from 'node:path';

import { CliError } from '../../errors/errors.ts';

function escapes(base: string, target: string): boolean {
  const relative = path.relative(base, target);
  return relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative);
}

function realpathOrUndefined(target: string): string | undefined {
  try {
    return fs.realpathSync(target);
  } catch {
    // Not created yet
    return undefined;
  }
}

/**
 * Resolve `inputPath` against `baseDir` and refuse anything outside it.
 *
 * @param label - Names the path in the error message.
 * @throws {CliError} `CLI_INVALID_PATH`
 */
export function ensureSafeDirectoryPath(
  baseDir: string,
  inputPath: string,
  label = 'Log directory',
): string {
  const resolvedBase = path.resolve(baseDir);
  const reject = (): CliError =>
    new CliError('CLI_INVALID_PATH', `${label} must be within ${resolvedBase}`, {
      details: { resolvedBase, inputPath },
    });

  // Backslashes are separators only on Windows
  if (path.sep !== '\\' && inputPath.includes('\\')) {
    throw reject();
  }

  const resolvedPath = path.resolve(resolvedBase, inputPath);
  if (escapes(resolvedBase, resolvedPath)) {
    throw reject();
  }

  const realPath = realpathOrUndefined(resolvedPath);
  if (realPath !== undefined && escapes(realpathOrUndefined(resolvedBase) ?? resolvedBase, realPath)) {
    throw reject();
  }

  return resolvedPath;
}
