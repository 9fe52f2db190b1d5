/**
 * Risk Gate — Template Sources
 *
 * Collects infrastructure template files under a directory so the oracle
 * can compare the What-If changes with the code that produced them.
 *
 * Guarantees:
 *   - Symbolic links are never followed or read
 *   - At most `MAX_TEMPLATE_FILES` files, in sorted path order
 *   - Problems become warnings; the evaluation continues without templates
 */

import type { Dirent } from 'node:fs';
import { readdir, readFile, stat } from 'node:fs/promises';
import path from 'node:path';

import picomatch from 'picomatch';

import {
  ignoreWarnings,
  WARNING_TEMPLATES_UNAVAILABLE,
  type WarningSink,
} from '../../engine/warnings.ts';
import { formatErrorMessage } from '../../errors/errors.ts';
import { MAX_TEMPLATE_FILES } from '../constants/paths.ts';
import { DEFAULT_TEMPLATE_GLOB } from '../input/args.ts';

const IGNORED_DIRS = new Set(['.git', 'node_modules', 'dist', 'coverage']);

export interface TemplateOptions {
  readonly glob?: string;
  readonly maxFiles?: number;
  readonly onWarning?: WarningSink;
}

async function directoryExists(dir: string): Promise<boolean> {
  try {
    return (await stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Walk `root` and return matching file paths relative to it, POSIX style.
 */
async function findTemplateFiles(
  root: string,
  matches: (relative: string) => boolean,
  onWarning: WarningSink,
): Promise<string[]> {
  const found: string[] = [];

  const walk = async (relativeDir: string): Promise<void> => {
    const entries: Dirent[] = await readdir(path.join(root, relativeDir), { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      const relative = relativeDir === '' ? entry.name : `${relativeDir}/${entry.name}`;
      if (entry.isSymbolicLink()) {
        if (matches(relative)) {
          onWarning({
            code: WARNING_TEMPLATES_UNAVAILABLE,
            stage: 'context',
            message: `Skipping symbolic link: ${relative}`,
          });
        }
        continue;
      }
      if (entry.isDirectory()) {
        if (!IGNORED_DIRS.has(entry.name)) {
          await walk(relative);
        }
        continue;
      }
      if (entry.isFile() && matches(relative)) {
        found.push(relative);
      }
    }
  };

  await walk('');
  return found;
}

/**
 * Load template sources under `dir`, each prefixed with a `// File:` line.
 *
 * @returns the joined sources, or `undefined` when nothing could be loaded.
 */
export async function loadTemplates(
  dir: string,
  options: TemplateOptions = {},
): Promise<string | undefined> {
  const onWarning = options.onWarning ?? ignoreWarnings;
  const maxFiles = options.maxFiles ?? MAX_TEMPLATE_FILES;
  const root = path.resolve(dir);

  const warn = (message: string): undefined => {
    onWarning({ code: WARNING_TEMPLATES_UNAVAILABLE, stage: 'context', message });
    return undefined;
  };

  if (!(await directoryExists(root))) {
    return warn(`Template directory does not exist or is not a directory: ${dir}`);
  }

  let files: string[];
  try {
    const isMatch = picomatch(options.glob ?? DEFAULT_TEMPLATE_GLOB, { dot: false });
    files = await findTemplateFiles(root, isMatch, onWarning);
  } catch (error) {
    return warn(`Error scanning template directory ${dir}: ${formatErrorMessage(error)}`);
  }

  const contents: string[] = [];
  for (const relative of files.slice(0, maxFiles)) {
    try {
      const content = await readFile(path.join(root, relative), 'utf8');
      contents.push(`// File: ${relative}\n${content}`);
    } catch (error) {
      warn(`Could not read ${relative}: ${formatErrorMessage(error)}`);
    }
  }

  return contents.length > 0 ? contents.join('\n\n') : undefined;
}
