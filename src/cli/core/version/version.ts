/**
 * Risk Gate — Version
 *
 * Reads the package version once, at module load. The manifest path is
 * fixed relative to this file; nothing from the command line reaches it.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

import { PKG_FILENAME, PKG_VERSION_FALLBACK } from '../../constants/paths.ts';

const pkgPath = fileURLToPath(new URL(`../../../../${PKG_FILENAME}`, import.meta.url));

const ManifestSchema = z.object({ version: z.string().min(1).optional() });

let cachedPkgVersion: string | undefined;

/**
 * Read and cache the version from package.json, falling back to
 * `PKG_VERSION_FALLBACK` when it cannot be read.
 */
function getPkgVersion(): string {
  if (cachedPkgVersion !== undefined) {
    return cachedPkgVersion;
  }
  try {
    const manifest = ManifestSchema.safeParse(JSON.parse(readFileSync(pkgPath, 'utf8')));
    cachedPkgVersion =
      manifest.success && manifest.data.version !== undefined
        ? manifest.data.version
        : PKG_VERSION_FALLBACK;
  } catch (error) {
    console.error(`[version] Failed to read ${PKG_FILENAME}: ${String(error)}`);
    cachedPkgVersion = PKG_VERSION_FALLBACK;
  }
  return cachedPkgVersion;
}

const PKG_VERSION = getPkgVersion();

export function getPackageVersion(): string {
  return PKG_VERSION;
}

export const __test__ = {
  getPkgVersion,
};
