/**
 * Risk Gate — Help & Version API
 */

import { getPackageVersion } from '../version/version.ts';

export { showHelp } from './formatter.ts';

/**
 * Version line for `--version`, e.g. `whatif-gate v1.2.3`.
 */
export function showVersion(): string {
  return `whatif-gate v${getPackageVersion()}`;
}
