/**
 * File names and limits shared by the CLI input readers.
 */

/** Manifest read for `--version`. */
export const PKG_FILENAME = 'package.json';

/** Reported when the manifest cannot be read. */
export const PKG_VERSION_FALLBACK = 'unknown';

/** Written under `--log-dir`. */
export const LOG_FILE_NAME = 'whatif-gate.log';

/** Template files forwarded to the oracle, at most. */
export const MAX_TEMPLATE_FILES = 5;

/** Characters of piped input kept before truncating. */
export const MAX_INPUT_CHARS = 100_000;
