/**
 * Input handling: argument parsing, piped What-If input and path checks.
 */

export {
  type CLIArgs,
  DEFAULT_DIFF_REF,
  DEFAULT_ORACLE_TIMEOUT_SECONDS,
  DEFAULT_TEMPLATE_GLOB,
  type OutputFormat,
  parseCliArgs,
} from './args.ts';
export {
  type InputStream,
  looksLikeWhatIfOutput,
  type ReadInputOptions,
  readWhatIfInput,
  WHATIF_MARKERS,
} from './stdin.ts';
export { ensureSafeDirectoryPath } from './validation.ts';
