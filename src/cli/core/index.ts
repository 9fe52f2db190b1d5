/**
 * Risk Gate — CLI
 *
 * Role:
 *   Command-line surface of the gate: reads What-If output from stdin,
 *   gathers CI context, runs one evaluation and exits with its verdict.
 *
 * Principles:
 *   - Fail closed: an evaluation that cannot finish is unsafe
 *   - Reports on stdout, diagnostics on stderr
 *   - Local runs mirror CI semantics
 */

export {
  detectPlatform,
  getDiff,
  loadTemplates,
  type PlatformContext,
  platformDiffRef,
} from '../context/index.ts';
export {
  createOracle,
  executeWithArgs,
  type MainDeps,
  type MainResult,
  type OracleSelection,
  selectOracle,
} from '../execution/index.ts';
export { type CLIArgs, parseCliArgs, readWhatIfInput } from '../input/index.ts';
export {
  createLogger,
  createTraceContext,
  TelemetryCollector,
  type TraceContext,
} from '../observability/index.ts';
export { type EntrypointDeps, main, runEntrypoint } from './entrypoint/entrypoint.ts';
export { showHelp, showVersion } from './help/help.ts';
