/**
 * whatif-gate - Main Entry Point
 *
 * Confidence-gated, three-bucket risk evaluation for infrastructure
 * What-If change sets, with command and HTTP classification oracles.
 */

export * from './engine/index.ts';
export {
  AppError,
  CliError,
  type ErrorCode,
  type ErrorDetails,
  formatErrorMessage,
  hasErrorProperty,
  InputError,
  isAppError,
  isOracleError,
  NoisePatternError,
  OracleError,
  ProcessError,
} from './errors/errors.ts';
export * from './oracle/index.ts';
export {
  type CLIArgs,
  executeWithArgs,
  type MainDeps,
  type MainResult,
  main,
  parseCliArgs,
} from './cli/core/index.ts';
