/**
 * Execution orchestration
 */

export {
  createOracle,
  EXIT_SAFE,
  EXIT_UNSAFE,
  EXIT_USAGE,
  executeWithArgs,
  type MainDeps,
  type MainResult,
  type OracleSelection,
  selectOracle,
} from './execution.ts';
