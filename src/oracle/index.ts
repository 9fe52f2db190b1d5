/**
 * Classification oracle adapters.
 */

export type { CommandOracleConfig } from './command-oracle.ts';
export { createCommandOracle, runOracleCommand } from './command-oracle.ts';
export type { HttpOracleConfig } from './http-oracle.ts';
export { createHttpOracle, postOracleRequest, readResponseField } from './http-oracle.ts';
export type {
  ChangeInput,
  ClassificationOracle,
  ClassificationPass,
  OracleCallOptions,
  OracleConfig,
  OracleContext,
  OracleRequest,
  PullRequestIntent,
} from './types.ts';
export { DEFAULT_MAX_RESPONSE_BYTES } from './types.ts';
