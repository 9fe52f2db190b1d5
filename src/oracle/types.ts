/**
 * Classification oracle contract.
 *
 * An oracle receives structured change data and returns raw text that
 * should contain one JSON classification payload. Adapters are configured
 * once at construction; nothing is read from module-level defaults.
 */

import type { ChangeAction } from '../engine/types.ts';

export type ClassificationPass = 'initial' | 'reclassification';

export interface PullRequestIntent {
  readonly title?: string;
  readonly description?: string;
}

/** Supplementary material forwarded with both passes. */
export interface OracleContext {
  readonly diff?: string;
  readonly templates?: string;
  readonly intent?: PullRequestIntent;
}

/** The raw inputs of one change, as resent on re-classification. */
export interface ChangeInput {
  readonly name: string;
  readonly type: string;
  readonly action: ChangeAction;
  readonly description: string;
}

export interface OracleRequest {
  readonly pass: ClassificationPass;
  /** Change data as text: the tool output, or the retained changes on re-classification. */
  readonly input: string;
  readonly changes?: readonly ChangeInput[];
  readonly context?: OracleContext;
}

export interface OracleCallOptions {
  readonly signal: AbortSignal;
}

export interface ClassificationOracle {
  readonly name: string;
  classify(request: OracleRequest, options: OracleCallOptions): Promise<string>;
}

/**
 * Construction-time configuration shared by the adapters.
 */
export interface OracleConfig {
  /** Model identifier forwarded to the backend, if it takes one. */
  readonly model?: string;
  /** Responses beyond this size are rejected. */
  readonly maxResponseBytes?: number;
}

export const DEFAULT_MAX_RESPONSE_BYTES = 4 * 1024 * 1024;
