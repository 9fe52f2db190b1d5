/**
 * Risk Engine — Warnings
 *
 * Non-fatal diagnostics raised while an evaluation proceeds. Codes are
 * stable identifiers; messages are for humans.
 */

export type EvaluationStage =
  | 'input'
  | 'context'
  | 'classification'
  | 'noise-filter'
  | 'reclassification'
  | 'evaluation';

export interface EngineWarning {
  readonly code: string; // stable identifier
  readonly stage: EvaluationStage;
  readonly message: string;
}

export type WarningSink = (warning: EngineWarning) => void;

/* -------------------------------------------------------------------------- */
/* Public warning codes                                                       */
/* -------------------------------------------------------------------------- */

export const WARNING_RISK_LEVEL_UNRECOGNIZED = 'RISK_LEVEL_UNRECOGNIZED' as const;
export const WARNING_RISK_ASSESSMENT_MISSING = 'RISK_ASSESSMENT_MISSING' as const;
export const WARNING_RISK_BUCKET_MISSING = 'RISK_BUCKET_MISSING' as const;
export const WARNING_INTENT_UNREQUESTED = 'INTENT_UNREQUESTED' as const;
export const WARNING_CONFIDENCE_UNRECOGNIZED = 'CONFIDENCE_UNRECOGNIZED' as const;
export const WARNING_ACTION_UNRECOGNIZED = 'ACTION_UNRECOGNIZED' as const;
export const WARNING_RESOURCES_MISSING = 'RESOURCES_MISSING' as const;
export const WARNING_SUMMARY_MISSING = 'SUMMARY_MISSING' as const;
export const WARNING_RECORD_DROPPED = 'RECORD_DROPPED' as const;
export const WARNING_NOISE_PATTERNS_EMPTY = 'NOISE_PATTERNS_EMPTY' as const;
export const WARNING_RECLASSIFICATION_FAILED = 'RECLASSIFICATION_FAILED' as const;
export const WARNING_INPUT_TRUNCATED = 'INPUT_TRUNCATED' as const;
export const WARNING_INPUT_UNRECOGNIZED = 'INPUT_UNRECOGNIZED' as const;
export const WARNING_DIFF_UNAVAILABLE = 'DIFF_UNAVAILABLE' as const;
export const WARNING_TEMPLATES_UNAVAILABLE = 'TEMPLATES_UNAVAILABLE' as const;
export const WARNING_PLATFORM_EVENT_UNREADABLE = 'PLATFORM_EVENT_UNREADABLE' as const;

/** Sink that discards warnings. */
export const ignoreWarnings: WarningSink = () => {};

/**
 * Create a sink that keeps warnings in order and optionally forwards them.
 */
export function createWarningCollector(forward?: WarningSink): {
  readonly sink: WarningSink;
  readonly warnings: readonly EngineWarning[];
} {
  const warnings: EngineWarning[] = [];
  return {
    warnings,
    sink: (warning) => {
      warnings.push(warning);
      forward?.(warning);
    },
  };
}
