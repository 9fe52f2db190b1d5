/**
 * Risk Engine — Risk Bucket Evaluator
 *
 * Compares each risk bucket against its configured threshold. A bucket
 * fails when its level is at or above the threshold, so a threshold of
 * `low` blocks on any finding and `high` only on high-risk findings.
 *
 * Drift and operations are always evaluated. Intent is evaluated only when
 * the assessment carries it; its absence means "not applicable", which is
 * different from passing and is never synthesized.
 */

import {
  DEFAULT_THRESHOLDS,
  type NormalizedRiskAssessment,
  RISK_LEVELS,
  type RiskAssessmentInput,
  type RiskBucketAssessment,
  type RiskBucketId,
  type RiskBucketInput,
  type RiskLevel,
  type ThresholdConfig,
} from './types.ts';
import {
  ignoreWarnings,
  WARNING_RISK_ASSESSMENT_MISSING,
  WARNING_RISK_BUCKET_MISSING,
  WARNING_RISK_LEVEL_UNRECOGNIZED,
  type WarningSink,
} from './warnings.ts';

export interface RiskBucketEvaluation {
  readonly isSafe: boolean;
  /** Failing buckets in the fixed order drift, intent, operations. */
  readonly failedBuckets: readonly RiskBucketId[];
  readonly assessment: NormalizedRiskAssessment;
}

const NO_ASSESSMENT_REASONING = 'No risk assessment provided';

/* -------------------------------------------------------------------------- */
/* Risk level helpers                                                         */
/* -------------------------------------------------------------------------- */

export function isRiskLevel(value: string): value is RiskLevel {
  return RISK_LEVELS.some((level) => level === value);
}

export function riskLevelIndex(level: RiskLevel): number {
  return RISK_LEVELS.indexOf(level);
}

/**
 * Render a reported value for a warning message.
 */
export function describeReportedValue(value: unknown): string {
  if (value === undefined) {
    return '(missing)';
  }
  return typeof value === 'string' ? `"${value}"` : String(JSON.stringify(value));
}

/**
 * Match a reported value against the risk vocabulary, ignoring case and
 * surrounding whitespace.
 */
export function parseRiskLevel(value: unknown): RiskLevel | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  return isRiskLevel(normalized) ? normalized : undefined;
}

/**
 * Normalize a reported risk level. Missing, non-string and unknown values
 * become `low` and raise a warning; they are never fatal.
 */
export function normalizeRiskLevel(
  value: unknown,
  bucket: RiskBucketId,
  onWarning: WarningSink = ignoreWarnings,
): RiskLevel {
  const level = parseRiskLevel(value);
  if (level !== undefined) {
    return level;
  }

  onWarning({
    code: WARNING_RISK_LEVEL_UNRECOGNIZED,
    stage: 'evaluation',
    message: `Unrecognized risk level ${describeReportedValue(value)} for ${bucket} bucket; treating as low`,
  });
  return 'low';
}

/**
 * True when `risk` is at or above `threshold`.
 */
export function exceedsThreshold(risk: RiskLevel, threshold: RiskLevel): boolean {
  return riskLevelIndex(risk) >= riskLevelIndex(threshold);
}

export function maxRiskLevel(levels: readonly RiskLevel[]): RiskLevel {
  return levels.reduce<RiskLevel>(
    (highest, level) => (riskLevelIndex(level) > riskLevelIndex(highest) ? level : highest),
    'low',
  );
}

/* -------------------------------------------------------------------------- */
/* Bucket normalization                                                       */
/* -------------------------------------------------------------------------- */

function placeholderBucket(bucket: RiskBucketId, reasoning: string): RiskBucketAssessment {
  return { bucket, riskLevel: 'low', concerns: [], reasoning };
}

function normalizeBucket(
  bucket: RiskBucketId,
  input: RiskBucketInput | undefined,
  onWarning: WarningSink,
): RiskBucketAssessment {
  if (input === undefined) {
    onWarning({
      code: WARNING_RISK_BUCKET_MISSING,
      stage: 'evaluation',
      message: `Risk assessment has no ${bucket} bucket; treating as low`,
    });
    return placeholderBucket(bucket, `No ${bucket} assessment provided`);
  }

  return {
    bucket,
    riskLevel: normalizeRiskLevel(input.riskLevel, bucket, onWarning),
    concerns: input.concerns,
    reasoning: input.reasoning,
  };
}

function hasAnyBucket(assessment: RiskAssessmentInput): boolean {
  return (
    assessment.drift !== undefined ||
    assessment.intent !== undefined ||
    assessment.operations !== undefined
  );
}

/**
 * Normalize an oracle-reported assessment. A missing assessment yields
 * low-risk drift and operations placeholders and a warning.
 */
export function normalizeRiskAssessment(
  assessment: RiskAssessmentInput | undefined,
  onWarning: WarningSink = ignoreWarnings,
): NormalizedRiskAssessment {
  if (assessment === undefined || !hasAnyBucket(assessment)) {
    onWarning({
      code: WARNING_RISK_ASSESSMENT_MISSING,
      stage: 'evaluation',
      message: 'No risk assessment provided; treating deployment as low risk',
    });
    return {
      drift: placeholderBucket('drift', NO_ASSESSMENT_REASONING),
      operations: placeholderBucket('operations', NO_ASSESSMENT_REASONING),
    };
  }

  const drift = normalizeBucket('drift', assessment.drift, onWarning);
  const operations = normalizeBucket('operations', assessment.operations, onWarning);

  if (assessment.intent === undefined || assessment.intent === null) {
    return { drift, operations };
  }

  return {
    drift,
    intent: normalizeBucket('intent', assessment.intent, onWarning),
    operations,
  };
}

/**
 * Buckets present in an assessment, in evaluation order.
 */
export function evaluatedBuckets(
  assessment: NormalizedRiskAssessment,
): readonly RiskBucketAssessment[] {
  return assessment.intent === undefined
    ? [assessment.drift, assessment.operations]
    : [assessment.drift, assessment.intent, assessment.operations];
}

/* -------------------------------------------------------------------------- */
/* Evaluation                                                                 */
/* -------------------------------------------------------------------------- */

/**
 * Evaluate an assessment against per-bucket thresholds.
 *
 * @example
 * const { isSafe, failedBuckets } = evaluateRiskBuckets(assessment, {
 *   drift: 'medium',
 *   intent: 'high',
 *   operations: 'high',
 * });
 */
export function evaluateRiskBuckets(
  assessment: RiskAssessmentInput | undefined,
  thresholds: ThresholdConfig = DEFAULT_THRESHOLDS,
  onWarning: WarningSink = ignoreWarnings,
): RiskBucketEvaluation {
  const normalized = normalizeRiskAssessment(assessment, onWarning);

  const failedBuckets = evaluatedBuckets(normalized)
    .filter((entry) => exceedsThreshold(entry.riskLevel, thresholds[entry.bucket]))
    .map((entry) => entry.bucket);

  return {
    isSafe: failedBuckets.length === 0,
    failedBuckets,
    assessment: normalized,
  };
}
