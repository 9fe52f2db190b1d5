/**
 * Risk Engine — Data Model
 *
 * Change records, bucket assessments, thresholds and verdicts shared by
 * every stage of an evaluation. All values are immutable; stages return
 * new values rather than editing their inputs.
 */

/* -------------------------------------------------------------------------- */
/* Enumerations                                                               */
/* -------------------------------------------------------------------------- */

export const CHANGE_ACTIONS = ['Create', 'Modify', 'Delete', 'Deploy', 'NoChange', 'Ignore'] as const;
export type ChangeAction = (typeof CHANGE_ACTIONS)[number];

export const CONFIDENCE_LEVELS = ['high', 'medium', 'low', 'noise'] as const;
export type ConfidenceLevel = (typeof CONFIDENCE_LEVELS)[number];

/** Ordered from least to most severe. */
export const RISK_LEVELS = ['low', 'medium', 'high'] as const;
export type RiskLevel = (typeof RISK_LEVELS)[number];

/** Fixed evaluation order; also the order of `failedBuckets`. */
export const RISK_BUCKET_IDS = ['drift', 'intent', 'operations'] as const;
export type RiskBucketId = (typeof RISK_BUCKET_IDS)[number];

/* -------------------------------------------------------------------------- */
/* Change records                                                             */
/* -------------------------------------------------------------------------- */

export interface ChangeRecord {
  readonly name: string;
  readonly type: string;
  readonly action: ChangeAction;
  readonly description: string;
  readonly confidence: ConfidenceLevel;
  readonly confidenceReason: string;
  readonly riskLevel?: RiskLevel;
  readonly riskReason?: string;
}

/* -------------------------------------------------------------------------- */
/* Risk assessment                                                            */
/* -------------------------------------------------------------------------- */

/**
 * A bucket as reported by the oracle. `riskLevel` is whatever the oracle sent,
 * possibly missing or not a string; evaluation normalizes it with a warning.
 */
export interface RiskBucketInput {
  readonly riskLevel?: unknown;
  readonly concerns: readonly string[];
  readonly reasoning: string;
}

/**
 * Risk assessment as reported by the oracle. `intent` is `null` or absent
 * when no PR intent was supplied.
 */
export interface RiskAssessmentInput {
  readonly drift?: RiskBucketInput;
  readonly intent?: RiskBucketInput | null;
  readonly operations?: RiskBucketInput;
}

export interface RiskBucketAssessment {
  readonly bucket: RiskBucketId;
  readonly riskLevel: RiskLevel;
  readonly concerns: readonly string[];
  readonly reasoning: string;
}

/** Normalized assessment; `intent` is only present when it was evaluated. */
export interface NormalizedRiskAssessment {
  readonly drift: RiskBucketAssessment;
  readonly intent?: RiskBucketAssessment;
  readonly operations: RiskBucketAssessment;
}

export type ThresholdConfig = Readonly<Record<RiskBucketId, RiskLevel>>;

export const DEFAULT_THRESHOLDS: ThresholdConfig = {
  drift: 'high',
  intent: 'high',
  operations: 'high',
};

/* -------------------------------------------------------------------------- */
/* Oracle results                                                             */
/* -------------------------------------------------------------------------- */

/** The oracle's own verdict. Informational only; the gate decides. */
export interface OracleVerdict {
  readonly safe?: boolean;
  readonly highestRiskBucket?: string;
  readonly overallRiskLevel?: string;
  readonly reasoning?: string;
}

export interface ClassificationSummary {
  readonly overallSummary?: string;
  readonly riskAssessment?: RiskAssessmentInput;
  readonly verdict?: OracleVerdict;
}

export interface ClassificationResult {
  readonly records: readonly ChangeRecord[];
  readonly summary: ClassificationSummary;
}

/* -------------------------------------------------------------------------- */
/* Verdict                                                                    */
/* -------------------------------------------------------------------------- */

export interface Verdict {
  readonly safe: boolean;
  readonly highestRiskBucket: RiskBucketId | 'none';
  readonly overallRiskLevel: RiskLevel;
  readonly reasoning: string;
  readonly failedBuckets: readonly RiskBucketId[];
}
