/**
 * Risk Engine — Public API
 */

export type { ConfidenceSplit } from './confidence-splitter.ts';
export { isIncludedConfidence, splitByConfidence } from './confidence-splitter.ts';
export type { BraceSpan } from './extract.ts';
export { balancedSpans, extractFirstStructuredBlock } from './extract.ts';
export type {
  EvaluationOptions,
  EvaluationOutcome,
  EvaluationRequest,
  EvaluationState,
  OracleCallEvent,
  ReclassificationStatus,
  TrailEntry,
} from './orchestrator.ts';
export {
  assembleVerdict,
  buildReclassificationRequest,
  callOracle,
  DEFAULT_ORACLE_TIMEOUT_MS,
  describeChange,
  evaluateDeployment,
  MAX_ORACLE_TIMEOUT_MS,
  reclassifyIncluded,
  withoutUnrequestedIntent,
} from './orchestrator.ts';
export type { NoisePatternMatch, NoisePatternSource, ReadTextFile } from './pattern-matcher.ts';
export {
  applyNoisePatterns,
  DEFAULT_NOISE_THRESHOLD,
  fileNoisePatternSource,
  findNoisePatternMatch,
  loadNoisePatterns,
  matchesNoisePattern,
  parseNoisePatterns,
  similarityRatio,
  staticNoisePatternSource,
} from './pattern-matcher.ts';
export type { MarkdownOptions, OutcomeReport } from './report.ts';
export {
  DEFAULT_REPORT_TITLE,
  escapeTableCell,
  generateMarkdownSummary,
  serializeOutcome,
  toOutcomeReport,
} from './report.ts';
export type { RiskBucketEvaluation } from './risk-buckets.ts';
export {
  evaluatedBuckets,
  evaluateRiskBuckets,
  exceedsThreshold,
  isRiskLevel,
  maxRiskLevel,
  normalizeRiskAssessment,
  normalizeRiskLevel,
  parseRiskLevel,
} from './risk-buckets.ts';
export {
  NO_SUMMARY_PROVIDED,
  normalizeAction,
  normalizeConfidence,
  parseClassificationPayload,
  parseClassificationResponse,
  RawClassificationPayloadSchema,
} from './schema.ts';
export type {
  ChangeAction,
  ChangeRecord,
  ClassificationResult,
  ClassificationSummary,
  ConfidenceLevel,
  NormalizedRiskAssessment,
  OracleVerdict,
  RiskAssessmentInput,
  RiskBucketAssessment,
  RiskBucketId,
  RiskBucketInput,
  RiskLevel,
  ThresholdConfig,
  Verdict,
} from './types.ts';
export {
  CHANGE_ACTIONS,
  CONFIDENCE_LEVELS,
  DEFAULT_THRESHOLDS,
  RISK_BUCKET_IDS,
  RISK_LEVELS,
} from './types.ts';
export type { EngineWarning, EvaluationStage, WarningSink } from './warnings.ts';
export {
  createWarningCollector,
  ignoreWarnings,
  WARNING_ACTION_UNRECOGNIZED,
  WARNING_CONFIDENCE_UNRECOGNIZED,
  WARNING_DIFF_UNAVAILABLE,
  WARNING_INPUT_TRUNCATED,
  WARNING_INTENT_UNREQUESTED,
  WARNING_INPUT_UNRECOGNIZED,
  WARNING_NOISE_PATTERNS_EMPTY,
  WARNING_PLATFORM_EVENT_UNREADABLE,
  WARNING_RECLASSIFICATION_FAILED,
  WARNING_RECORD_DROPPED,
  WARNING_RESOURCES_MISSING,
  WARNING_RISK_ASSESSMENT_MISSING,
  WARNING_RISK_BUCKET_MISSING,
  WARNING_RISK_LEVEL_UNRECOGNIZED,
  WARNING_SUMMARY_MISSING,
  WARNING_TEMPLATES_UNAVAILABLE,
} from './warnings.ts';
