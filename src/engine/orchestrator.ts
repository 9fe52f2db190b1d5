/**
 * Risk Engine — Evaluation Orchestrator
 *
 * Runs one evaluation as an explicit sequence of states:
 *
 *   classified -> noise-filtered -> split -> [reclassified] -> evaluated -> verdict
 *
 * Each transition appends a trail entry. The initial classification is
 * mandatory and any failure there is fatal. Re-classification runs only
 * when noise was removed and something meaningful remains; its failure
 * falls back to the first pass with a warning.
 *
 * No clocks, randomness or shared state feed the verdict or the trail, so
 * equal inputs and oracle responses give equal outcomes.
 */

import { formatErrorMessage, isOracleError, OracleError } from '../errors/errors.ts';
import type {
  ClassificationOracle,
  ClassificationPass,
  OracleContext,
  OracleRequest,
} from '../oracle/types.ts';
import { type ConfidenceSplit, splitByConfidence } from './confidence-splitter.ts';
import {
  applyNoisePatterns,
  DEFAULT_NOISE_THRESHOLD,
  type NoisePatternSource,
} from './pattern-matcher.ts';
import {
  evaluatedBuckets,
  evaluateRiskBuckets,
  maxRiskLevel,
  type RiskBucketEvaluation,
} from './risk-buckets.ts';
import { parseClassificationResponse } from './schema.ts';
import {
  type ChangeRecord,
  type ClassificationResult,
  DEFAULT_THRESHOLDS,
  type OracleVerdict,
  type RiskAssessmentInput,
  type ThresholdConfig,
  type Verdict,
} from './types.ts';
import {
  createWarningCollector,
  type EngineWarning,
  WARNING_INTENT_UNREQUESTED,
  WARNING_NOISE_PATTERNS_EMPTY,
  WARNING_RECLASSIFICATION_FAILED,
  type WarningSink,
} from './warnings.ts';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export const DEFAULT_ORACLE_TIMEOUT_MS = 120_000;

/** Longest delay a Node timer honours; larger values fire immediately. */
export const MAX_ORACLE_TIMEOUT_MS = 2_147_483_647;

export type EvaluationState =
  | 'classified'
  | 'noise-filtered'
  | 'split'
  | 'reclassified'
  | 'evaluated'
  | 'verdict';

export interface TrailEntry {
  readonly from: EvaluationState | 'start';
  readonly to: EvaluationState;
  readonly detail: string;
}

export type ReclassificationStatus = 'not-needed' | 'applied' | 'fallback';

export interface OracleCallEvent {
  readonly pass: ClassificationPass;
  readonly durationMs: number;
  readonly success: boolean;
  readonly errorMessage?: string;
}

export interface EvaluationRequest {
  /** Change data handed to the oracle on the initial pass. */
  readonly input: string;
  readonly context?: OracleContext;
}

export interface EvaluationOptions {
  readonly oracle: ClassificationOracle;
  readonly thresholds?: ThresholdConfig;
  readonly noisePatterns?: NoisePatternSource;
  readonly noiseThreshold?: number;
  /** Budget for each oracle call. */
  readonly timeoutMs?: number;
  readonly onWarning?: WarningSink;
  readonly onOracleCall?: (event: OracleCallEvent) => void;
  /** Injectable clock for call durations. */
  readonly now?: () => number;
}

export interface EvaluationOutcome {
  readonly verdict: Verdict;
  readonly evaluation: RiskBucketEvaluation;
  readonly included: ClassificationResult;
  readonly excluded: ClassificationResult;
  readonly reclassification: ReclassificationStatus;
  readonly warnings: readonly EngineWarning[];
  readonly trail: readonly TrailEntry[];
}

/* -------------------------------------------------------------------------- */
/* Oracle calls                                                               */
/* -------------------------------------------------------------------------- */

/**
 * Call the oracle under a timeout. The adapter's signal is aborted when the
 * budget runs out.
 *
 * @throws {OracleError} `ORACLE_TIMEOUT` or `ORACLE_CALL_FAILED`.
 */
export async function callOracle(
  oracle: ClassificationOracle,
  request: OracleRequest,
  requestedTimeoutMs: number,
): Promise<string> {
  const timeoutMs = Math.min(requestedTimeoutMs, MAX_ORACLE_TIMEOUT_MS);
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      // Settle first so the timeout wins over the adapter's abort rejection
      reject(
        new OracleError('ORACLE_TIMEOUT', `${oracle.name} did not respond within ${timeoutMs}ms`, {
          details: { pass: request.pass, timeoutMs },
        }),
      );
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([oracle.classify(request, { signal: controller.signal }), timeout]);
  } catch (error) {
    if (isOracleError(error)) {
      throw error;
    }
    throw new OracleError(
      'ORACLE_CALL_FAILED',
      `${oracle.name} call failed: ${formatErrorMessage(error)}`,
      { cause: error, details: { pass: request.pass } },
    );
  } finally {
    clearTimeout(timer);
  }
}

async function classifyPass(
  request: OracleRequest,
  options: EvaluationOptions,
  onWarning: WarningSink,
): Promise<ClassificationResult> {
  const now = options.now ?? Date.now;
  const startedAt = now();
  const stage = request.pass === 'initial' ? 'classification' : 'reclassification';

  try {
    const text = await callOracle(
      options.oracle,
      request,
      options.timeoutMs ?? DEFAULT_ORACLE_TIMEOUT_MS,
    );
    const result = parseClassificationResponse(text, onWarning, stage);
    options.onOracleCall?.({ pass: request.pass, durationMs: now() - startedAt, success: true });
    return result;
  } catch (error) {
    options.onOracleCall?.({
      pass: request.pass,
      durationMs: now() - startedAt,
      success: false,
      errorMessage: formatErrorMessage(error),
    });
    throw error;
  }
}

/* -------------------------------------------------------------------------- */
/* Stages                                                                     */
/* -------------------------------------------------------------------------- */

export function describeChange(record: ChangeRecord): string {
  return `${record.action} ${record.type} ${record.name}: ${record.description}`;
}

/**
 * Build the second-pass request from the retained records only, so that
 * excluded changes cannot reach the risk reasoning.
 */
export function buildReclassificationRequest(
  included: readonly ChangeRecord[],
  context?: OracleContext,
): OracleRequest {
  return {
    pass: 'reclassification',
    input: included.map((record) => describeChange(record)).join('\n'),
    changes: included.map(({ name, type, action, description }) => ({
      name,
      type,
      action,
      description,
    })),
    ...(context === undefined ? {} : { context }),
  };
}

/**
 * Re-classify the included set when noise was removed. Returns the included
 * result to evaluate and how it was obtained.
 */
export async function reclassifyIncluded(
  split: ConfidenceSplit,
  request: EvaluationRequest,
  options: EvaluationOptions,
  onWarning: WarningSink,
): Promise<{ readonly included: ClassificationResult; readonly status: ReclassificationStatus }> {
  if (split.excluded.records.length === 0 || split.included.records.length === 0) {
    return { included: split.included, status: 'not-needed' };
  }

  try {
    const fresh = await classifyPass(
      buildReclassificationRequest(split.included.records, request.context),
      options,
      onWarning,
    );
    return {
      included: { records: split.included.records, summary: fresh.summary },
      status: 'applied',
    };
  } catch (error) {
    onWarning({
      code: WARNING_RECLASSIFICATION_FAILED,
      stage: 'reclassification',
      message: `Re-classification failed (${formatErrorMessage(error)}); using first-pass assessment`,
    });
    return { included: split.included, status: 'fallback' };
  }
}

const EMPTY_INCLUDED_REASONING = 'No changes remain after confidence filtering';

/**
 * Drop an intent bucket the oracle reported although no PR intent was sent.
 */
export function withoutUnrequestedIntent(
  assessment: RiskAssessmentInput | undefined,
  intentSupplied: boolean,
  onWarning: WarningSink,
): RiskAssessmentInput | undefined {
  if (intentSupplied || assessment?.intent === undefined || assessment.intent === null) {
    return assessment;
  }
  onWarning({
    code: WARNING_INTENT_UNREQUESTED,
    stage: 'evaluation',
    message: 'Classifier reported an intent bucket but no PR intent was supplied; ignoring it',
  });
  const { intent: _ignored, ...rest } = assessment;
  return rest;
}

function evaluateIncluded(
  included: ClassificationResult,
  thresholds: ThresholdConfig,
  intentSupplied: boolean,
  onWarning: WarningSink,
): RiskBucketEvaluation {
  if (included.records.length === 0) {
    return {
      isSafe: true,
      failedBuckets: [],
      assessment: {
        drift: {
          bucket: 'drift',
          riskLevel: 'low',
          concerns: [],
          reasoning: EMPTY_INCLUDED_REASONING,
        },
        operations: {
          bucket: 'operations',
          riskLevel: 'low',
          concerns: [],
          reasoning: EMPTY_INCLUDED_REASONING,
        },
      },
    };
  }
  return evaluateRiskBuckets(
    withoutUnrequestedIntent(included.summary.riskAssessment, intentSupplied, onWarning),
    thresholds,
    onWarning,
  );
}

/**
 * Assemble the final verdict from a bucket evaluation.
 */
export function assembleVerdict(
  evaluation: RiskBucketEvaluation,
  oracleVerdict?: OracleVerdict,
): Verdict {
  const buckets = evaluatedBuckets(evaluation.assessment);
  const overallRiskLevel = maxRiskLevel(buckets.map((entry) => entry.riskLevel));
  const highest = buckets.find((entry) => entry.riskLevel === overallRiskLevel);

  const gate = evaluation.isSafe
    ? 'All evaluated risk buckets are below their thresholds.'
    : `Risk threshold met or exceeded for: ${evaluation.failedBuckets.join(', ')}.`;
  const oracleReasoning = oracleVerdict?.reasoning?.trim() ?? '';

  return {
    safe: evaluation.isSafe,
    highestRiskBucket: overallRiskLevel === 'low' || highest === undefined ? 'none' : highest.bucket,
    overallRiskLevel,
    reasoning: oracleReasoning.length > 0 ? `${gate} ${oracleReasoning}` : gate,
    failedBuckets: evaluation.failedBuckets,
  };
}

/* -------------------------------------------------------------------------- */
/* Orchestration                                                              */
/* -------------------------------------------------------------------------- */

/**
 * Evaluate one deployment end to end.
 *
 * @throws {NoisePatternError} when a named noise-pattern source is unreadable.
 * @throws {OracleError} when the initial classification fails.
 *
 * @example
 * const outcome = await evaluateDeployment({ input: whatIfText }, { oracle });
 * if (!outcome.verdict.safe) {
 *   // block the deployment
 * }
 */
export async function evaluateDeployment(
  request: EvaluationRequest,
  options: EvaluationOptions,
): Promise<EvaluationOutcome> {
  const { sink, warnings } = createWarningCollector(options.onWarning);
  const thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
  const trail: TrailEntry[] = [];
  let state: EvaluationState | 'start' = 'start';

  const transition = (to: EvaluationState, detail: string): void => {
    trail.push({ from: state, to, detail });
    state = to;
  };

  // Read patterns before any oracle call so a bad source fails cheaply
  const patterns = options.noisePatterns === undefined ? undefined : await options.noisePatterns();
  if (patterns?.length === 0) {
    sink({
      code: WARNING_NOISE_PATTERNS_EMPTY,
      stage: 'noise-filter',
      message: 'Noise pattern source contained no patterns',
    });
  }

  const classified = await classifyPass(
    {
      pass: 'initial',
      input: request.input,
      ...(request.context === undefined ? {} : { context: request.context }),
    },
    options,
    sink,
  );
  transition('classified', `Classifier returned ${classified.records.length} change record(s)`);

  const filteredRecords =
    patterns === undefined
      ? classified.records
      : applyNoisePatterns(
          classified.records,
          patterns,
          options.noiseThreshold ?? DEFAULT_NOISE_THRESHOLD,
        );
  const matched = filteredRecords.filter(
    (record, index) => record !== classified.records[index],
  ).length;
  transition(
    'noise-filtered',
    patterns === undefined
      ? 'No noise pattern source supplied'
      : `${matched} record(s) matched ${patterns.length} noise pattern(s)`,
  );

  const split = splitByConfidence({ records: filteredRecords, summary: classified.summary });
  transition(
    'split',
    `${split.included.records.length} included, ${split.excluded.records.length} excluded`,
  );

  const { included, status } = await reclassifyIncluded(split, request, options, sink);
  if (status === 'applied') {
    transition(
      'reclassified',
      `Re-classified ${included.records.length} included record(s) without excluded changes`,
    );
  } else if (status === 'fallback') {
    transition('reclassified', 'Re-classification failed; kept first-pass assessment');
  }

  const evaluation = evaluateIncluded(
    included,
    thresholds,
    request.context?.intent !== undefined,
    sink,
  );
  transition(
    'evaluated',
    included.records.length === 0
      ? 'No included changes to evaluate'
      : evaluation.failedBuckets.length > 0
        ? `Failed buckets: ${evaluation.failedBuckets.join(', ')}`
        : 'No bucket reached its threshold',
  );

  const verdict = assembleVerdict(
    evaluation,
    included.records.length === 0 ? undefined : included.summary.verdict,
  );
  transition(
    'verdict',
    `${verdict.safe ? 'SAFE' : 'UNSAFE'} (overall risk ${verdict.overallRiskLevel})`,
  );

  return {
    verdict,
    evaluation,
    included,
    excluded: split.excluded,
    reclassification: status,
    warnings,
    trail,
  };
}
