/**
 * Risk Engine — Oracle Payload Schema
 *
 * Validates the classifier's JSON payload and maps it onto engine types.
 * Structural problems (wrong types) are fatal for the call; unknown enum
 * values and missing optional sections degrade to defaults with a warning.
 *
 * Wire format (snake_case):
 *   {
 *     "resources": [{ "resource_name", "resource_type", "action", "summary",
 *                     "confidence_level", "confidence_reason",
 *                     "risk_level"?, "risk_reason"? }],
 *     "overall_summary": "...",
 *     "risk_assessment": { "drift", "intent"?, "operations" },
 *     "verdict": { "safe", "highest_risk_bucket", "overall_risk_level", "reasoning" }
 *   }
 */

import { z } from 'zod';

import { OracleError } from '../errors/errors.ts';
import { extractFirstStructuredBlock } from './extract.ts';
import { describeReportedValue, parseRiskLevel } from './risk-buckets.ts';
import {
  CHANGE_ACTIONS,
  type ChangeAction,
  type ChangeRecord,
  type ClassificationResult,
  CONFIDENCE_LEVELS,
  type ConfidenceLevel,
  type OracleVerdict,
  type RiskAssessmentInput,
  type RiskBucketInput,
  type RiskLevel,
} from './types.ts';
import {
  type EvaluationStage,
  ignoreWarnings,
  WARNING_ACTION_UNRECOGNIZED,
  WARNING_CONFIDENCE_UNRECOGNIZED,
  WARNING_RECORD_DROPPED,
  WARNING_RESOURCES_MISSING,
  WARNING_RISK_LEVEL_UNRECOGNIZED,
  WARNING_SUMMARY_MISSING,
  type WarningSink,
} from './warnings.ts';

export const NO_SUMMARY_PROVIDED = 'No summary provided.';

/* -------------------------------------------------------------------------- */
/* Schemas                                                                    */
/* -------------------------------------------------------------------------- */

export const RawRiskBucketSchema = z.object({
  // Any value; unknown levels degrade to low during evaluation
  risk_level: z.unknown(),
  concerns: z.array(z.string()).default([]),
  reasoning: z.string().default(''),
});
export type RawRiskBucket = z.infer<typeof RawRiskBucketSchema>;

export const RawRiskAssessmentSchema = z.object({
  drift: RawRiskBucketSchema.optional(),
  intent: RawRiskBucketSchema.nullable().optional(),
  operations: RawRiskBucketSchema.optional(),
});

export const RawResourceSchema = z.object({
  resource_name: z.string(),
  resource_type: z.string().default('Unknown'),
  action: z.string().optional(),
  summary: z.string().default(''),
  confidence_level: z.string().optional(),
  confidence_reason: z.string().default(''),
  risk_level: z.unknown(),
  risk_reason: z.string().optional(),
});
export type RawResource = z.infer<typeof RawResourceSchema>;

export const RawVerdictSchema = z.object({
  safe: z.boolean().optional(),
  highest_risk_bucket: z.string().optional(),
  overall_risk_level: z.string().optional(),
  reasoning: z.string().optional(),
});

export const RawClassificationPayloadSchema = z.object({
  // Entries are validated one by one so a single bad record can be dropped
  resources: z.array(z.unknown()).optional(),
  overall_summary: z.string().optional(),
  risk_assessment: RawRiskAssessmentSchema.nullable().optional(),
  verdict: RawVerdictSchema.nullable().optional(),
});
export type RawClassificationPayload = z.infer<typeof RawClassificationPayloadSchema>;

/* -------------------------------------------------------------------------- */
/* Enum normalization                                                         */
/* -------------------------------------------------------------------------- */

function compactKey(value: string): string {
  return value.replaceAll(/[\s_-]/g, '').toLowerCase();
}

export function normalizeAction(
  value: string | undefined,
  resourceName: string,
  onWarning: WarningSink = ignoreWarnings,
  stage: EvaluationStage = 'classification',
): ChangeAction {
  if (value !== undefined) {
    const key = compactKey(value);
    const action = CHANGE_ACTIONS.find((candidate) => candidate.toLowerCase() === key);
    if (action !== undefined) {
      return action;
    }
  }

  onWarning({
    code: WARNING_ACTION_UNRECOGNIZED,
    stage,
    message: `Unrecognized action ${value === undefined ? '(missing)' : `"${value}"`} for ${resourceName}; treating as Modify`,
  });
  return 'Modify';
}

export function normalizeConfidence(
  value: string | undefined,
  resourceName: string,
  onWarning: WarningSink = ignoreWarnings,
  stage: EvaluationStage = 'classification',
): ConfidenceLevel {
  if (value !== undefined) {
    const key = value.trim().toLowerCase();
    const level = CONFIDENCE_LEVELS.find((candidate) => candidate === key);
    if (level !== undefined) {
      return level;
    }
  }

  onWarning({
    code: WARNING_CONFIDENCE_UNRECOGNIZED,
    stage,
    message: `Unrecognized confidence ${value === undefined ? '(missing)' : `"${value}"`} for ${resourceName}; treating as medium`,
  });
  return 'medium';
}

function normalizeRecordRisk(
  value: unknown,
  resourceName: string,
  onWarning: WarningSink,
  stage: EvaluationStage,
): RiskLevel {
  const level = parseRiskLevel(value);
  if (level !== undefined) {
    return level;
  }
  onWarning({
    code: WARNING_RISK_LEVEL_UNRECOGNIZED,
    stage,
    message: `Unrecognized risk level ${describeReportedValue(value)} for ${resourceName}; treating as low`,
  });
  return 'low';
}

/* -------------------------------------------------------------------------- */
/* Mapping                                                                    */
/* -------------------------------------------------------------------------- */

function toChangeRecord(
  raw: RawResource,
  onWarning: WarningSink,
  stage: EvaluationStage,
): ChangeRecord {
  const name = raw.resource_name;
  return {
    name,
    type: raw.resource_type,
    action: normalizeAction(raw.action, name, onWarning, stage),
    description: raw.summary,
    confidence: normalizeConfidence(raw.confidence_level, name, onWarning, stage),
    confidenceReason: raw.confidence_reason,
    // Per-resource risk is optional; null reads as absent
    ...(raw.risk_level === undefined || raw.risk_level === null
      ? {}
      : { riskLevel: normalizeRecordRisk(raw.risk_level, name, onWarning, stage) }),
    ...(raw.risk_reason === undefined ? {} : { riskReason: raw.risk_reason }),
  };
}

function toBucketInput(raw: RawRiskBucket): RiskBucketInput {
  return {
    ...(raw.risk_level === undefined ? {} : { riskLevel: raw.risk_level }),
    concerns: raw.concerns,
    reasoning: raw.reasoning,
  };
}

function toRiskAssessment(
  raw: z.infer<typeof RawRiskAssessmentSchema>,
): RiskAssessmentInput {
  return {
    ...(raw.drift === undefined ? {} : { drift: toBucketInput(raw.drift) }),
    ...(raw.intent === undefined
      ? {}
      : { intent: raw.intent === null ? null : toBucketInput(raw.intent) }),
    ...(raw.operations === undefined ? {} : { operations: toBucketInput(raw.operations) }),
  };
}

function toOracleVerdict(raw: z.infer<typeof RawVerdictSchema>): OracleVerdict {
  return {
    ...(raw.safe === undefined ? {} : { safe: raw.safe }),
    ...(raw.highest_risk_bucket === undefined
      ? {}
      : { highestRiskBucket: raw.highest_risk_bucket }),
    ...(raw.overall_risk_level === undefined ? {} : { overallRiskLevel: raw.overall_risk_level }),
    ...(raw.reasoning === undefined ? {} : { reasoning: raw.reasoning }),
  };
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

/**
 * Validate an already-extracted payload and map it onto engine types.
 *
 * @throws {OracleError} `ORACLE_INVALID_RESPONSE` on structural mismatch.
 */
export function parseClassificationPayload(
  payload: unknown,
  onWarning: WarningSink = ignoreWarnings,
  stage: EvaluationStage = 'classification',
): ClassificationResult {
  const parsed = RawClassificationPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new OracleError(
      'ORACLE_INVALID_RESPONSE',
      `Classifier response failed validation: ${issues.join('; ')}`,
      { details: { issues } },
    );
  }
  const raw = parsed.data;

  if (raw.resources === undefined) {
    onWarning({
      code: WARNING_RESOURCES_MISSING,
      stage,
      message: "Classifier response missing 'resources'; using an empty list",
    });
  }

  const records: ChangeRecord[] = [];
  for (const [index, entry] of (raw.resources ?? []).entries()) {
    const resource = RawResourceSchema.safeParse(entry);
    if (resource.success) {
      records.push(toChangeRecord(resource.data, onWarning, stage));
    } else {
      onWarning({
        code: WARNING_RECORD_DROPPED,
        stage,
        message: `Dropped resource #${index + 1}: ${formatIssues(resource.error).join('; ')}`,
      });
    }
  }

  if (raw.overall_summary === undefined) {
    onWarning({
      code: WARNING_SUMMARY_MISSING,
      stage,
      message: "Classifier response missing 'overall_summary'",
    });
  }

  return {
    records,
    summary: {
      overallSummary: raw.overall_summary ?? NO_SUMMARY_PROVIDED,
      ...(raw.risk_assessment == null
        ? {}
        : { riskAssessment: toRiskAssessment(raw.risk_assessment) }),
      ...(raw.verdict == null ? {} : { verdict: toOracleVerdict(raw.verdict) }),
    },
  };
}

/**
 * Extract and validate a raw classifier response.
 *
 * @throws {OracleError} when the text holds no valid payload.
 */
export function parseClassificationResponse(
  text: string,
  onWarning: WarningSink = ignoreWarnings,
  stage: EvaluationStage = 'classification',
): ClassificationResult {
  return parseClassificationPayload(extractFirstStructuredBlock(text), onWarning, stage);
}
