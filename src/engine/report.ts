/**
 * Risk Engine — Reports
 *
 * Machine-readable and human-readable renderings of an evaluation outcome.
 * Rendering never changes a decision; every value shown comes from the
 * outcome as evaluated.
 */

import type { EvaluationOutcome, ReclassificationStatus, TrailEntry } from './orchestrator.ts';
import type {
  ChangeRecord,
  NormalizedRiskAssessment,
  RiskBucketAssessment,
  RiskBucketId,
  Verdict,
} from './types.ts';
import type { EngineWarning } from './warnings.ts';

/* -------------------------------------------------------------------------- */
/* JSON                                                                       */
/* -------------------------------------------------------------------------- */

export interface OutcomeReport {
  readonly verdict: Verdict;
  readonly riskAssessment: NormalizedRiskAssessment;
  readonly overallSummary: string;
  readonly resources: readonly ChangeRecord[];
  readonly excludedResources: readonly ChangeRecord[];
  readonly reclassification: ReclassificationStatus;
  readonly warnings: readonly EngineWarning[];
  readonly trail: readonly TrailEntry[];
}

export function toOutcomeReport(outcome: EvaluationOutcome): OutcomeReport {
  return {
    verdict: outcome.verdict,
    riskAssessment: outcome.evaluation.assessment,
    overallSummary: outcome.included.summary.overallSummary ?? '',
    resources: outcome.included.records,
    excludedResources: outcome.excluded.records,
    reclassification: outcome.reclassification,
    warnings: outcome.warnings,
    trail: outcome.trail,
  };
}

export function serializeOutcome(outcome: EvaluationOutcome): string {
  return JSON.stringify(toOutcomeReport(outcome), null, 2);
}

/* -------------------------------------------------------------------------- */
/* Markdown                                                                   */
/* -------------------------------------------------------------------------- */

export const DEFAULT_REPORT_TITLE = 'What-If Deployment Review';

const BUCKET_LABELS: Readonly<Record<RiskBucketId, string>> = {
  drift: 'Infrastructure Drift',
  intent: 'PR Intent Alignment',
  operations: 'Risky Operations',
};

export interface MarkdownOptions {
  readonly title?: string;
  /** Append the state trail (default true). */
  readonly includeTrail?: boolean;
}

function capitalize(value: string): string {
  return value.length === 0 ? value : `${value.charAt(0).toUpperCase()}${value.slice(1)}`;
}

/** Table cells cannot hold pipes or line breaks. */
export function escapeTableCell(value: string): string {
  return value.replaceAll('|', String.raw`\|`).replaceAll(/\r?\n/g, ' ');
}

function bucketRow(assessment: RiskBucketAssessment | undefined, bucket: RiskBucketId): string {
  const label = BUCKET_LABELS[bucket];
  if (assessment === undefined) {
    return `| ${label} | Not evaluated | No PR metadata provided |`;
  }
  const concern = assessment.concerns[0];
  const concerns = concern === undefined ? 'None' : escapeTableCell(concern);
  return `| ${label} | ${capitalize(assessment.riskLevel)} | ${concerns} |`;
}

function resourceRow(record: ChangeRecord, index: number): string {
  return [
    '',
    String(index + 1),
    escapeTableCell(record.name),
    escapeTableCell(record.type),
    record.action,
    record.riskLevel === undefined ? 'None' : capitalize(record.riskLevel),
    escapeTableCell(record.description),
    '',
  ]
    .join(' | ')
    .trim();
}

function excludedRow(record: ChangeRecord, index: number): string {
  return [
    '',
    String(index + 1),
    escapeTableCell(record.name),
    escapeTableCell(record.type),
    record.action,
    capitalize(record.confidence),
    escapeTableCell(record.confidenceReason),
    '',
  ]
    .join(' | ')
    .trim();
}

/**
 * Render an outcome as a markdown review comment.
 */
export function generateMarkdownSummary(
  outcome: EvaluationOutcome,
  options: MarkdownOptions = {},
): string {
  const { verdict, evaluation, included, excluded, warnings, trail } = outcome;
  const assessment = evaluation.assessment;

  const lines: string[] = [
    `## ${options.title ?? DEFAULT_REPORT_TITLE}`,
    '',
    '### Risk Assessment',
    '',
    '| Risk Bucket | Risk Level | Key Concerns |',
    '|-------------|------------|--------------|',
    bucketRow(assessment.drift, 'drift'),
    bucketRow(assessment.intent, 'intent'),
    bucketRow(assessment.operations, 'operations'),
    '',
    '### Resource Changes',
    '',
  ];

  if (included.records.length === 0) {
    lines.push('No resource changes remain after confidence filtering.', '');
  } else {
    lines.push(
      '| # | Resource | Type | Action | Risk | Summary |',
      '|---|----------|------|--------|------|---------|',
      ...included.records.map((record, index) => resourceRow(record, index)),
      '',
    );
  }

  const overallSummary = included.summary.overallSummary ?? '';
  if (overallSummary.length > 0) {
    lines.push(`**Summary:** ${overallSummary}`, '');
  }

  lines.push(
    `### Verdict: ${verdict.safe ? '✅ SAFE' : '❌ UNSAFE'}`,
    '',
    `**Overall Risk Level:** ${capitalize(verdict.overallRiskLevel)}`,
  );
  if (verdict.highestRiskBucket !== 'none') {
    lines.push(`**Highest Risk Bucket:** ${capitalize(verdict.highestRiskBucket)}`);
  }
  lines.push(`**Reasoning:** ${verdict.reasoning}`, '');

  if (excluded.records.length > 0) {
    lines.push(
      `### Excluded Changes (${excluded.records.length})`,
      '',
      'Low-confidence and noise changes are listed for reference and did not affect the verdict.',
      '',
      '| # | Resource | Type | Action | Confidence | Reason |',
      '|---|----------|------|--------|------------|--------|',
      ...excluded.records.map((record, index) => excludedRow(record, index)),
      '',
    );
  }

  if (warnings.length > 0) {
    lines.push(
      '### Warnings',
      '',
      ...warnings.map((warning) => `- **${warning.code}** (${warning.stage}): ${warning.message}`),
      '',
    );
  }

  if (options.includeTrail ?? true) {
    lines.push(
      '### Evaluation Trail',
      '',
      ...trail.map((step) => `- ${step.from} -> ${step.to}: ${step.detail}`),
      '',
    );
  }

  lines.push('---');
  return lines.join('\n');
}
