/**
 * Risk Engine — Confidence Splitter
 *
 * Partitions one classification result into the records that feed risk
 * evaluation (`high`, `medium`) and the ones reported for information only
 * (`low`, `noise`). The partition is stable and lossless.
 */

import type { ClassificationResult, ConfidenceLevel } from './types.ts';

const INCLUDED_CONFIDENCE: ReadonlySet<ConfidenceLevel> = new Set(['high', 'medium']);

export interface ConfidenceSplit {
  readonly included: ClassificationResult;
  /** Always carries an empty summary. */
  readonly excluded: ClassificationResult;
}

export function isIncludedConfidence(confidence: ConfidenceLevel): boolean {
  return INCLUDED_CONFIDENCE.has(confidence);
}

export function splitByConfidence(result: ClassificationResult): ConfidenceSplit {
  const included = result.records.filter((record) => isIncludedConfidence(record.confidence));
  const excluded = result.records.filter((record) => !isIncludedConfidence(record.confidence));

  return {
    included: { records: included, summary: result.summary },
    excluded: { records: excluded, summary: {} },
  };
}
