/**
 * Oracle fixtures: classification payload builders and stub oracles.
 */

import { type Mock, vi } from 'vitest';

import type {
  ClassificationOracle,
  OracleCallOptions,
  OracleRequest,
} from '../../../oracle/types.ts';

export interface ResourceSpec {
  readonly name: string;
  readonly confidence: string;
  readonly summary?: string;
}

export interface ResponseSpec {
  readonly resources: readonly ResourceSpec[];
  readonly drift?: string;
  readonly intent?: string | null;
  readonly operations?: string;
  readonly reasoning?: string;
}

const bucketJson = (riskLevel: string) => ({ risk_level: riskLevel, concerns: [], reasoning: '' });

/**
 * A classification payload as an oracle would print it. Every resource is a
 * `Modify` of a `Microsoft.Web/sites` resource.
 */
export const classificationResponse = (shape: ResponseSpec): string =>
  JSON.stringify({
    resources: shape.resources.map((r) => ({
      resource_name: r.name,
      resource_type: 'Microsoft.Web/sites',
      action: 'Modify',
      summary: r.summary ?? `${r.name} changed`,
      confidence_level: r.confidence,
      confidence_reason: 'classifier',
    })),
    overall_summary: 'summary',
    risk_assessment: {
      drift: bucketJson(shape.drift ?? 'low'),
      ...(shape.intent === undefined
        ? {}
        : { intent: shape.intent === null ? null : bucketJson(shape.intent) }),
      operations: bucketJson(shape.operations ?? 'low'),
    },
    ...(shape.reasoning === undefined ? {} : { verdict: { safe: true, reasoning: shape.reasoning } }),
  });

export type ClassifyMock = Mock<
  (request: OracleRequest, options: OracleCallOptions) => Promise<string>
>;

/**
 * An oracle answering with `responses` in order; an Error entry rejects.
 */
export const stubOracle = (
  ...responses: ReadonlyArray<string | Error>
): { oracle: ClassificationOracle; classify: ClassifyMock } => {
  const classify = vi.fn<(request: OracleRequest, options: OracleCallOptions) => Promise<string>>();
  for (const item of responses) {
    if (typeof item === 'string') {
      classify.mockResolvedValueOnce(item);
    } else {
      classify.mockRejectedValueOnce(item);
    }
  }
  const oracle: ClassificationOracle = { name: 'stub', classify };
  return { oracle, classify };
};

/** An oracle that only settles when its call is aborted. */
export const hangingOracle = (): ClassificationOracle => ({
  name: 'slow',
  classify: (_request, { signal }) =>
    new Promise<string>((_resolve, reject) => {
      signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
    }),
});
