/**
 * Tests for the Evaluation Orchestrator
 *
 * These tests assert:
 * - the state sequence and its trail
 * - re-classification runs only when noise was removed and changes remain
 * - re-classification failures fall back without aborting
 * - initial classification failures are fatal
 * - noise sources are read before the oracle is called
 * - an intent bucket counts only when PR intent was supplied
 * - unusable risk levels degrade to low instead of failing the run
 */

import { describe, expect, it, vi } from 'vitest';

import {
  classificationResponse,
  hangingOracle,
  stubOracle,
} from '../__test-utils__/fixtures/oracle/oracle-fixtures.ts';
import { NoisePatternError, OracleError } from '../errors/errors.ts';
import {
  assembleVerdict,
  buildReclassificationRequest,
  callOracle,
  evaluateDeployment,
  MAX_ORACLE_TIMEOUT_MS,
  type OracleCallEvent,
} from './orchestrator.ts';
import { staticNoisePatternSource } from './pattern-matcher.ts';
import type { ClassificationOracle } from '../oracle/types.ts';
import type { ChangeRecord } from './types.ts';
import {
  WARNING_INTENT_UNREQUESTED,
  WARNING_NOISE_PATTERNS_EMPTY,
  WARNING_RECLASSIFICATION_FAILED,
  WARNING_RISK_LEVEL_UNRECOGNIZED,
} from './warnings.ts';

/* -------------------------------------------------------------------------- */
/* Tests                                                                      */
/* -------------------------------------------------------------------------- */

describe('Evaluation Orchestrator', () => {
  describe('evaluateDeployment', () => {
    it('classifies once when nothing is excluded', async () => {
      const { oracle, classify } = stubOracle(
        classificationResponse({ resources: [{ name: 'app1', confidence: 'high' }], reasoning: 'Routine' }),
      );

      const outcome = await evaluateDeployment({ input: 'what-if text' }, { oracle });

      expect(classify).toHaveBeenCalledTimes(1);
      expect(classify.mock.calls[0]?.[0]).toEqual({ pass: 'initial', input: 'what-if text' });
      expect(outcome.reclassification).toBe('not-needed');
      expect(outcome.verdict).toEqual({
        safe: true,
        highestRiskBucket: 'none',
        overallRiskLevel: 'low',
        reasoning: 'All evaluated risk buckets are below their thresholds. Routine',
        failedBuckets: [],
      });
      expect(outcome.trail.map((entry) => entry.to)).toEqual([
        'classified',
        'noise-filtered',
        'split',
        'evaluated',
        'verdict',
      ]);
      expect(outcome.warnings).toEqual([]);
    });

    it('re-classifies from the included records only and replaces the assessment', async () => {
      const { oracle, classify } = stubOracle(
        classificationResponse({
          resources: [
            { name: 'app1', confidence: 'high', summary: 'Changes app setting' },
            { name: 'app1-etag', confidence: 'noise', summary: 'etag updated' },
          ],
          drift: 'high',
        }),
        classificationResponse({
          resources: [{ name: 'app1', confidence: 'high' }],
          reasoning: 'Only the app setting changes',
        }),
      );
      const context = { intent: { title: 'Add app setting' } };

      const outcome = await evaluateDeployment({ input: 'raw', context }, { oracle });

      expect(classify).toHaveBeenCalledTimes(2);
      expect(classify.mock.calls[1]?.[0]).toEqual({
        pass: 'reclassification',
        input: 'Modify Microsoft.Web/sites app1: Changes app setting',
        changes: [
          {
            name: 'app1',
            type: 'Microsoft.Web/sites',
            action: 'Modify',
            description: 'Changes app setting',
          },
        ],
        context,
      });
      expect(outcome.reclassification).toBe('applied');
      expect(outcome.verdict.safe).toBe(true);
      expect(outcome.verdict.reasoning).toBe(
        'All evaluated risk buckets are below their thresholds. Only the app setting changes',
      );
      expect(outcome.included.records.map((r) => r.description)).toEqual(['Changes app setting']);
      expect(outcome.excluded.records.map((r) => r.name)).toEqual(['app1-etag']);
      expect(outcome.excluded.summary).toEqual({});
      expect(outcome.trail).toEqual([
        { from: 'start', to: 'classified', detail: 'Classifier returned 2 change record(s)' },
        { from: 'classified', to: 'noise-filtered', detail: 'No noise pattern source supplied' },
        { from: 'noise-filtered', to: 'split', detail: '1 included, 1 excluded' },
        {
          from: 'split',
          to: 'reclassified',
          detail: 'Re-classified 1 included record(s) without excluded changes',
        },
        { from: 'reclassified', to: 'evaluated', detail: 'No bucket reached its threshold' },
        { from: 'evaluated', to: 'verdict', detail: 'SAFE (overall risk low)' },
      ]);
    });

    it('falls back to the first pass when re-classification fails', async () => {
      const { oracle } = stubOracle(
        classificationResponse({
          resources: [
            { name: 'app1', confidence: 'high' },
            { name: 'app2', confidence: 'low' },
          ],
          drift: 'high',
        }),
        new Error('backend unavailable'),
      );

      const outcome = await evaluateDeployment({ input: 'raw' }, { oracle });

      expect(outcome.reclassification).toBe('fallback');
      expect(outcome.verdict).toEqual({
        safe: false,
        highestRiskBucket: 'drift',
        overallRiskLevel: 'high',
        reasoning: 'Risk threshold met or exceeded for: drift.',
        failedBuckets: ['drift'],
      });
      expect(outcome.warnings).toEqual([
        {
          code: WARNING_RECLASSIFICATION_FAILED,
          stage: 'reclassification',
          message:
            'Re-classification failed (ORACLE_CALL_FAILED: stub call failed: backend unavailable); using first-pass assessment',
        },
      ]);
      expect(outcome.trail[3]).toEqual({
        from: 'split',
        to: 'reclassified',
        detail: 'Re-classification failed; kept first-pass assessment',
      });
    });

    it('falls back when re-classification returns no structure', async () => {
      const { oracle } = stubOracle(
        classificationResponse({
          resources: [
            { name: 'app1', confidence: 'medium' },
            { name: 'app2', confidence: 'noise' },
          ],
        }),
        'I could not classify these changes.',
      );

      const outcome = await evaluateDeployment({ input: 'raw' }, { oracle });

      expect(outcome.reclassification).toBe('fallback');
      expect(outcome.warnings.map((w) => w.code)).toEqual([WARNING_RECLASSIFICATION_FAILED]);
    });

    it('treats a re-classification timeout as a failure', async () => {
      let calls = 0;
      const slow = hangingOracle();
      const oracle: ClassificationOracle = {
        name: 'mixed',
        classify: (request, options) => {
          calls++;
          return calls === 1
            ? Promise.resolve(
                classificationResponse({
                  resources: [
                    { name: 'a', confidence: 'high' },
                    { name: 'b', confidence: 'noise' },
                  ],
                }),
              )
            : slow.classify(request, options);
        },
      };

      const outcome = await evaluateDeployment({ input: 'raw' }, { oracle, timeoutMs: 10 });

      expect(outcome.reclassification).toBe('fallback');
      expect(outcome.warnings[0]?.message).toBe(
        'Re-classification failed (ORACLE_TIMEOUT: mixed did not respond within 10ms); using first-pass assessment',
      );
    });

    it('fails when the initial call fails', async () => {
      const { oracle } = stubOracle(new Error('connection refused'));

      await expect(evaluateDeployment({ input: 'raw' }, { oracle })).rejects.toMatchObject({
        code: 'ORACLE_CALL_FAILED',
        message: 'stub call failed: connection refused',
      });
    });

    it('fails when the initial call times out', async () => {
      await expect(
        evaluateDeployment({ input: 'raw' }, { oracle: hangingOracle(), timeoutMs: 10 }),
      ).rejects.toMatchObject({ code: 'ORACLE_TIMEOUT' });
    });

    it('fails when the initial response holds no structure', async () => {
      const { oracle } = stubOracle('Sorry, no JSON today.');

      const promise = evaluateDeployment({ input: 'raw' }, { oracle });

      await expect(promise).rejects.toBeInstanceOf(OracleError);
      await expect(promise).rejects.toMatchObject({ code: 'ORACLE_RESPONSE_UNPARSABLE' });
    });

    it('downgrades noise-matching records before splitting', async () => {
      const { oracle, classify } = stubOracle(
        classificationResponse({
          resources: [
            { name: 'sa1', confidence: 'high', summary: 'etag property change detected' },
            { name: 'sa2', confidence: 'high', summary: 'Create blob container' },
          ],
        }),
        classificationResponse({ resources: [{ name: 'sa2', confidence: 'high' }] }),
      );

      const outcome = await evaluateDeployment(
        { input: 'raw' },
        { oracle, noisePatterns: staticNoisePatternSource(['etag property change']) },
      );

      expect(classify).toHaveBeenCalledTimes(2);
      expect(outcome.excluded.records).toHaveLength(1);
      expect(outcome.excluded.records[0]).toMatchObject({ name: 'sa1', confidence: 'noise' });
      expect(outcome.trail[1]).toEqual({
        from: 'classified',
        to: 'noise-filtered',
        detail: '1 record(s) matched 1 noise pattern(s)',
      });
    });

    it('reads the noise source before calling the oracle', async () => {
      const { oracle, classify } = stubOracle(classificationResponse({ resources: [] }));
      const failing = () =>
        Promise.reject(new NoisePatternError('NOISE_PATTERNS_UNREADABLE', 'missing.txt'));

      await expect(
        evaluateDeployment({ input: 'raw' }, { oracle, noisePatterns: failing }),
      ).rejects.toBeInstanceOf(NoisePatternError);
      expect(classify).not.toHaveBeenCalled();
    });

    it('warns on an empty noise source and leaves records alone', async () => {
      const { oracle } = stubOracle(classificationResponse({ resources: [{ name: 'a', confidence: 'high' }] }));

      const outcome = await evaluateDeployment(
        { input: 'raw' },
        { oracle, noisePatterns: staticNoisePatternSource([]) },
      );

      expect(outcome.warnings.map((w) => w.code)).toEqual([WARNING_NOISE_PATTERNS_EMPTY]);
      expect(outcome.included.records.map((r) => r.confidence)).toEqual(['high']);
      expect(outcome.trail[1]?.detail).toBe('0 record(s) matched 0 noise pattern(s)');
    });

    it('is safe without re-classification when every record is excluded', async () => {
      const { oracle, classify } = stubOracle(
        classificationResponse({
          resources: [
            { name: 'a', confidence: 'low' },
            { name: 'b', confidence: 'noise' },
          ],
          drift: 'high',
          reasoning: 'Noise only',
        }),
      );

      const outcome = await evaluateDeployment(
        { input: 'raw' },
        { oracle, thresholds: { drift: 'low', intent: 'low', operations: 'low' } },
      );

      expect(classify).toHaveBeenCalledTimes(1);
      expect(outcome.reclassification).toBe('not-needed');
      expect(outcome.verdict).toEqual({
        safe: true,
        highestRiskBucket: 'none',
        overallRiskLevel: 'low',
        reasoning: 'All evaluated risk buckets are below their thresholds.',
        failedBuckets: [],
      });
      expect(outcome.trail[3]).toEqual({
        from: 'split',
        to: 'evaluated',
        detail: 'No included changes to evaluate',
      });
      expect(outcome.warnings).toEqual([]);
    });

    it('never evaluates an intent bucket the oracle left out', async () => {
      const { oracle } = stubOracle(
        classificationResponse({ resources: [{ name: 'a', confidence: 'high' }], intent: null }),
      );

      const outcome = await evaluateDeployment(
        { input: 'raw' },
        { oracle, thresholds: { drift: 'medium', intent: 'low', operations: 'medium' } },
      );

      expect(outcome.evaluation.assessment.intent).toBeUndefined();
      expect(outcome.verdict.failedBuckets).toEqual([]);
    });

    it('ignores an intent bucket when no PR intent was supplied', async () => {
      const { oracle } = stubOracle(
        classificationResponse({ resources: [{ name: 'a', confidence: 'high' }], intent: 'high' }),
      );

      const outcome = await evaluateDeployment({ input: 'raw' }, { oracle });

      expect(outcome.evaluation.assessment.intent).toBeUndefined();
      expect(outcome.verdict).toEqual({
        safe: true,
        highestRiskBucket: 'none',
        overallRiskLevel: 'low',
        reasoning: 'All evaluated risk buckets are below their thresholds.',
        failedBuckets: [],
      });
      expect(outcome.warnings).toEqual([
        {
          code: WARNING_INTENT_UNREQUESTED,
          stage: 'evaluation',
          message: 'Classifier reported an intent bucket but no PR intent was supplied; ignoring it',
        },
      ]);
    });

    it('evaluates the intent bucket when PR intent was supplied', async () => {
      const { oracle } = stubOracle(
        classificationResponse({ resources: [{ name: 'a', confidence: 'high' }], intent: 'high' }),
      );

      const outcome = await evaluateDeployment(
        { input: 'raw', context: { intent: { title: 'Scale out' } } },
        { oracle },
      );

      expect(outcome.verdict.safe).toBe(false);
      expect(outcome.verdict.failedBuckets).toEqual(['intent']);
      expect(outcome.verdict.highestRiskBucket).toBe('intent');
      expect(outcome.warnings).toEqual([]);
    });

    it('treats null and numeric bucket risk levels as low with warnings', async () => {
      const { oracle } = stubOracle(
        JSON.stringify({
          resources: [
            {
              resource_name: 'a',
              action: 'Modify',
              summary: 'a changed',
              confidence_level: 'high',
              confidence_reason: 'classifier',
            },
          ],
          overall_summary: 'summary',
          risk_assessment: {
            drift: { risk_level: null, concerns: [], reasoning: '' },
            operations: { risk_level: 3, concerns: [], reasoning: '' },
          },
        }),
      );

      const outcome = await evaluateDeployment({ input: 'raw' }, { oracle });

      expect(outcome.verdict.safe).toBe(true);
      expect(outcome.evaluation.assessment.drift.riskLevel).toBe('low');
      expect(outcome.evaluation.assessment.operations.riskLevel).toBe('low');
      expect(outcome.warnings.map((w) => w.code)).toEqual([
        WARNING_RISK_LEVEL_UNRECOGNIZED,
        WARNING_RISK_LEVEL_UNRECOGNIZED,
      ]);
      expect(outcome.warnings.map((w) => w.message)).toEqual([
        'Unrecognized risk level null for drift bucket; treating as low',
        'Unrecognized risk level 3 for operations bucket; treating as low',
      ]);
    });

    it('reports each oracle call', async () => {
      const { oracle } = stubOracle(
        classificationResponse({
          resources: [
            { name: 'a', confidence: 'high' },
            { name: 'b', confidence: 'noise' },
          ],
        }),
        new Error('boom'),
      );
      const events: OracleCallEvent[] = [];
      let tick = 0;

      await evaluateDeployment(
        { input: 'raw' },
        {
          oracle,
          onOracleCall: (event) => events.push(event),
          now: () => {
            tick += 5;
            return tick;
          },
        },
      );

      expect(events).toEqual([
        { pass: 'initial', durationMs: 5, success: true },
        {
          pass: 'reclassification',
          durationMs: 5,
          success: false,
          errorMessage: 'ORACLE_CALL_FAILED: stub call failed: boom',
        },
      ]);
    });

    it('forwards warnings as they are raised', async () => {
      const { oracle } = stubOracle('{"overall_summary": "empty"}');
      const onWarning = vi.fn();

      const outcome = await evaluateDeployment({ input: 'raw' }, { oracle, onWarning });

      expect(onWarning).toHaveBeenCalledTimes(outcome.warnings.length);
      expect(onWarning.mock.calls.map(([warning]) => warning)).toEqual(outcome.warnings);
    });

    it('gives equal outcomes for equal inputs', async () => {
      const text = classificationResponse({
        resources: [{ name: 'a', confidence: 'high' }],
        drift: 'medium',
        intent: 'high',
      });

      const first = await evaluateDeployment({ input: 'raw' }, { oracle: stubOracle(text).oracle });
      const second = await evaluateDeployment(
        { input: 'raw' },
        { oracle: stubOracle(text).oracle },
      );

      expect(second).toEqual(first);
    });
  });

  describe('callOracle', () => {
    it('returns the adapter response', async () => {
      const { oracle } = stubOracle('text');

      await expect(callOracle(oracle, { pass: 'initial', input: 'x' }, 1000)).resolves.toBe('text');
    });

    it('aborts the adapter signal on timeout', async () => {
      let seen: AbortSignal | undefined;
      const oracle: ClassificationOracle = {
        name: 'slow',
        classify: (request, options) => {
          seen = options.signal;
          return hangingOracle().classify(request, options);
        },
      };

      await expect(
        callOracle(oracle, { pass: 'reclassification', input: 'x' }, 5),
      ).rejects.toMatchObject({
        code: 'ORACLE_TIMEOUT',
        details: { pass: 'reclassification', timeoutMs: 5 },
      });
      expect(seen?.aborted).toBe(true);
    });

    it('caps budgets beyond the timer range instead of firing at once', async () => {
      const oracle: ClassificationOracle = {
        name: 'steady',
        classify: () =>
          new Promise<string>((resolve) => {
            setTimeout(() => resolve('late but fine'), 20);
          }),
      };

      await expect(
        callOracle(oracle, { pass: 'initial', input: 'x' }, MAX_ORACLE_TIMEOUT_MS * 2),
      ).resolves.toBe('late but fine');
    });

    it('passes OracleErrors from adapters through unchanged', async () => {
      const original = new OracleError('ORACLE_CALL_FAILED', 'HTTP 503');
      const { oracle } = stubOracle(original);

      await expect(callOracle(oracle, { pass: 'initial', input: 'x' }, 1000)).rejects.toBe(
        original,
      );
    });
  });

  describe('assembleVerdict', () => {
    it('names the first bucket at the highest level', () => {
      const verdict = assembleVerdict({
        isSafe: false,
        failedBuckets: ['intent', 'operations'],
        assessment: {
          drift: { bucket: 'drift', riskLevel: 'medium', concerns: [], reasoning: '' },
          intent: { bucket: 'intent', riskLevel: 'high', concerns: [], reasoning: '' },
          operations: { bucket: 'operations', riskLevel: 'high', concerns: [], reasoning: '' },
        },
      });

      expect(verdict).toEqual({
        safe: false,
        highestRiskBucket: 'intent',
        overallRiskLevel: 'high',
        reasoning: 'Risk threshold met or exceeded for: intent, operations.',
        failedBuckets: ['intent', 'operations'],
      });
    });

    it('ignores blank oracle reasoning', () => {
      const verdict = assembleVerdict(
        {
          isSafe: true,
          failedBuckets: [],
          assessment: {
            drift: { bucket: 'drift', riskLevel: 'low', concerns: [], reasoning: '' },
            operations: { bucket: 'operations', riskLevel: 'medium', concerns: [], reasoning: '' },
          },
        },
        { reasoning: '   ' },
      );

      expect(verdict.highestRiskBucket).toBe('operations');
      expect(verdict.reasoning).toBe('All evaluated risk buckets are below their thresholds.');
    });
  });

  describe('buildReclassificationRequest', () => {
    it('describes each retained change on its own line', () => {
      const records: ChangeRecord[] = [
        {
          name: 'kv1',
          type: 'Microsoft.KeyVault/vaults',
          action: 'Delete',
          description: 'Removes vault',
          confidence: 'high',
          confidenceReason: 'x',
        },
        {
          name: 'vnet1',
          type: 'Microsoft.Network/virtualNetworks',
          action: 'Create',
          description: 'New network',
          confidence: 'medium',
          confidenceReason: 'y',
        },
      ];

      expect(buildReclassificationRequest(records).input).toBe(
        'Delete Microsoft.KeyVault/vaults kv1: Removes vault\nCreate Microsoft.Network/virtualNetworks vnet1: New network',
      );
    });
  });
});
