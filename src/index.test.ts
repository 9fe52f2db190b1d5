/**
 * whatif-gate - Main Entry Point Tests
 *
 * Verifies that the package root exposes the engine, the oracle adapters,
 * the error hierarchy and the CLI runner.
 */

import { describe, expect, it } from 'vitest';

import * as gate from './index.ts';

describe('whatif-gate package entry', () => {
  it.each([
    'evaluateDeployment',
    'splitByConfidence',
    'applyNoisePatterns',
    'evaluateRiskBuckets',
    'generateMarkdownSummary',
    'createCommandOracle',
    'createHttpOracle',
    'executeWithArgs',
    'parseCliArgs',
    'main',
  ])('exports %s', (name) => {
    expect(typeof Reflect.get(gate, name)).toBe('function');
  });

  it('exports the error hierarchy', () => {
    expect(new gate.OracleError('ORACLE_TIMEOUT', 'late')).toBeInstanceOf(gate.AppError);
  });

  it('exports default thresholds', () => {
    expect(gate.DEFAULT_THRESHOLDS).toEqual({ drift: 'high', intent: 'high', operations: 'high' });
  });
});
