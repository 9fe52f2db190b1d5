/**
 * Risk Gate — Telemetry
 *
 * Role:
 *   Collect per-oracle-call metrics for one gate run and export them as a
 *   JSON document next to the logs.
 *
 * Guarantees:
 *   - Recording never throws and never affects the verdict
 *   - Aggregates are computed from the recorded calls only
 */

import type { OracleCallEvent } from '../../engine/orchestrator.ts';
import type { ClassificationPass } from '../../oracle/types.ts';
import type { TraceContext } from './tracing.ts';

export interface OracleCallMetric {
  readonly oracle: string;
  readonly pass: ClassificationPass;
  readonly traceId: string;
  readonly durationMs: number;
  readonly success: boolean;
  readonly errorMessage?: string;
}

export interface TelemetryStats {
  readonly totalCalls: number;
  readonly successfulCalls: number;
  readonly failedCalls: number;
  readonly averageDurationMs: number;
  readonly minDurationMs: number;
  readonly maxDurationMs: number;
}

export interface TelemetryExport {
  readonly version: '1.0';
  readonly collectedAt: string;
  readonly traceId: string;
  readonly metrics: readonly OracleCallMetric[];
  readonly stats: TelemetryStats;
}

export const TELEMETRY_FILE_NAME = 'telemetry.json';

export class TelemetryCollector {
  private readonly metrics: OracleCallMetric[] = [];
  private readonly traceContext: TraceContext;
  private readonly oracleName: string;

  constructor(traceContext: TraceContext, oracleName: string) {
    this.traceContext = traceContext;
    this.oracleName = oracleName;
  }

  /**
   * Record one oracle call; shaped to be passed as the orchestrator's
   * `onOracleCall` hook.
   */
  readonly recordOracleCall = (event: OracleCallEvent): void => {
    this.metrics.push({
      oracle: this.oracleName,
      pass: event.pass,
      traceId: this.traceContext.traceId,
      durationMs: event.durationMs,
      success: event.success,
      ...(event.errorMessage === undefined ? {} : { errorMessage: event.errorMessage }),
    });
  };

  getAllMetrics(): readonly OracleCallMetric[] {
    return [...this.metrics];
  }

  calculateStats(): TelemetryStats {
    if (this.metrics.length === 0) {
      return {
        totalCalls: 0,
        successfulCalls: 0,
        failedCalls: 0,
        averageDurationMs: 0,
        minDurationMs: 0,
        maxDurationMs: 0,
      };
    }

    const durations = this.metrics.map((m) => m.durationMs);
    const successful = this.metrics.filter((m) => m.success).length;

    return {
      totalCalls: this.metrics.length,
      successfulCalls: successful,
      failedCalls: this.metrics.length - successful,
      averageDurationMs: durations.reduce((a, b) => a + b, 0) / durations.length,
      minDurationMs: Math.min(...durations),
      maxDurationMs: Math.max(...durations),
    };
  }

  export(collectedAt: Date = new Date()): TelemetryExport {
    return {
      version: '1.0',
      collectedAt: collectedAt.toISOString(),
      traceId: this.traceContext.traceId,
      metrics: this.getAllMetrics(),
      stats: this.calculateStats(),
    };
  }
}
