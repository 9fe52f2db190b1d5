/**
 * Observability: logging, telemetry, and tracing
 */

export {
  createLogger,
  formatLogLine,
  type LogFields,
  type Logger,
  type LoggerOptions,
  type LogLevel,
} from './logger.ts';
export {
  type OracleCallMetric,
  TELEMETRY_FILE_NAME,
  TelemetryCollector,
  type TelemetryExport,
  type TelemetryStats,
} from './telemetry.ts';
export {
  createTraceContext,
  formatTraceparent,
  generateSpanId,
  generateTraceId,
  parseTraceparent,
  shortTraceId,
  type TraceContext,
} from './tracing.ts';
