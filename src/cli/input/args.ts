/**
 * Risk Gate — CLI Argument Parsing
 *
 * Role:
 *   Turn raw argv into a typed, validated `CLIArgs`.
 *
 * Responsibilities:
 *   - Parse argv strictly (unknown options are errors)
 *   - Validate thresholds, numbers and formats
 *   - Map parse errors to CliErrors with stable codes
 *
 * Environment fallbacks and CI detection are applied later, at execution.
 */

import { parseArgs } from 'node:util';

import { CliError, hasErrorProperty } from '../../errors/errors.ts';
import { MAX_ORACLE_TIMEOUT_MS } from '../../engine/orchestrator.ts';
import { DEFAULT_NOISE_THRESHOLD } from '../../engine/pattern-matcher.ts';
import { isRiskLevel } from '../../engine/risk-buckets.ts';
import type { RiskBucketId, RiskLevel, ThresholdConfig } from '../../engine/types.ts';
import { MS_PER_SECOND } from '../constants/time.ts';

/* -------------------------------------------------------------------------- */
/* CLI argument model                                                          */
/* -------------------------------------------------------------------------- */

export type OutputFormat = 'json' | 'markdown';

export const DEFAULT_DIFF_REF = 'HEAD~1';
export const DEFAULT_TEMPLATE_GLOB = '**/*.bicep';
export const DEFAULT_ORACLE_TIMEOUT_SECONDS = 120;

export interface CLIArgs {
  readonly oracleCommand?: string;
  readonly oracleUrl?: string;
  /** JSON body field holding the oracle text (HTTP oracle only). */
  readonly oracleResponseField?: string;
  readonly oracleTimeoutMs: number;
  readonly model?: string;
  readonly format: OutputFormat;
  readonly title?: string;
  readonly ci: boolean;
  readonly diffFile?: string;
  readonly diffRef: string;
  readonly templateDir?: string;
  readonly templateGlob: string;
  readonly prTitle?: string;
  readonly prDescription?: string;
  readonly thresholds: ThresholdConfig;
  readonly noiseFiles: readonly string[];
  readonly noiseThreshold: number;
  readonly logDir?: string;
  readonly structuredLogs: boolean;
  readonly verbose: boolean;
  readonly help: boolean;
  readonly version: boolean;
}

/* -------------------------------------------------------------------------- */
/* Argument parsing                                                            */
/* -------------------------------------------------------------------------- */

/**
 * Parse the raw argv array into structured CLI arguments.
 *
 * @throws {CliError} when parsing fails or validation rejects the inputs.
 */
export function parseCliArgs(argv: readonly string[] = process.argv.slice(2)): CLIArgs {
  try {
    const { values, positionals } = parseArgs({
      args: [...argv],
      strict: true,
      allowPositionals: true,
      options: {
        'oracle-command': { type: 'string' },
        'oracle-url': { type: 'string' },
        'oracle-response-field': { type: 'string' },
        'oracle-timeout': { type: 'string' },
        model: { type: 'string' },
        format: { type: 'string', short: 'f', default: 'json' },
        title: { type: 'string' },
        ci: { type: 'boolean', default: false },
        diff: { type: 'string' },
        'diff-ref': { type: 'string', default: DEFAULT_DIFF_REF },
        'template-dir': { type: 'string' },
        'template-glob': { type: 'string', default: DEFAULT_TEMPLATE_GLOB },
        'pr-title': { type: 'string' },
        'pr-description': { type: 'string' },
        'drift-threshold': { type: 'string', default: 'high' },
        'intent-threshold': { type: 'string', default: 'high' },
        'operations-threshold': { type: 'string', default: 'high' },
        'noise-file': { type: 'string', multiple: true },
        'noise-threshold': { type: 'string' },
        'log-dir': { type: 'string' },
        'structured-logs': { type: 'boolean', default: false },
        verbose: { type: 'boolean', short: 'v', default: false },
        help: { type: 'boolean', short: 'h', default: false },
        version: { type: 'boolean', default: false },
      },
    });

    return normalizeCliArgs(values, positionals);
  } catch (error) {
    throw mapParseArgsError(error);
  }
}

type RawCliValues = {
  readonly 'oracle-command'?: string;
  readonly 'oracle-url'?: string;
  readonly 'oracle-response-field'?: string;
  readonly 'oracle-timeout'?: string;
  readonly model?: string;
  readonly format?: string;
  readonly title?: string;
  readonly ci?: boolean;
  readonly diff?: string;
  readonly 'diff-ref'?: string;
  readonly 'template-dir'?: string;
  readonly 'template-glob'?: string;
  readonly 'pr-title'?: string;
  readonly 'pr-description'?: string;
  readonly 'drift-threshold'?: string;
  readonly 'intent-threshold'?: string;
  readonly 'operations-threshold'?: string;
  readonly 'noise-file'?: readonly string[];
  readonly 'noise-threshold'?: string;
  readonly 'log-dir'?: string;
  readonly 'structured-logs'?: boolean;
  readonly verbose?: boolean;
  readonly help?: boolean;
  readonly version?: boolean;
};

function parseThreshold(value: string | undefined, bucket: RiskBucketId): RiskLevel {
  const key = (value ?? 'high').trim().toLowerCase();
  if (!isRiskLevel(key)) {
    throw new CliError(
      'CLI_INVALID_ARGUMENT',
      `--${bucket}-threshold must be one of low, medium, high (got "${value ?? ''}")`,
    );
  }
  return key;
}

function parseFormat(value: string | undefined): OutputFormat {
  const key = (value ?? 'json').trim().toLowerCase();
  if (key === 'json' || key === 'markdown') {
    return key;
  }
  throw new CliError('CLI_INVALID_ARGUMENT', `--format must be json or markdown (got "${value}")`);
}

function parseTimeoutMs(value: string | undefined): number {
  if (value === undefined) {
    return DEFAULT_ORACLE_TIMEOUT_SECONDS * MS_PER_SECOND;
  }
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0 || value.trim() === '') {
    throw new CliError(
      'CLI_INVALID_ARGUMENT',
      `--oracle-timeout must be a positive number of seconds (got "${value}")`,
    );
  }
  const ms = Math.round(seconds * MS_PER_SECOND);
  if (ms > MAX_ORACLE_TIMEOUT_MS) {
    throw new CliError(
      'CLI_INVALID_ARGUMENT',
      `--oracle-timeout must be at most ${Math.floor(MAX_ORACLE_TIMEOUT_MS / MS_PER_SECOND)} seconds (got "${value}")`,
    );
  }
  return ms;
}

function parseNoiseThreshold(value: string | undefined): number {
  if (value === undefined) {
    return DEFAULT_NOISE_THRESHOLD;
  }
  const ratio = Number(value);
  if (value.trim() === '' || !Number.isFinite(ratio) || ratio < 0 || ratio > 1) {
    throw new CliError(
      'CLI_INVALID_ARGUMENT',
      `--noise-threshold must be a number between 0 and 1 (got "${value}")`,
    );
  }
  return ratio;
}

function nonEmpty(value: string | undefined, flag: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (value.trim().length === 0) {
    throw new CliError('CLI_INVALID_ARGUMENT', `${flag} requires a value`);
  }
  return value;
}

/**
 * Normalize the `parseArgs` output into our CLI shape and enforce validation rules.
 */
function normalizeCliArgs(values: RawCliValues, positionals: readonly string[]): CLIArgs {
  if (positionals.length > 0) {
    throw new CliError('CLI_INVALID_ARGUMENT', `Unexpected argument: ${positionals[0]}`);
  }

  const oracleCommand = nonEmpty(values['oracle-command'], '--oracle-command');
  const oracleUrl = nonEmpty(values['oracle-url'], '--oracle-url');
  if (oracleCommand !== undefined && oracleUrl !== undefined) {
    throw new CliError(
      'CLI_INVALID_ARGUMENT',
      '--oracle-command and --oracle-url cannot be used together',
    );
  }

  const oracleResponseField = nonEmpty(values['oracle-response-field'], '--oracle-response-field');
  const model = nonEmpty(values.model, '--model');
  const diffFile = nonEmpty(values.diff, '--diff');
  const templateDir = nonEmpty(values['template-dir'], '--template-dir');
  const logDir = nonEmpty(values['log-dir'], '--log-dir');
  const { title } = values;
  const prTitle = values['pr-title'];
  const prDescription = values['pr-description'];

  const diffRef = nonEmpty(values['diff-ref'], '--diff-ref') ?? DEFAULT_DIFF_REF;
  const templateGlob =
    nonEmpty(values['template-glob'], '--template-glob') ?? DEFAULT_TEMPLATE_GLOB;

  return {
    ...(oracleCommand === undefined ? {} : { oracleCommand }),
    ...(oracleUrl === undefined ? {} : { oracleUrl }),
    ...(oracleResponseField === undefined ? {} : { oracleResponseField }),
    ...(model === undefined ? {} : { model }),
    ...(title === undefined ? {} : { title }),
    ...(diffFile === undefined ? {} : { diffFile }),
    ...(templateDir === undefined ? {} : { templateDir }),
    ...(prTitle === undefined ? {} : { prTitle }),
    ...(prDescription === undefined ? {} : { prDescription }),
    ...(logDir === undefined ? {} : { logDir }),
    oracleTimeoutMs: parseTimeoutMs(values['oracle-timeout']),
    format: parseFormat(values.format),
    ci: values.ci === true,
    diffRef,
    templateGlob,
    thresholds: {
      drift: parseThreshold(values['drift-threshold'], 'drift'),
      intent: parseThreshold(values['intent-threshold'], 'intent'),
      operations: parseThreshold(values['operations-threshold'], 'operations'),
    },
    noiseFiles: values['noise-file'] ?? [],
    noiseThreshold: parseNoiseThreshold(values['noise-threshold']),
    structuredLogs: values['structured-logs'] === true,
    verbose: values.verbose === true,
    help: values.help === true,
    version: values.version === true,
  };
}

/**
 * Translate `parseArgs` errors into `CliError` instances with user-friendly messages.
 */
function mapParseArgsError(error: unknown): Error {
  if (error instanceof CliError) {
    return error;
  }

  if (error instanceof Error && hasErrorProperty(error, 'code')) {
    const code = error.code;
    const option = /'(--?[\w-]+)/.exec(error.message)?.[1];

    if (code === 'ERR_PARSE_ARGS_UNKNOWN_OPTION') {
      return new CliError('CLI_UNKNOWN_OPTION', `Unknown option: ${option ?? error.message}`, {
        cause: error,
      });
    }

    if (code === 'ERR_PARSE_ARGS_INVALID_OPTION_VALUE' && option !== undefined) {
      return new CliError('CLI_INVALID_ARGUMENT', `${option} requires a value`, { cause: error });
    }
  }

  if (error instanceof Error) {
    return new CliError('CLI_PARSE_ERROR', error.message, { cause: error });
  }
  return new CliError('CLI_PARSE_ERROR', String(error));
}
