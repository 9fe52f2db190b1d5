/**
 * Risk Gate — CLI Main Execution
 *
 * Role:
 *   Run one gate evaluation from parsed arguments to exit status.
 *
 * Responsibilities:
 *   - Apply environment fallbacks and CI platform detection
 *   - Gather input, diff, templates and PR intent
 *   - Build the configured oracle and run the evaluation
 *   - Write the report to stdout and diagnostics to the logger
 *   - Export telemetry next to the log file when a log directory is given
 *
 * Exit status:
 *   0 safe, 1 unsafe or fatal evaluation error, 2 unusable arguments or input.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { evaluateDeployment, type EvaluationOutcome } from '../../engine/orchestrator.ts';
import { fileNoisePatternSource, type ReadTextFile } from '../../engine/pattern-matcher.ts';
import { generateMarkdownSummary, serializeOutcome } from '../../engine/report.ts';
import type { WarningSink } from '../../engine/warnings.ts';
import {
  CliError,
  formatErrorMessage,
  InputError,
  isAppError,
} from '../../errors/errors.ts';
import { createCommandOracle } from '../../oracle/command-oracle.ts';
import { createHttpOracle } from '../../oracle/http-oracle.ts';
import type {
  ClassificationOracle,
  OracleContext,
  PullRequestIntent,
} from '../../oracle/types.ts';
import { LOG_FILE_NAME } from '../constants/paths.ts';
import { getDiff, type RunGitDiff } from '../context/diff.ts';
import {
  detectPlatform,
  type PlatformContext,
  type PlatformEnv,
  platformDiffRef,
} from '../context/platform.ts';
import { loadTemplates } from '../context/templates.ts';
import { type CLIArgs, DEFAULT_DIFF_REF } from '../input/args.ts';
import { type InputStream, readWhatIfInput } from '../input/stdin.ts';
import { ensureSafeDirectoryPath } from '../input/validation.ts';
import { createLogger, type Logger } from '../observability/logger.ts';
import { TELEMETRY_FILE_NAME, TelemetryCollector } from '../observability/telemetry.ts';
import {
  createTraceContext,
  formatTraceparent,
  parseTraceparent,
  type TraceContext,
} from '../observability/tracing.ts';

export const EXIT_SAFE = 0;
export const EXIT_UNSAFE = 1;
export const EXIT_USAGE = 2;

/**
 * Dependency overrides supplied when invoking `executeWithArgs`.
 *
 * Tests and alternative entrypoints replace streams, the environment,
 * filesystem helpers, git and the oracle factory.
 */
export interface MainDeps {
  readonly stdin?: InputStream;
  readonly stdout?: NodeJS.WritableStream;
  readonly stderr?: NodeJS.WritableStream;
  readonly env?: PlatformEnv;
  readonly cwd?: string;
  readonly readFileFn?: ReadTextFile;
  readonly writeFileFn?: typeof writeFile;
  readonly mkdirFn?: typeof mkdir;
  readonly runGitDiff?: RunGitDiff;
  readonly createOracle?: (selection: OracleSelection) => ClassificationOracle;
  readonly now?: () => Date;
}

export interface MainResult {
  readonly exitCode: number;
  readonly outcome?: EvaluationOutcome;
}

/* -------------------------------------------------------------------------- */
/* Configuration resolution                                                   */
/* -------------------------------------------------------------------------- */

export type OracleSelection =
  | {
      readonly kind: 'command';
      readonly command: string;
      readonly model?: string;
      readonly traceContext: TraceContext;
    }
  | {
      readonly kind: 'http';
      readonly url: string;
      readonly responseField?: string;
      readonly model?: string;
      readonly traceContext: TraceContext;
    };

/**
 * Pick the oracle from flags, then `WHATIF_ORACLE_COMMAND` /
 * `WHATIF_ORACLE_URL`. A command wins over a URL at the same level.
 *
 * @throws {CliError} `ORACLE_NOT_CONFIGURED` when neither is set.
 */
export function selectOracle(
  args: CLIArgs,
  env: PlatformEnv,
  traceContext: TraceContext,
): OracleSelection {
  const model = args.model ?? present(env.WHATIF_MODEL);
  const withModel = model === undefined ? {} : { model };

  const flagged = args.oracleCommand ?? args.oracleUrl;
  const command =
    flagged === undefined ? present(env.WHATIF_ORACLE_COMMAND) : args.oracleCommand;
  const url = flagged === undefined ? present(env.WHATIF_ORACLE_URL) : args.oracleUrl;

  if (command !== undefined) {
    return { kind: 'command', command, traceContext, ...withModel };
  }
  if (url !== undefined) {
    return {
      kind: 'http',
      url,
      traceContext,
      ...withModel,
      ...(args.oracleResponseField === undefined
        ? {}
        : { responseField: args.oracleResponseField }),
    };
  }
  throw new CliError(
    'ORACLE_NOT_CONFIGURED',
    'No classification oracle configured. Pass --oracle-command or --oracle-url, or set WHATIF_ORACLE_COMMAND or WHATIF_ORACLE_URL.',
  );
}

/**
 * Build the adapter for a selection. Both adapters carry the trace context
 * to the backend.
 */
export function createOracle(selection: OracleSelection): ClassificationOracle {
  const traceparent = formatTraceparent(selection.traceContext);
  const model = selection.model === undefined ? {} : { model: selection.model };

  if (selection.kind === 'command') {
    return createCommandOracle({
      command: selection.command,
      shell: true,
      env: { TRACEPARENT: traceparent },
      ...model,
    });
  }
  return createHttpOracle({
    url: selection.url,
    headers: { traceparent },
    ...model,
    ...(selection.responseField === undefined ? {} : { responseField: selection.responseField }),
  });
}

function present(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

function resolveIntent(args: CLIArgs, platform: PlatformContext): PullRequestIntent | undefined {
  const title = args.prTitle ?? platform.prTitle;
  const description = args.prDescription ?? platform.prDescription;
  if (title === undefined && description === undefined) {
    return undefined;
  }
  return {
    ...(title === undefined ? {} : { title }),
    ...(description === undefined ? {} : { description }),
  };
}

/* -------------------------------------------------------------------------- */
/* Execution                                                                  */
/* -------------------------------------------------------------------------- */

function exitCodeFor(error: unknown): number {
  return error instanceof InputError || error instanceof CliError ? EXIT_USAGE : EXIT_UNSAFE;
}

/**
 * Execute one evaluation with provided args and optional dependency overrides.
 */
export async function executeWithArgs(args: CLIArgs, deps: MainDeps = {}): Promise<MainResult> {
  const {
    stdin = process.stdin,
    stdout = process.stdout,
    stderr = process.stderr,
    env = process.env,
    cwd = process.cwd(),
    readFileFn = readFile,
    writeFileFn = writeFile,
    mkdirFn = mkdir,
    now = () => new Date(),
  } = deps;

  const inherited = present(env.TRACEPARENT);
  const parent = inherited === undefined ? undefined : parseTraceparent(inherited);
  const traceContext = createTraceContext(parent);

  let logger: Logger | undefined;
  let telemetry: TelemetryCollector | undefined;
  let logDir: string | undefined;

  try {
    logDir = args.logDir === undefined ? undefined : ensureSafeDirectoryPath(cwd, args.logDir);
    logger = await createLogger({
      scope: 'whatif-gate',
      stream: stderr,
      structured: args.structuredLogs,
      verbose: args.verbose,
      traceContext,
      now,
      ...(logDir === undefined ? {} : { logFile: path.join(logDir, LOG_FILE_NAME) }),
    });
    const log = logger;
    const onWarning: WarningSink = (warning) => {
      log.warn(`${warning.code}: ${warning.message}`, { stage: warning.stage });
    };

    const selection = selectOracle(args, env, traceContext);
    const oracle = (deps.createOracle ?? createOracle)(selection);
    telemetry = new TelemetryCollector(traceContext, oracle.name);

    const platform = await detectPlatform(env, {
      readFile: (file) => readFileFn(file, 'utf8'),
      onWarning,
    });
    const ci = args.ci || platform.platform !== 'local';
    const diffRef =
      args.diffRef === DEFAULT_DIFF_REF ? (platformDiffRef(platform) ?? args.diffRef) : args.diffRef;

    log.info(`Oracle: ${oracle.name}`);
    log.debug(`Platform: ${platform.platform}`, {
      ci,
      diffRef,
      ...(platform.prNumber === undefined ? {} : { pr: platform.prNumber }),
    });

    const input = await readWhatIfInput(stdin, { onWarning });

    const diff =
      args.diffFile !== undefined || ci
        ? await getDiff(
            {
              diffRef,
              cwd,
              ...(args.diffFile === undefined ? {} : { diffFile: path.resolve(cwd, args.diffFile) }),
            },
            {
              readFile: (file) => readFileFn(file, 'utf8'),
              ...(deps.runGitDiff === undefined ? {} : { runGitDiff: deps.runGitDiff }),
            },
            onWarning,
          )
        : undefined;
    const templates =
      args.templateDir === undefined
        ? undefined
        : await loadTemplates(path.resolve(cwd, args.templateDir), {
            glob: args.templateGlob,
            onWarning,
          });
    const intent = resolveIntent(args, platform);

    const context: OracleContext = {
      ...(diff === undefined || diff === '' ? {} : { diff }),
      ...(templates === undefined ? {} : { templates }),
      ...(intent === undefined ? {} : { intent }),
    };

    const outcome = await evaluateDeployment(
      { input, ...(Object.keys(context).length === 0 ? {} : { context }) },
      {
        oracle,
        thresholds: args.thresholds,
        noiseThreshold: args.noiseThreshold,
        timeoutMs: args.oracleTimeoutMs,
        onWarning,
        onOracleCall: telemetry.recordOracleCall,
        ...(args.noiseFiles.length === 0
          ? {}
          : {
              noisePatterns: fileNoisePatternSource(
                args.noiseFiles.map((file) => path.resolve(cwd, file)),
                readFileFn,
              ),
            }),
      },
    );

    stdout.write(
      args.format === 'markdown'
        ? `${generateMarkdownSummary(outcome, args.title === undefined ? {} : { title: args.title })}\n`
        : `${serializeOutcome(outcome)}\n`,
    );

    const { verdict } = outcome;
    log.info(`Verdict: ${verdict.safe ? 'SAFE' : 'UNSAFE'}`, {
      overallRisk: verdict.overallRiskLevel,
      highestBucket: verdict.highestRiskBucket,
      included: outcome.included.records.length,
      excluded: outcome.excluded.records.length,
    });

    return { exitCode: verdict.safe ? EXIT_SAFE : EXIT_UNSAFE, outcome };
  } catch (err) {
    const message = `Fatal: ${formatErrorMessage(err)}`;
    if (logger === undefined) {
      stderr.write(`${message}\n`);
    } else {
      logger.error(message, isAppError(err) ? { code: err.code } : undefined);
    }
    return { exitCode: exitCodeFor(err) };
  } finally {
    // Telemetry export is best-effort
    if (telemetry !== undefined && logDir !== undefined) {
      try {
        await mkdirFn(logDir, { recursive: true });
        await writeFileFn(
          path.join(logDir, TELEMETRY_FILE_NAME),
          JSON.stringify(telemetry.export(now()), null, 2),
          'utf8',
        );
      } catch (error) {
        logger?.warn(`Failed to write ${TELEMETRY_FILE_NAME}: ${formatErrorMessage(error)}`);
      }
    }
    await logger?.close();
  }
}
