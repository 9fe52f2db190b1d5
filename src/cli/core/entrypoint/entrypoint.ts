/**
 * Risk Gate — CLI Entrypoint
 *
 * Role:
 *   Handle process-level concerns around one gate run.
 *
 * Responsibilities:
 *   - Ignore EPIPE on stdout/stderr
 *   - Map SIGINT/SIGTERM to exit status 130/143
 *   - Turn argument errors into exit status 2 and anything unexpected into 1
 *   - Run when executed directly
 */

import { pathToFileURL } from 'node:url';

import { AppError, CliError, formatErrorMessage } from '../../../errors/errors.ts';
import {
  EXIT_USAGE,
  executeWithArgs,
  type MainDeps,
  type MainResult,
} from '../../execution/execution.ts';
import { type CLIArgs, parseCliArgs } from '../../input/args.ts';
import { showHelp, showVersion } from '../help/help.ts';

type ShutdownSignal = 'SIGINT' | 'SIGTERM';

// 128 + signal number
const SIGNAL_EXIT_CODES: Readonly<Record<ShutdownSignal, number>> = {
  SIGINT: 130,
  SIGTERM: 143,
};

export interface EntrypointDeps {
  readonly mainFn?: () => Promise<{ exitCode: number }>;
  readonly stderr?: NodeJS.WritableStream;
  /** Graceful shutdown hook invoked once on SIGINT/SIGTERM. */
  readonly onSignal?: (signal: ShutdownSignal) => Promise<void> | void;
  /** Terminates the process after a signal; `process.exit` by default. */
  readonly exit?: (code: number) => void;
}

/**
 * Swallow EPIPE (the reader went away); rethrow anything else.
 */
function handleBrokenPipe(err: NodeJS.ErrnoException): void {
  if (err.code === 'EPIPE') {
    return;
  }
  throw err;
}

function setupBrokenPipeHandlers(): void {
  process.stdout.on('error', handleBrokenPipe);
  process.stderr.on('error', handleBrokenPipe);
}

/**
 * Register SIGINT/SIGTERM handlers.
 *
 * @returns a cleanup function and a probe telling whether a signal arrived.
 */
function setupSignalHandlers(
  deps: EntrypointDeps,
  stderr: NodeJS.WritableStream,
): { readonly remove: () => void; readonly signalled: () => boolean } {
  let handling = false;
  const exit = deps.exit ?? ((code: number) => process.exit(code));

  const warn = (error: unknown): void => {
    stderr.write(`WARN: signal handler failed: ${formatErrorMessage(error)}\n`);
  };

  const createHandler = (signal: ShutdownSignal) => (): void => {
    if (handling) {
      return;
    }
    handling = true;

    const code = SIGNAL_EXIT_CODES[signal];
    process.exitCode = code;

    let pending: Promise<void> = Promise.resolve();
    try {
      pending = Promise.resolve(deps.onSignal?.(signal)).catch(warn);
    } catch (error) {
      warn(error);
    }
    void pending.finally(() => exit(code));
  };

  const sigintHandler = createHandler('SIGINT');
  const sigtermHandler = createHandler('SIGTERM');
  process.on('SIGINT', sigintHandler);
  process.on('SIGTERM', sigtermHandler);

  return {
    remove: () => {
      process.off('SIGINT', sigintHandler);
      process.off('SIGTERM', sigtermHandler);
    },
    signalled: () => handling,
  };
}

/**
 * Execute the CLI: broken pipes, signal handling and top-level error
 * reporting around `mainFn`.
 */
export function runEntrypoint(deps: EntrypointDeps = {}): void {
  const { mainFn = () => main(process.argv.slice(2)), stderr = process.stderr } = deps;

  setupBrokenPipeHandlers();
  const signals = setupSignalHandlers(deps, stderr);

  void mainFn()
    .then((result) => {
      if (!signals.signalled()) {
        process.exitCode = result.exitCode;
      }
    })
    .catch((error: unknown) => {
      const wrapped = new AppError('UNEXPECTED_ERROR', formatErrorMessage(error), {
        cause: error,
        details: { argv: sanitizeArgs(process.argv.slice(2)) },
      });
      stderr.write(`Fatal: ${formatErrorMessage(wrapped)}\n`);
      process.exitCode = 1;
    })
    .finally(() => {
      signals.remove();
    });
}

/**
 * Scrub argv for error details: option values and positionals are redacted.
 */
export function sanitizeArgs(argv: readonly string[]): string[] {
  return argv.map((arg) => {
    if (arg.startsWith('--')) {
      const [key = arg, value] = arg.split('=', 2);
      return value === undefined ? key : `${key}=<redacted>`;
    }
    if (arg.startsWith('-')) {
      return arg;
    }
    return '<redacted>';
  });
}

/**
 * Parse argv, answer `--help`/`--version`, otherwise run one evaluation.
 */
export async function main(argv: readonly string[], deps: MainDeps = {}): Promise<MainResult> {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;

  let args: CLIArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliError) {
      stderr.write(`Error: ${error.message}\nRun whatif-gate --help for usage.\n`);
      return { exitCode: EXIT_USAGE };
    }
    throw error;
  }

  if (args.help) {
    stdout.write(`${showHelp()}\n`);
    return { exitCode: 0 };
  }
  if (args.version) {
    stdout.write(`${showVersion()}\n`);
    return { exitCode: 0 };
  }

  return executeWithArgs(args, deps);
}

/* -------------------------------------------------------------------------- */
/* Module self-execution detection                                            */
/* -------------------------------------------------------------------------- */

const entryUrl = process.argv[1] === undefined ? null : pathToFileURL(process.argv[1]).href;

if (entryUrl !== null && import.meta.url === entryUrl) {
  runEntrypoint();
}
