/**
 * Command oracle adapter.
 *
 * Runs a local command per classification. The request is written to the
 * command's stdin as JSON and whatever it prints on stdout is the response.
 * The command's environment carries the configured model as `WHATIF_MODEL`.
 */

import { spawn } from 'node:child_process';

import { OracleError, ProcessError } from '../errors/errors.ts';
import {
  type ClassificationOracle,
  DEFAULT_MAX_RESPONSE_BYTES,
  type OracleCallOptions,
  type OracleConfig,
  type OracleRequest,
} from './types.ts';

export interface CommandOracleConfig extends OracleConfig {
  readonly command: string;
  readonly args?: readonly string[];
  /** Run through the platform shell so `command` may hold a full command line. */
  readonly shell?: boolean;
  readonly env?: NodeJS.ProcessEnv;
}

const STDERR_TAIL_BYTES = 2048;

function tail(chunks: readonly Buffer[], limit: number): string {
  const text = Buffer.concat(chunks).toString('utf8').trim();
  return text.length > limit ? `...${text.slice(-limit)}` : text;
}

/**
 * Run the command once for a request.
 *
 * @throws {ProcessError} when the command cannot start, is aborted or exits non-zero.
 * @throws {OracleError} `ORACLE_CALL_FAILED` when stdout exceeds the response limit.
 */
export function runOracleCommand(
  config: CommandOracleConfig,
  request: OracleRequest,
  { signal }: OracleCallOptions,
): Promise<string> {
  const maxBytes = config.maxResponseBytes ?? DEFAULT_MAX_RESPONSE_BYTES;

  const proc = spawn(config.command, [...(config.args ?? [])], {
    stdio: ['pipe', 'pipe', 'pipe'],
    signal,
    shell: config.shell ?? false,
    env: {
      ...process.env,
      ...config.env,
      ...(config.model === undefined ? {} : { WHATIF_MODEL: config.model }),
    },
  });

  return new Promise<string>((resolve, reject) => {
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let received = 0;
    let settled = false;
    let stdinError: Error | undefined;

    const fail = (error: Error): void => {
      if (!settled) {
        settled = true;
        reject(error);
      }
    };

    proc.stdout.on('data', (chunk: Buffer) => {
      received += chunk.length;
      if (received > maxBytes) {
        fail(
          new OracleError(
            'ORACLE_CALL_FAILED',
            `${config.command} response exceeded ${maxBytes} bytes`,
            { details: { maxResponseBytes: maxBytes } },
          ),
        );
        proc.kill('SIGKILL');
        return;
      }
      stdout.push(chunk);
    });
    proc.stderr.on('data', (chunk: Buffer) => {
      stderr.push(chunk);
    });

    // A command may exit before reading its input; the exit code decides
    proc.stdin.on('error', (error) => {
      stdinError = error;
    });

    proc.on('error', (error) => {
      if (signal.aborted) {
        fail(
          new ProcessError('PROCESS_ABORTED', `${config.command} was aborted`, { cause: error }),
        );
        return;
      }
      fail(
        new ProcessError('PROCESS_SPAWN_FAILED', `Process spawn failed: ${error.message}`, {
          cause: error,
          details: { command: config.command },
        }),
      );
    });

    proc.on('close', (code) => {
      if (code === 0) {
        if (!settled) {
          settled = true;
          resolve(Buffer.concat(stdout).toString('utf8'));
        }
        return;
      }
      const reason = tail(stderr, STDERR_TAIL_BYTES) || stdinError?.message || 'no output';
      fail(
        new ProcessError(
          'PROCESS_FAILED',
          `${config.command} exited with code ${code ?? 'null'}: ${reason}`,
          { details: { command: config.command, exitCode: code } },
        ),
      );
    });

    proc.stdin.end(JSON.stringify(request));
  });
}

export function createCommandOracle(config: CommandOracleConfig): ClassificationOracle {
  return {
    name: `command:${config.command}`,
    classify: (request, options) => runOracleCommand(config, request, options),
  };
}
