/**
 * Shared error hierarchy for consistent error handling.
 */

export type ErrorCode =
  | 'CLI_INVALID_ARGUMENT'
  | 'CLI_UNKNOWN_OPTION'
  | 'CLI_PARSE_ERROR'
  | 'CLI_INVALID_PATH'
  | 'INPUT_TTY'
  | 'INPUT_EMPTY'
  | 'INPUT_UNREADABLE'
  | 'NOISE_PATTERNS_UNREADABLE'
  | 'ORACLE_NOT_CONFIGURED'
  | 'ORACLE_CALL_FAILED'
  | 'ORACLE_TIMEOUT'
  | 'ORACLE_RESPONSE_UNPARSABLE'
  | 'ORACLE_INVALID_RESPONSE'
  | 'PROCESS_ABORTED'
  | 'PROCESS_SPAWN_FAILED'
  | 'PROCESS_FAILED'
  | 'UNEXPECTED_ERROR';

export interface ErrorDetails {
  readonly [key: string]: unknown;
}

/**
 * Base class for every error raised deliberately by this project.
 */
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly details?: ErrorDetails;
  public override cause?: unknown;

  constructor(
    code: ErrorCode,
    message: string,
    options?: { cause?: unknown; details?: ErrorDetails },
  ) {
    super(message);
    this.code = code;
    if (options?.details !== undefined) {
      this.details = options.details;
    }
    if (options?.cause instanceof Error) {
      this.cause = options.cause;
      // Keep the cause's stack when ours is empty
      const currentStack = this.stack;
      const causeStack = options.cause.stack;
      if (
        (currentStack === undefined || currentStack === '') &&
        causeStack !== undefined &&
        causeStack !== ''
      ) {
        this.stack = String(causeStack);
      }
    } else if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
    this.name = this.constructor.name;
  }
}

export class CliError extends AppError {}
/** Raised for unusable input data (exit status 2). */
export class InputError extends AppError {}
export class NoisePatternError extends AppError {}
export class OracleError extends AppError {}
export class ProcessError extends AppError {}

/**
 * Format an arbitrary error into a concise string for logging or display.
 */
export function formatErrorMessage(error: unknown): string {
  if (error instanceof AppError) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function isOracleError(error: unknown): error is OracleError {
  return error instanceof OracleError;
}

/**
 * Check whether an unknown value has the given property name.
 * Useful before accessing properties on caught errors.
 */
export function hasErrorProperty<T extends string>(
  error: unknown,
  prop: T,
): error is Record<T, unknown> {
  return typeof error === 'object' && error !== null && Reflect.has(error, prop);
}
