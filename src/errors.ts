/**
 * Error taxonomy and exit codes.
 *
 * Exit codes follow common Unix conventions:
 * - 0: success
 * - 1: operational/runtime error
 * - 2: policy violation or failed safety check
 * - 3: invalid arguments or configuration
 */

export const ExitCode = {
  SUCCESS: 0,
  OPERATIONAL_ERROR: 1,
  POLICY_DENY: 2,
  INVALID_ARGS: 3
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export class AceError extends Error {
  readonly exitCode: ExitCode;

  constructor(message: string, exitCode: ExitCode = ExitCode.OPERATIONAL_ERROR) {
    super(message);
    this.name = 'AceError';
    this.exitCode = exitCode;
  }
}

/** Runtime failures: unreadable files, unparseable originals, failed writes. */
export class OperationalError extends AceError {
  constructor(message: string) {
    super(message, ExitCode.OPERATIONAL_ERROR);
    this.name = 'OperationalError';
  }
}

/** Dirty git tree, denied plans and other refusals. */
export class PolicyDenyError extends AceError {
  constructor(message: string) {
    super(message, ExitCode.POLICY_DENY);
    this.name = 'PolicyDenyError';
  }
}

export class InvalidArgsError extends AceError {
  constructor(message: string) {
    super(message, ExitCode.INVALID_ARGS);
    this.name = 'InvalidArgsError';
  }
}

/**
 * Raised when bytes on disk do not match what a receipt sealed.
 * Never auto-corrected: the cause is ambiguous.
 */
export class IntegrityError extends AceError {
  readonly file: string;

  constructor(file: string, message: string) {
    super(message, ExitCode.OPERATIONAL_ERROR);
    this.name = 'IntegrityError';
    this.file = file;
  }
}

/** Edits that overlap each other or fall outside the file. */
export class EditConflictError extends AceError {
  constructor(message: string) {
    super(message, ExitCode.OPERATIONAL_ERROR);
    this.name = 'EditConflictError';
  }
}

export function formatError(error: unknown, verbose = false): string {
  if (error instanceof AceError) {
    return `Error: ${error.message}`;
  }
  if (error instanceof Error) {
    if (verbose && error.stack) {
      return `Unexpected error: ${error.message}\n${error.stack}`;
    }
    return `Unexpected error: ${error.message}`;
  }
  return `Unexpected error: ${String(error)}`;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
