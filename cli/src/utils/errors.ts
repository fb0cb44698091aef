export const ExitCode = {
  Ok: 0,
  Violations: 1,
  Remediated: 2,
  OperationalError: 3,
  InstallFailed: 4,
} as const;

export type ExitStatus = (typeof ExitCode)[keyof typeof ExitCode];

export class PushGateError extends Error {
  readonly exitCode: ExitStatus;
  constructor(message: string, exitCode: ExitStatus) {
    super(message);
    this.name = 'PushGateError';
    this.exitCode = exitCode;
  }
}

/**
 * A problem running a check (missing directory, unreadable file, failed
 * lookup), as opposed to the check finding violations.
 */
export class OperationalError extends PushGateError {
  constructor(message: string) {
    super(message, ExitCode.OperationalError);
    this.name = 'OperationalError';
  }
}

export class ConfigError extends OperationalError {
  readonly file: string;
  constructor(file: string, message: string) {
    super(`${file}: ${message}`);
    this.name = 'ConfigError';
    this.file = file;
  }
}

export class TransactionError extends PushGateError {
  readonly transaction: string;
  readonly cause: unknown;
  constructor(transaction: string, cause: unknown) {
    super(`Transaction "${transaction}" failed and was rolled back: ${describeError(cause)}`, ExitCode.InstallFailed);
    this.name = 'TransactionError';
    this.transaction = transaction;
    this.cause = cause;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function exitCodeFor(error: unknown): ExitStatus {
  return error instanceof PushGateError ? error.exitCode : ExitCode.OperationalError;
}
