/**
 * Failure taxonomy for a refresh run
 */

export type FailureCategory =
  | 'configuration'
  | 'trigger'
  | 'provisioning'
  | 'install'
  | 'generator'
  | 'push';

/**
 * Error raised by any stage of a run.
 * exitCode is what the whole run exits with when this error ends it.
 */
export class RunnerError extends Error {
  readonly category: FailureCategory;
  readonly exitCode: number;

  constructor(
    category: FailureCategory,
    message: string,
    options: { exitCode?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'RunnerError';
    this.category = category;
    this.exitCode = normalizeExitCode(options.exitCode);
  }
}

/**
 * Raised by runChecked when a child process exits non-zero
 */
export class CommandFailedError extends Error {
  readonly command: string;
  readonly exitCode: number;
  readonly stderr: string;

  constructor(command: string, exitCode: number, stderr: string) {
    const detail = stderr.trim();
    super(
      `${command} exited with code ${exitCode}${detail ? `: ${detail}` : ''}`
    );
    this.name = 'CommandFailedError';
    this.command = command;
    this.exitCode = normalizeExitCode(exitCode);
    this.stderr = stderr;
  }
}

/**
 * A failure must never report success
 */
export function normalizeExitCode(code: number | undefined): number {
  if (code === undefined || !Number.isInteger(code) || code === 0) {
    return 1;
  }
  return code;
}

/**
 * Exit code a run should end with for an arbitrary thrown value.
 * Follows the cause chain down to the failed command, if any.
 */
export function exitCodeOf(error: unknown): number {
  let current = error;
  while (current instanceof Error) {
    if (current instanceof RunnerError || current instanceof CommandFailedError) {
      return current.exitCode;
    }
    current = current.cause;
  }
  return 1;
}

/**
 * Wrap an unknown failure into a RunnerError of the given category,
 * keeping the child exit code when there is one
 */
export function toRunnerError(
  category: FailureCategory,
  message: string,
  error: unknown
): RunnerError {
  if (error instanceof RunnerError) {
    return error;
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new RunnerError(category, `${message}: ${reason}`, {
    exitCode: exitCodeOf(error),
    cause: error
  });
}
