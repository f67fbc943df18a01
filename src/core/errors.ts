/** Exit code for usage, validation and environment errors. */
export const EXIT_USAGE = 2;

/** Exit code for unexpected errors and partial failures. */
export const EXIT_FAILURE = 1;

/**
 * Expected error caused by user input or the local environment.
 * Displayed as a clean message with an optional hint. Exit code 2.
 *
 * Throw this from command handlers or `preRun` hooks for any failure
 * the user can fix (bad flags, missing files, missing tools).
 */
export class UserError extends Error {
  readonly exitCode: number = EXIT_USAGE;

  constructor(message: string, public hint?: string) {
    super(message);
    this.name = "UserError";
  }
}

/** A required external program could not be found. */
export class ToolNotFoundError extends UserError {
  constructor(public tool: string, hint?: string) {
    super(`${tool} not found.`, hint);
    this.name = "ToolNotFoundError";
  }
}

/**
 * An external program ran and exited non-zero. Its exit status becomes
 * the exit status of the whole invocation.
 *
 * @param exitCode - status reported by the child process
 * @param stderr - whatever the child wrote to stderr, trimmed
 */
export class DownstreamError extends Error {
  constructor(
    message: string,
    public exitCode: number,
    public stderr = "",
  ) {
    super(message);
    this.name = "DownstreamError";
  }
}

/** Raised by the yargs failure hook once the usage message has been printed. */
export class UsageError extends UserError {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/** Map any thrown value to the process exit code it should produce. */
export function exitCodeFor(err: unknown): number {
  if (err instanceof UserError) return err.exitCode;
  if (err instanceof DownstreamError) return err.exitCode > 0 ? err.exitCode : EXIT_FAILURE;
  return EXIT_FAILURE;
}
