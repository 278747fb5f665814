/**
 * Thrown when a batch file cannot be read or does not describe a valid batch.
 */
export class BatchError extends Error {
  /** One line per validation problem. Empty for read and parse failures. */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], cause?: unknown) {
    super(message);
    this.name = "BatchError";
    this.issues = issues;
    this.cause = cause;
  }
}

/**
 * Thrown when a command cannot run with the given configuration.
 */
export class CommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CommandError";
  }
}
