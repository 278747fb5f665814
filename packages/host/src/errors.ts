/**
 * Thrown when the extension-point table is misused: a name registered twice,
 * or a lookup for a point that was never registered.
 */
export class ExtensionPointError extends Error {
  public readonly point: string;

  constructor(point: string, message: string) {
    super(message);
    this.name = "ExtensionPointError";
    this.point = point;
  }
}

/**
 * Thrown when a host configuration cannot be read or does not validate.
 */
export class ConfigError extends Error {
  /** One line per validation problem, e.g. `cycles: Invalid enum value`. */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], cause?: unknown) {
    super(message);
    this.name = "ConfigError";
    this.issues = issues;
    this.cause = cause;
  }
}
