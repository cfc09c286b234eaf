/**
 * Error types for launchdex
 *
 * Invariants:
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - All errors support a `cause` property for wrapping underlying errors
 */

/**
 * Base class for all launchdex errors
 */
export abstract class LaunchdexError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a link base handle is used after its last release
 */
export class LinkBaseReleasedError extends LaunchdexError {
  readonly code = "E_RELEASED";

  constructor(operation: string, options?: ErrorOptions) {
    super(`Link base used after release: ${operation}`, options);
  }
}

/**
 * Thrown when a link is referenced after its last owner let go of it, or
 * unreferenced more times than it was referenced
 */
export class LinkDisposedError extends LaunchdexError {
  readonly code = "E_DISPOSED";

  constructor(
    public readonly sourcePath: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(`${message}: ${sourcePath}`, options);
  }
}

/**
 * Thrown when an event arrives for a base path that was never registered.
 * Registration always precedes watch installation, so this is a bug.
 */
export class PathNotRegisteredError extends LaunchdexError {
  readonly code = "E_UNREGISTERED";

  constructor(
    public readonly basePath: string,
    options?: ErrorOptions
  ) {
    super(`No priority registered for watched path: ${basePath}`, options);
  }
}

/**
 * Thrown when a desktop entry file is malformed
 */
export class DesktopEntryParseError extends LaunchdexError {
  readonly code = "E_PARSE";

  constructor(
    public readonly filePath: string,
    public readonly reason: string,
    public readonly line?: number,
    options?: ErrorOptions
  ) {
    super(
      line === undefined
        ? `Invalid desktop entry ${filePath}: ${reason}`
        : `Invalid desktop entry ${filePath}:${line}: ${reason}`,
      options
    );
  }
}

/**
 * Thrown when configuration input fails validation
 */
export class ConfigError extends LaunchdexError {
  readonly code = "E_CONFIG";

  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
    options?: ErrorOptions
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, options);
  }
}
