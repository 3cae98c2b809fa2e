/**
 * Unified exception hierarchy for kubefilter.
 *
 * All custom exceptions inherit from KubefilterError for consistent error handling.
 * The CLI catches these and converts them to exit codes.
 *
 * Dependency direction:
 *   This module has NO internal dependencies (leaf module).
 *   It may be imported by: all other kubefilter modules.
 */

/** Exit code for usage and configuration errors. */
export const EXIT_USAGE = 2;

/** Exit code when an external tool is not in PATH (shell convention). */
export const EXIT_NOT_FOUND = 127;

/**
 * Base exception for all kubefilter errors.
 */
export class KubefilterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "KubefilterError";
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Configuration-related errors.
 *
 * Examples:
 *   - Unknown resource kind
 *   - Action not supported for the resource kind
 *   - Unreadable configuration file
 */
export class ConfigError extends KubefilterError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Raised when a header line yields no columns. */
export class LayoutError extends ConfigError {
  constructor(message: string) {
    super(message);
    this.name = "LayoutError";
  }
}

/**
 * Input validation errors.
 *
 * Examples:
 *   - Malformed filter expression
 *   - Regex that does not compile
 *   - Filter column beyond the listing's column count
 */
export class ValidationError extends KubefilterError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * An external command exited non-zero and the run must stop.
 *
 * Carries the exit code so the CLI can propagate it verbatim.
 */
export class CommandError extends KubefilterError {
  readonly exitCode: number;
  readonly command: string;

  constructor(message: string, exitCode: number, command: string) {
    super(message);
    this.name = "CommandError";
    this.exitCode = exitCode;
    this.command = command;
  }
}

/** Raised when an external tool is not installed or not in PATH. */
export class CommandNotFoundError extends CommandError {
  constructor(tool: string) {
    super(`${tool} not found in PATH`, EXIT_NOT_FOUND, tool);
    this.name = "CommandNotFoundError";
  }
}

/**
 * Extract a user-facing message from an unknown error.
 *
 * Truncates output to maxLength to avoid overwhelming log output.
 */
export function extractErrorDetails(error: unknown, maxLength = 1000): string {
  if (!(error instanceof Error)) {
    return String(error).slice(0, maxLength);
  }
  return error.message.slice(0, maxLength);
}

/**
 * Map an error to the process exit code it should produce.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof CommandError) {
    return error.exitCode;
  }
  if (error instanceof ConfigError || error instanceof ValidationError) {
    return EXIT_USAGE;
  }
  return 1;
}
