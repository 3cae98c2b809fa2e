/**
 * Unified error handling utilities for kubefilter.
 *
 * Explains external exit codes and turns fatal errors into a logged message
 * plus the exit code the process should end with.
 */

import { CommandError, CommandNotFoundError, exitCodeFor, extractErrorDetails, KubefilterError } from "./errors.js";
import { log } from "./logger.js";

/** Known exit codes with their meanings. */
export interface ExitCodeInfo {
  code: number;
  description: string;
  suggestion?: string;
  severity: "info" | "warn" | "error";
}

const EXIT_CODES: Record<number, ExitCodeInfo> = {
  1: {
    code: 1,
    description: "Command failed",
    severity: "error",
  },
  126: {
    code: 126,
    description: "Command not executable",
    suggestion: "Check the container's shell exists and is executable",
    severity: "error",
  },
  127: {
    code: 127,
    description: "Command not found",
    suggestion: "Install the tool or set its path in kf.yaml",
    severity: "error",
  },
  130: {
    code: 130,
    description: "Interrupted by Ctrl+C",
    severity: "info",
  },
  137: {
    code: 137,
    description: "Killed (OOM or SIGKILL)",
    severity: "warn",
  },
  143: {
    code: 143,
    description: "Terminated by signal",
    severity: "info",
  },
};

export function getExitCodeInfo(code: number): ExitCodeInfo {
  return (
    EXIT_CODES[code] ?? {
      code,
      description: `Exited with code ${code}`,
      severity: "error" as const,
    }
  );
}

/**
 * Exit codes caused by the user interrupting a child (not an error).
 */
export function isUserTermination(code: number): boolean {
  return code === 130 || code === 143;
}

/**
 * Log an exit code with appropriate styling and suggestions.
 */
export function logExitCode(code: number, context?: string): void {
  if (code === 0) {
    return;
  }

  const info = getExitCodeInfo(code);
  const contextStr = context ? ` (${context})` : "";

  if (isUserTermination(code)) {
    log.dim(`${info.description}${contextStr}`);
    return;
  }

  switch (info.severity) {
    case "error":
      log.error(`${info.description}${contextStr}`);
      break;
    case "warn":
      log.warn(`${info.description}${contextStr}`);
      break;
    default:
      log.dim(`${info.description}${contextStr}`);
  }

  if (info.suggestion) {
    log.dim(info.suggestion);
  }
}

/**
 * Report a fatal error and return the process exit code for it.
 *
 * kubefilter errors print their message only; anything else is unexpected
 * and also gets its stack trace at debug level.
 */
export function handleFatalError(error: unknown): number {
  if (error instanceof CommandNotFoundError) {
    logExitCode(error.exitCode, error.command);
  } else if (error instanceof CommandError) {
    log.error(error.message);
  } else if (error instanceof KubefilterError) {
    log.error(`Error: ${error.message}`);
  } else {
    log.error(`Unexpected error: ${extractErrorDetails(error)}`);
    if (error instanceof Error && error.stack) {
      log.debug(error.stack);
    }
  }
  return exitCodeFor(error);
}
