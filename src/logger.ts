/**
 * Unified logging abstraction for kubefilter.
 *
 * Diagnostics (status, warnings, errors, debug traces) always go to stderr so
 * that data written through an Output sink stays pipeable on stdout.
 * Uses picocolors for terminal styling.
 *
 * IMPORTANT: All diagnostic output MUST go through this module.
 * Never use console.log/console.error directly in other modules.
 */

import pc from "picocolors";

/** Log levels in order of verbosity (debug is most verbose). */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

/** Logger configuration. */
interface LoggerConfig {
  level: LogLevel;
}

const config: LoggerConfig = {
  level: LogLevel.INFO,
};

const writeErr = console.error.bind(console);

function canOutput(level: LogLevel): boolean {
  return config.level <= level;
}

/**
 * Enable quiet mode: suppress all diagnostics. Data output is unaffected.
 */
export function enableQuietMode(): void {
  config.level = LogLevel.SILENT;
}

/**
 * Set the minimum log level. Messages below this level are suppressed.
 */
export function setLogLevel(level: LogLevel): void {
  config.level = level;
}

/**
 * Logger object with level-aware methods.
 *
 * Usage:
 *   log.debug("running: kubectl get pods")
 *   log.warn("No rows matched")
 *   log.error("Unknown resource kind 'pdos'")
 */
export const log = {
  /** Debug-level message, dim. Shown with --verbose. */
  debug(message: string): void {
    if (canOutput(LogLevel.DEBUG)) {
      writeErr(pc.dim(message));
    }
  },

  warn(message: string): void {
    if (canOutput(LogLevel.WARN)) {
      writeErr(pc.yellow(message));
    }
  },

  error(message: string): void {
    if (canOutput(LogLevel.ERROR)) {
      writeErr(pc.red(message));
    }
  },

  /** Subtle info-level message. */
  dim(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      writeErr(pc.dim(message));
    }
  },
};

/**
 * Styled string builders (for compositions inside a single message).
 *
 * Usage:
 *   log.warn(`Using container ${style.bold(name)}`)
 */
export const style = {
  bold: (text: string) => pc.bold(text),
};

/**
 * Sink for data lines (rows, dry-run commands, container listings).
 */
export interface Output {
  line(text: string): void;
}

/** Output sink writing to stdout. */
export const stdoutOutput: Output = {
  line(text: string): void {
    process.stdout.write(`${text}\n`);
  },
};
