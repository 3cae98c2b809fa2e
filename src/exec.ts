/**
 * External command execution for kubefilter.
 *
 * Every tool invocation (kubectl, flux, kustomize) flows through a
 * CommandRunner, which takes an argument vector and never a shell string.
 * execaRunner is the real implementation; tests supply an in-process fake.
 */

import { execa, ExecaError } from "execa";

import { CommandNotFoundError } from "./errors.js";
import { log } from "./logger.js";

export interface ExecResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export type LineHandler = (line: string) => Promise<void> | void;

export interface CommandRunner {
  /** Run to completion and capture stdout/stderr. */
  capture(cmd: string, args: readonly string[]): Promise<ExecResult>;
  /** Run attached to the terminal (stdio inherited). Returns the exit code. */
  inherit(cmd: string, args: readonly string[]): Promise<number>;
  /**
   * Stream stdout line by line. Each handler call completes before the next
   * line is read. If a handler throws, the command is stopped and the error
   * is rethrown. Returns the exit code.
   */
  streamLines(cmd: string, args: readonly string[], onLine: LineHandler): Promise<number>;
}

/** Conventional signal numbers, for 128+N exit codes. */
const SIGNAL_NUMBERS: Record<string, number> = {
  SIGHUP: 1,
  SIGINT: 2,
  SIGQUIT: 3,
  SIGKILL: 9,
  SIGPIPE: 13,
  SIGTERM: 15,
};

/** Characters that never need quoting when shown as a shell command. */
const SAFE_ARG = /^[\w@%+=:,./-]+$/;

/**
 * Quote one argument for display as a POSIX shell word.
 */
export function quoteArg(arg: string): string {
  if (SAFE_ARG.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Render a command for display (dry run, verbose and error messages).
 */
export function formatCommand(cmd: string, args: readonly string[]): string {
  return [cmd, ...args].map(quoteArg).join(" ");
}

function isNotFound(error: unknown): boolean {
  return error instanceof ExecaError && error.code === "ENOENT";
}

function exitCodeOf(result: { exitCode?: number; signal?: string }): number {
  if (result.exitCode !== undefined) {
    return result.exitCode;
  }
  const signal = result.signal === undefined ? undefined : SIGNAL_NUMBERS[result.signal];
  return signal === undefined ? 1 : 128 + signal;
}

/**
 * CommandRunner backed by execa.
 */
export const execaRunner: CommandRunner = {
  async capture(cmd, args) {
    log.debug(`$ ${formatCommand(cmd, args)}`);
    const result = await execa(cmd, args, { reject: false, stdin: "ignore" });
    if (isNotFound(result)) {
      throw new CommandNotFoundError(cmd);
    }
    return {
      exitCode: exitCodeOf(result),
      stdout: result.stdout,
      stderr: result.stderr,
    };
  },

  async inherit(cmd, args) {
    log.debug(`$ ${formatCommand(cmd, args)}`);
    const result = await execa(cmd, args, { reject: false, stdio: "inherit" });
    if (isNotFound(result)) {
      throw new CommandNotFoundError(cmd);
    }
    return exitCodeOf(result);
  },

  async streamLines(cmd, args, onLine) {
    log.debug(`$ ${formatCommand(cmd, args)}`);
    const subprocess = execa(cmd, args, { reject: false, stdin: "ignore", stderr: "inherit" });

    try {
      for await (const line of subprocess) {
        await onLine(line);
      }
    } catch (error) {
      subprocess.kill();
      const stopped = await subprocess;
      if (isNotFound(error) || isNotFound(stopped)) {
        throw new CommandNotFoundError(cmd);
      }
      throw error;
    }

    const result = await subprocess;
    if (isNotFound(result)) {
      throw new CommandNotFoundError(cmd);
    }
    return exitCodeOf(result);
  },
};
