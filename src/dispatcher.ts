/**
 * Per-row action dispatch.
 *
 * Runs the configured RowAction for each row that survived filtering, one at
 * a time. Interactive children (edit, shell, logs -f) hold the terminal until
 * they exit.
 *
 * Failure policy:
 *   - delete, edit, shell: a non-zero exit stops the run (CommandError)
 *   - other actions: the failure is logged and becomes the final exit code
 *   - --force downgrades any failure to a warning
 */

import { isFailFast, type RowAction } from "./actions.js";
import type { RunConfig } from "./config.js";
import { FIELD_SEPARATOR } from "./constants.js";
import { logExitCode } from "./error-handler.js";
import { CommandError, ConfigError } from "./errors.js";
import { formatCommand, type CommandRunner } from "./exec.js";
import {
  containersArgs,
  deleteArgs,
  editArgs,
  execArgs,
  getOneArgs,
  logsArgs,
  reconcileArgs,
} from "./kubectl/args.js";
import { parseContainerNames } from "./kubectl/containers.js";
import { log, style, type Output } from "./logger.js";
import type { Confirm } from "./prompt-io.js";
import { rowTarget, type Layout, type Row, type RowTarget } from "./table/layout.js";

export interface DispatchDeps {
  readonly runner: CommandRunner;
  readonly output: Output;
  readonly confirm: Confirm;
}

type ShellAction = Extract<RowAction, { kind: "shell" }>;
type LogsAction = Extract<RowAction, { kind: "logs" }>;

export function describeTarget(target: RowTarget): string {
  return target.namespace ? `${target.namespace}/${target.name}` : target.name;
}

/**
 * Format a row for output: tab-joined, or re-encoded at the layout's widths.
 */
export function formatRow(layout: Layout, row: Row, preserveColumns: boolean): string {
  return preserveColumns ? layout.encode(row) : row.join(FIELD_SEPARATOR);
}

function firstLine(text: string): string {
  return text.trim().split("\n")[0] ?? "";
}

export class RowDispatcher {
  private lastFailure = 0;

  constructor(
    private readonly config: RunConfig,
    /** Canonical plural kind of the listing. */
    private readonly kind: string,
    private readonly deps: DispatchDeps
  ) {}

  /** Exit code of the last failed, non-fatal invocation (0 if none). */
  get exitCode(): number {
    return this.lastFailure;
  }

  async dispatch(row: Row, layout: Layout): Promise<void> {
    const { action, scope, tools } = this.config;
    const target = rowTarget(layout, row);

    switch (action.kind) {
      case "get":
        this.deps.output.line(formatRow(layout, row, this.config.preserveColumns));
        return;
      case "get-extended":
        return this.invoke(tools.kubectl, getOneArgs(this.kind, target, scope, action.output));
      case "delete":
        return this.remove(target);
      case "edit":
        return this.invoke(tools.kubectl, editArgs(this.kind, target, scope));
      case "logs":
        return this.logs(target, action);
      case "shell":
        return this.shell(target, action);
      case "get-container":
        return this.listContainers(target);
      case "reconcile":
        return this.invoke(tools.flux, reconcileArgs(target, scope));
      default: {
        const unhandled: never = action;
        throw new Error(`Unhandled row action: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  /** Run attached to the terminal, or print the command under --dry-run. */
  private async invoke(cmd: string, args: readonly string[]): Promise<void> {
    const command = formatCommand(cmd, args);
    if (this.config.dryRun) {
      this.deps.output.line(command);
      return;
    }
    this.settle(await this.deps.runner.inherit(cmd, args), command);
  }

  /** Apply the failure policy to a finished invocation. */
  private settle(exitCode: number, command: string): void {
    if (exitCode === 0) {
      return;
    }
    if (this.config.force) {
      log.warn(`Exit code ${exitCode}, continuing (--force): ${command}`);
      return;
    }
    if (isFailFast(this.config.action)) {
      throw new CommandError(`Exit code ${exitCode}, stopping: ${command}`, exitCode, command);
    }
    logExitCode(exitCode, command);
    this.lastFailure = exitCode;
  }

  private async remove(target: RowTarget): Promise<void> {
    const { tools, scope } = this.config;
    if (!this.config.dryRun && !this.config.force) {
      const confirmed = await this.deps.confirm(`Delete ${this.kind} ${describeTarget(target)}?`);
      if (!confirmed) {
        log.dim(`Skipped ${describeTarget(target)}`);
        return;
      }
    }
    await this.invoke(tools.kubectl, deleteArgs(this.kind, target, scope));
  }

  private async logs(target: RowTarget, action: LogsAction): Promise<void> {
    const args = logsArgs(this.kind, target, this.config.scope, {
      container: action.container,
      follow: action.follow,
    });
    await this.invoke(this.config.tools.kubectl, args);
  }

  /**
   * Fetch the resource's container names. Returns null (after applying the
   * failure policy) when the lookup fails or the kind has no containers.
   */
  private async fetchContainers(target: RowTarget): Promise<string[] | null> {
    const { tools, scope } = this.config;
    const args = containersArgs(this.kind, target, scope);
    const command = formatCommand(tools.kubectl, args);
    const result = await this.deps.runner.capture(tools.kubectl, args);
    if (result.exitCode !== 0) {
      const detail = firstLine(result.stderr);
      if (detail) {
        log.dim(detail);
      }
      this.settle(result.exitCode, command);
      return null;
    }

    try {
      return parseContainerNames(result.stdout);
    } catch (error) {
      if (!(error instanceof ConfigError)) {
        throw error;
      }
      log.error(`${describeTarget(target)}: ${error.message}`);
      this.settle(1, command);
      return null;
    }
  }

  private async shell(target: RowTarget, action: ShellAction): Promise<void> {
    let container = action.container;

    if (!container) {
      const names = await this.fetchContainers(target);
      if (names === null) {
        return;
      }
      const [first] = names;
      if (first === undefined) {
        log.error(`No containers found in ${describeTarget(target)}`);
        this.settle(1, `${this.kind} ${describeTarget(target)}`);
        return;
      }
      log.warn(
        `No container given; using ${style.bold(first)} (first of: ${names.join(", ")}) in ${describeTarget(target)}`
      );
      container = first;
    }

    const args = execArgs(this.kind, target, this.config.scope, {
      container,
      stdin: action.stdin,
      tty: action.tty,
      command: action.command,
    });
    await this.invoke(this.config.tools.kubectl, args);
  }

  private async listContainers(target: RowTarget): Promise<void> {
    if (this.config.dryRun) {
      this.deps.output.line(formatCommand(this.config.tools.kubectl, containersArgs(this.kind, target, this.config.scope)));
      return;
    }
    const names = await this.fetchContainers(target);
    if (names === null) {
      return;
    }
    const prefix = target.namespace ? [target.namespace, target.name] : [target.name];
    for (const name of names) {
      this.deps.output.line([...prefix, name].join(FIELD_SEPARATOR));
    }
  }
}
