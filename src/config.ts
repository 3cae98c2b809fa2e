/**
 * Run configuration for kubefilter.
 *
 * Built once from parsed arguments and the config file, frozen, and passed
 * explicitly to the pipeline. No module holds option state of its own.
 *
 * Dependency direction:
 *   This module has minimal dependencies (near-leaf module).
 *   It should NOT import from: cli, commands
 */

import type { RowAction } from "./actions.js";
import type { KfFileConfig } from "./config-file.js";
import { DEFAULT_SHELL_COMMAND } from "./constants.js";
import type { KubectlScope } from "./kubectl/args.js";
import type { MatchSpec } from "./table/match.js";

/** Binaries for the external tools. */
export interface ToolPaths {
  readonly kubectl: string;
  readonly flux: string;
  readonly kustomize: string;
}

export const DEFAULT_TOOLS: ToolPaths = { kubectl: "kubectl", flux: "flux", kustomize: "kustomize" };

export interface RunConfig {
  /** Resource kind as typed by the user (alias, singular or plural). */
  readonly resource: string;
  readonly action: RowAction;
  readonly filters: MatchSpec;
  readonly scope: KubectlScope;
  readonly tools: ToolPaths;
  /** Print commands instead of running side-effecting ones. */
  readonly dryRun: boolean;
  /** Skip confirmations; downgrade per-row failures to warnings. */
  readonly force: boolean;
  /** Re-encode rows at their column widths instead of tab-joining. */
  readonly preserveColumns: boolean;
  /** Print the header row before data rows (get only). */
  readonly headers: boolean;
}

export type RunConfigInit = Pick<RunConfig, "resource" | "action" | "filters"> &
  Partial<Omit<RunConfig, "resource" | "action" | "filters" | "scope" | "tools">> & {
    scope?: Partial<KubectlScope>;
    tools?: Partial<ToolPaths>;
  };

/**
 * Create a frozen run configuration, filling unset fields with defaults.
 */
export function createConfig(init: RunConfigInit): RunConfig {
  return Object.freeze({
    resource: init.resource,
    action: init.action,
    filters: init.filters,
    scope: Object.freeze({ allNamespaces: false, wide: false, ...init.scope }),
    tools: Object.freeze({ ...DEFAULT_TOOLS, ...init.tools }),
    dryRun: init.dryRun ?? false,
    force: init.force ?? false,
    preserveColumns: init.preserveColumns ?? false,
    headers: init.headers ?? false,
  });
}

/**
 * Tool paths from the config file over the defaults.
 */
export function toolsFromFile(file: KfFileConfig): ToolPaths {
  return {
    kubectl: file.kubectl ?? DEFAULT_TOOLS.kubectl,
    flux: file.flux ?? DEFAULT_TOOLS.flux,
    kustomize: file.kustomize ?? DEFAULT_TOOLS.kustomize,
  };
}

/**
 * Shell command for `kf shell`: explicit arguments, else the config file's
 * `shell` entry split on whitespace, else the default.
 */
export function shellCommand(args: readonly string[], file: KfFileConfig): string[] {
  if (args.length > 0) {
    return [...args];
  }
  const fromFile = file.shell?.split(/\s+/).filter(Boolean) ?? [];
  return fromFile.length > 0 ? fromFile : [...DEFAULT_SHELL_COMMAND];
}
