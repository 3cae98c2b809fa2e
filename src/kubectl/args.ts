/**
 * Argument vectors for the external tools.
 *
 * Pure functions: nothing here runs a process.
 */

import type { RowTarget } from "../table/layout.js";

/** Cluster scope taken from the command line and applied to every call. */
export interface KubectlScope {
  readonly context?: string;
  readonly namespace?: string;
  readonly allNamespaces: boolean;
  readonly selector?: string;
  readonly wide: boolean;
}

export const DEFAULT_SCOPE: KubectlScope = { allNamespaces: false, wide: false };

function contextArgs(scope: KubectlScope): string[] {
  return scope.context ? ["--context", scope.context] : [];
}

/**
 * Namespace for a per-row command: the row's own, else the one the listing
 * was scoped to.
 */
function targetNamespaceArgs(target: RowTarget, scope: KubectlScope): string[] {
  const namespace = target.namespace || scope.namespace;
  return namespace ? ["-n", namespace] : [];
}

/** `kubectl get KIND` producing the table to filter. */
export function listArgs(kind: string, scope: KubectlScope): string[] {
  const args = [...contextArgs(scope), "get", kind];
  if (scope.allNamespaces) {
    args.push("--all-namespaces");
  } else if (scope.namespace) {
    args.push("-n", scope.namespace);
  }
  if (scope.selector) {
    args.push("-l", scope.selector);
  }
  if (scope.wide) {
    args.push("-o", "wide");
  }
  return args;
}

export function getOneArgs(kind: string, target: RowTarget, scope: KubectlScope, output: string): string[] {
  return [...contextArgs(scope), "get", kind, target.name, ...targetNamespaceArgs(target, scope), "-o", output];
}

export function deleteArgs(kind: string, target: RowTarget, scope: KubectlScope): string[] {
  return [...contextArgs(scope), "delete", kind, target.name, ...targetNamespaceArgs(target, scope)];
}

export function editArgs(kind: string, target: RowTarget, scope: KubectlScope): string[] {
  return [...contextArgs(scope), "edit", kind, target.name, ...targetNamespaceArgs(target, scope)];
}

export function logsArgs(
  kind: string,
  target: RowTarget,
  scope: KubectlScope,
  options: { container?: string; follow: boolean }
): string[] {
  const args = [...contextArgs(scope), "logs", `${kind}/${target.name}`, ...targetNamespaceArgs(target, scope)];
  if (options.follow) {
    args.push("-f");
  }
  if (options.container) {
    args.push("-c", options.container);
  } else {
    args.push("--all-containers=true");
  }
  return args;
}

export function execArgs(
  kind: string,
  target: RowTarget,
  scope: KubectlScope,
  options: { container: string; stdin: boolean; tty: boolean; command: readonly string[] }
): string[] {
  const args = [...contextArgs(scope), "exec"];
  if (options.stdin) {
    args.push("-i");
  }
  if (options.tty) {
    args.push("-t");
  }
  args.push(`${kind}/${target.name}`, ...targetNamespaceArgs(target, scope), "-c", options.container);
  return [...args, "--", ...options.command];
}

/** JSON document of a single resource, read for its container list. */
export function containersArgs(kind: string, target: RowTarget, scope: KubectlScope): string[] {
  return getOneArgs(kind, target, scope, "json");
}

export function apiResourcesArgs(scope: KubectlScope): string[] {
  return [...contextArgs(scope), "api-resources"];
}

export function explainArgs(kind: string, scope: KubectlScope, recursive: boolean): string[] {
  return [...contextArgs(scope), "explain", kind, ...(recursive ? ["--recursive"] : [])];
}

/** `flux reconcile kustomization NAME --with-source` */
export function reconcileArgs(target: RowTarget, scope: KubectlScope): string[] {
  return [
    ...contextArgs(scope),
    "reconcile",
    "kustomization",
    target.name,
    ...targetNamespaceArgs(target, scope),
    "--with-source",
  ];
}

/** `kustomize build PATH` */
export function buildArgs(path: string): string[] {
  return ["build", path];
}
