/**
 * Row actions: what happens to each row that survives filtering.
 *
 * One action is chosen per invocation. Each variant carries only the fields
 * it needs.
 */

import { ConfigError } from "./errors.js";
import { RECONCILABLE_KIND } from "./kubectl/resource-kinds.js";

export type RowAction =
  | { readonly kind: "get" }
  | { readonly kind: "get-extended"; readonly output: string }
  | { readonly kind: "delete" }
  | { readonly kind: "edit" }
  | { readonly kind: "logs"; readonly container?: string; readonly follow: boolean }
  | {
      readonly kind: "shell";
      readonly container?: string;
      readonly command: readonly string[];
      readonly tty: boolean;
      readonly stdin: boolean;
    }
  | { readonly kind: "get-container" }
  | { readonly kind: "reconcile" };

/**
 * Actions whose external failure stops the remaining rows unless --force.
 */
export function isFailFast(action: RowAction): boolean {
  switch (action.kind) {
    case "delete":
    case "edit":
    case "shell":
      return true;
    case "get":
    case "get-extended":
    case "logs":
    case "get-container":
    case "reconcile":
      return false;
  }
}

/**
 * Reject an action that cannot apply to the resolved kind.
 *
 * @throws ConfigError when reconciling anything but kustomizations.
 */
export function assertActionSupported(action: RowAction, kind: string): void {
  if (action.kind === "reconcile" && kind !== RECONCILABLE_KIND) {
    throw new ConfigError(`reconcile only applies to ${RECONCILABLE_KIND}, not '${kind}'`);
  }
}
