/**
 * Explain command: `kubectl explain KIND`, without kind resolution.
 */

import type { DispatchDeps } from "../dispatcher.js";
import { formatCommand } from "../exec.js";
import { explainArgs, type KubectlScope } from "../kubectl/args.js";

export interface ExplainOptions {
  readonly kubectl: string;
  readonly scope: KubectlScope;
  readonly recursive: boolean;
  readonly dryRun: boolean;
}

export async function explain(
  kind: string,
  options: ExplainOptions,
  deps: Pick<DispatchDeps, "runner" | "output">
): Promise<number> {
  const args = explainArgs(kind, options.scope, options.recursive);
  if (options.dryRun) {
    deps.output.line(formatCommand(options.kubectl, args));
    return 0;
  }
  return deps.runner.inherit(options.kubectl, args);
}
