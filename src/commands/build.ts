/**
 * Build command: render a kustomization with `kustomize build PATH`.
 */

import type { DispatchDeps } from "../dispatcher.js";
import { formatCommand } from "../exec.js";
import { buildArgs } from "../kubectl/args.js";

export async function build(
  path: string,
  options: { readonly kustomize: string; readonly dryRun: boolean },
  deps: Pick<DispatchDeps, "runner" | "output">
): Promise<number> {
  const args = buildArgs(path);
  if (options.dryRun) {
    deps.output.line(formatCommand(options.kustomize, args));
    return 0;
  }
  return deps.runner.inherit(options.kustomize, args);
}
