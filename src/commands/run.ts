/**
 * Run operations for kubefilter.
 *
 * The main workflow: resolve the kind, stream `kubectl get`, and hand every
 * line to the row pipeline.
 */

import type { RunConfig } from "../config.js";
import type { DispatchDeps } from "../dispatcher.js";
import { logExitCode } from "../error-handler.js";
import { formatCommand } from "../exec.js";
import { listArgs } from "../kubectl/args.js";
import { log } from "../logger.js";
import { RowProcessor } from "../pipeline.js";
import { describeMatchSpec } from "../table/match.js";
import { resolveResourceKind } from "./run-phases.js";

/**
 * Filter a resource listing and apply the configured action to each match.
 *
 * @returns Exit code: 0, or the last non-fatal external failure.
 * @throws ConfigError / ValidationError before any row is processed.
 * @throws CommandError when a fail-fast action fails (unless --force).
 */
export async function run(config: RunConfig, deps: DispatchDeps): Promise<number> {
  const kind = await resolveResourceKind(config, deps.runner);

  if (config.filters.size > 0) {
    log.debug(`Filters: ${describeMatchSpec(config.filters)}`);
  }

  const processor = new RowProcessor(config, kind, deps);
  const args = listArgs(kind, config.scope);
  const exitCode = await deps.runner.streamLines(config.tools.kubectl, args, (line) => processor.accept(line));

  if (exitCode !== 0) {
    logExitCode(exitCode, formatCommand(config.tools.kubectl, args));
    return exitCode;
  }

  return processor.finish();
}
