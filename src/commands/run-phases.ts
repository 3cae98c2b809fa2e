/**
 * Run command phases for kubefilter.
 *
 * Phase 1: Resolve the requested resource kind against `kubectl api-resources`
 * and check the action applies to it, before any row is read.
 */

import { assertActionSupported } from "../actions.js";
import type { RunConfig } from "../config.js";
import { CommandError } from "../errors.js";
import { formatCommand, type CommandRunner } from "../exec.js";
import { apiResourcesArgs } from "../kubectl/args.js";
import { parseResourceKinds, resolveKind } from "../kubectl/resource-kinds.js";
import { log } from "../logger.js";

/**
 * Phase 1: Resolve the configured resource to its canonical plural kind.
 *
 * @throws CommandError if `kubectl api-resources` fails.
 * @throws ConfigError for an unknown kind or an unsupported action.
 */
export async function resolveResourceKind(config: RunConfig, runner: CommandRunner): Promise<string> {
  const { tools, scope } = config;
  const args = apiResourcesArgs(scope);
  const result = await runner.capture(tools.kubectl, args);

  if (result.exitCode !== 0) {
    const command = formatCommand(tools.kubectl, args);
    const detail = result.stderr.trim().split("\n")[0] ?? "";
    throw new CommandError(`Could not list resource kinds${detail ? `: ${detail}` : ""}`, result.exitCode, command);
  }

  const kind = resolveKind(parseResourceKinds(result.stdout), config.resource);
  log.debug(`Kind: ${config.resource} → ${kind}`);

  assertActionSupported(config.action, kind);
  return kind;
}
