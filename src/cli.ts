#!/usr/bin/env node
/**
 * CLI entry point for kubefilter.
 *
 * Commander.js-based CLI: one subcommand per row action, plus the explain and
 * build passthroughs.
 */

import { Command, CommanderError } from "commander";

import type { RowAction } from "./actions.js";
import { splitAtDoubleDash, tailFor } from "./argv.js";
import { build } from "./commands/build.js";
import { explain } from "./commands/explain.js";
import { run } from "./commands/run.js";
import { loadKfConfig, type KfFileConfig } from "./config-file.js";
import { createConfig, shellCommand, toolsFromFile, type RunConfig } from "./config.js";
import { CLI_NAME, DEFAULT_BUILD_PATH, VERSION } from "./constants.js";
import type { DispatchDeps } from "./dispatcher.js";
import { handleFatalError } from "./error-handler.js";
import { EXIT_USAGE } from "./errors.js";
import { execaRunner } from "./exec.js";
import type { KubectlScope } from "./kubectl/args.js";
import { enableQuietMode, LogLevel, setLogLevel, stdoutOutput } from "./logger.js";
import { TerminalPrompt } from "./prompt-io.js";
import { parseMatchSpec } from "./validation.js";

/** Options defined on the root program. */
type GlobalOptions = {
  dryRun?: boolean;
  force?: boolean;
  preserveColumns?: boolean;
  headers?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  context?: string;
  namespace?: string;
  allNamespaces?: boolean;
  selector?: string;
  wide?: boolean;
};

const prompt = new TerminalPrompt();
const deps: DispatchDeps = { runner: execaRunner, output: stdoutOutput, confirm: prompt.confirm };

function scopeFrom(opts: GlobalOptions, file: KfFileConfig): KubectlScope {
  return {
    context: opts.context ?? file.context,
    namespace: opts.namespace ?? file.namespace,
    allNamespaces: opts.allNamespaces ?? false,
    selector: opts.selector,
    wide: opts.wide ?? false,
  };
}

function runConfigFrom(
  resource: string,
  filters: readonly string[],
  action: RowAction,
  command: Command,
  file: KfFileConfig
): RunConfig {
  const opts = command.optsWithGlobals<GlobalOptions>();
  return createConfig({
    resource,
    action,
    filters: parseMatchSpec(filters),
    scope: scopeFrom(opts, file),
    tools: toolsFromFile(file),
    dryRun: opts.dryRun ?? false,
    force: opts.force ?? false,
    preserveColumns: opts.preserveColumns ?? file.preserveColumns ?? false,
    headers: opts.headers ?? false,
  });
}

/**
 * Run a command body, turning its result or error into the process exit code.
 */
async function execute(body: () => Promise<number>): Promise<void> {
  try {
    process.exitCode = await body();
  } catch (error) {
    process.exitCode = handleFatalError(error);
  }
}

/**
 * Register a row-action subcommand: `kf NAME <kind> [filters...]`.
 */
function rowCommand(
  program: Command,
  shellTail: readonly string[],
  name: string,
  description: string,
  toAction: (options: Record<string, unknown>, file: KfFileConfig, tail: string[]) => RowAction
): Command {
  return program
    .command(name)
    .description(description)
    .argument("<kind>", "Resource kind (plural, singular or short name)")
    .argument("[filters...]", "Column filters: INDEX=REGEX or INDEX=!REGEX, comma-separated")
    .action(async (kind: string, filters: string[], options: Record<string, unknown>, command: Command) => {
      await execute(async () => {
        const tail = tailFor(name, shellTail);
        const file = loadKfConfig();
        const config = runConfigFrom(kind, filters, toAction(options, file, tail), command, file);
        return run(config, deps);
      });
    });
}

function stringOption(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  return typeof value === "string" ? value : undefined;
}

function createProgram(shellTail: readonly string[]): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description("Filter kubectl tables by column and act on the matching resources")
    .version(VERSION)
    .exitOverride()
    .option("-d, --dry-run", "Print commands instead of running them")
    .option("-F, --force", "Skip confirmations; warn and continue when a row's command fails")
    .option("-p, --preserve-columns", "Keep fixed-width columns instead of tab-separated output")
    .option("-H, --headers", "Print the header row (get)")
    .option("-v, --verbose", "Log every external command")
    .option("-q, --quiet", "Suppress diagnostics (data output is kept)")
    .option("--context <name>", "kubeconfig context")
    .option("-n, --namespace <namespace>", "Namespace to list")
    .option("-A, --all-namespaces", "List across all namespaces")
    .option("-l, --selector <selector>", "Label selector")
    .option("-w, --wide", "List with -o wide (more columns to filter on)")
    .hook("preAction", (_thisCommand, actionCommand) => {
      const opts = actionCommand.optsWithGlobals<GlobalOptions>();
      if (opts.quiet) {
        enableQuietMode();
      } else if (opts.verbose) {
        setLogLevel(LogLevel.DEBUG);
      }
    });

  rowCommand(program, shellTail, "get", "Print matching rows, or fetch each one with --output", (options) => {
    const output = stringOption(options, "output");
    return output ? { kind: "get-extended", output } : { kind: "get" };
  }).option("-o, --output <format>", "Fetch each matching resource in this format (yaml, json, ...)");

  rowCommand(program, shellTail, "delete", "Delete matching resources (asks per row unless --force)", () => ({
    kind: "delete",
  }));

  rowCommand(program, shellTail, "edit", "Edit matching resources one at a time", () => ({ kind: "edit" }));

  rowCommand(program, shellTail, "logs", "Show logs of matching resources", (options) => ({
    kind: "logs",
    container: stringOption(options, "container"),
    follow: options.follow === true,
  }))
    .option("-c, --container <name>", "Container (default: all containers)")
    .option("-f, --follow", "Stream new log lines");

  rowCommand(
    program,
    shellTail,
    "shell",
    "Open a shell in matching pods (command after --)",
    (options, file, tail) => ({
      kind: "shell",
      container: stringOption(options, "container"),
      command: shellCommand(tail, file),
      tty: options.tty !== false,
      stdin: options.stdin !== false,
    })
  )
    .option("-c, --container <name>", "Container (default: the pod's first container)")
    .option("--no-tty", "Do not allocate a TTY")
    .option("--no-stdin", "Do not attach stdin");

  rowCommand(program, shellTail, "containers", "List containers of matching resources", () => ({
    kind: "get-container",
  }));

  rowCommand(program, shellTail, "reconcile", "Reconcile matching flux kustomizations with their source", () => ({
    kind: "reconcile",
  }));

  program
    .command("explain")
    .description("Describe a resource kind's fields (kubectl explain)")
    .argument("<kind>", "Resource kind or field path, e.g. pods.spec")
    .option("-r, --recursive", "Show all nested fields")
    .action(async (kind: string, options: { recursive?: boolean }, command: Command) => {
      await execute(async () => {
        tailFor("explain", shellTail);
        const opts = command.optsWithGlobals<GlobalOptions>();
        const file = loadKfConfig();
        return explain(
          kind,
          {
            kubectl: toolsFromFile(file).kubectl,
            scope: scopeFrom(opts, file),
            recursive: options.recursive ?? false,
            dryRun: opts.dryRun ?? false,
          },
          deps
        );
      });
    });

  program
    .command("build")
    .description("Render a kustomization (kustomize build)")
    .argument("[path]", "Kustomization directory", DEFAULT_BUILD_PATH)
    .action(async (path: string, _options: unknown, command: Command) => {
      await execute(async () => {
        tailFor("build", shellTail);
        const opts = command.optsWithGlobals<GlobalOptions>();
        const file = loadKfConfig();
        return build(path, { kustomize: toolsFromFile(file).kustomize, dryRun: opts.dryRun ?? false }, deps);
      });
    });

  return program;
}

const { head, tail } = splitAtDoubleDash(process.argv);

try {
  await createProgram(tail).parseAsync(head);
} catch (error) {
  if (error instanceof CommanderError) {
    process.exitCode = error.exitCode === 0 ? 0 : EXIT_USAGE;
  } else {
    process.exitCode = handleFatalError(error);
  }
} finally {
  prompt.close();
}
