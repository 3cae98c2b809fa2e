/**
 * kubefilter - filter kubectl tables by column and act on matching resources.
 *
 * This is the library entry point; the `kf` command lives in cli.ts.
 */

export { VERSION } from "./constants.js";
export { type RowAction, assertActionSupported, isFailFast } from "./actions.js";
export { type RunConfig, type ToolPaths, createConfig } from "./config.js";
export {
  KubefilterError,
  ConfigError,
  LayoutError,
  ValidationError,
  CommandError,
  CommandNotFoundError,
} from "./errors.js";
export { type CommandRunner, type ExecResult, execaRunner, formatCommand } from "./exec.js";
export { type DispatchDeps, RowDispatcher } from "./dispatcher.js";
export { RowProcessor } from "./pipeline.js";
export { run } from "./commands/run.js";
export { parseMatchSpec, parseFilterExpression } from "./validation.js";
export * from "./table/index.js";
export * from "./kubectl/index.js";
