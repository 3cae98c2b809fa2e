/**
 * Constants module for kubefilter.
 *
 * Shared constants are defined here (SSOT).
 */

// === Version (SSOT: package.json) ===
import pkg from "../package.json" with { type: "json" };
export const VERSION: string = pkg.version;

export const CLI_NAME = "kf";

// === Row actions ===
/** Command run by `kf shell` when none is configured. */
export const DEFAULT_SHELL_COMMAND: readonly string[] = ["sh"];

/** Default path for `kf build`. */
export const DEFAULT_BUILD_PATH = ".";

// === Output ===
export const FIELD_SEPARATOR = "\t";

export const NO_MATCHES_WARNING = "No rows matched; check the filters";
