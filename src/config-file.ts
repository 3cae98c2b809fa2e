/**
 * Configuration file support for kubefilter.
 *
 * Loads defaults from kf.yaml or .kfrc files.
 *
 * Config file locations (in order of precedence):
 *   1. ./kf.yaml, ./kf.yml or ./.kfrc (working directory)
 *   2. ~/.kf/config.yaml (global)
 *
 * Dependency direction:
 *   This module imports from: errors.ts, logger.ts
 *   It should NOT import from: cli, commands
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

import { ConfigError } from "./errors.js";
import { log } from "./logger.js";

/**
 * kubefilter configuration file options.
 * All fields are optional - CLI flags take precedence.
 */
export interface KfFileConfig {
  // Tool binaries
  kubectl?: string;
  flux?: string;
  kustomize?: string;

  // Cluster scope
  context?: string;
  namespace?: string;

  // Output
  preserveColumns?: boolean;

  /** Command run by `kf shell` when none is given, e.g. "bash -l". */
  shell?: string;
}

const PROJECT_CONFIG_FILES = ["kf.yaml", "kf.yml", ".kfrc"];

export function globalConfigPath(home: string = homedir()): string {
  return join(home, ".kf", "config.yaml");
}

/**
 * Parse YAML-like config (flat `key: value` lines, `#` comments).
 */
export function parseSimpleYaml(content: string): Record<string, string | boolean> {
  const result: Record<string, string | boolean> = {};

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.startsWith("#") || trimmed === "") {
      continue;
    }

    const match = trimmed.match(/^([a-zA-Z_][a-zA-Z0-9_-]*):\s*(.*)$/);
    if (!match) {
      continue;
    }
    const [, key, value] = match;
    if (key === undefined || value === undefined) {
      continue;
    }

    const cleanValue = value.replace(/^["']|["']$/g, "").trim();
    if (cleanValue === "true") {
      result[key] = true;
    } else if (cleanValue === "false") {
      result[key] = false;
    } else if (cleanValue !== "") {
      result[key] = cleanValue;
    }
  }

  return result;
}

const STRING_KEYS = ["kubectl", "flux", "kustomize", "context", "namespace", "shell"] as const;

/**
 * Map parsed key/value pairs onto KfFileConfig, warning about mistyped values.
 */
export function toFileConfig(parsed: Record<string, string | boolean>, source: string): KfFileConfig {
  const config: KfFileConfig = {};

  for (const key of STRING_KEYS) {
    const value = parsed[key];
    if (typeof value === "string") {
      config[key] = value;
    } else if (value !== undefined) {
      log.warn(`${source}: '${key}' must be a string, ignoring`);
    }
  }

  const preserve = parsed.preserveColumns;
  if (typeof preserve === "boolean") {
    config.preserveColumns = preserve;
  } else if (preserve !== undefined) {
    log.warn(`${source}: 'preserveColumns' must be true or false, ignoring`);
  }

  return config;
}

/**
 * Load configuration from one file, or null if it does not exist.
 *
 * @throws ConfigError if the file exists but cannot be read.
 */
export function loadConfigFile(path: string): KfFileConfig | null {
  if (!existsSync(path)) {
    return null;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read config file ${path}: ${reason}`);
  }

  log.debug(`Loaded config: ${path}`);
  return toFileConfig(parseSimpleYaml(content), path);
}

function loadProjectConfig(dir: string): KfFileConfig | null {
  for (const filename of PROJECT_CONFIG_FILES) {
    const config = loadConfigFile(join(dir, filename));
    if (config) {
      return config;
    }
  }
  return null;
}

/**
 * Merge configurations; later values override earlier ones.
 */
export function mergeConfigs(...configs: (KfFileConfig | null)[]): KfFileConfig {
  const result: KfFileConfig = {};
  for (const config of configs) {
    if (!config) {continue;}
    for (const key of STRING_KEYS) {
      const value = config[key];
      if (value !== undefined) {result[key] = value;}
    }
    if (config.preserveColumns !== undefined) {result.preserveColumns = config.preserveColumns;}
  }
  return result;
}

/**
 * Load kubefilter configuration: global file, then the working directory's.
 * CLI flags should be applied on top of the returned config.
 */
export function loadKfConfig(dir: string = process.cwd(), home: string = homedir()): KfFileConfig {
  return mergeConfigs(loadConfigFile(globalConfigPath(home)), loadProjectConfig(dir));
}
