/**
 * Container names from a resource's JSON document.
 */

import { ConfigError } from "../errors.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function namesOf(spec: unknown): string[] | null {
  if (!isRecord(spec)) {
    return null;
  }
  const containers = spec.containers;
  if (!Array.isArray(containers)) {
    return null;
  }
  const names: string[] = [];
  for (const container of containers) {
    if (isRecord(container) && typeof container.name === "string") {
      names.push(container.name);
    }
  }
  return names;
}

/**
 * Read container names from `spec.containers`, or from
 * `spec.template.spec.containers` for workloads that wrap a pod template.
 *
 * @throws ConfigError when the document is not JSON or has no container list.
 */
export function parseContainerNames(json: string): string[] {
  let doc: unknown;
  try {
    doc = JSON.parse(json);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Could not parse resource JSON: ${reason}`);
  }

  const spec = isRecord(doc) ? doc.spec : undefined;
  const direct = namesOf(spec);
  if (direct !== null) {
    return direct;
  }

  const template = isRecord(spec) && isRecord(spec.template) ? spec.template.spec : undefined;
  const templated = namesOf(template);
  if (templated !== null) {
    return templated;
  }

  throw new ConfigError("Resource has no container list (spec.containers)");
}
