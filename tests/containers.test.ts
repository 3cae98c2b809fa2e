import { describe, expect, it } from "vitest";

import { ConfigError } from "../src/errors.js";
import { parseContainerNames } from "../src/kubectl/containers.js";

describe("parseContainerNames", () => {
  it("reads spec.containers of a pod", () => {
    const pod = { kind: "Pod", spec: { containers: [{ name: "app", image: "web:1" }, { name: "sidecar" }] } };
    expect(parseContainerNames(JSON.stringify(pod))).toEqual(["app", "sidecar"]);
  });

  it("reads the pod template of a workload", () => {
    const deployment = { kind: "Deployment", spec: { template: { spec: { containers: [{ name: "web" }] } } } };
    expect(parseContainerNames(JSON.stringify(deployment))).toEqual(["web"]);
  });

  it("skips entries without a name", () => {
    expect(parseContainerNames(JSON.stringify({ spec: { containers: [{ image: "x" }, { name: "b" }] } }))).toEqual(["b"]);
  });

  it("returns an empty list for an empty container list", () => {
    expect(parseContainerNames(JSON.stringify({ spec: { containers: [] } }))).toEqual([]);
  });

  it("rejects a resource without containers", () => {
    expect(() => parseContainerNames(JSON.stringify({ kind: "Service", spec: { ports: [] } }))).toThrow(
      new ConfigError("Resource has no container list (spec.containers)")
    );
  });

  it("rejects output that is not JSON", () => {
    expect(() => parseContainerNames("Error from server (NotFound)")).toThrow(ConfigError);
  });
});
