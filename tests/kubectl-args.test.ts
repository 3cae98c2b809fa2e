import { describe, expect, it } from "vitest";

import {
  DEFAULT_SCOPE,
  apiResourcesArgs,
  buildArgs,
  containersArgs,
  deleteArgs,
  editArgs,
  execArgs,
  explainArgs,
  getOneArgs,
  listArgs,
  logsArgs,
  reconcileArgs,
} from "../src/kubectl/args.js";

const pod = { namespace: "default", name: "web-1" };

describe("listArgs", () => {
  it("lists a kind in the current namespace", () => {
    expect(listArgs("pods", DEFAULT_SCOPE)).toEqual(["get", "pods"]);
  });

  it("applies context, all-namespaces, selector and wide", () => {
    const scope = { context: "dev", namespace: "apps", allNamespaces: true, selector: "app=web", wide: true };
    expect(listArgs("pods", scope)).toEqual([
      "--context", "dev", "get", "pods", "--all-namespaces", "-l", "app=web", "-o", "wide",
    ]);
  });

  it("lists one namespace", () => {
    expect(listArgs("pods", { ...DEFAULT_SCOPE, namespace: "apps" })).toEqual(["get", "pods", "-n", "apps"]);
  });
});

describe("per-row commands", () => {
  it("uses the row's namespace", () => {
    expect(deleteArgs("pods", pod, { ...DEFAULT_SCOPE, namespace: "other" })).toEqual([
      "delete", "pods", "web-1", "-n", "default",
    ]);
  });

  it("falls back to the listed namespace for rows without one", () => {
    expect(editArgs("pods", { name: "web-1" }, { ...DEFAULT_SCOPE, namespace: "apps" })).toEqual([
      "edit", "pods", "web-1", "-n", "apps",
    ]);
  });

  it("passes no namespace for cluster-scoped rows", () => {
    expect(deleteArgs("namespaces", { name: "old" }, DEFAULT_SCOPE)).toEqual(["delete", "namespaces", "old"]);
  });

  it("fetches one resource in a format", () => {
    expect(getOneArgs("pods", pod, { ...DEFAULT_SCOPE, context: "dev" }, "yaml")).toEqual([
      "--context", "dev", "get", "pods", "web-1", "-n", "default", "-o", "yaml",
    ]);
  });

  it("reads the resource as JSON for its containers", () => {
    expect(containersArgs("pods", pod, DEFAULT_SCOPE)).toEqual([
      "get", "pods", "web-1", "-n", "default", "-o", "json",
    ]);
  });
});

describe("logsArgs", () => {
  it("follows all containers by default", () => {
    expect(logsArgs("pods", pod, DEFAULT_SCOPE, { follow: true })).toEqual([
      "logs", "pods/web-1", "-n", "default", "-f", "--all-containers=true",
    ]);
  });

  it("scopes to one container", () => {
    expect(logsArgs("pods", pod, DEFAULT_SCOPE, { container: "app", follow: false })).toEqual([
      "logs", "pods/web-1", "-n", "default", "-c", "app",
    ]);
  });
});

describe("execArgs", () => {
  it("builds an exec with the command after --", () => {
    const options = { container: "app", stdin: true, tty: false, command: ["bash", "-l"] };
    expect(execArgs("pods", { name: "web-1" }, { ...DEFAULT_SCOPE, namespace: "apps" }, options)).toEqual([
      "exec", "-i", "pods/web-1", "-n", "apps", "-c", "app", "--", "bash", "-l",
    ]);
  });

  it("allocates a TTY when asked", () => {
    const options = { container: "app", stdin: true, tty: true, command: ["sh"] };
    expect(execArgs("pods", pod, DEFAULT_SCOPE, options)).toEqual([
      "exec", "-i", "-t", "pods/web-1", "-n", "default", "-c", "app", "--", "sh",
    ]);
  });
});

describe("other tools", () => {
  it("reconciles a kustomization with its source", () => {
    expect(reconcileArgs({ namespace: "flux-system", name: "infra" }, DEFAULT_SCOPE)).toEqual([
      "reconcile", "kustomization", "infra", "-n", "flux-system", "--with-source",
    ]);
  });

  it("lists api resources in the selected context", () => {
    expect(apiResourcesArgs({ ...DEFAULT_SCOPE, context: "dev" })).toEqual(["--context", "dev", "api-resources"]);
  });

  it("explains a kind", () => {
    expect(explainArgs("pods.spec", DEFAULT_SCOPE, true)).toEqual(["explain", "pods.spec", "--recursive"]);
    expect(explainArgs("pods", DEFAULT_SCOPE, false)).toEqual(["explain", "pods"]);
  });

  it("builds a kustomization", () => {
    expect(buildArgs("overlays/dev")).toEqual(["build", "overlays/dev"]);
  });
});
