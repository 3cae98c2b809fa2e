import { describe, expect, it } from "vitest";

import { CommandError, CommandNotFoundError } from "../src/errors.js";
import { execaRunner, formatCommand, quoteArg } from "../src/exec.js";

/** Run a node one-liner as the external tool. */
const NODE = process.execPath;
const MISSING_TOOL = "kf-test-no-such-binary";

describe("quoteArg", () => {
  it("leaves plain words alone", () => {
    expect(quoteArg("app=web")).toBe("app=web");
    expect(quoteArg("--all-containers=true")).toBe("--all-containers=true");
    expect(quoteArg("pods/web-1")).toBe("pods/web-1");
  });

  it("single-quotes words with shell metacharacters", () => {
    expect(quoteArg("tier in (web)")).toBe("'tier in (web)'");
    expect(quoteArg("")).toBe("''");
  });

  it("escapes embedded single quotes", () => {
    expect(quoteArg("it's")).toBe("'it'\\''s'");
  });
});

describe("formatCommand", () => {
  it("joins the command and quoted arguments", () => {
    expect(formatCommand("kubectl", ["get", "pods", "-l", "tier in (web)"])).toBe(
      "kubectl get pods -l 'tier in (web)'"
    );
  });
});

describe("execaRunner", () => {
  describe("capture", () => {
    it("returns stdout, stderr and the exit code", async () => {
      const result = await execaRunner.capture(NODE, [
        "-e",
        "console.log('pods'); console.error('warning'); process.exit(3)",
      ]);
      expect(result).toEqual({ exitCode: 3, stdout: "pods", stderr: "warning" });
    });

    it("maps a signal to 128 + its number", async () => {
      const result = await execaRunner.capture(NODE, ["-e", "process.kill(process.pid, 'SIGTERM')"]);
      expect(result.exitCode).toBe(143);
    });

    it("throws CommandNotFoundError for a missing binary", async () => {
      const result = execaRunner.capture(MISSING_TOOL, ["get", "pods"]);
      await expect(result).rejects.toBeInstanceOf(CommandNotFoundError);
      await expect(result).rejects.toMatchObject({ exitCode: 127, command: MISSING_TOOL });
    });
  });

  describe("inherit", () => {
    it("returns the exit code", async () => {
      await expect(execaRunner.inherit(NODE, ["-e", "process.exit(4)"])).resolves.toBe(4);
    });

    it("throws CommandNotFoundError for a missing binary", async () => {
      await expect(execaRunner.inherit(MISSING_TOOL, [])).rejects.toBeInstanceOf(CommandNotFoundError);
    });
  });

  describe("streamLines", () => {
    it("hands over each line, then the exit code", async () => {
      const lines: string[] = [];
      const code = await execaRunner.streamLines(
        NODE,
        ["-e", "console.log('NAME    STATUS'); console.log('web-1   Running'); process.exit(3)"],
        (line) => {
          lines.push(line);
        }
      );
      expect(lines).toEqual(["NAME    STATUS", "web-1   Running"]);
      expect(code).toBe(3);
    });

    it("stops the command and rethrows when a handler throws", async () => {
      const failure = new CommandError("Exit code 1, stopping: kubectl edit pods web-1", 1, "kubectl edit pods web-1");
      const lines: string[] = [];
      const started = Date.now();
      const result = execaRunner.streamLines(
        NODE,
        ["-e", "console.log('NAME'); console.log('web-1'); setInterval(() => console.log('web-2'), 50)"],
        (line) => {
          lines.push(line);
          if (line === "web-1") {
            throw failure;
          }
        }
      );
      await expect(result).rejects.toBe(failure);
      expect(lines).toEqual(["NAME", "web-1"]);
      expect(Date.now() - started).toBeLessThan(5000);
    });

    it("throws CommandNotFoundError for a missing binary", async () => {
      await expect(execaRunner.streamLines(MISSING_TOOL, ["get", "pods"], () => undefined)).rejects.toBeInstanceOf(
        CommandNotFoundError
      );
    });
  });
});
