import { describe, expect, it } from "vitest";

import { LayoutError } from "../src/errors.js";
import {
  UNBOUNDED,
  createLayout,
  decodeLine,
  detectColumns,
  encodeRow,
  rowTarget,
} from "../src/table/layout.js";

describe("detectColumns", () => {
  it("takes each width from the name plus its padding", () => {
    expect(detectColumns("NAME      STATUS   AGE")).toEqual([
      { name: "NAME", width: 10 },
      { name: "STATUS", width: 9 },
      { name: "AGE", width: UNBOUNDED },
    ]);
  });

  it("sums non-final widths to the start of the last column", () => {
    const header = "NAMESPACE   NAME          READY   STATUS";
    const columns = detectColumns(header);
    const bounded = columns.slice(0, -1).reduce((sum, c) => sum + c.width, 0);
    expect(columns.map((c) => c.name)).toEqual(["NAMESPACE", "NAME", "READY", "STATUS"]);
    expect(bounded).toBe(header.indexOf("STATUS"));
  });

  it("accepts digits, dashes and underscores in names", () => {
    expect(detectColumns("CLUSTER-IP   EXTERNAL_IP   P2").map((c) => c.name)).toEqual([
      "CLUSTER-IP",
      "EXTERNAL_IP",
      "P2",
    ]);
  });

  it("stops at the first token that is not a column name", () => {
    expect(detectColumns("NAME   PORT(S)   AGE")).toEqual([{ name: "NAME", width: UNBOUNDED }]);
  });

  it("ignores trailing padding and a line terminator after the last name", () => {
    expect(detectColumns("NAME   AGE   \r\n")).toEqual([
      { name: "NAME", width: 7 },
      { name: "AGE", width: UNBOUNDED },
    ]);
  });

  it.each(["", "   NAME   AGE", "name   age"])("rejects header %j with no columns", (header) => {
    expect(() => detectColumns(header)).toThrow(LayoutError);
  });
});

describe("decodeLine", () => {
  const columns = detectColumns("NAME      STATUS   AGE");

  it("splits a line at the column widths", () => {
    expect(decodeLine(columns, "nginx-1   Running  5d")).toEqual(["nginx-1", "Running", "5d"]);
  });

  it("keeps spaces inside the last column", () => {
    const message = detectColumns("NAME   MESSAGE");
    expect(decodeLine(message, "job-a  Back-off restarting failed")).toEqual([
      "job-a",
      "Back-off restarting failed",
    ]);
  });

  it("fills fields missing from a short line with empty strings", () => {
    expect(decodeLine(columns, "pod-x")).toEqual(["pod-x", "", ""]);
  });

  it("drops the line terminator", () => {
    expect(decodeLine(columns, "pod-x     Running  1d\r\n")).toEqual(["pod-x", "Running", "1d"]);
  });
});

describe("encodeRow", () => {
  const columns = detectColumns("NAME      STATUS   AGE");

  it("pads fields to their widths", () => {
    expect(encodeRow(columns, ["web-1", "Running", "12d"])).toBe("web-1     Running  12d");
  });

  it("round-trips fields that fit their columns", () => {
    const fields = ["web-1", "Running", "12d ago"];
    expect(decodeLine(columns, encodeRow(columns, fields))).toEqual(fields);
  });

  it("cuts a field longer than its column", () => {
    expect(encodeRow(columns, ["a-very-long-name", "Running", "1d"])).toBe("a-very-lonRunning  1d");
  });

  it("pads missing fields", () => {
    expect(encodeRow(columns, ["x"])).toBe(`x${" ".repeat(18)}`);
  });
});

describe("createLayout", () => {
  it("marks a listing namespaced when the first column is NAMESPACE", () => {
    expect(createLayout("NAMESPACE   NAME    STATUS").namespaced).toBe(true);
    expect(createLayout("NAME    NAMESPACE   STATUS").namespaced).toBe(false);
  });

  it("reads namespace and name from columns 0 and 1 when namespaced", () => {
    const layout = createLayout("NAMESPACE   NAME    STATUS");
    expect(rowTarget(layout, ["default", "pod-a", "Running"])).toEqual({ namespace: "default", name: "pod-a" });
  });

  it("reads only the name from column 0 otherwise", () => {
    const layout = createLayout("NAME    STATUS   AGE");
    expect(rowTarget(layout, ["pod-a", "Running", "1d"])).toEqual({ name: "pod-a" });
  });
});
