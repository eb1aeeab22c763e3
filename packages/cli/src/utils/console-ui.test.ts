import { describe, expect, it } from "vitest";
import { formatTable } from "./console-ui.js";

describe("console table", () => {
  it("aligns columns", () => {
    expect(
      formatTable([
        { arch: "linux/amd64", host: "ssh a" },
        { arch: "arm", host: null },
      ]),
    ).toEqual([
      "arch        | host",
      "------------|------",
      "linux/amd64 | ssh a",
      "arm         |",
    ]);
  });

  it("handles empty data", () => {
    expect(formatTable([])).toEqual(["(none)"]);
  });
});
