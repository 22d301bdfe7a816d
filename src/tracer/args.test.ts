import { describe, expect, it } from "vitest";

import { parseTraceFlags } from "./args.js";

describe("parseTraceFlags", () => {
  it("defaults to loud and colorful", () => {
    expect(parseTraceFlags(["node", "app"])).toEqual({ silent: false, color: true });
    expect(parseTraceFlags([])).toEqual({ silent: false, color: true });
  });

  it("reads the long flags", () => {
    expect(parseTraceFlags(["node", "app", "--silent", "--no-color"])).toEqual({
      silent: true,
      color: false,
    });
  });

  it("reads the short flags", () => {
    expect(parseTraceFlags(["node", "app", "-s"])).toEqual({ silent: true, color: true });
    expect(parseTraceFlags(["node", "app", "-n"])).toEqual({ silent: false, color: false });
  });

  it("ignores the host program's own arguments", () => {
    expect(parseTraceFlags(["node", "app", "--port", "8080", "input.txt", "-s"])).toEqual({
      silent: true,
      color: true,
    });
  });
});
