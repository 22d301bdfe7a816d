import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { readTraceConfigFile, resolveConfigPath } from "./config.js";

let tmpDir = "";

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "linetrace-config-"));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function writeConfig(contents: string): string {
  const file = path.join(tmpDir, "linetrace.json5");
  fs.writeFileSync(file, contents, "utf-8");
  return file;
}

describe("resolveConfigPath", () => {
  it("prefers the explicit path", () => {
    expect(resolveConfigPath("/etc/a.json5", { LINETRACE_CONFIG: "/etc/b.json5" })).toBe(
      "/etc/a.json5",
    );
  });

  it("falls back to LINETRACE_CONFIG", () => {
    expect(resolveConfigPath(undefined, { LINETRACE_CONFIG: "cfg/x.json5" })).toBe(
      path.resolve("cfg/x.json5"),
    );
  });

  it("returns undefined when nothing is configured", () => {
    expect(resolveConfigPath(undefined, {})).toBeUndefined();
    expect(resolveConfigPath("  ", { LINETRACE_CONFIG: "" })).toBeUndefined();
  });
});

describe("readTraceConfigFile", () => {
  it("parses JSON5 settings", () => {
    const file = writeConfig("{\n  // quiet by default\n  verbosity: false,\n  filename: 'svc',\n}\n");
    expect(readTraceConfigFile(file)).toEqual({
      ok: true,
      value: { verbosity: false, filename: "svc" },
    });
  });

  it("treats a missing file as no settings", () => {
    expect(readTraceConfigFile(path.join(tmpDir, "absent.json5"))).toEqual({
      ok: true,
      value: undefined,
    });
  });

  it("reports unparsable files", () => {
    const file = writeConfig("{ verbosity: ");
    const result = readTraceConfigFile(file);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("INVALID_CONFIG_VALUE");
      expect(result.error.message.startsWith(`Could not parse ${file}: `)).toBe(true);
    }
  });

  it("reports schema violations", () => {
    const file = writeConfig("{ showTrace: 'sometimes' }");
    const result = readTraceConfigFile(file);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message.startsWith(`Invalid config ${file}: showTrace:`)).toBe(true);
    }
  });
});
