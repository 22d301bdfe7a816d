import { describe, expect, it } from "vitest";

import {
  clampFilename,
  DEFAULT_TRACE_SETTINGS,
  FILENAME_MAX_LENGTH,
  TraceSettingsStore,
} from "./settings.js";

describe("TraceSettingsStore", () => {
  it("starts from the defaults", () => {
    const store = new TraceSettingsStore();
    expect(store.snapshot()).toEqual({
      verbosity: true,
      colorfulness: true,
      autoNewline: true,
      showTrace: true,
      filename: "?",
    });
    expect(DEFAULT_TRACE_SETTINGS.filename).toBe("?");
  });

  it("updates a toggle", () => {
    const store = new TraceSettingsStore();
    expect(store.setToggle("autoNewline", false)).toEqual({ ok: true, value: undefined });
    expect(store.get("autoNewline")).toBe(false);
  });

  it("rejects a non-boolean toggle and keeps the old value", () => {
    const store = new TraceSettingsStore();
    // Untyped callers can still hand over anything.
    const parsed: boolean = JSON.parse("2");
    const rejected = store.setToggle("showTrace", parsed);
    expect(rejected).toMatchObject({
      ok: false,
      error: {
        code: "INVALID_CONFIG_VALUE",
        message: "Invalid show trace value: 2 (expected true or false)",
      },
    });
    expect(store.get("showTrace")).toBe(true);
  });

  it("clamps filenames to 31 code points", () => {
    const store = new TraceSettingsStore();
    store.setFilename("a".repeat(40));
    expect(store.get("filename")).toBe("a".repeat(FILENAME_MAX_LENGTH));
    expect(clampFilename("main.c")).toBe("main.c");
  });

  it("rejects an empty filename", () => {
    const store = new TraceSettingsStore();
    store.setFilename("app");
    const result = store.setFilename("");
    expect(result.ok).toBe(false);
    expect(store.get("filename")).toBe("app");
  });

  it("applies a partial update all at once", () => {
    const store = new TraceSettingsStore();
    expect(store.apply({ colorfulness: false, filename: "svc.ts" }).ok).toBe(true);
    expect(store.snapshot()).toMatchObject({ colorfulness: false, filename: "svc.ts", verbosity: true });
  });

  it("applies nothing when any field is invalid", () => {
    const store = new TraceSettingsStore();
    const result = store.apply({ verbosity: false, showTrace: "no" });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("INVALID_CONFIG_VALUE");
      expect(result.error.message).toContain("showTrace:");
    }
    expect(store.get("verbosity")).toBe(true);
  });

  it("rejects unknown keys", () => {
    const store = new TraceSettingsStore();
    expect(store.apply({ loud: true }).ok).toBe(false);
  });

  it("returns frozen snapshots that do not follow later changes", () => {
    const store = new TraceSettingsStore();
    const before = store.snapshot();
    store.setToggle("colorfulness", false);
    expect(before.colorfulness).toBe(true);
    expect(Object.isFrozen(before)).toBe(true);
  });

  it("resets to the defaults", () => {
    const store = new TraceSettingsStore({ verbosity: false, filename: "x.ts" });
    store.reset();
    expect(store.snapshot()).toEqual(DEFAULT_TRACE_SETTINGS);
  });
});
