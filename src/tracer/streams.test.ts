import { describe, expect, it } from "vitest";

import { MemorySink } from "../test-utils/sinks.js";
import { StreamRegistry } from "./streams.js";

function boundRegistry(stdoutTTY: boolean, stderrTTY: boolean) {
  const stdout = new MemorySink({ isTTY: stdoutTTY });
  const stderr = new MemorySink({ isTTY: stderrTTY });
  const registry = new StreamRegistry();
  const flags = registry.bind({ stdout, stderr });
  return { registry, stdout, stderr, flags };
}

describe("StreamRegistry", () => {
  it("maps standard to stdout and warning and error to stderr", () => {
    const { registry, stdout, stderr } = boundRegistry(true, true);
    expect(registry.get("standard")).toEqual({ ok: true, value: stdout });
    expect(registry.get("warning")).toEqual({ ok: true, value: stderr });
    expect(registry.get("error")).toEqual({ ok: true, value: stderr });
  });

  it("derives redirect flags from the terminal check", () => {
    const { registry, flags } = boundRegistry(true, false);
    expect(flags).toEqual({ standard: false, error: true });
    expect(registry.isRedirected("standard")).toBe(false);
    expect(registry.isRedirected("warning")).toBe(true);
    expect(registry.isRedirected("error")).toBe(true);
    expect(registry.isRedirected("custom")).toBe(false);
  });

  it("keeps redirect flags when a stream is replaced", () => {
    const { registry } = boundRegistry(false, true);
    const tty = new MemorySink({ isTTY: true });
    expect(registry.set("standard", tty).ok).toBe(true);
    expect(registry.get("standard")).toEqual({ ok: true, value: tty });
    expect(registry.redirectFlags()).toEqual({ standard: true, error: false });
  });

  it("rejects unknown categories", () => {
    const { registry } = boundRegistry(true, true);
    const set = registry.set("custom", new MemorySink());
    expect(set.ok).toBe(false);
    if (!set.ok) expect(set.error.code).toBe("INVALID_CATEGORY");
    const get = registry.get("debug");
    expect(get.ok).toBe(false);
    if (!get.ok) expect(get.error.code).toBe("INVALID_CATEGORY");
  });

  it("rejects destinations that are not writable streams", () => {
    const { registry, stdout } = boundRegistry(true, true);
    const result = registry.set("standard", { write: "nope" });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("INVALID_CONFIG_VALUE");
    expect(registry.get("standard")).toEqual({ ok: true, value: stdout });
  });

  it("reports unbound lookups as uninitialized", () => {
    const registry = new StreamRegistry();
    const result = registry.get("standard");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("UNINITIALIZED_STATE");

    const { registry: bound } = boundRegistry(true, true);
    bound.unbind();
    const after = bound.get("error");
    expect(after.ok).toBe(false);
  });
});
