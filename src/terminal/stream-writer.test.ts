import { PassThrough } from "node:stream";

import { describe, expect, it, vi } from "vitest";

import { FailingSink, MemorySink } from "../test-utils/sinks.js";
import { TraceError } from "../tracer/errors.js";
import { createSafeStreamWriter } from "./stream-writer.js";

describe("createSafeStreamWriter", () => {
  it("resolves once the destination accepted the text", async () => {
    const writer = createSafeStreamWriter();
    const sink = new MemorySink();
    await writer.write(sink, "hello");
    await writer.write(sink, " world");
    expect(sink.chunks).toEqual(["hello", " world"]);
  });

  it("signals broken pipes once and closes the destination", async () => {
    const onBrokenPipe = vi.fn();
    const writer = createSafeStreamWriter({ onBrokenPipe });
    const sink = new FailingSink("EPIPE");

    await expect(writer.write(sink, "hello")).rejects.toMatchObject({
      code: "DESTINATION_UNAVAILABLE",
      message: "Write failed: write EPIPE",
    });
    expect(writer.isClosed(sink)).toBe(true);

    await expect(writer.write(sink, "again")).rejects.toMatchObject({
      message: "Destination closed after a broken pipe",
    });
    expect(onBrokenPipe).toHaveBeenCalledTimes(1);
  });

  it("wraps other write errors and reports the stream error", async () => {
    const onStreamError = vi.fn();
    const writer = createSafeStreamWriter({ onStreamError });
    const sink = new FailingSink("EACCES");

    const failure = await writer.write(sink, "x").catch((err: unknown) => err);
    expect(failure).toBeInstanceOf(TraceError);
    if (failure instanceof TraceError) {
      expect(failure.code).toBe("DESTINATION_UNAVAILABLE");
      expect(failure.cause).toMatchObject({ code: "EACCES" });
    }
    expect(writer.isClosed(sink)).toBe(false);
    await vi.waitFor(() => expect(onStreamError).toHaveBeenCalledTimes(1));
  });

  it("treats synchronous EIO throws as broken pipes", async () => {
    const onBrokenPipe = vi.fn();
    const writer = createSafeStreamWriter({ onBrokenPipe });
    const stream = new PassThrough();
    vi.spyOn(stream, "write").mockImplementation(() => {
      const err: NodeJS.ErrnoException = new Error("EIO");
      err.code = "EIO";
      throw err;
    });

    await expect(writer.write(stream, "hi")).rejects.toMatchObject({
      code: "DESTINATION_UNAVAILABLE",
    });
    expect(writer.isClosed(stream)).toBe(true);
    expect(onBrokenPipe).toHaveBeenCalledTimes(1);

    writer.reset();
    expect(writer.isClosed(stream)).toBe(false);
  });

  it("rejects ended destinations without writing", async () => {
    const writer = createSafeStreamWriter();
    const sink = new MemorySink();
    sink.end();
    await expect(writer.write(sink, "late")).rejects.toMatchObject({
      code: "DESTINATION_UNAVAILABLE",
      message: "Destination is closed",
    });
    expect(sink.chunks).toEqual([]);
  });
});
