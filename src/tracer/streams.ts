import { fail, ok, type TraceResult } from "./errors.js";
import {
  isStreamCategory,
  isTraceDestination,
  type PrintCategory,
  type RedirectFlags,
  type StreamCategory,
  type TraceDestination,
} from "./types.js";

export type StandardStreams = {
  stdout: TraceDestination;
  stderr: TraceDestination;
};

function isInteractive(stream: TraceDestination): boolean {
  return stream.isTTY === true;
}

/**
 * Category → destination table. Redirect flags are probed once in `bind` and
 * never re-probed, even when a category is later pointed somewhere else.
 */
export class StreamRegistry {
  private streams: Map<StreamCategory, TraceDestination> | null = null;
  private redirected: RedirectFlags = { standard: false, error: false };

  bind(std: StandardStreams): RedirectFlags {
    this.redirected = Object.freeze({
      standard: !isInteractive(std.stdout),
      error: !isInteractive(std.stderr),
    });
    this.streams = new Map<StreamCategory, TraceDestination>([
      ["standard", std.stdout],
      ["warning", std.stderr],
      ["error", std.stderr],
    ]);
    return this.redirected;
  }

  unbind(): void {
    this.streams = null;
  }

  set(category: unknown, destination: unknown): TraceResult {
    if (!isStreamCategory(category)) {
      return fail(
        "INVALID_CATEGORY",
        `Invalid stream category: ${String(category)} (expected standard, warning or error)`,
      );
    }
    if (!isTraceDestination(destination)) {
      return fail("INVALID_CONFIG_VALUE", `Stream for ${category} must be a writable stream`);
    }
    if (!this.streams) {
      this.streams = new Map();
    }
    this.streams.set(category, destination);
    return ok();
  }

  get(category: unknown): TraceResult<TraceDestination> {
    if (!isStreamCategory(category)) {
      return fail("INVALID_CATEGORY", `Invalid stream category: ${String(category)}`);
    }
    const stream = this.streams?.get(category);
    if (!stream) {
      return fail("UNINITIALIZED_STATE", `No stream bound for ${category}; initialize first`);
    }
    return ok(stream);
  }

  /** Custom prints never count as redirected; their destination is the caller's choice. */
  isRedirected(category: PrintCategory): boolean {
    if (category === "standard") return this.redirected.standard;
    if (category === "warning" || category === "error") return this.redirected.error;
    return false;
  }

  redirectFlags(): RedirectFlags {
    return { ...this.redirected };
  }
}
