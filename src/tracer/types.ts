export const PRINT_CATEGORIES = ["standard", "warning", "error", "custom"] as const;
export type PrintCategory = (typeof PRINT_CATEGORIES)[number];

export const STREAM_CATEGORIES = ["standard", "warning", "error"] as const;
export type StreamCategory = (typeof STREAM_CATEGORIES)[number];

/**
 * Anything the tracer can write to: `process.stdout`, an `fs.WriteStream`, a
 * socket, a `PassThrough`. The optional flags are read when present.
 */
export type TraceDestination = NodeJS.WritableStream & {
  isTTY?: boolean;
  destroyed?: boolean;
  writableEnded?: boolean;
};

export type RedirectFlags = {
  /** stdout is not an interactive terminal. */
  standard: boolean;
  /** stderr is not an interactive terminal. */
  error: boolean;
};

export function isStreamCategory(value: unknown): value is StreamCategory {
  return STREAM_CATEGORIES.some((category) => category === value);
}

export function isTraceDestination(value: unknown): value is TraceDestination {
  if (!value || typeof value !== "object") return false;
  return (
    "write" in value &&
    typeof value.write === "function" &&
    "on" in value &&
    typeof value.on === "function"
  );
}
