import path from "node:path";
import { fileURLToPath } from "node:url";

import { clampFilename, UNKNOWN_FILENAME } from "./settings.js";

export type TraceHeaderParts = {
  time: Date;
  filename: string;
  fn: string;
};

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local wall-clock time at second resolution. */
export function formatTraceTime(date: Date): string {
  return `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
}

export function buildTraceHeader(parts: TraceHeaderParts): string {
  return `[${formatTraceTime(parts.time)}][${parts.filename}][${parts.fn}]`;
}

/**
 * Accepts `import.meta.url`, `__filename` or any path and keeps the base name,
 * extension included.
 */
export function resolveSourceFilename(source: string | URL | undefined): string {
  if (source === undefined) return UNKNOWN_FILENAME;
  let filePath: string;
  try {
    filePath =
      source instanceof URL || source.startsWith("file:") ? fileURLToPath(source) : source;
  } catch {
    filePath = String(source);
  }
  const base = path.basename(filePath);
  return base ? clampFilename(base) : UNKNOWN_FILENAME;
}
