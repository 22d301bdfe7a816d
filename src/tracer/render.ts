import { RESET } from "../terminal/styles.js";
import { formatMessage } from "./format.js";
import { buildTraceHeader } from "./header.js";
import type { TraceSettings } from "./settings.js";
import type { PrintCategory } from "./types.js";

export type RenderInput = {
  category: PrintCategory;
  fn: string;
  style: string;
  template: string;
  args: readonly unknown[];
};

export type RenderContext = {
  settings: Readonly<TraceSettings>;
  /** Colorfulness after the redirect override for this call. */
  colorful: boolean;
  time: Date;
  capacity: number;
};

const CATEGORY_TAGS: Partial<Record<PrintCategory, string>> = {
  warning: "[WARNING] ",
  error: "[ERROR] ",
};

/**
 * Splits one print into the writes it is made of, in order: styled header,
 * tag or separator, body, reset, newline. Empty pieces are dropped.
 */
export function renderPrintSegments(input: RenderInput, ctx: RenderContext): string[] {
  const segments: string[] = [];
  const { settings, colorful } = ctx;
  if (settings.showTrace) {
    const header = buildTraceHeader({ time: ctx.time, filename: settings.filename, fn: input.fn });
    segments.push(colorful ? `${input.style}${header}` : header);
  }
  const tag = CATEGORY_TAGS[input.category];
  if (tag) {
    segments.push(tag);
  } else if (settings.showTrace) {
    segments.push(" ");
  }
  segments.push(formatMessage(input.template, input.args, ctx.capacity).text);
  if (colorful) segments.push(RESET);
  if (settings.autoNewline) segments.push("\n");
  return segments.filter((segment) => segment.length > 0);
}
