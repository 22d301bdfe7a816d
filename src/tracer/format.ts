import util from "node:util";

import { z } from "zod";

/** Capacity of the message buffer, terminator included. */
export const MESSAGE_BUFFER_CAPACITY = 256;

export const MessageCapacitySchema = z.number().int().positive();

export type FormattedMessage = {
  text: string;
  truncated: boolean;
};

const DIRECTIVE_PATTERN = /%[sdifjoOc%]/g;

/** Number of arguments `template` consumes; `%%` consumes none. */
export function countDirectives(template: string): number {
  let count = 0;
  for (const match of template.matchAll(DIRECTIVE_PATTERN)) {
    if (match[0] !== "%%") count += 1;
  }
  return count;
}

/**
 * printf-style rendering (`%s %d %i %f %j %o %O %c %%`) bounded to
 * `capacity - 1` code points. Arguments beyond the template's directives are
 * dropped, not appended. Longer output is cut, never rejected.
 */
export function formatMessage(
  template: string,
  args: readonly unknown[],
  capacity: number = MESSAGE_BUFFER_CAPACITY,
): FormattedMessage {
  const used = args.slice(0, countDirectives(template));
  // util.format leaves a lone template untouched, `%%` included.
  const text = used.length > 0 ? util.format(template, ...used) : template.replace(/%%/g, "%");
  return truncateToCapacity(text, capacity);
}

export function truncateToCapacity(text: string, capacity: number): FormattedMessage {
  const limit = Math.max(0, Math.floor(capacity) - 1);
  // Fast path: UTF-16 length bounds the code point count from above.
  if (text.length <= limit) return { text, truncated: false };
  const points = Array.from(text);
  if (points.length <= limit) return { text, truncated: false };
  return { text: points.slice(0, limit).join(""), truncated: true };
}
